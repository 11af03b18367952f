/**
 * Pain Radar - Main Entry Point
 *
 * Orchestrates the complaint pipeline:
 * 1. Collection: Fetch candidate items from the configured connectors
 * 2. Ingestion: Store new items, skipping ones already seen
 * 3. Sentiment: Flag negative items
 * 4. Extraction: Turn unextracted items into scored pain points,
 *    tracked as one extraction session
 * 5. Scorecard: Summarize a session for display
 *
 * The discover and subreddit commands help pick which subreddits to watch.
 */

import { config } from './config';
import type { PainRadarConfig } from './config';
import { HackerNewsListener, RedditListener, ReviewsListener, collectCandidates } from './ingestion';
import type { Connector, SubredditSummary } from './ingestion';
import { createPipeline } from './pipeline';
import type { PainRadarPipeline } from './pipeline';
import { isPainPointCategory, isSeverity } from './types';
import type { ExtractionSessionResult, PainPointFilter, Scorecard } from './types';

export * from './errors';
export * from './types';
export * from './pipeline';
export { loadConfig } from './config';
export type { PainRadarConfig } from './config';

export class PainRadarBot {
  private pipeline: PainRadarPipeline;
  private connectors: Connector[];

  constructor(
    appConfig: PainRadarConfig = config,
    pipeline: PainRadarPipeline = createPipeline(appConfig),
    connectors: Connector[] = [
      new RedditListener(appConfig.reddit),
      new HackerNewsListener(appConfig.hackerNews),
      new ReviewsListener(appConfig.reviews),
    ],
    private reddit: RedditListener = new RedditListener(appConfig.reddit)
  ) {
    this.pipeline = pipeline;
    this.connectors = connectors;
  }

  /**
   * Collect from every connector and ingest the results
   */
  async collect(): Promise<void> {
    const candidates = await collectCandidates(this.connectors);
    const result = await this.pipeline.ingest(candidates);
    console.log(`✓ Ingested ${result.accepted} new items (${result.skipped} duplicates, ${result.invalid} invalid)\n`);
  }

  async runSentiment(limit?: number): Promise<void> {
    const result = await this.pipeline.runSentimentPass(limit);
    console.log(`✓ Sentiment pass: ${result.processed} items classified, ${result.negative} negative\n`);
  }

  async runExtraction(limit?: number): Promise<ExtractionSessionResult> {
    const result = await this.pipeline.runExtractionSession(limit);
    if (result.status === 'completed') {
      console.log(
        `✓ Session ${result.sessionName}: ${result.extracted} pain points from ${result.processed} items (${result.skipped} skipped) in ${result.durationSeconds}s\n`
      );
    } else {
      console.log(`✗ Session ${result.sessionName} failed: ${result.errorMessage}\n`);
    }
    return result;
  }

  /**
   * Run the complete pipeline and print the session scorecard
   */
  async run(): Promise<void> {
    console.log('\n╔════════════════════════════════════════════════════════╗');
    console.log('║                PAIN RADAR - STARTING                   ║');
    console.log('╚════════════════════════════════════════════════════════╝\n');

    console.log('📥 STEP 1: COLLECTION AND INGESTION');
    console.log('─────────────────────────────────────────────────────────\n');
    await this.collect();

    console.log('\n🌡️  STEP 2: SENTIMENT');
    console.log('─────────────────────────────────────────────────────────\n');
    await this.runSentiment();

    console.log('\n⚙️  STEP 3: PAIN POINT EXTRACTION');
    console.log('─────────────────────────────────────────────────────────\n');
    const result = await this.runExtraction();

    console.log('\n📋 STEP 4: SCORECARD');
    console.log('─────────────────────────────────────────────────────────\n');
    await this.printScorecard(result.sessionId);
  }

  async printScorecard(sessionId: string): Promise<void> {
    printScorecard(await this.pipeline.getScorecard(sessionId));
  }

  async printSessions(): Promise<void> {
    const sessions = await this.pipeline.listSessions();
    if (sessions.length === 0) {
      console.log('No extraction sessions yet.');
      return;
    }
    for (const session of sessions) {
      console.log(
        `${session.id}  ${session.status.padEnd(11)}  ${session.name}  (${session.painPointsExtracted} pain points, ${session.itemsProcessed} items)`
      );
    }
  }

  async printPainPoints(filter: PainPointFilter): Promise<void> {
    const painPoints = await this.pipeline.listPainPoints(filter);
    if (painPoints.length === 0) {
      console.log('No pain points match.');
      return;
    }
    painPoints.forEach((pp, i) => {
      console.log(`  ${i + 1}. [${pp.opportunityScore}] ${pp.problemStatement}`);
      console.log(`     ${pp.category} / ${pp.severity}${pp.tags.length > 0 ? ` / ${pp.tags.join(', ')}` : ''}`);
    });
  }

  async printStats(): Promise<void> {
    const stats = await this.pipeline.getStats();
    console.log('Pipeline Statistics:');
    console.log(`  Raw Items: ${stats.totalItems}`);
    console.log(`  Negative Items: ${stats.negativeItems}`);
    console.log(`  Pain Points: ${stats.totalPainPoints}`);
    console.log('  Categories:', stats.categories);
  }

  /**
   * List subreddits worth listening to: by topic when a category is given,
   * otherwise the popular ones
   */
  async discover(category?: string): Promise<void> {
    const subreddits = category
      ? await this.reddit.discoverSubredditsByCategory(category)
      : await this.reddit.discoverPopularSubreddits();
    printSubreddits(subreddits);
  }

  async printSubredditMetadata(name: string): Promise<void> {
    const metadata = await this.reddit.getSubredditMetadata(name);
    console.log(`${metadata.displayName}: ${metadata.title}`);
    console.log(`  Subscribers: ${metadata.subscribers} (${metadata.activeUsers} active)`);
    console.log(`  Created: ${metadata.createdAt}${metadata.nsfw ? '  NSFW' : ''}`);
    console.log(`  Submissions: ${metadata.submissionType}`);
    if (metadata.description) {
      console.log(`  ${metadata.description}`);
    }
    if (metadata.flairs.length > 0) {
      console.log(`  Flairs: ${metadata.flairs.map((flair) => flair.text).join(', ')}`);
    }
    metadata.rules.forEach((rule, i) => {
      console.log(`  Rule ${i + 1}: ${rule.shortName}`);
    });
  }

  async reconcile(): Promise<void> {
    const reconciled = await this.pipeline.reconcileStaleSessions();
    console.log(`✓ Marked ${reconciled.length} stale sessions as failed`);
  }
}

export function printScorecard(scorecard: Scorecard): void {
  console.log(`Session: ${scorecard.sessionName} (${scorecard.sessionId})`);
  console.log(`  Status: ${scorecard.status}`);
  console.log(`  Started: ${scorecard.startedAt}`);
  console.log(`  Duration: ${scorecard.duration}`);
  console.log(`  Pain Points: ${scorecard.totalPainPoints}`);
  console.log(`  Items Analyzed: ${scorecard.itemsAnalyzed} (${scorecard.itemsSkipped} skipped)`);
  console.log(`  Avg Opportunity Score: ${scorecard.avgOpportunityScore}`);
  console.log(`  Critical: ${scorecard.criticalCount}  High: ${scorecard.highCount}`);
  console.log(`  Top Category: ${scorecard.topCategory ?? 'none'}`);
  if (scorecard.errorMessage) {
    console.log(`  Error: ${scorecard.errorMessage}`);
  }
  if (scorecard.topOpportunities.length > 0) {
    console.log('\nTop Opportunities:');
    scorecard.topOpportunities.forEach((op, i) => {
      console.log(`  ${i + 1}. [${op.score}] ${op.problem} (${op.category}, ${op.severity})`);
    });
  }
  console.log('');
}

export function printSubreddits(subreddits: SubredditSummary[]): void {
  if (subreddits.length === 0) {
    console.log('No subreddits found.');
    return;
  }
  for (const subreddit of subreddits) {
    console.log(`${subreddit.displayName.padEnd(28)} ${String(subreddit.subscribers).padStart(10)}  ${subreddit.title}`);
  }
}

function parseLimit(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const limit = parseInt(value, 10);
  return Number.isNaN(limit) || limit <= 0 ? undefined : limit;
}

/**
 * Build a pain point filter from positional CLI arguments:
 *   [category] [severity] [minScore]
 * "any" or "-" leaves a position unset.
 */
export function parsePainPointFilter(args: string[]): PainPointFilter {
  const [category, severity, minScore] = args;
  const filter: PainPointFilter = {};

  if (isPainPointCategory(category)) {
    filter.category = category;
  }
  if (isSeverity(severity)) {
    filter.severity = severity;
  }
  const score = parseInt(minScore || '', 10);
  if (!Number.isNaN(score)) {
    filter.minScore = score;
  }

  return filter;
}

const USAGE =
  'Available commands: run, collect, sentiment [limit], extract [limit], scorecard <sessionId>, sessions, pain-points [category] [severity] [minScore], stats, reconcile, discover [category], subreddit <name>';

/**
 * CLI Entry Point
 */
async function main() {
  const args = process.argv.slice(2);
  const command = args[0] || 'run';

  const bot = new PainRadarBot();

  switch (command) {
    case 'run':
      await bot.run();
      break;
    case 'collect':
      await bot.collect();
      break;
    case 'sentiment':
      await bot.runSentiment(parseLimit(args[1]));
      break;
    case 'extract': {
      const result = await bot.runExtraction(parseLimit(args[1]));
      if (result.status === 'failed') {
        process.exitCode = 1;
      }
      break;
    }
    case 'scorecard':
      if (!args[1]) {
        console.log('Usage: scorecard <sessionId>');
        process.exit(1);
      }
      await bot.printScorecard(args[1]);
      break;
    case 'sessions':
      await bot.printSessions();
      break;
    case 'pain-points':
      await bot.printPainPoints(parsePainPointFilter(args.slice(1)));
      break;
    case 'stats':
      await bot.printStats();
      break;
    case 'reconcile':
      await bot.reconcile();
      break;
    case 'discover':
      await bot.discover(args[1]);
      break;
    case 'subreddit':
      if (!args[1]) {
        console.log('Usage: subreddit <name>');
        process.exit(1);
      }
      await bot.printSubredditMetadata(args[1]);
      break;
    default:
      console.log(`Unknown command. ${USAGE}`);
      process.exit(1);
  }
}

// Run if called directly
if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export default PainRadarBot;
