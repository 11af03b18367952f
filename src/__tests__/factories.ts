import type { ExtractionOutcome, ExtractionAdapter, SentimentClassifier } from '../processing';
import type { CandidateItem, ExtractionSession, PainPointCategory, RawItem, SentimentResult, Severity } from '../types';

export function candidate(externalId: string, content: string, overrides: Partial<CandidateItem> = {}): CandidateItem {
  return { externalId, source: 'reddit', content, ...overrides };
}

export function rawItem(externalId: string, content: string, overrides: Partial<RawItem> = {}): RawItem {
  return {
    externalId,
    source: 'reddit',
    content,
    author: null,
    url: null,
    originTimestamp: null,
    metadata: {},
    isNegative: null,
    sentimentScore: null,
    processed: false,
    ingestedAt: '2026-03-01T09:00:00.000Z',
    ...overrides,
  };
}

export function inProgressSession(id: string, startedAt: string): ExtractionSession {
  return {
    id,
    name: `Session ${id}`,
    status: 'in_progress',
    itemsProcessed: 0,
    painPointsExtracted: 0,
    itemsSkipped: 0,
    avgOpportunityScore: null,
    highSeverityCount: 0,
    criticalSeverityCount: 0,
    categoryBreakdown: {},
    severityBreakdown: {},
    startedAt,
    completedAt: null,
    durationSeconds: null,
    errorMessage: null,
  };
}

export function extracted(problemStatement: string, category: PainPointCategory, severity: Severity): ExtractionOutcome {
  return {
    ok: true,
    fields: {
      problemStatement,
      category,
      severity,
      context: null,
      suggestedSolution: null,
      tags: [],
      targetAudience: null,
      relatedIndustry: null,
    },
  };
}

/**
 * Extraction adapter answering from a content -> outcome table.
 * Unknown content throws, like a failed API call.
 */
export class ScriptedExtractionAdapter implements ExtractionAdapter {
  readonly name = 'scripted';
  readonly calls: string[] = [];

  constructor(private replies: Record<string, ExtractionOutcome>) {}

  async extract(text: string): Promise<ExtractionOutcome> {
    this.calls.push(text);
    const reply = this.replies[text];
    if (!reply) {
      throw new Error(`No scripted reply for "${text}"`);
    }
    return reply;
  }
}

export class ScriptedSentimentClassifier implements SentimentClassifier {
  readonly name = 'scripted';
  readonly calls: string[] = [];

  constructor(private replies: Record<string, SentimentResult>) {}

  async classify(text: string): Promise<SentimentResult> {
    this.calls.push(text);
    const reply = this.replies[text];
    if (!reply) {
      throw new Error(`No scripted sentiment for "${text}"`);
    }
    return reply;
  }
}
