/**
 * Pain Radar Pipeline
 *
 * Stateless entry points for the host (CLI, HTTP layer, scheduler):
 *   ingest -> runSentimentPass -> runExtractionSession
 * plus read accessors for pain points, sessions and scorecards.
 *
 * Only one extraction session may run at a time. The candidate anti-join
 * is read-then-write, so a second concurrent run could extract the same
 * raw item twice.
 */

import { v4 as uuidv4 } from 'uuid';
import type { PainRadarConfig } from '../config';
import {
  AdapterUnavailable,
  InvalidSessionTransition,
  SessionCancelled,
  SessionConflict,
  SessionNotFound,
} from '../errors';
import { IngestionGate } from '../ingestion/ingestion-gate';
import {
  PainPointExtractor,
  SentimentFilter,
  createExtractionAdapter,
  createSentimentClassifier,
} from '../processing';
import type { ExtractionAdapter, SentimentClassifier } from '../processing';
import { createPipelineStore } from '../storage';
import type { PipelineStore } from '../storage';
import type {
  CandidateItem,
  ExtractionInput,
  ExtractionSession,
  ExtractionSessionResult,
  IngestResult,
  PainPoint,
  PainPointDraft,
  PainPointFilter,
  PipelineStats,
  RawItem,
  RawItemFilter,
  Scorecard,
  SentimentPassResult,
  SessionStatus,
} from '../types';
import { ExtractionSessionTracker } from './session-tracker';

export interface PipelineSettings {
  sentimentBatchSize: number;
  sentimentMaxLength: number;
  sentimentTimeoutMs: number;
  extractionBatchSize: number;
  extractionTimeoutMs: number;
  staleSessionMinutes: number;
  scorecardTopN: number;
}

/**
 * Adapters are built per run so that a missing credential fails that run
 * (and its session) instead of the whole process.
 */
export interface AdapterFactories {
  sentimentClassifier: () => SentimentClassifier;
  extractionAdapter: () => ExtractionAdapter;
}

export interface RunExtractionOptions {
  name?: string;
  signal?: AbortSignal;
}

export interface SessionDetail {
  session: ExtractionSession;
  painPoints: PainPoint[];
}

function toExtractionInput(item: RawItem): ExtractionInput {
  return { id: item.externalId, content: item.content, metadata: item.metadata };
}

function toSessionResult(session: ExtractionSession): ExtractionSessionResult {
  return {
    sessionId: session.id,
    sessionName: session.name,
    status: session.status === 'completed' ? 'completed' : 'failed',
    extracted: session.painPointsExtracted,
    processed: session.itemsProcessed,
    skipped: session.itemsSkipped,
    durationSeconds: session.durationSeconds ?? 0,
    errorMessage: session.errorMessage,
  };
}

function topCategory(breakdown: Record<string, number>): string | null {
  let top: string | null = null;
  let topCount = 0;
  for (const [category, count] of Object.entries(breakdown)) {
    if (count > topCount) {
      top = category;
      topCount = count;
    }
  }
  return top;
}

export class PainRadarPipeline {
  private activeRun = false;

  constructor(
    private store: PipelineStore,
    private adapters: AdapterFactories,
    private settings: PipelineSettings,
    private clock: () => Date = () => new Date()
  ) {}

  async ingest(candidates: CandidateItem[]): Promise<IngestResult> {
    return new IngestionGate(this.store.rawItems, this.clock).ingest(candidates);
  }

  async runSentimentPass(limit: number = this.settings.sentimentBatchSize): Promise<SentimentPassResult> {
    const filter = new SentimentFilter(this.adapters.sentimentClassifier(), this.store.rawItems, {
      maxLength: this.settings.sentimentMaxLength,
      timeoutMs: this.settings.sentimentTimeoutMs,
    });
    return filter.filter(limit);
  }

  /**
   * Run one extraction session over items that have no pain point yet.
   *
   * Returns a failed result when the extraction adapter is unavailable or
   * the run is cancelled. Storage failures are rethrown after the session
   * has been marked failed (best effort).
   */
  async runExtractionSession(
    limit: number = this.settings.extractionBatchSize,
    options: RunExtractionOptions = {}
  ): Promise<ExtractionSessionResult> {
    if (this.activeRun) {
      throw new SessionConflict();
    }
    this.activeRun = true;

    try {
      await this.reconcileStaleSessions();
      const [active] = await this.store.sessions.findInProgress();
      if (active) {
        throw new SessionConflict(active.id);
      }
      return await this.executeSession(limit, options);
    } finally {
      this.activeRun = false;
    }
  }

  private async executeSession(limit: number, options: RunExtractionOptions): Promise<ExtractionSessionResult> {
    const tracker = await ExtractionSessionTracker.open(this.store.sessions, options.name, this.clock);

    try {
      if (options.signal?.aborted) {
        throw new SessionCancelled();
      }

      const extractedIds = await this.store.painPoints.listRawItemIds();
      const candidates = await this.store.rawItems.findExtractionCandidates(extractedIds, limit);

      if (candidates.length === 0) {
        console.log('[Session] No new items to extract');
        return toSessionResult(await tracker.complete());
      }

      const extractor = new PainPointExtractor(this.adapters.extractionAdapter(), this.settings.extractionTimeoutMs);
      tracker.selectItems(candidates.length);
      console.log(`[Session] Extracting pain points from ${candidates.length} items...`);

      await extractor.extractBatch(candidates.map(toExtractionInput), {
        signal: options.signal,
        onDraft: async (draft) => {
          const painPoint = this.toPainPoint(draft, tracker.id);
          await this.store.painPoints.save(painPoint);
          tracker.record(painPoint);
        },
      });

      return toSessionResult(await tracker.complete());
    } catch (error) {
      const session = await tracker.fail(error);
      if (session && (error instanceof AdapterUnavailable || error instanceof SessionCancelled)) {
        return toSessionResult(session);
      }
      throw error;
    }
  }

  private toPainPoint(draft: PainPointDraft, sessionId: string): PainPoint {
    return {
      ...draft,
      id: uuidv4(),
      extractionSessionId: sessionId,
      createdAt: this.clock().toISOString(),
    };
  }

  /**
   * Mark in_progress sessions older than the staleness threshold as failed.
   * Covers runs that died without reaching their own failure handling.
   */
  async reconcileStaleSessions(now: Date = this.clock()): Promise<string[]> {
    const cutoff = new Date(now.getTime() - this.settings.staleSessionMinutes * 60 * 1000);
    const stale = await this.store.sessions.findStale(cutoff.toISOString());
    const reconciled: string[] = [];

    for (const session of stale) {
      try {
        await this.store.sessions.finalize(session.id, {
          itemsProcessed: session.itemsProcessed,
          painPointsExtracted: session.painPointsExtracted,
          itemsSkipped: session.itemsSkipped,
          avgOpportunityScore: session.avgOpportunityScore,
          highSeverityCount: session.highSeverityCount,
          criticalSeverityCount: session.criticalSeverityCount,
          categoryBreakdown: session.categoryBreakdown,
          severityBreakdown: session.severityBreakdown,
          status: 'failed',
          completedAt: now.toISOString(),
          durationSeconds: Math.max(0, Math.floor((now.getTime() - Date.parse(session.startedAt)) / 1000)),
          errorMessage: `Session abandoned: still in progress after ${this.settings.staleSessionMinutes} minutes`,
        });
        reconciled.push(session.id);
        console.warn(`[Session] Marked stale session ${session.id} as failed`);
      } catch (error) {
        if (!(error instanceof InvalidSessionTransition)) throw error;
        console.warn(`[Session] Session ${session.id} finished before it could be reconciled`);
      }
    }

    return reconciled;
  }

  async listPainPoints(filter: PainPointFilter = {}): Promise<PainPoint[]> {
    return this.store.painPoints.list(filter);
  }

  async listRawItems(filter: RawItemFilter = {}): Promise<RawItem[]> {
    return this.store.rawItems.list(filter);
  }

  async listSessions(options: { status?: SessionStatus; limit?: number } = {}): Promise<ExtractionSession[]> {
    return this.store.sessions.list(options);
  }

  async getSessionDetail(sessionId: string): Promise<SessionDetail> {
    const session = await this.requireSession(sessionId);
    const painPoints = await this.store.painPoints.listBySession(sessionId);
    return { session, painPoints };
  }

  async getScorecard(sessionId: string, topN: number = this.settings.scorecardTopN): Promise<Scorecard> {
    const session = await this.requireSession(sessionId);
    const topPainPoints = (await this.store.painPoints.listBySession(sessionId)).slice(0, topN);

    return {
      sessionId: session.id,
      sessionName: session.name,
      startedAt: session.startedAt,
      duration: session.durationSeconds !== null ? `${session.durationSeconds}s` : 'N/A',
      status: session.status,
      totalPainPoints: session.painPointsExtracted,
      itemsAnalyzed: session.itemsProcessed,
      itemsSkipped: session.itemsSkipped,
      avgOpportunityScore: session.avgOpportunityScore ? Math.round(session.avgOpportunityScore * 10) / 10 : 0,
      criticalCount: session.criticalSeverityCount,
      highCount: session.highSeverityCount,
      severityBreakdown: session.severityBreakdown,
      topCategory: topCategory(session.categoryBreakdown),
      categoryBreakdown: session.categoryBreakdown,
      topOpportunities: topPainPoints.map((pp) => ({
        problem: pp.problemStatement,
        category: pp.category,
        severity: pp.severity,
        score: pp.opportunityScore,
      })),
      errorMessage: session.errorMessage,
    };
  }

  async getStats(): Promise<PipelineStats> {
    const [totalItems, negativeItems, totalPainPoints, categories] = await Promise.all([
      this.store.rawItems.count(),
      this.store.rawItems.count({ negativeOnly: true }),
      this.store.painPoints.count(),
      this.store.painPoints.countByCategory(),
    ]);
    return { totalItems, negativeItems, totalPainPoints, categories };
  }

  private async requireSession(sessionId: string): Promise<ExtractionSession> {
    const session = await this.store.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFound(sessionId);
    }
    return session;
  }
}

/**
 * Wire the pipeline from configuration
 */
export function createPipeline(config: PainRadarConfig): PainRadarPipeline {
  return new PainRadarPipeline(
    createPipelineStore(config.storage),
    {
      sentimentClassifier: () => createSentimentClassifier(config.sentiment),
      extractionAdapter: () => createExtractionAdapter(config.extraction),
    },
    {
      sentimentBatchSize: config.pipeline.sentimentBatchSize,
      sentimentMaxLength: config.sentiment.maxLength,
      sentimentTimeoutMs: config.sentiment.timeoutMs,
      extractionBatchSize: config.pipeline.extractionBatchSize,
      extractionTimeoutMs: config.extraction.timeoutMs,
      staleSessionMinutes: config.pipeline.staleSessionMinutes,
      scorecardTopN: config.pipeline.scorecardTopN,
    }
  );
}
