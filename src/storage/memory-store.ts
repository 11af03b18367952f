/**
 * In-Memory Storage
 *
 * Same semantics as the DynamoDB tables, held in Maps.
 * Selected with STORAGE_DRIVER=memory for local runs and tests.
 */

import { InvalidSessionTransition } from '../errors';
import type { ExtractionSession, PainPoint, PainPointFilter, RawItem, RawItemFilter, SessionOutcome, SessionStatus } from '../types';
import {
  DEFAULT_PAIN_POINT_LIMIT,
  DEFAULT_RAW_ITEM_LIMIT,
  DEFAULT_SESSION_LIMIT,
  byScoreDescending,
  matchesPainPointFilter,
  takeFirst,
} from './repositories';
import type {
  ExtractionSessionRepository,
  InsertOrSkipResult,
  PainPointRepository,
  PipelineStore,
  RawItemRepository,
  SentimentMark,
} from './repositories';

export class MemoryRawItemRepository implements RawItemRepository {
  private items = new Map<string, RawItem>();

  async insertOrSkip(item: RawItem): Promise<InsertOrSkipResult> {
    if (this.items.has(item.externalId)) {
      return { status: 'duplicate', externalId: item.externalId };
    }
    this.items.set(item.externalId, { ...item });
    return { status: 'inserted', item };
  }

  async findUnprocessed(limit: number): Promise<RawItem[]> {
    return takeFirst(
      [...this.items.values()].filter((item) => !item.processed),
      limit
    );
  }

  async markSentiment(externalId: string, mark: SentimentMark): Promise<boolean> {
    const item = this.items.get(externalId);
    if (!item || item.processed) {
      return false;
    }
    this.items.set(externalId, { ...item, ...mark, processed: true });
    return true;
  }

  async findExtractionCandidates(excludeIds: ReadonlySet<string>, limit: number): Promise<RawItem[]> {
    return takeFirst(
      [...this.items.values()].filter((item) => item.content.length > 0 && !excludeIds.has(item.externalId)),
      limit
    );
  }

  async get(externalId: string): Promise<RawItem | null> {
    const item = this.items.get(externalId);
    return item ? { ...item } : null;
  }

  async list(filter: RawItemFilter = {}): Promise<RawItem[]> {
    const items = [...this.items.values()]
      .filter((item) => !filter.source || item.source === filter.source)
      .sort((a, b) => b.ingestedAt.localeCompare(a.ingestedAt));
    return takeFirst(items, filter.limit ?? DEFAULT_RAW_ITEM_LIMIT);
  }

  async count(options: { negativeOnly?: boolean } = {}): Promise<number> {
    const items = [...this.items.values()];
    return options.negativeOnly ? items.filter((item) => item.isNegative === true).length : items.length;
  }
}

export class MemoryPainPointRepository implements PainPointRepository {
  private painPoints: PainPoint[] = [];

  async save(painPoint: PainPoint): Promise<void> {
    this.painPoints.push({ ...painPoint, tags: [...painPoint.tags] });
  }

  async listRawItemIds(): Promise<Set<string>> {
    return new Set(this.painPoints.map((pp) => pp.rawItemId));
  }

  async list(filter: PainPointFilter = {}): Promise<PainPoint[]> {
    const painPoints = this.painPoints.filter((pp) => matchesPainPointFilter(pp, filter)).sort(byScoreDescending);
    return takeFirst(painPoints, filter.limit ?? DEFAULT_PAIN_POINT_LIMIT);
  }

  async listBySession(sessionId: string): Promise<PainPoint[]> {
    return this.painPoints.filter((pp) => pp.extractionSessionId === sessionId).sort(byScoreDescending);
  }

  async count(): Promise<number> {
    return this.painPoints.length;
  }

  async countByCategory(): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};
    for (const pp of this.painPoints) {
      counts[pp.category] = (counts[pp.category] || 0) + 1;
    }
    return counts;
  }
}

export class MemoryExtractionSessionRepository implements ExtractionSessionRepository {
  private sessions = new Map<string, ExtractionSession>();

  async create(session: ExtractionSession): Promise<void> {
    this.sessions.set(session.id, { ...session });
  }

  async finalize(sessionId: string, outcome: SessionOutcome): Promise<ExtractionSession> {
    const existing = this.sessions.get(sessionId);
    if (!existing || existing.status !== 'in_progress') {
      throw new InvalidSessionTransition(sessionId);
    }
    const updated: ExtractionSession = { ...existing, ...outcome };
    this.sessions.set(sessionId, updated);
    return { ...updated };
  }

  async get(sessionId: string): Promise<ExtractionSession | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async list(options: { status?: SessionStatus; limit?: number } = {}): Promise<ExtractionSession[]> {
    const sessions = [...this.sessions.values()]
      .filter((session) => !options.status || session.status === options.status)
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt));
    return takeFirst(sessions, options.limit ?? DEFAULT_SESSION_LIMIT);
  }

  async findInProgress(): Promise<ExtractionSession[]> {
    return [...this.sessions.values()].filter((session) => session.status === 'in_progress');
  }

  async findStale(startedBefore: string): Promise<ExtractionSession[]> {
    return (await this.findInProgress()).filter((session) => session.startedAt < startedBefore);
  }
}

export function createMemoryStore(): PipelineStore {
  return {
    rawItems: new MemoryRawItemRepository(),
    painPoints: new MemoryPainPointRepository(),
    sessions: new MemoryExtractionSessionRepository(),
  };
}
