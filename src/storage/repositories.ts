/**
 * Repository Contracts
 *
 * Three logical record sets back the pipeline: raw items, pain points and
 * extraction sessions. Each backend (DynamoDB, in-memory) implements all three.
 */

import type {
  ExtractionSession,
  PainPoint,
  PainPointFilter,
  RawItem,
  RawItemFilter,
  SessionOutcome,
  SessionStatus,
} from '../types';

export type InsertOrSkipResult =
  | { status: 'inserted'; item: RawItem }
  | { status: 'duplicate'; externalId: string };

export interface SentimentMark {
  isNegative: boolean;
  sentimentScore: number | null;
}

export interface RawItemRepository {
  /**
   * Insert a new raw item unless its externalId is already stored.
   * Existing items are never overwritten.
   */
  insertOrSkip(item: RawItem): Promise<InsertOrSkipResult>;

  findUnprocessed(limit: number): Promise<RawItem[]>;

  /**
   * Record a sentiment outcome and flip processed to true.
   * Returns false if the item was already processed.
   */
  markSentiment(externalId: string, mark: SentimentMark): Promise<boolean>;

  /**
   * Items with content whose externalId is not in excludeIds.
   */
  findExtractionCandidates(excludeIds: ReadonlySet<string>, limit: number): Promise<RawItem[]>;

  get(externalId: string): Promise<RawItem | null>;
  list(filter?: RawItemFilter): Promise<RawItem[]>;
  count(options?: { negativeOnly?: boolean }): Promise<number>;
}

export interface PainPointRepository {
  save(painPoint: PainPoint): Promise<void>;

  /** Distinct raw item ids that already yielded a pain point */
  listRawItemIds(): Promise<Set<string>>;

  list(filter?: PainPointFilter): Promise<PainPoint[]>;
  listBySession(sessionId: string): Promise<PainPoint[]>;
  count(): Promise<number>;
  countByCategory(): Promise<Record<string, number>>;
}

export interface ExtractionSessionRepository {
  create(session: ExtractionSession): Promise<void>;

  /**
   * Apply the terminal update. Throws InvalidSessionTransition unless the
   * stored session is still in_progress.
   */
  finalize(sessionId: string, outcome: SessionOutcome): Promise<ExtractionSession>;

  get(sessionId: string): Promise<ExtractionSession | null>;
  list(options?: { status?: SessionStatus; limit?: number }): Promise<ExtractionSession[]>;
  findInProgress(): Promise<ExtractionSession[]>;

  /** In-progress sessions started before the cutoff (ISO-8601) */
  findStale(startedBefore: string): Promise<ExtractionSession[]>;
}

export interface PipelineStore {
  rawItems: RawItemRepository;
  painPoints: PainPointRepository;
  sessions: ExtractionSessionRepository;
}

export const DEFAULT_PAIN_POINT_LIMIT = 50;
export const DEFAULT_RAW_ITEM_LIMIT = 100;
export const DEFAULT_SESSION_LIMIT = 20;

export function byScoreDescending(a: PainPoint, b: PainPoint): number {
  return b.opportunityScore - a.opportunityScore;
}

export function matchesPainPointFilter(painPoint: PainPoint, filter: PainPointFilter): boolean {
  if (filter.category && painPoint.category !== filter.category) return false;
  if (filter.severity && painPoint.severity !== filter.severity) return false;
  if (filter.minScore !== undefined && painPoint.opportunityScore < filter.minScore) return false;
  return true;
}

/**
 * First `limit` entries. Zero or a negative limit selects nothing.
 */
export function takeFirst<T>(items: T[], limit: number): T[] {
  return limit > 0 ? items.slice(0, limit) : [];
}
