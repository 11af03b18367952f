/**
 * Extraction Session Tracker
 *
 * Wraps one extraction run: opens the session record, tallies every saved
 * pain point, and writes the terminal state exactly once.
 *
 *   in_progress -> completed   run finished (possibly with skipped items)
 *   in_progress -> failed      run-level error or cancellation
 */

import { v4 as uuidv4 } from 'uuid';
import { InvalidSessionTransition, toErrorMessage } from '../errors';
import type { ExtractionSessionRepository } from '../storage';
import type { ExtractionSession, PainPoint, SessionAggregates, SessionOutcome } from '../types';
import { SEVERITIES } from '../types';

export type TalliedPainPoint = Pick<PainPoint, 'category' | 'severity' | 'opportunityScore'>;

export function defaultSessionName(startedAt: Date): string {
  return `Analysis ${startedAt.toISOString().slice(0, 16).replace('T', ' ')}`;
}

export class ExtractionSessionTracker {
  private itemsSelected = 0;
  private savedCount = 0;
  private scoreSum = 0;
  private categoryCounts: Record<string, number> = {};
  private severityCounts: Record<string, number> = Object.fromEntries(SEVERITIES.map((severity) => [severity, 0]));
  private finalized = false;

  private constructor(
    private sessions: ExtractionSessionRepository,
    private session: ExtractionSession,
    private clock: () => Date
  ) {}

  static async open(
    sessions: ExtractionSessionRepository,
    name: string | undefined,
    clock: () => Date = () => new Date()
  ): Promise<ExtractionSessionTracker> {
    const startedAt = clock();
    const session: ExtractionSession = {
      id: uuidv4(),
      name: name || defaultSessionName(startedAt),
      status: 'in_progress',
      itemsProcessed: 0,
      painPointsExtracted: 0,
      itemsSkipped: 0,
      avgOpportunityScore: null,
      highSeverityCount: 0,
      criticalSeverityCount: 0,
      categoryBreakdown: {},
      severityBreakdown: {},
      startedAt: startedAt.toISOString(),
      completedAt: null,
      durationSeconds: null,
      errorMessage: null,
    };

    await sessions.create(session);
    console.log(`[Session] Created extraction session ${session.id}: ${session.name}`);

    return new ExtractionSessionTracker(sessions, session, clock);
  }

  get id(): string {
    return this.session.id;
  }

  get name(): string {
    return this.session.name;
  }

  selectItems(count: number): void {
    this.assertOpen();
    this.itemsSelected = count;
  }

  record(painPoint: TalliedPainPoint): void {
    this.assertOpen();
    this.savedCount++;
    this.scoreSum += painPoint.opportunityScore;
    this.categoryCounts[painPoint.category] = (this.categoryCounts[painPoint.category] || 0) + 1;
    this.severityCounts[painPoint.severity] = (this.severityCounts[painPoint.severity] || 0) + 1;
  }

  aggregates(): SessionAggregates {
    return {
      itemsProcessed: this.itemsSelected,
      painPointsExtracted: this.savedCount,
      itemsSkipped: Math.max(0, this.itemsSelected - this.savedCount),
      avgOpportunityScore: this.savedCount > 0 ? this.scoreSum / this.savedCount : 0,
      highSeverityCount: this.severityCounts.high || 0,
      criticalSeverityCount: this.severityCounts.critical || 0,
      categoryBreakdown: { ...this.categoryCounts },
      severityBreakdown: { ...this.severityCounts },
    };
  }

  async complete(): Promise<ExtractionSession> {
    const session = await this.finalize({ status: 'completed', errorMessage: null });
    console.log(
      `[Session] Session ${session.id}: Extracted ${session.painPointsExtracted} pain points in ${session.durationSeconds}s`
    );
    return session;
  }

  /**
   * Best-effort transition to failed. Returns null if the terminal write
   * itself fails; the caller still owns the original error.
   */
  async fail(error: unknown): Promise<ExtractionSession | null> {
    const errorMessage = toErrorMessage(error);
    try {
      const session = await this.finalize({ status: 'failed', errorMessage });
      console.error(`[Session] Session ${session.id} failed: ${errorMessage}`);
      return session;
    } catch (finalizeError) {
      console.error(`[Session] Could not mark session ${this.session.id} as failed:`, finalizeError);
      return null;
    }
  }

  private async finalize(result: Pick<SessionOutcome, 'status' | 'errorMessage'>): Promise<ExtractionSession> {
    this.assertOpen();
    const completedAt = this.clock();
    const outcome: SessionOutcome = {
      ...this.aggregates(),
      ...result,
      completedAt: completedAt.toISOString(),
      durationSeconds: Math.max(0, Math.floor((completedAt.getTime() - Date.parse(this.session.startedAt)) / 1000)),
    };

    const session = await this.sessions.finalize(this.session.id, outcome);
    this.finalized = true;
    this.session = session;
    return session;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new InvalidSessionTransition(this.session.id);
    }
  }
}
