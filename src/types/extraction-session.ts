/**
 * Extraction Session Types
 *
 * An extraction session is one bounded run of the extractor. Its aggregates
 * form the "scorecard" shown for that run.
 */

export type SessionStatus = 'in_progress' | 'completed' | 'failed';

export interface SessionAggregates {
  itemsProcessed: number;
  painPointsExtracted: number;
  itemsSkipped: number;
  avgOpportunityScore: number | null;
  highSeverityCount: number;
  criticalSeverityCount: number;
  categoryBreakdown: Record<string, number>;
  severityBreakdown: Record<string, number>;
}

export interface ExtractionSession extends SessionAggregates {
  id: string;
  name: string;
  status: SessionStatus;
  startedAt: string;
  completedAt: string | null;
  durationSeconds: number | null;
  errorMessage: string | null;
}

/**
 * The single update applied when a session leaves in_progress.
 */
export interface SessionOutcome extends SessionAggregates {
  status: Exclude<SessionStatus, 'in_progress'>;
  completedAt: string;
  durationSeconds: number;
  errorMessage: string | null;
}

export interface ExtractionSessionResult {
  sessionId: string;
  sessionName: string;
  status: Exclude<SessionStatus, 'in_progress'>;
  extracted: number;
  processed: number;
  skipped: number;
  durationSeconds: number;
  errorMessage: string | null;
}

export interface ScorecardOpportunity {
  problem: string;
  category: string;
  severity: string;
  score: number;
}

export interface Scorecard {
  sessionId: string;
  sessionName: string;
  startedAt: string;
  duration: string;
  status: SessionStatus;
  totalPainPoints: number;
  itemsAnalyzed: number;
  itemsSkipped: number;
  avgOpportunityScore: number;
  criticalCount: number;
  highCount: number;
  severityBreakdown: Record<string, number>;
  topCategory: string | null;
  categoryBreakdown: Record<string, number>;
  topOpportunities: ScorecardOpportunity[];
  errorMessage: string | null;
}
