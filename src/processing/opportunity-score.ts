/**
 * Opportunity Score
 *
 * 1-100 estimate of how valuable a pain point is to address:
 * base 50, plus a severity bonus, plus social proof from the source item.
 */

import type { SourceMetadata } from '../types';

export const BASE_SCORE = 50;

export const SEVERITY_BONUS: Record<string, number> = {
  critical: 30,
  high: 20,
  medium: 10,
  low: 5,
};

export const MAX_ENGAGEMENT_BONUS = 15;
export const MAX_COMMENT_BONUS = 10;

function nonNegative(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : 0;
}

export function calculateOpportunityScore(severity: string, metadata?: SourceMetadata | null): number {
  let score = BASE_SCORE + (Object.hasOwn(SEVERITY_BONUS, severity) ? SEVERITY_BONUS[severity] : 0);

  if (metadata) {
    score += Math.min(Math.floor(nonNegative(metadata.engagementScore) / 10), MAX_ENGAGEMENT_BONUS);
    score += Math.min(Math.floor(nonNegative(metadata.commentCount) / 5), MAX_COMMENT_BONUS);
  }

  return Math.max(1, Math.min(score, 100));
}
