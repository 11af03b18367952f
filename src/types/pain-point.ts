/**
 * Raw Item and Pain Point Types
 *
 * These types represent the records that flow through the pipeline:
 * connectors produce candidates, the ingestion gate stores them as raw items,
 * and the extractor turns raw items into scored pain points.
 */

export const PAIN_POINT_CATEGORIES = [
  'pricing',
  'performance',
  'usability',
  'features',
  'support',
  'reliability',
  'integration',
  'documentation',
  'onboarding',
  'other',
] as const;

export type PainPointCategory = (typeof PAIN_POINT_CATEGORIES)[number];

export const SEVERITIES = ['critical', 'high', 'medium', 'low'] as const;

export type Severity = (typeof SEVERITIES)[number];

/**
 * Social-proof signals a connector attaches to an item.
 * engagementScore is the upvote/points count, commentCount the reply count.
 */
export interface SourceMetadata {
  engagementScore?: number;
  commentCount?: number;
  [key: string]: unknown;
}

export interface CandidateItem {
  externalId: string;
  source: string; // e.g. reddit, hackernews, amazon
  content: string;
  author?: string;
  url?: string;
  originTimestamp?: string; // ISO-8601
  metadata?: SourceMetadata;
}

export interface RawItem {
  externalId: string;
  source: string;
  content: string;
  author: string | null;
  url: string | null;
  originTimestamp: string | null;
  metadata: SourceMetadata;
  isNegative: boolean | null;
  sentimentScore: number | null; // signed: negative values are negative sentiment
  processed: boolean;
  ingestedAt: string;
}

/**
 * Fields produced by the extraction adapter for one complaint.
 */
export interface PainPointFields {
  problemStatement: string;
  category: PainPointCategory;
  severity: Severity;
  context: string | null;
  suggestedSolution: string | null;
  tags: string[];
  targetAudience: string | null;
  relatedIndustry: string | null;
}

export interface PainPointDraft extends PainPointFields {
  rawItemId: string;
  opportunityScore: number; // 1 - 100
}

export interface PainPoint extends PainPointDraft {
  id: string;
  extractionSessionId: string;
  createdAt: string;
}

export interface PainPointFilter {
  category?: PainPointCategory;
  severity?: Severity;
  minScore?: number;
  limit?: number;
}

export interface RawItemFilter {
  source?: string;
  limit?: number;
}

export function isPainPointCategory(value: unknown): value is PainPointCategory {
  return PAIN_POINT_CATEGORIES.some((category) => category === value);
}

export function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}
