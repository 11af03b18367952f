/**
 * Pipeline Result Types
 */

import type { SourceMetadata } from './pain-point';

export interface IngestResult {
  accepted: number;
  skipped: number; // duplicates of an already stored externalId
  invalid: number; // candidates missing externalId, source or content
}

export interface SentimentPassResult {
  processed: number;
  negative: number;
}

export type SentimentLabel = 'NEGATIVE' | 'POSITIVE' | 'NEUTRAL';

export interface SentimentResult {
  label: SentimentLabel;
  confidence: number; // 0.0 to 1.0
}

/**
 * One item handed to the pain point extractor.
 */
export interface ExtractionInput {
  id: string;
  content: string;
  metadata?: SourceMetadata;
}

export interface PipelineStats {
  totalItems: number;
  negativeItems: number;
  totalPainPoints: number;
  categories: Record<string, number>;
}
