/**
 * Ingestion Gate
 *
 * Accepts candidate items from any connector and stores the ones whose
 * externalId has not been seen before. Each insert-or-skip decision is its
 * own write, so a duplicate or a bad candidate never affects the rest of the
 * batch. Only storage failures propagate.
 */

import { z } from 'zod';
import type { RawItemRepository } from '../storage';
import type { CandidateItem, IngestResult, RawItem } from '../types';

const candidateItemSchema = z.object({
  externalId: z.string().trim().min(1),
  source: z.string().trim().min(1),
  content: z.string().trim().min(1),
  author: z.string().optional(),
  url: z.string().optional(),
  originTimestamp: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export function toRawItem(candidate: CandidateItem, ingestedAt: Date): RawItem {
  return {
    externalId: candidate.externalId,
    source: candidate.source,
    content: candidate.content,
    author: candidate.author ?? null,
    url: candidate.url ?? null,
    originTimestamp: candidate.originTimestamp ?? null,
    metadata: candidate.metadata ?? {},
    isNegative: null,
    sentimentScore: null,
    processed: false,
    ingestedAt: ingestedAt.toISOString(),
  };
}

export class IngestionGate {
  constructor(
    private rawItems: RawItemRepository,
    private clock: () => Date = () => new Date()
  ) {}

  async ingest(candidates: CandidateItem[]): Promise<IngestResult> {
    const result: IngestResult = { accepted: 0, skipped: 0, invalid: 0 };

    for (const candidate of candidates) {
      if (!candidateItemSchema.safeParse(candidate).success) {
        console.warn(`[Ingestion] Rejected invalid candidate ${String(candidate.externalId)}`);
        result.invalid++;
        continue;
      }

      const outcome = await this.rawItems.insertOrSkip(toRawItem(candidate, this.clock()));
      if (outcome.status === 'duplicate') {
        result.skipped++;
      } else {
        result.accepted++;
      }
    }

    console.log(
      `[Ingestion] Accepted ${result.accepted}, skipped ${result.skipped} duplicates, rejected ${result.invalid} invalid`
    );

    return result;
  }
}
