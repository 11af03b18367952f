/**
 * Pain Point Extractor
 *
 * Runs the extraction adapter over a batch of items, one item at a time,
 * and scores each parsed result. A failed or malformed reply skips that
 * item only; the batch always runs to the end unless it is cancelled, the
 * adapter becomes unavailable, or the draft callback fails. An abort that
 * lands while an item is in flight keeps that item's draft and cancels
 * the batch once it is handed over.
 */

import { AdapterUnavailable, SessionCancelled, toErrorMessage, withTimeout } from '../errors';
import type { ExtractionInput, PainPointDraft } from '../types';
import type { ExtractionAdapter } from './extraction-adapter';
import { calculateOpportunityScore } from './opportunity-score';

export interface ExtractBatchOptions {
  signal?: AbortSignal;
  /** Called with each draft as soon as it is scored, before the next item starts */
  onDraft?: (draft: PainPointDraft) => Promise<void>;
}

export class PainPointExtractor {
  constructor(
    private adapter: ExtractionAdapter,
    private timeoutMs: number
  ) {}

  async extract(item: ExtractionInput, signal?: AbortSignal): Promise<PainPointDraft | null> {
    try {
      const outcome = await withTimeout(
        this.adapter.extract(item.content, signal),
        this.timeoutMs,
        `Extraction timed out after ${this.timeoutMs}ms`
      );

      if (!outcome.ok) {
        console.warn(`[Extractor] Skipping item ${item.id}: ${outcome.error.message}`);
        return null;
      }

      return {
        ...outcome.fields,
        rawItemId: item.id,
        opportunityScore: calculateOpportunityScore(outcome.fields.severity, item.metadata),
      };
    } catch (error) {
      if (error instanceof AdapterUnavailable) throw error;
      console.error(`[Extractor] Error extracting from item ${item.id}: ${toErrorMessage(error)}`);
      return null;
    }
  }

  async extractBatch(items: ExtractionInput[], options: ExtractBatchOptions = {}): Promise<PainPointDraft[]> {
    const drafts: PainPointDraft[] = [];

    for (const item of items) {
      if (options.signal?.aborted) {
        throw new SessionCancelled();
      }

      const draft = await this.extract(item, options.signal);
      if (!draft) continue;

      if (options.onDraft) {
        await options.onDraft(draft);
      }
      drafts.push(draft);
    }

    // An abort during the last item must still cancel the batch
    if (options.signal?.aborted) {
      throw new SessionCancelled();
    }

    console.log(`[Extractor] Extracted ${drafts.length} pain points from ${items.length} items`);
    return drafts;
  }
}
