/**
 * Sentiment Filter
 *
 * Classifies unprocessed raw items and flags the negative ones.
 * Every selected item is marked processed exactly once, whatever the
 * classifier returns. Classifier failures count as neutral (fail-open).
 */

import { toErrorMessage, withTimeout } from '../errors';
import type { RawItemRepository, SentimentMark } from '../storage';
import type { RawItem, SentimentPassResult, SentimentResult } from '../types';
import type { SentimentClassifier } from './sentiment-classifier';

export const NEGATIVE_CONFIDENCE_THRESHOLD = 0.7;
export const NEUTRAL_FALLBACK: SentimentResult = { label: 'NEUTRAL', confidence: 0.5 };

export interface SentimentFilterOptions {
  maxLength: number;
  timeoutMs: number;
}

/**
 * Map a classifier result to the stored mark. Negative confidence is stored
 * with a negative sign, positive confidence as is, neutral as 0.
 */
export function toSentimentMark(result: SentimentResult): SentimentMark {
  const isNegative = result.label === 'NEGATIVE' && result.confidence > NEGATIVE_CONFIDENCE_THRESHOLD;

  let sentimentScore = 0;
  if (result.label === 'NEGATIVE') sentimentScore = -result.confidence;
  if (result.label === 'POSITIVE') sentimentScore = result.confidence;

  return { isNegative, sentimentScore };
}

export class SentimentFilter {
  constructor(
    private classifier: SentimentClassifier,
    private rawItems: RawItemRepository,
    private options: SentimentFilterOptions
  ) {}

  async filter(batchSize: number): Promise<SentimentPassResult> {
    const items = await this.rawItems.findUnprocessed(batchSize);

    if (items.length === 0) {
      console.log('[Sentiment] No unprocessed items');
      return { processed: 0, negative: 0 };
    }

    console.log(`[Sentiment] Classifying ${items.length} items with ${this.classifier.name}...`);

    let processed = 0;
    let negative = 0;

    for (const item of items) {
      const mark = await this.classifyItem(item);
      const updated = await this.rawItems.markSentiment(item.externalId, mark);

      if (!updated) {
        console.warn(`[Sentiment] Item ${item.externalId} was already processed, skipping`);
        continue;
      }

      processed++;
      if (mark.isNegative) negative++;
    }

    console.log(`[Sentiment] Filtered ${processed} items down to ${negative} negative items`);

    return { processed, negative };
  }

  private async classifyItem(item: RawItem): Promise<SentimentMark> {
    const text = item.content.slice(0, this.options.maxLength);

    try {
      const result = await withTimeout(
        this.classifier.classify(text, this.options.maxLength),
        this.options.timeoutMs,
        `Sentiment classification timed out after ${this.options.timeoutMs}ms`
      );
      return toSentimentMark(result);
    } catch (error) {
      console.error(`[Sentiment] Error analyzing item ${item.externalId}, treating as neutral: ${toErrorMessage(error)}`);
      return toSentimentMark(NEUTRAL_FALLBACK);
    }
  }
}
