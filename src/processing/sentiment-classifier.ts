/**
 * Sentiment Classifier Adapters
 *
 * The sentiment filter only depends on the SentimentClassifier contract.
 * The Cloudflare adapter calls a Workers AI text-classification model.
 */

import { z } from 'zod';
import type { SentimentConfig } from '../config';
import { AdapterTransient, AdapterUnavailable } from '../errors';
import type { SentimentResult } from '../types';
import { LexiconSentimentClassifier } from './sentiment-analyzer';

export interface SentimentClassifier {
  name: string;
  classify(text: string, maxLength: number): Promise<SentimentResult>;
}

const cloudflareResponseSchema = z.object({
  result: z
    .array(
      z.object({
        label: z.string(),
        score: z.number().min(0).max(1),
      })
    )
    .min(1),
});

export class CloudflareSentimentClassifier implements SentimentClassifier {
  readonly name = 'cloudflare';
  private baseUrl: string;
  private apiToken: string;

  constructor(sentiment: SentimentConfig) {
    if (!sentiment.cloudflareAccountId || !sentiment.cloudflareApiToken) {
      throw new AdapterUnavailable('Cloudflare credentials not configured (CLOUDFLARE_ACCOUNT_ID, CLOUDFLARE_API_TOKEN)');
    }
    this.apiToken = sentiment.cloudflareApiToken;
    this.baseUrl = `https://api.cloudflare.com/client/v4/accounts/${sentiment.cloudflareAccountId}/ai/run/${sentiment.model}`;
  }

  async classify(text: string, maxLength: number): Promise<SentimentResult> {
    const response = await fetch(this.baseUrl, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ text: text.slice(0, maxLength) }),
    });

    if (!response.ok) {
      throw new AdapterTransient(`Cloudflare AI error: ${response.status} ${response.statusText}`);
    }

    const parsed = cloudflareResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AdapterTransient('Unexpected Cloudflare AI response shape');
    }

    // Highest-scoring label wins
    const best = parsed.data.result.reduce((a, b) => (b.score > a.score ? b : a));
    const label = best.label.toUpperCase();

    return {
      label: label === 'NEGATIVE' || label === 'POSITIVE' ? label : 'NEUTRAL',
      confidence: best.score,
    };
  }
}

/**
 * Factory function to create the configured sentiment classifier
 */
export function createSentimentClassifier(sentiment: SentimentConfig): SentimentClassifier {
  switch (sentiment.provider) {
    case 'cloudflare':
      return new CloudflareSentimentClassifier(sentiment);
    case 'lexicon':
      return new LexiconSentimentClassifier();
  }
}
