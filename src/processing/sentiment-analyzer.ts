/**
 * Lexicon Sentiment Analyzer
 *
 * Offline classifier that scores complaint and praise cues in text.
 * Used when SENTIMENT_PROVIDER=lexicon, e.g. for local runs without
 * Cloudflare credentials.
 */

import type { SentimentResult } from '../types';
import type { SentimentClassifier } from './sentiment-classifier';

const NEGATIVE_CUES = [
  'frustrated',
  'frustrating',
  'annoying',
  'disappointing',
  'struggling',
  'hard to',
  'impossible to',
  'waste of',
  'painful',
  'hate',
  'terrible',
  'awful',
  'worst',
  'ridiculous',
  'unacceptable',
  'useless',
  'broken',
  'crashes',
  'too expensive',
  'overpriced',
];

const POSITIVE_CUES = [
  'love',
  'great',
  'excellent',
  'amazing',
  'fantastic',
  'perfect',
  'wonderful',
  'awesome',
  'brilliant',
  'works well',
];

export class LexiconSentimentClassifier implements SentimentClassifier {
  readonly name = 'lexicon';

  async classify(text: string, maxLength: number): Promise<SentimentResult> {
    return this.analyze(text.slice(0, maxLength));
  }

  /**
   * Analyze sentiment of text
   */
  analyze(text: string): SentimentResult {
    const lowerText = text.toLowerCase();
    const negative = this.calculatePatternScore(lowerText, NEGATIVE_CUES);
    const positive = this.calculatePatternScore(lowerText, POSITIVE_CUES);

    if (negative === positive) {
      return { label: 'NEUTRAL', confidence: 0.5 };
    }

    const confidence = Math.min(1, 0.5 + Math.abs(negative - positive));
    return { label: negative > positive ? 'NEGATIVE' : 'POSITIVE', confidence };
  }

  /**
   * Calculate score based on pattern matches
   */
  private calculatePatternScore(text: string, patterns: string[]): number {
    let score = 0;

    for (const pattern of patterns) {
      if (text.includes(pattern)) {
        score += 0.2;
      }
    }

    // Intensifiers
    if (/\b(very|extremely|really|so|too)\s+/.test(text)) {
      score *= 1.2;
    }

    // Negations
    if (/\b(not|never|no|neither)\s+/.test(text)) {
      score *= 0.5;
    }

    return Math.min(1.0, score);
  }
}
