import type { CandidateItem } from '../types';

/**
 * A source of candidate items. The pipeline never calls connectors itself;
 * their output is handed to the ingestion gate.
 */
export interface Connector {
  name: string;
  fetchAll(): Promise<CandidateItem[]>;
}

export function containsKeyword(text: string, keywords: string[]): boolean {
  const lowerText = text.toLowerCase();
  return keywords.some((keyword) => lowerText.includes(keyword.toLowerCase()));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
