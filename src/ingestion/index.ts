/**
 * Central export for all ingestion modules
 */

export * from './connector';
export * from './cleaner';
export * from './ingestion-gate';
export * from './reddit-listener';
export * from './hackernews-listener';
export * from './reviews-listener';

import type { CandidateItem } from '../types';
import type { Connector } from './connector';

/**
 * Run every connector and concatenate their candidates. A failing
 * connector is logged and contributes nothing.
 */
export async function collectCandidates(connectors: Connector[]): Promise<CandidateItem[]> {
  console.log('=== Starting Data Collection ===');

  const allCandidates: CandidateItem[] = [];

  for (const connector of connectors) {
    console.log(`\n--- ${connector.name} ---`);
    try {
      const candidates = await connector.fetchAll();
      allCandidates.push(...candidates);
      console.log(`✓ ${connector.name}: ${candidates.length} candidates`);
    } catch (error) {
      console.error(`✗ ${connector.name} error:`, error);
    }
  }

  console.log(`\n=== Total Candidates Collected: ${allCandidates.length} ===\n`);

  return allCandidates;
}
