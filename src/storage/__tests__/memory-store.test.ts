import { describe, expect, it } from 'vitest';
import { inProgressSession, rawItem } from '../../__tests__/factories';
import { InvalidSessionTransition } from '../../errors';
import type { PainPoint, SessionOutcome } from '../../types';
import { MemoryExtractionSessionRepository, MemoryPainPointRepository, MemoryRawItemRepository } from '../memory-store';

function painPoint(id: string, overrides: Partial<PainPoint> = {}): PainPoint {
  return {
    id,
    rawItemId: `raw_${id}`,
    extractionSessionId: 'session-1',
    problemStatement: `Problem ${id}`,
    category: 'other',
    severity: 'low',
    context: null,
    suggestedSolution: null,
    tags: [],
    targetAudience: null,
    relatedIndustry: null,
    opportunityScore: 55,
    createdAt: '2026-03-01T09:00:00.000Z',
    ...overrides,
  };
}

const outcome: SessionOutcome = {
  itemsProcessed: 1,
  painPointsExtracted: 1,
  itemsSkipped: 0,
  avgOpportunityScore: 55,
  highSeverityCount: 0,
  criticalSeverityCount: 0,
  categoryBreakdown: { other: 1 },
  severityBreakdown: { critical: 0, high: 0, medium: 0, low: 1 },
  status: 'completed',
  completedAt: '2026-03-01T09:01:00.000Z',
  durationSeconds: 60,
  errorMessage: null,
};

describe('MemoryRawItemRepository', () => {
  it('reports duplicates without overwriting', async () => {
    const repo = new MemoryRawItemRepository();

    expect((await repo.insertOrSkip(rawItem('a', 'first'))).status).toBe('inserted');
    expect(await repo.insertOrSkip(rawItem('a', 'second'))).toEqual({ status: 'duplicate', externalId: 'a' });
    expect((await repo.get('a'))?.content).toBe('first');
  });

  it('marks sentiment only once', async () => {
    const repo = new MemoryRawItemRepository();
    await repo.insertOrSkip(rawItem('a', 'text'));

    expect(await repo.markSentiment('a', { isNegative: true, sentimentScore: -0.9 })).toBe(true);
    expect(await repo.markSentiment('a', { isNegative: false, sentimentScore: 0.9 })).toBe(false);
    expect(await repo.markSentiment('missing', { isNegative: false, sentimentScore: 0 })).toBe(false);
    expect(await repo.get('a')).toMatchObject({ processed: true, isNegative: true, sentimentScore: -0.9 });
    expect(await repo.count({ negativeOnly: true })).toBe(1);
  });

  it('excludes already extracted items from candidates', async () => {
    const repo = new MemoryRawItemRepository();
    await repo.insertOrSkip(rawItem('a', 'one'));
    await repo.insertOrSkip(rawItem('b', 'two'));
    await repo.insertOrSkip(rawItem('c', 'three'));

    const candidates = await repo.findExtractionCandidates(new Set(['b']), 10);

    expect(candidates.map((item) => item.externalId)).toEqual(['a', 'c']);
  });

  it('selects nothing for a zero or negative limit', async () => {
    const repo = new MemoryRawItemRepository();
    await repo.insertOrSkip(rawItem('a', 'one'));
    await repo.insertOrSkip(rawItem('b', 'two'));

    expect(await repo.findUnprocessed(0)).toEqual([]);
    expect(await repo.findUnprocessed(-1)).toEqual([]);
    expect(await repo.findExtractionCandidates(new Set(), 0)).toEqual([]);
    expect(await repo.list({ limit: -1 })).toEqual([]);
    expect((await repo.findUnprocessed(1)).map((item) => item.externalId)).toEqual(['a']);
  });
});

describe('MemoryPainPointRepository', () => {
  it('lists by score and counts by category', async () => {
    const repo = new MemoryPainPointRepository();
    await repo.save(painPoint('1', { opportunityScore: 60, category: 'pricing' }));
    await repo.save(painPoint('2', { opportunityScore: 90, category: 'pricing' }));
    await repo.save(painPoint('3', { opportunityScore: 70, category: 'support', extractionSessionId: 'session-2' }));

    expect((await repo.list()).map((pp) => pp.id)).toEqual(['2', '3', '1']);
    expect((await repo.list({ limit: 1 })).map((pp) => pp.id)).toEqual(['2']);
    expect((await repo.listBySession('session-1')).map((pp) => pp.id)).toEqual(['2', '1']);
    expect(await repo.countByCategory()).toEqual({ pricing: 2, support: 1 });
    expect(await repo.listRawItemIds()).toEqual(new Set(['raw_1', 'raw_2', 'raw_3']));
  });
});

describe('MemoryExtractionSessionRepository', () => {
  it('finalizes an in_progress session exactly once', async () => {
    const repo = new MemoryExtractionSessionRepository();
    await repo.create(inProgressSession('s1', '2026-03-01T09:00:00.000Z'));

    const finalized = await repo.finalize('s1', outcome);

    expect(finalized).toMatchObject({ status: 'completed', durationSeconds: 60 });
    await expect(repo.finalize('s1', { ...outcome, status: 'failed' })).rejects.toBeInstanceOf(InvalidSessionTransition);
    await expect(repo.finalize('missing', outcome)).rejects.toBeInstanceOf(InvalidSessionTransition);
  });

  it('lists newest first and finds stale sessions', async () => {
    const repo = new MemoryExtractionSessionRepository();
    await repo.create(inProgressSession('old', '2026-03-01T07:00:00.000Z'));
    await repo.create(inProgressSession('new', '2026-03-01T08:45:00.000Z'));
    await repo.create(inProgressSession('done', '2026-03-01T06:00:00.000Z'));
    await repo.finalize('done', outcome);

    expect((await repo.list()).map((s) => s.id)).toEqual(['new', 'old', 'done']);
    expect((await repo.list({ status: 'in_progress', limit: 1 })).map((s) => s.id)).toEqual(['new']);
    expect((await repo.findStale('2026-03-01T08:00:00.000Z')).map((s) => s.id)).toEqual(['old']);
  });
});
