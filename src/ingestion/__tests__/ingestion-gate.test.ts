import { describe, expect, it } from 'vitest';
import { candidate } from '../../__tests__/factories';
import { StorageFailure } from '../../errors';
import { MemoryRawItemRepository } from '../../storage';
import type { InsertOrSkipResult } from '../../storage';
import type { RawItem } from '../../types';
import { IngestionGate } from '../ingestion-gate';

const clock = () => new Date('2026-03-01T09:00:00Z');

describe('IngestionGate', () => {
  it('stores new candidates with default state', async () => {
    const repo = new MemoryRawItemRepository();
    const gate = new IngestionGate(repo, clock);

    await gate.ingest([
      candidate('reddit_abc', 'Billing page keeps timing out', {
        author: 'pat',
        url: 'https://reddit.com/r/SaaS/comments/abc',
        metadata: { engagementScore: 12 },
      }),
    ]);

    expect(await repo.get('reddit_abc')).toEqual({
      externalId: 'reddit_abc',
      source: 'reddit',
      content: 'Billing page keeps timing out',
      author: 'pat',
      url: 'https://reddit.com/r/SaaS/comments/abc',
      originTimestamp: null,
      metadata: { engagementScore: 12 },
      isNegative: null,
      sentimentScore: null,
      processed: false,
      ingestedAt: '2026-03-01T09:00:00.000Z',
    });
  });

  it('counts accepted, duplicate and invalid candidates', async () => {
    const gate = new IngestionGate(new MemoryRawItemRepository(), clock);

    const result = await gate.ingest([
      candidate('hn_1', 'Search is useless'),
      candidate('hn_1', 'Search is useless (repost)'),
      candidate('hn_2', '   '),
      candidate('hn_3', 'Exports are broken'),
    ]);

    expect(result).toEqual({ accepted: 2, skipped: 1, invalid: 1 });
  });

  it('is idempotent across batches and never overwrites', async () => {
    const repo = new MemoryRawItemRepository();
    const gate = new IngestionGate(repo, clock);
    await gate.ingest([candidate('hn_1', 'original text')]);

    const second = await gate.ingest([candidate('hn_1', 'changed text')]);

    expect(second).toEqual({ accepted: 0, skipped: 1, invalid: 0 });
    expect((await repo.get('hn_1'))?.content).toBe('original text');
    expect(await repo.count()).toBe(1);
  });

  it('propagates storage failures', async () => {
    class FailingRepository extends MemoryRawItemRepository {
      async insertOrSkip(_item: RawItem): Promise<InsertOrSkipResult> {
        throw new StorageFailure('DynamoDB put failed: throttled');
      }
    }

    await expect(
      new IngestionGate(new FailingRepository(), clock).ingest([candidate('hn_1', 'text')])
    ).rejects.toBeInstanceOf(StorageFailure);
  });
});
