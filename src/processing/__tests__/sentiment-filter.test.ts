import { describe, expect, it } from 'vitest';
import { rawItem, ScriptedSentimentClassifier } from '../../__tests__/factories';
import { MemoryRawItemRepository } from '../../storage';
import type { SentimentResult } from '../../types';
import type { SentimentClassifier } from '../sentiment-classifier';
import { SentimentFilter, toSentimentMark } from '../sentiment-filter';

const options = { maxLength: 1000, timeoutMs: 1000 };

async function seed(repo: MemoryRawItemRepository, contents: Record<string, string>): Promise<void> {
  for (const [externalId, content] of Object.entries(contents)) {
    await repo.insertOrSkip(rawItem(externalId, content));
  }
}

describe('toSentimentMark', () => {
  it('flags negative results above the confidence threshold', () => {
    expect(toSentimentMark({ label: 'NEGATIVE', confidence: 0.92 })).toEqual({ isNegative: true, sentimentScore: -0.92 });
  });

  it('does not flag negative results at or below the threshold', () => {
    expect(toSentimentMark({ label: 'NEGATIVE', confidence: 0.7 })).toEqual({ isNegative: false, sentimentScore: -0.7 });
  });

  it('stores positive confidence as is and neutral as zero', () => {
    expect(toSentimentMark({ label: 'POSITIVE', confidence: 0.8 })).toEqual({ isNegative: false, sentimentScore: 0.8 });
    expect(toSentimentMark({ label: 'NEUTRAL', confidence: 0.9 })).toEqual({ isNegative: false, sentimentScore: 0 });
  });
});

describe('SentimentFilter', () => {
  it('marks every selected item processed and counts negatives', async () => {
    const repo = new MemoryRawItemRepository();
    await seed(repo, { a: 'angry', b: 'mildly upset', c: 'happy', d: 'unknown' });
    const classifier = new ScriptedSentimentClassifier({
      angry: { label: 'NEGATIVE', confidence: 0.9 },
      'mildly upset': { label: 'NEGATIVE', confidence: 0.6 },
      happy: { label: 'POSITIVE', confidence: 0.8 },
    });

    const result = await new SentimentFilter(classifier, repo, options).filter(10);

    expect(result).toEqual({ processed: 4, negative: 1 });
    expect(await repo.get('a')).toMatchObject({ processed: true, isNegative: true, sentimentScore: -0.9 });
    expect(await repo.get('b')).toMatchObject({ processed: true, isNegative: false, sentimentScore: -0.6 });
    expect(await repo.get('c')).toMatchObject({ processed: true, isNegative: false, sentimentScore: 0.8 });
    expect(await repo.get('d')).toMatchObject({ processed: true, isNegative: false, sentimentScore: 0 });
  });

  it('does not classify an item twice', async () => {
    const repo = new MemoryRawItemRepository();
    await seed(repo, { a: 'angry' });
    const classifier = new ScriptedSentimentClassifier({ angry: { label: 'NEGATIVE', confidence: 0.95 } });
    const filter = new SentimentFilter(classifier, repo, options);

    await filter.filter(10);
    const second = await filter.filter(10);

    expect(second).toEqual({ processed: 0, negative: 0 });
    expect(classifier.calls).toEqual(['angry']);
  });

  it('respects the batch size', async () => {
    const repo = new MemoryRawItemRepository();
    await seed(repo, { a: 'one', b: 'two', c: 'three' });
    const neutral: SentimentResult = { label: 'NEUTRAL', confidence: 0.5 };
    const classifier = new ScriptedSentimentClassifier({ one: neutral, two: neutral, three: neutral });

    const result = await new SentimentFilter(classifier, repo, options).filter(2);

    expect(result.processed).toBe(2);
    expect(await repo.findUnprocessed(10)).toHaveLength(1);
  });

  it('truncates content before classification', async () => {
    const repo = new MemoryRawItemRepository();
    await seed(repo, { a: 'abcdefghij' });
    const classifier = new ScriptedSentimentClassifier({ abcde: { label: 'NEGATIVE', confidence: 0.99 } });

    const result = await new SentimentFilter(classifier, repo, { maxLength: 5, timeoutMs: 1000 }).filter(10);

    expect(classifier.calls).toEqual(['abcde']);
    expect(result.negative).toBe(1);
  });

  it('treats a classifier timeout as neutral', async () => {
    const repo = new MemoryRawItemRepository();
    await seed(repo, { a: 'slow' });
    const hanging: SentimentClassifier = {
      name: 'hanging',
      classify: () => new Promise<SentimentResult>(() => undefined),
    };

    const result = await new SentimentFilter(hanging, repo, { maxLength: 1000, timeoutMs: 10 }).filter(10);

    expect(result).toEqual({ processed: 1, negative: 0 });
    expect(await repo.get('a')).toMatchObject({ processed: true, isNegative: false, sentimentScore: 0 });
  });

  it('returns zero counts when nothing is unprocessed', async () => {
    const classifier = new ScriptedSentimentClassifier({});

    const result = await new SentimentFilter(classifier, new MemoryRawItemRepository(), options).filter(10);

    expect(result).toEqual({ processed: 0, negative: 0 });
  });
});
