import { describe, expect, it, vi } from 'vitest';
import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { AdapterUnavailable, StorageFailure } from '../../errors';
import {
  buildPainPointFilter,
  isConditionalCheckFailure,
  scanAll,
  toExtractionSession,
  toPainPoint,
  toRawItem,
  toStorageFailure,
} from '../dynamo-helpers';

describe('buildPainPointFilter', () => {
  it('returns no expression without criteria', () => {
    expect(buildPainPointFilter({})).toEqual({});
    expect(buildPainPointFilter({ limit: 10 })).toEqual({});
  });

  it('joins criteria with AND', () => {
    expect(buildPainPointFilter({ category: 'pricing', minScore: 70 })).toEqual({
      FilterExpression: '#category = :category AND #opportunityScore >= :minScore',
      ExpressionAttributeNames: { '#category': 'category', '#opportunityScore': 'opportunityScore' },
      ExpressionAttributeValues: { ':category': 'pricing', ':minScore': 70 },
    });
  });

  it('keeps a zero minimum score', () => {
    expect(buildPainPointFilter({ minScore: 0 }).FilterExpression).toBe('#opportunityScore >= :minScore');
  });
});

describe('isConditionalCheckFailure', () => {
  it('recognizes the SDK exception', () => {
    const error = new ConditionalCheckFailedException({ message: 'The conditional request failed', $metadata: {} });

    expect(isConditionalCheckFailure(error)).toBe(true);
  });

  it('recognizes the error by name', () => {
    const error = new Error('The conditional request failed');
    error.name = 'ConditionalCheckFailedException';

    expect(isConditionalCheckFailure(error)).toBe(true);
    expect(isConditionalCheckFailure(new Error('ProvisionedThroughputExceeded'))).toBe(false);
  });
});

describe('toStorageFailure', () => {
  it('wraps unknown errors', () => {
    const cause = new Error('socket hang up');
    const failure = toStorageFailure('scan', cause);

    expect(failure).toBeInstanceOf(StorageFailure);
    expect(failure.message).toBe('DynamoDB scan failed: socket hang up');
    expect(failure.cause).toBe(cause);
  });

  it('passes pipeline errors through', () => {
    const error = new AdapterUnavailable('missing');

    expect(toStorageFailure('put', error)).toBe(error);
  });
});

describe('record decoding', () => {
  it('decodes a raw item with defaults', () => {
    expect(toRawItem({ externalId: 'reddit_1', content: 'text', processed: true, sentimentScore: -0.8 })).toEqual({
      externalId: 'reddit_1',
      source: 'unknown',
      content: 'text',
      author: null,
      url: null,
      originTimestamp: null,
      metadata: {},
      isNegative: null,
      sentimentScore: -0.8,
      processed: true,
      ingestedAt: '',
    });
  });

  it('falls back to safe enum values for pain points', () => {
    const painPoint = toPainPoint({ id: 'pp1', category: 'billing', severity: 'urgent', tags: new Set(['a', 'b']) });

    expect(painPoint).toMatchObject({ category: 'other', severity: 'low', opportunityScore: 50, tags: ['a', 'b'] });
  });

  it('decodes a session and keeps only numeric breakdown counts', () => {
    const session = toExtractionSession({
      id: 's1',
      name: 'Analysis 2026-03-01 09:00',
      status: 'completed',
      itemsProcessed: 4,
      categoryBreakdown: { pricing: 2, bogus: 'x' },
      startedAt: '2026-03-01T09:00:00.000Z',
      durationSeconds: 12,
    });

    expect(session).toMatchObject({
      status: 'completed',
      itemsProcessed: 4,
      painPointsExtracted: 0,
      avgOpportunityScore: null,
      categoryBreakdown: { pricing: 2 },
      durationSeconds: 12,
      completedAt: null,
    });
  });

  it('treats an unknown status as in_progress', () => {
    expect(toExtractionSession({ id: 's2', status: 'paused' }).status).toBe('in_progress');
  });
});

describe('scanAll', () => {
  function pagedClient() {
    const docClient = DynamoDBDocumentClient.from(new DynamoDBClient({ region: 'us-east-1' }));
    const send = vi.spyOn(docClient, 'send').mockImplementation(async () => ({
      $metadata: {},
      Items: [{ externalId: 'a' }, { externalId: 'b' }, { externalId: 'c' }],
    }));
    return { docClient, send };
  }

  it('stops once the limit is reached', async () => {
    const { docClient, send } = pagedClient();

    const records = await scanAll(docClient, { TableName: 'items' }, { limit: 2 });

    expect(records).toEqual([{ externalId: 'a' }, { externalId: 'b' }]);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('counts only accepted records toward the limit', async () => {
    const { docClient } = pagedClient();

    const records = await scanAll(
      docClient,
      { TableName: 'items' },
      { limit: 1, accept: (record) => record.externalId !== 'a' }
    );

    expect(records).toEqual([{ externalId: 'b' }]);
  });

  it('selects nothing for a zero or negative limit', async () => {
    const { docClient, send } = pagedClient();

    expect(await scanAll(docClient, { TableName: 'items' }, { limit: 0 })).toEqual([]);
    expect(await scanAll(docClient, { TableName: 'items' }, { limit: -1 })).toEqual([]);
    expect(send).not.toHaveBeenCalled();
  });
});
