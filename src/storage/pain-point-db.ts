/**
 * Pain Point Table (DynamoDB)
 *
 * Stores the structured, scored pain points. Consumers read them
 * highest opportunity score first.
 */

import { PutCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { PainPoint, PainPointFilter } from '../types';
import { buildPainPointFilter, countAll, scanAll, toPainPoint, toStorageFailure } from './dynamo-helpers';
import { DEFAULT_PAIN_POINT_LIMIT, byScoreDescending, takeFirst } from './repositories';
import type { PainPointRepository } from './repositories';

export class PainPointTable implements PainPointRepository {
  constructor(
    private docClient: DynamoDBDocumentClient,
    private tableName: string
  ) {}

  async save(painPoint: PainPoint): Promise<void> {
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: painPoint,
        })
      );
    } catch (error) {
      throw toStorageFailure('put pain point', error);
    }
  }

  async listRawItemIds(): Promise<Set<string>> {
    try {
      const records = await scanAll(this.docClient, {
        TableName: this.tableName,
        ProjectionExpression: '#rawItemId',
        ExpressionAttributeNames: { '#rawItemId': 'rawItemId' },
      });
      const ids = new Set<string>();
      for (const record of records) {
        if (typeof record.rawItemId === 'string') ids.add(record.rawItemId);
      }
      return ids;
    } catch (error) {
      throw toStorageFailure('scan pain point item ids', error);
    }
  }

  async list(filter: PainPointFilter = {}): Promise<PainPoint[]> {
    try {
      const records = await scanAll(this.docClient, {
        TableName: this.tableName,
        ...buildPainPointFilter(filter),
      });
      return takeFirst(
        records
          .map(toPainPoint)
          .sort(byScoreDescending),
        filter.limit ?? DEFAULT_PAIN_POINT_LIMIT
      );
    } catch (error) {
      throw toStorageFailure('scan pain points', error);
    }
  }

  async listBySession(sessionId: string): Promise<PainPoint[]> {
    try {
      const records = await scanAll(this.docClient, {
        TableName: this.tableName,
        FilterExpression: '#sessionId = :sessionId',
        ExpressionAttributeNames: { '#sessionId': 'extractionSessionId' },
        ExpressionAttributeValues: { ':sessionId': sessionId },
      });
      return records.map(toPainPoint).sort(byScoreDescending);
    } catch (error) {
      throw toStorageFailure('scan session pain points', error);
    }
  }

  async count(): Promise<number> {
    try {
      return await countAll(this.docClient, { TableName: this.tableName });
    } catch (error) {
      throw toStorageFailure('count pain points', error);
    }
  }

  async countByCategory(): Promise<Record<string, number>> {
    try {
      const records = await scanAll(this.docClient, {
        TableName: this.tableName,
        ProjectionExpression: '#category',
        ExpressionAttributeNames: { '#category': 'category' },
      });
      const counts: Record<string, number> = {};
      for (const record of records) {
        const category = typeof record.category === 'string' ? record.category : 'other';
        counts[category] = (counts[category] || 0) + 1;
      }
      return counts;
    } catch (error) {
      throw toStorageFailure('scan pain point categories', error);
    }
  }
}
