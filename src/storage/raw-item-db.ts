/**
 * Raw Item Table (DynamoDB)
 *
 * Holds every ingested item keyed by its externalId. A conditional put
 * makes each insert-or-skip decision independent of the rest of the batch.
 */

import { GetCommand, PutCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { RawItem, RawItemFilter } from '../types';
import { countAll, isConditionalCheckFailure, scanAll, toRawItem, toStorageFailure } from './dynamo-helpers';
import { DEFAULT_RAW_ITEM_LIMIT, takeFirst } from './repositories';
import type { InsertOrSkipResult, RawItemRepository, SentimentMark } from './repositories';

export class RawItemTable implements RawItemRepository {
  constructor(
    private docClient: DynamoDBDocumentClient,
    private tableName: string
  ) {}

  async insertOrSkip(item: RawItem): Promise<InsertOrSkipResult> {
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: item,
          ConditionExpression: 'attribute_not_exists(externalId)',
        })
      );
      return { status: 'inserted', item };
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        return { status: 'duplicate', externalId: item.externalId };
      }
      throw toStorageFailure('put raw item', error);
    }
  }

  async findUnprocessed(limit: number): Promise<RawItem[]> {
    try {
      const records = await scanAll(
        this.docClient,
        {
          TableName: this.tableName,
          FilterExpression: '#processed = :false',
          ExpressionAttributeNames: { '#processed': 'processed' },
          ExpressionAttributeValues: { ':false': false },
        },
        { limit }
      );
      return records.map(toRawItem);
    } catch (error) {
      throw toStorageFailure('scan unprocessed items', error);
    }
  }

  async markSentiment(externalId: string, mark: SentimentMark): Promise<boolean> {
    try {
      await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { externalId },
          UpdateExpression: 'SET #processed = :true, #isNegative = :isNegative, #sentimentScore = :sentimentScore',
          ConditionExpression: 'attribute_exists(externalId) AND #processed = :false',
          ExpressionAttributeNames: {
            '#processed': 'processed',
            '#isNegative': 'isNegative',
            '#sentimentScore': 'sentimentScore',
          },
          ExpressionAttributeValues: {
            ':true': true,
            ':false': false,
            ':isNegative': mark.isNegative,
            ':sentimentScore': mark.sentimentScore,
          },
        })
      );
      return true;
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        return false;
      }
      throw toStorageFailure('update sentiment', error);
    }
  }

  async findExtractionCandidates(excludeIds: ReadonlySet<string>, limit: number): Promise<RawItem[]> {
    try {
      const records = await scanAll(
        this.docClient,
        {
          TableName: this.tableName,
          FilterExpression: 'attribute_exists(#content) AND size(#content) > :zero',
          ExpressionAttributeNames: { '#content': 'content' },
          ExpressionAttributeValues: { ':zero': 0 },
        },
        {
          limit,
          accept: (record) => typeof record.externalId === 'string' && !excludeIds.has(record.externalId),
        }
      );
      return records.map(toRawItem);
    } catch (error) {
      throw toStorageFailure('scan extraction candidates', error);
    }
  }

  async get(externalId: string): Promise<RawItem | null> {
    try {
      const response = await this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { externalId },
        })
      );
      return response.Item ? toRawItem(response.Item) : null;
    } catch (error) {
      throw toStorageFailure('get raw item', error);
    }
  }

  async list(filter: RawItemFilter = {}): Promise<RawItem[]> {
    try {
      const records = await scanAll(
        this.docClient,
        filter.source
          ? {
              TableName: this.tableName,
              FilterExpression: '#source = :source',
              ExpressionAttributeNames: { '#source': 'source' },
              ExpressionAttributeValues: { ':source': filter.source },
            }
          : { TableName: this.tableName }
      );
      return takeFirst(
        records
          .map(toRawItem)
          .sort((a, b) => b.ingestedAt.localeCompare(a.ingestedAt)),
        filter.limit ?? DEFAULT_RAW_ITEM_LIMIT
      );
    } catch (error) {
      throw toStorageFailure('scan raw items', error);
    }
  }

  async count(options: { negativeOnly?: boolean } = {}): Promise<number> {
    try {
      return await countAll(
        this.docClient,
        options.negativeOnly
          ? {
              TableName: this.tableName,
              FilterExpression: '#isNegative = :true',
              ExpressionAttributeNames: { '#isNegative': 'isNegative' },
              ExpressionAttributeValues: { ':true': true },
            }
          : { TableName: this.tableName }
      );
    } catch (error) {
      throw toStorageFailure('count raw items', error);
    }
  }
}
