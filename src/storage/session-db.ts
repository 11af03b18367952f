/**
 * Extraction Session Table (DynamoDB)
 *
 * Sessions move forward only: the terminal update is conditional on the
 * stored status still being in_progress.
 */

import { GetCommand, PutCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { InvalidSessionTransition } from '../errors';
import type { ExtractionSession, SessionOutcome, SessionStatus } from '../types';
import { isConditionalCheckFailure, scanAll, toExtractionSession, toStorageFailure } from './dynamo-helpers';
import { DEFAULT_SESSION_LIMIT, takeFirst } from './repositories';
import type { ExtractionSessionRepository } from './repositories';

export class ExtractionSessionTable implements ExtractionSessionRepository {
  constructor(
    private docClient: DynamoDBDocumentClient,
    private tableName: string
  ) {}

  async create(session: ExtractionSession): Promise<void> {
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: session,
          ConditionExpression: 'attribute_not_exists(id)',
        })
      );
    } catch (error) {
      throw toStorageFailure('put extraction session', error);
    }
  }

  async finalize(sessionId: string, outcome: SessionOutcome): Promise<ExtractionSession> {
    const fields = Object.entries(outcome);
    const names: Record<string, string> = { '#current': 'status' };
    const values: Record<string, unknown> = { ':inProgress': 'in_progress' };

    const assignments = fields.map(([field, value]) => {
      names[`#${field}`] = field;
      values[`:${field}`] = value;
      return `#${field} = :${field}`;
    });

    try {
      const response = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { id: sessionId },
          UpdateExpression: `SET ${assignments.join(', ')}`,
          ConditionExpression: 'attribute_exists(id) AND #current = :inProgress',
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: values,
          ReturnValues: 'ALL_NEW',
        })
      );
      if (!response.Attributes) {
        throw new InvalidSessionTransition(sessionId);
      }
      return toExtractionSession(response.Attributes);
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new InvalidSessionTransition(sessionId);
      }
      throw toStorageFailure('finalize extraction session', error);
    }
  }

  async get(sessionId: string): Promise<ExtractionSession | null> {
    try {
      const response = await this.docClient.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { id: sessionId },
        })
      );
      return response.Item ? toExtractionSession(response.Item) : null;
    } catch (error) {
      throw toStorageFailure('get extraction session', error);
    }
  }

  async list(options: { status?: SessionStatus; limit?: number } = {}): Promise<ExtractionSession[]> {
    try {
      const records = await scanAll(
        this.docClient,
        options.status
          ? {
              TableName: this.tableName,
              FilterExpression: '#status = :status',
              ExpressionAttributeNames: { '#status': 'status' },
              ExpressionAttributeValues: { ':status': options.status },
            }
          : { TableName: this.tableName }
      );
      return takeFirst(
        records
          .map(toExtractionSession)
          .sort((a, b) => b.startedAt.localeCompare(a.startedAt)),
        options.limit ?? DEFAULT_SESSION_LIMIT
      );
    } catch (error) {
      throw toStorageFailure('scan extraction sessions', error);
    }
  }

  async findInProgress(): Promise<ExtractionSession[]> {
    return this.findStale(undefined);
  }

  async findStale(startedBefore: string | undefined): Promise<ExtractionSession[]> {
    const names: Record<string, string> = { '#status': 'status' };
    const values: Record<string, unknown> = { ':inProgress': 'in_progress' };
    let filter = '#status = :inProgress';

    if (startedBefore) {
      filter += ' AND #startedAt < :cutoff';
      names['#startedAt'] = 'startedAt';
      values[':cutoff'] = startedBefore;
    }

    try {
      const records = await scanAll(this.docClient, {
        TableName: this.tableName,
        FilterExpression: filter,
        ExpressionAttributeNames: names,
        ExpressionAttributeValues: values,
      });
      return records.map(toExtractionSession);
    } catch (error) {
      throw toStorageFailure('scan in-progress sessions', error);
    }
  }
}
