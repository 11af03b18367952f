/**
 * DynamoDB helpers shared by the table classes: client construction,
 * paginated scans, error wrapping and record decoding.
 */

import { ConditionalCheckFailedException, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, ScanCommand } from '@aws-sdk/lib-dynamodb';
import type { ScanCommandInput } from '@aws-sdk/lib-dynamodb';
import type { StorageConfig } from '../config';
import { PainRadarError, StorageFailure, toErrorMessage } from '../errors';
import { isPainPointCategory, isSeverity } from '../types';
import type { ExtractionSession, PainPoint, PainPointFilter, RawItem, SessionStatus, SourceMetadata } from '../types';

export type DynamoRecord = Record<string, unknown>;

export function createDocumentClient(storage: StorageConfig): DynamoDBDocumentClient {
  const dynamoClient = new DynamoDBClient({
    region: storage.region,
    endpoint: storage.endpoint,
  });
  return DynamoDBDocumentClient.from(dynamoClient, {
    marshallOptions: { removeUndefinedValues: true },
  });
}

export function isConditionalCheckFailure(error: unknown): boolean {
  if (error instanceof ConditionalCheckFailedException) {
    return true;
  }
  return error instanceof Error && error.name === 'ConditionalCheckFailedException';
}

export function toStorageFailure(operation: string, error: unknown): PainRadarError {
  if (error instanceof PainRadarError) {
    return error;
  }
  return new StorageFailure(`DynamoDB ${operation} failed: ${toErrorMessage(error)}`, { cause: error });
}

/**
 * Scan a table page by page, keeping records that pass `accept`,
 * until `limit` records are collected or the table is exhausted.
 * A limit of zero or less selects nothing.
 */
export async function scanAll(
  docClient: DynamoDBDocumentClient,
  input: ScanCommandInput,
  options: { limit?: number; accept?: (record: DynamoRecord) => boolean } = {}
): Promise<DynamoRecord[]> {
  const records: DynamoRecord[] = [];
  if (options.limit !== undefined && options.limit <= 0) {
    return records;
  }
  let exclusiveStartKey: ScanCommandInput['ExclusiveStartKey'];

  do {
    const response = await docClient.send(new ScanCommand({ ...input, ExclusiveStartKey: exclusiveStartKey }));

    for (const record of response.Items || []) {
      if (options.accept && !options.accept(record)) continue;
      records.push(record);
      if (options.limit !== undefined && records.length >= options.limit) {
        return records;
      }
    }

    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return records;
}

export async function countAll(docClient: DynamoDBDocumentClient, input: ScanCommandInput): Promise<number> {
  let total = 0;
  let exclusiveStartKey: ScanCommandInput['ExclusiveStartKey'];

  do {
    const response = await docClient.send(
      new ScanCommand({ ...input, Select: 'COUNT', ExclusiveStartKey: exclusiveStartKey })
    );
    total += response.Count || 0;
    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return total;
}

export interface FilterExpressionParts {
  FilterExpression?: string;
  ExpressionAttributeNames?: Record<string, string>;
  ExpressionAttributeValues?: Record<string, unknown>;
}

export function buildPainPointFilter(filter: PainPointFilter): FilterExpressionParts {
  const clauses: string[] = [];
  const names: Record<string, string> = {};
  const values: Record<string, unknown> = {};

  if (filter.category) {
    clauses.push('#category = :category');
    names['#category'] = 'category';
    values[':category'] = filter.category;
  }
  if (filter.severity) {
    clauses.push('#severity = :severity');
    names['#severity'] = 'severity';
    values[':severity'] = filter.severity;
  }
  if (filter.minScore !== undefined) {
    clauses.push('#opportunityScore >= :minScore');
    names['#opportunityScore'] = 'opportunityScore';
    values[':minScore'] = filter.minScore;
  }

  if (clauses.length === 0) {
    return {};
  }

  return {
    FilterExpression: clauses.join(' AND '),
    ExpressionAttributeNames: names,
    ExpressionAttributeValues: values,
  };
}

// Record decoding

function str(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function num(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function bool(value: unknown): boolean | null {
  return typeof value === 'boolean' ? value : null;
}

function counts(value: unknown): Record<string, number> {
  const result: Record<string, number> = {};
  if (value && typeof value === 'object') {
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === 'number') result[key] = entry;
    }
  }
  return result;
}

function metadata(value: unknown): SourceMetadata {
  return value && typeof value === 'object' ? { ...value } : {};
}

function stringList(value: unknown): string[] {
  if (value instanceof Set) {
    return [...value].filter((entry): entry is string => typeof entry === 'string');
  }
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
}

function sessionStatus(value: unknown): SessionStatus {
  return value === 'completed' || value === 'failed' ? value : 'in_progress';
}

export function toRawItem(record: DynamoRecord): RawItem {
  return {
    externalId: str(record.externalId) ?? '',
    source: str(record.source) ?? 'unknown',
    content: str(record.content) ?? '',
    author: str(record.author),
    url: str(record.url),
    originTimestamp: str(record.originTimestamp),
    metadata: metadata(record.metadata),
    isNegative: bool(record.isNegative),
    sentimentScore: num(record.sentimentScore),
    processed: bool(record.processed) ?? false,
    ingestedAt: str(record.ingestedAt) ?? '',
  };
}

export function toPainPoint(record: DynamoRecord): PainPoint {
  return {
    id: str(record.id) ?? '',
    rawItemId: str(record.rawItemId) ?? '',
    extractionSessionId: str(record.extractionSessionId) ?? '',
    problemStatement: str(record.problemStatement) ?? '',
    category: isPainPointCategory(record.category) ? record.category : 'other',
    severity: isSeverity(record.severity) ? record.severity : 'low',
    context: str(record.context),
    suggestedSolution: str(record.suggestedSolution),
    tags: stringList(record.tags),
    targetAudience: str(record.targetAudience),
    relatedIndustry: str(record.relatedIndustry),
    opportunityScore: num(record.opportunityScore) ?? 50,
    createdAt: str(record.createdAt) ?? '',
  };
}

export function toExtractionSession(record: DynamoRecord): ExtractionSession {
  return {
    id: str(record.id) ?? '',
    name: str(record.name) ?? '',
    status: sessionStatus(record.status),
    itemsProcessed: num(record.itemsProcessed) ?? 0,
    painPointsExtracted: num(record.painPointsExtracted) ?? 0,
    itemsSkipped: num(record.itemsSkipped) ?? 0,
    avgOpportunityScore: num(record.avgOpportunityScore),
    highSeverityCount: num(record.highSeverityCount) ?? 0,
    criticalSeverityCount: num(record.criticalSeverityCount) ?? 0,
    categoryBreakdown: counts(record.categoryBreakdown),
    severityBreakdown: counts(record.severityBreakdown),
    startedAt: str(record.startedAt) ?? '',
    completedAt: str(record.completedAt),
    durationSeconds: num(record.durationSeconds),
    errorMessage: str(record.errorMessage),
  };
}
