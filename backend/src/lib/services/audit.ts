import { ulid } from 'ulid';
import type {
  AuditLogEntry,
  AuditAction,
  AuditTargetType,
  PaginatedResponse,
} from '@warranty/shared';
import { config } from '../config.js';
import {
  putItem,
  queryItems,
  encodeCursor,
  decodeCursor,
  stripKeys,
  isTransientDynamoError,
} from '../dynamodb.js';
import { logger } from '../logger.js';
import { sleep } from '../retry.js';
import type { AuditQueryInput } from '../validation.js';

const TABLE = config.tables.audit;

export interface AuditEventInput {
  action: AuditAction;
  targetType: AuditTargetType;
  targetId: string;
  actorId: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

type AuditItem = AuditLogEntry & {
  PK: string;
  SK: string;
  GSI1PK: string;
  GSI1SK: string;
  GSI2PK: string;
  GSI2SK: string;
};

function toItem(entry: AuditLogEntry): AuditItem {
  const yearMonth = entry.timestamp.substring(0, 7); // YYYY-MM
  return {
    PK: `AUDIT#${yearMonth}`,
    SK: `LOG#${entry.logId}`,
    GSI1PK: `ACTOR#${entry.actorId}`,
    GSI1SK: `LOG#${entry.timestamp}#${entry.logId}`,
    GSI2PK: `TARGET#${entry.targetType}#${entry.targetId}`,
    GSI2SK: `LOG#${entry.timestamp}#${entry.logId}`,
    ...entry,
  };
}

/**
 * Append an audit entry. Best effort: one retry after a fixed delay on storage
 * contention, then the entry is logged and dropped. Never rejects, so the
 * business operation that already committed is not affected.
 */
export async function recordAuditEvent(input: AuditEventInput): Promise<AuditLogEntry | null> {
  const entry: AuditLogEntry = {
    logId: ulid(),
    actorId: input.actorId,
    action: input.action,
    targetType: input.targetType,
    targetId: input.targetId,
    timestamp: new Date().toISOString(),
    details: input.details,
    requestId: input.requestId,
  };
  const params = { TableName: TABLE, Item: toItem(entry) };

  try {
    await putItem(params);
    return entry;
  } catch (error) {
    if (!isTransientDynamoError(error)) {
      logger.error({ error, entry }, `Failed to record audit event '${entry.action}'`);
      return null;
    }
  }

  await sleep(config.audit.retryDelayMs);

  try {
    await putItem(params);
    return entry;
  } catch (retryError) {
    logger.error({ error: retryError, entry }, `Retry failed for audit event '${entry.action}', entry dropped`);
    return null;
  }
}

function toPage(
  items: AuditItem[],
  lastEvaluatedKey: Record<string, unknown> | undefined
): PaginatedResponse<AuditLogEntry> {
  return {
    items: items.map((item) => stripKeys(item)),
    cursor: lastEvaluatedKey ? encodeCursor(lastEvaluatedKey) : undefined,
    hasMore: !!lastEvaluatedKey,
  };
}

export async function listAuditLogs(
  query: AuditQueryInput
): Promise<PaginatedResponse<AuditLogEntry>> {
  if (query.actorId) {
    return listAuditLogsByActor(query.actorId, query);
  }
  if (query.targetType && query.targetId) {
    return listAuditLogsByTarget(query.targetType, query.targetId, query);
  }

  const exclusiveStartKey = query.cursor ? decodeCursor(query.cursor) : undefined;

  // Get current month for partition key
  const yearMonth = new Date().toISOString().substring(0, 7);

  let filterExpression: string | undefined;
  const expressionAttributeValues: Record<string, unknown> = {
    ':pk': `AUDIT#${yearMonth}`,
  };

  const filters: string[] = [];

  if (query.action) {
    filters.push('#action = :action');
    expressionAttributeValues[':action'] = query.action;
  }

  if (query.targetType) {
    filters.push('targetType = :targetType');
    expressionAttributeValues[':targetType'] = query.targetType;
  }

  if (filters.length > 0) {
    filterExpression = filters.join(' AND ');
  }

  const { items, lastEvaluatedKey } = await queryItems<AuditItem>({
    TableName: TABLE,
    KeyConditionExpression: 'PK = :pk',
    ExpressionAttributeValues: expressionAttributeValues,
    ...(query.action && { ExpressionAttributeNames: { '#action': 'action' } }),
    FilterExpression: filterExpression,
    ScanIndexForward: false,
    Limit: query.limit,
    ExclusiveStartKey: exclusiveStartKey,
  });

  return toPage(items, lastEvaluatedKey);
}

export async function listAuditLogsByActor(
  actorId: string,
  query: Pick<AuditQueryInput, 'limit' | 'cursor'>
): Promise<PaginatedResponse<AuditLogEntry>> {
  const exclusiveStartKey = query.cursor ? decodeCursor(query.cursor) : undefined;

  const { items, lastEvaluatedKey } = await queryItems<AuditItem>({
    TableName: TABLE,
    IndexName: 'GSI1',
    KeyConditionExpression: 'GSI1PK = :pk',
    ExpressionAttributeValues: {
      ':pk': `ACTOR#${actorId}`,
    },
    ScanIndexForward: false,
    Limit: query.limit,
    ExclusiveStartKey: exclusiveStartKey,
  });

  return toPage(items, lastEvaluatedKey);
}

// History of one serial, product or user, newest first
export async function listAuditLogsByTarget(
  targetType: AuditTargetType,
  targetId: string,
  query: Pick<AuditQueryInput, 'limit' | 'cursor'>
): Promise<PaginatedResponse<AuditLogEntry>> {
  const exclusiveStartKey = query.cursor ? decodeCursor(query.cursor) : undefined;

  const { items, lastEvaluatedKey } = await queryItems<AuditItem>({
    TableName: TABLE,
    IndexName: 'GSI2',
    KeyConditionExpression: 'GSI2PK = :pk',
    ExpressionAttributeValues: {
      ':pk': `TARGET#${targetType}#${targetId}`,
    },
    ScanIndexForward: false,
    Limit: query.limit,
    ExclusiveStartKey: exclusiveStartKey,
  });

  return toPage(items, lastEvaluatedKey);
}
