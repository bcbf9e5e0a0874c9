import { ulid } from 'ulid';
import { SerialStatus, type PaginatedResponse, type SerialRecord } from '@warranty/shared';
import { config } from '../config.js';
import {
  getItem,
  updateItem,
  queryItems,
  countItems,
  batchGetItems,
  transactWrite,
  encodeCursor,
  decodeCursor,
  getCancellationCodes,
  isConditionalCheckFailed,
  isTransientDynamoError,
} from '../dynamodb.js';
import { withRetry } from '../retry.js';
import { logger } from '../logger.js';
import {
  DuplicateSerialError,
  NotFoundError,
  TemporarilyUnavailableError,
  ValidationError,
} from '../errors.js';
import { normalizeSerialNumber, isWellFormedSerialNumber } from '../serial-number.js';
import type { SerialQueryInput } from '../validation.js';

const TABLE = config.tables.serials;
const PRODUCTS_TABLE = config.tables.products;

interface SerialItem {
  PK: string;
  SK: string;
  GSI1PK: string;
  GSI1SK: string;
  GSI2PK?: string;
  GSI2SK?: string;
  serialId: string;
  serialNumber: string;
  productId: string;
  status: SerialStatus;
  ownerId?: string | null;
  registeredAt?: string | null;
  evidenceReference?: string | null;
  createdAt: string;
  updatedAt: string;
}

export type ClaimResult =
  | { ok: true; record: SerialRecord }
  | { ok: false; reason: 'NOT_FOUND' | 'NOT_AVAILABLE' };

export type ReleaseResult =
  | {
      ok: true;
      record: SerialRecord;
      previousOwnerId: string;
      previousEvidenceReference: string | null;
    }
  | { ok: false; reason: 'NOT_FOUND' | 'NOT_REGISTERED' };

export interface InsertBatchResult {
  inserted: string[];
  failed: Array<{ serialNumber: string; reason: string }>;
}

function serialKey(serialNumber: string) {
  return { PK: `SERIAL#${serialNumber}`, SK: 'META' };
}

function productKey(productId: string) {
  return { PK: `PRODUCT#${productId}`, SK: 'META' };
}

function toSerialRecord(item: SerialItem): SerialRecord {
  return {
    serialId: item.serialId,
    serialNumber: item.serialNumber,
    productId: item.productId,
    ownerId: item.ownerId ?? null,
    status: item.status,
    registeredAt: item.registeredAt ?? null,
    evidenceReference: item.evidenceReference ?? null,
    createdAt: item.createdAt,
    updatedAt: item.updatedAt,
  };
}

function newSerialItem(serialNumber: string, productId: string, now: string): SerialItem {
  return {
    ...serialKey(serialNumber),
    GSI1PK: `PRODUCT#${productId}`,
    GSI1SK: `SERIAL#${serialNumber}`,
    serialId: ulid(),
    serialNumber,
    productId,
    status: SerialStatus.AVAILABLE,
    createdAt: now,
    updatedAt: now,
  };
}

function requireSerialNumber(raw: string): string {
  const serialNumber = normalizeSerialNumber(raw);
  if (!isWellFormedSerialNumber(serialNumber)) {
    throw new ValidationError('Invalid serial number format', { serialNumber: raw });
  }
  return serialNumber;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// Bounded retry of storage contention; exhaustion surfaces as TemporarilyUnavailableError
async function storage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await withRetry(fn, {
      attempts: config.ledger.maxAttempts,
      backoffMs: config.ledger.backoffMs,
      isRetryable: isTransientDynamoError,
      onRetry: (error, attempt) =>
        logger.warn({ operation, attempt, error }, 'Ledger storage contention, retrying'),
    });
  } catch (error) {
    if (isTransientDynamoError(error)) {
      logger.error({ operation, error }, 'Ledger storage retries exhausted');
      throw new TemporarilyUnavailableError(operation);
    }
    throw error;
  }
}

function productCounterUpdate(productId: string, added: number, now: string) {
  return {
    Update: {
      TableName: PRODUCTS_TABLE,
      Key: productKey(productId),
      UpdateExpression: 'ADD serialCount :added SET lastSerialAddedAt = :now',
      ConditionExpression: 'attribute_exists(PK)',
      ExpressionAttributeValues: { ':added': added, ':now': now },
    },
  };
}

/**
 * Create one available serial. The record and the product's serial counter are
 * written in one transaction, so a serial can never point at a missing product.
 */
export async function insertAvailable(
  rawSerialNumber: string,
  productId: string
): Promise<SerialRecord> {
  const serialNumber = requireSerialNumber(rawSerialNumber);
  const now = new Date().toISOString();
  const item = newSerialItem(serialNumber, productId, now);
  const clientRequestToken = ulid();

  try {
    await storage('insertAvailable', () =>
      transactWrite({
        ClientRequestToken: clientRequestToken,
        TransactItems: [
          {
            Put: {
              TableName: TABLE,
              Item: item,
              ConditionExpression: 'attribute_not_exists(PK)',
            },
          },
          productCounterUpdate(productId, 1, now),
        ],
      })
    );
  } catch (error) {
    const codes = getCancellationCodes(error);
    if (codes?.[0] === 'ConditionalCheckFailed') {
      throw new DuplicateSerialError(serialNumber);
    }
    if (codes?.[1] === 'ConditionalCheckFailed') {
      throw new NotFoundError('Product', productId);
    }
    throw error;
  }

  return toSerialRecord(item);
}

export async function lookupBySerial(rawSerialNumber: string): Promise<SerialRecord | null> {
  const serialNumber = normalizeSerialNumber(rawSerialNumber);
  const item = await storage('lookupBySerial', () =>
    getItem<SerialItem>({
      TableName: TABLE,
      Key: serialKey(serialNumber),
    })
  );
  return item ? toSerialRecord(item) : null;
}

/**
 * Bind an available serial to an owner. A single conditional update: the
 * condition outcome is the only arbiter between concurrent claimants.
 */
export async function claim(
  rawSerialNumber: string,
  ownerId: string,
  evidenceReference: string
): Promise<ClaimResult> {
  const serialNumber = normalizeSerialNumber(rawSerialNumber);
  const now = new Date().toISOString();

  try {
    const item = await storage('claim', () =>
      updateItem<SerialItem>({
        TableName: TABLE,
        Key: serialKey(serialNumber),
        UpdateExpression:
          'SET #status = :registered, ownerId = :ownerId, registeredAt = :now, ' +
          'evidenceReference = :evidence, updatedAt = :now, GSI2PK = :ownerKey, GSI2SK = :ownerSort',
        ConditionExpression: 'attribute_exists(PK) AND #status = :available',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: {
          ':registered': SerialStatus.REGISTERED,
          ':available': SerialStatus.AVAILABLE,
          ':ownerId': ownerId,
          ':now': now,
          ':evidence': evidenceReference,
          ':ownerKey': `OWNER#${ownerId}`,
          ':ownerSort': `REG#${now}#${serialNumber}`,
        },
        ReturnValues: 'ALL_NEW',
        ReturnValuesOnConditionCheckFailure: 'ALL_OLD',
      })
    );
    if (!item) {
      throw new Error(`Claim of ${serialNumber} returned no attributes`);
    }
    return { ok: true, record: toSerialRecord(item) };
  } catch (error) {
    if (!isConditionalCheckFailed(error)) {
      throw error;
    }
    const current = error.Item;
    if (!current) {
      return { ok: false, reason: 'NOT_FOUND' };
    }
    // A retried attempt whose first write committed finds its own claim in place
    if (current.ownerId?.S === ownerId && current.evidenceReference?.S === evidenceReference) {
      const record = await lookupBySerial(serialNumber);
      if (record) {
        return { ok: true, record };
      }
    }
    return { ok: false, reason: 'NOT_AVAILABLE' };
  }
}

// Return a registered serial to the available pool
export async function release(rawSerialNumber: string): Promise<ReleaseResult> {
  const serialNumber = normalizeSerialNumber(rawSerialNumber);
  const now = new Date().toISOString();

  let previous: SerialItem | null;
  try {
    previous = await storage('release', () =>
      updateItem<SerialItem>({
        TableName: TABLE,
        Key: serialKey(serialNumber),
        UpdateExpression:
          'SET #status = :available, updatedAt = :now ' +
          'REMOVE ownerId, registeredAt, evidenceReference, GSI2PK, GSI2SK',
        ConditionExpression: 'attribute_exists(PK) AND #status = :registered',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: {
          ':available': SerialStatus.AVAILABLE,
          ':registered': SerialStatus.REGISTERED,
          ':now': now,
        },
        ReturnValues: 'ALL_OLD',
        ReturnValuesOnConditionCheckFailure: 'ALL_OLD',
      })
    );
  } catch (error) {
    if (!isConditionalCheckFailed(error)) {
      throw error;
    }
    return { ok: false, reason: error.Item ? 'NOT_REGISTERED' : 'NOT_FOUND' };
  }

  if (!previous || !previous.ownerId) {
    throw new Error(`Release of ${serialNumber} returned no previous owner`);
  }

  return {
    ok: true,
    record: toSerialRecord({
      ...previous,
      status: SerialStatus.AVAILABLE,
      ownerId: null,
      registeredAt: null,
      evidenceReference: null,
      updatedAt: now,
    }),
    previousOwnerId: previous.ownerId,
    previousEvidenceReference: previous.evidenceReference ?? null,
  };
}

export async function countsByProduct(
  productId: string
): Promise<{ uploaded: number; assigned: number }> {
  const byProduct = {
    TableName: TABLE,
    IndexName: 'GSI1',
    KeyConditionExpression: 'GSI1PK = :pk',
  };

  const uploaded = await storage('countsByProduct', () =>
    countItems({
      ...byProduct,
      ExpressionAttributeValues: { ':pk': `PRODUCT#${productId}` },
    })
  );
  const assigned = await storage('countsByProduct', () =>
    countItems({
      ...byProduct,
      FilterExpression: '#status = :registered',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: {
        ':pk': `PRODUCT#${productId}`,
        ':registered': SerialStatus.REGISTERED,
      },
    })
  );

  return { uploaded, assigned };
}

// Which of the given serial numbers already exist, under any product
export async function findExisting(rawSerialNumbers: string[]): Promise<Set<string>> {
  const serialNumbers = [...new Set(rawSerialNumbers.map(normalizeSerialNumber))];
  const existing = new Set<string>();

  for (const group of chunk(serialNumbers, config.ledger.batchGetChunkSize)) {
    const items = await storage('findExisting', () =>
      batchGetItems<{ serialNumber: string }>(TABLE, group.map(serialKey), 'serialNumber')
    );
    for (const item of items) {
      existing.add(item.serialNumber);
    }
  }

  return existing;
}

/**
 * Insert new available serials. Each chunk is one transaction; a chunk that
 * fails is reported entry by entry so the caller can retry just that subset.
 */
export async function insertBatch(
  productId: string,
  serialNumbers: string[]
): Promise<InsertBatchResult> {
  const result: InsertBatchResult = { inserted: [], failed: [] };
  // A transaction may touch each item only once
  const unique = [...new Set(serialNumbers.map(normalizeSerialNumber))];

  for (const group of chunk(unique, config.ledger.transactionChunkSize)) {
    const now = new Date().toISOString();
    const clientRequestToken = ulid();

    try {
      await storage('insertBatch', () =>
        transactWrite({
          ClientRequestToken: clientRequestToken,
          TransactItems: [
            ...group.map((serialNumber) => ({
              Put: {
                TableName: TABLE,
                Item: newSerialItem(serialNumber, productId, now),
                ConditionExpression: 'attribute_not_exists(PK)',
              },
            })),
            productCounterUpdate(productId, group.length, now),
          ],
        })
      );
      result.inserted.push(...group);
    } catch (error) {
      logger.error({ productId, size: group.length, error }, 'Serial batch insert failed');
      const codes = getCancellationCodes(error);
      const productMissing = codes?.[group.length] === 'ConditionalCheckFailed';

      group.forEach((serialNumber, index) => {
        let reason = 'not inserted: storage temporarily unavailable';
        if (codes?.[index] === 'ConditionalCheckFailed') {
          reason = 'already exists';
        } else if (productMissing) {
          reason = 'product not found';
        } else if (codes) {
          reason = 'not inserted: transaction cancelled';
        } else if (!(error instanceof TemporarilyUnavailableError)) {
          reason = 'not inserted: storage error';
        }
        result.failed.push({ serialNumber, reason });
      });
    }
  }

  return result;
}

export async function listSerialsByProduct(
  productId: string,
  query: SerialQueryInput
): Promise<PaginatedResponse<SerialRecord>> {
  const exclusiveStartKey = query.cursor ? decodeCursor(query.cursor) : undefined;

  const { items, lastEvaluatedKey } = await storage('listSerialsByProduct', () =>
    queryItems<SerialItem>({
      TableName: TABLE,
      IndexName: 'GSI1',
      KeyConditionExpression: 'GSI1PK = :pk',
      ...(query.status && {
        FilterExpression: '#status = :status',
        ExpressionAttributeNames: { '#status': 'status' },
      }),
      ExpressionAttributeValues: {
        ':pk': `PRODUCT#${productId}`,
        ...(query.status && { ':status': query.status }),
      },
      Limit: query.limit,
      ExclusiveStartKey: exclusiveStartKey,
    })
  );

  return {
    items: items.map(toSerialRecord),
    cursor: lastEvaluatedKey ? encodeCursor(lastEvaluatedKey) : undefined,
    hasMore: !!lastEvaluatedKey,
  };
}

// Serials currently registered to an owner, most recent registration first
export async function listSerialsByOwner(ownerId: string): Promise<SerialRecord[]> {
  const records: SerialRecord[] = [];
  let exclusiveStartKey: Record<string, unknown> | undefined;

  do {
    const page = await storage('listSerialsByOwner', () =>
      queryItems<SerialItem>({
        TableName: TABLE,
        IndexName: 'GSI2',
        KeyConditionExpression: 'GSI2PK = :pk',
        ExpressionAttributeValues: { ':pk': `OWNER#${ownerId}` },
        ScanIndexForward: false,
        ExclusiveStartKey: exclusiveStartKey,
      })
    );
    records.push(...page.items.map(toSerialRecord));
    exclusiveStartKey = page.lastEvaluatedKey;
  } while (exclusiveStartKey);

  return records;
}
