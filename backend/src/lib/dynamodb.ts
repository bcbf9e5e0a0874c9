import {
  DynamoDBClient,
  ConditionalCheckFailedException,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  UpdateCommand,
  DeleteCommand,
  QueryCommand,
  BatchGetCommand,
  TransactWriteCommand,
  type GetCommandInput,
  type PutCommandInput,
  type UpdateCommandInput,
  type DeleteCommandInput,
  type QueryCommandInput,
  type TransactWriteCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { config } from './config.js';
import { sleep } from './retry.js';

// Create DynamoDB client
const client = new DynamoDBClient({ region: config.region });

// Create document client with marshalling options
export const docClient = DynamoDBDocumentClient.from(client, {
  marshallOptions: {
    removeUndefinedValues: true,
    convertEmptyValues: false,
  },
  unmarshallOptions: {
    wrapNumbers: false,
  },
});

// Helper functions for common operations
export async function getItem<T>(params: GetCommandInput): Promise<T | null> {
  const result = await docClient.send(new GetCommand(params));
  return (result.Item as T) || null;
}

export async function putItem(params: PutCommandInput): Promise<void> {
  await docClient.send(new PutCommand(params));
}

export async function updateItem<T>(params: UpdateCommandInput): Promise<T | null> {
  const result = await docClient.send(new UpdateCommand(params));
  return (result.Attributes as T) || null;
}

export async function deleteItem(params: DeleteCommandInput): Promise<void> {
  await docClient.send(new DeleteCommand(params));
}

export async function queryItems<T>(
  params: QueryCommandInput
): Promise<{ items: T[]; lastEvaluatedKey?: Record<string, unknown> }> {
  const result = await docClient.send(new QueryCommand(params));
  return {
    items: (result.Items as T[]) || [],
    lastEvaluatedKey: result.LastEvaluatedKey as Record<string, unknown> | undefined,
  };
}

// Count every item matching a query, following pagination
export async function countItems(
  params: Omit<QueryCommandInput, 'Select' | 'ExclusiveStartKey'>
): Promise<number> {
  let total = 0;
  let exclusiveStartKey: Record<string, unknown> | undefined;

  do {
    const result = await docClient.send(
      new QueryCommand({ ...params, Select: 'COUNT', ExclusiveStartKey: exclusiveStartKey })
    );
    total += result.Count || 0;
    exclusiveStartKey = result.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return total;
}

export class UnprocessedKeysError extends Error {
  constructor(public readonly remaining: number) {
    super(`${remaining} keys left unprocessed by BatchGet`);
    this.name = 'UnprocessedKeysError';
  }
}

const BATCH_GET_ROUNDS = 5;

// Fetch up to 100 keys from one table, re-requesting unprocessed keys
export async function batchGetItems<T>(
  tableName: string,
  keys: Record<string, unknown>[],
  projectionExpression?: string
): Promise<T[]> {
  const found: T[] = [];
  let pending = keys;

  for (let round = 0; pending.length > 0; round++) {
    if (round >= BATCH_GET_ROUNDS) {
      throw new UnprocessedKeysError(pending.length);
    }
    if (round > 0) {
      await sleep(50 * 2 ** round);
    }

    const result = await docClient.send(
      new BatchGetCommand({
        RequestItems: {
          [tableName]: {
            Keys: pending,
            ...(projectionExpression && { ProjectionExpression: projectionExpression }),
          },
        },
      })
    );

    found.push(...((result.Responses?.[tableName] as T[] | undefined) || []));
    pending = result.UnprocessedKeys?.[tableName]?.Keys || [];
  }

  return found;
}

export async function transactWrite(params: TransactWriteCommandInput): Promise<void> {
  await docClient.send(new TransactWriteCommand(params));
}

// ============================================================
// Error classification
// ============================================================

const TRANSIENT_ERROR_NAMES = new Set([
  'ProvisionedThroughputExceededException',
  'ThrottlingException',
  'RequestLimitExceeded',
  'TransactionConflictException',
  'TransactionInProgressException',
  'InternalServerError',
  'ServiceUnavailable',
  'UnprocessedKeysError',
]);

const TRANSIENT_CANCELLATION_CODES = new Set([
  'TransactionConflict',
  'ThrottlingError',
  'ProvisionedThroughputExceeded',
  'RequestLimitExceeded',
]);

export function isConditionalCheckFailed(
  error: unknown
): error is ConditionalCheckFailedException {
  return error instanceof ConditionalCheckFailedException;
}

// Per-item cancellation codes of a cancelled transaction, in request order
export function getCancellationCodes(error: unknown): string[] | null {
  if (!(error instanceof TransactionCanceledException)) {
    return null;
  }
  return (error.CancellationReasons || []).map((reason) => reason.Code || 'None');
}

// Storage contention worth retrying: throttling, conflicts, brief outages
export function isTransientDynamoError(error: unknown): boolean {
  const codes = getCancellationCodes(error);
  if (codes) {
    const failing = codes.filter((code) => code !== 'None');
    return failing.length > 0 && failing.every((code) => TRANSIENT_CANCELLATION_CODES.has(code));
  }
  return error instanceof Error && TRANSIENT_ERROR_NAMES.has(error.name);
}

// Cursor encoding/decoding for pagination
export function encodeCursor(lastEvaluatedKey: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(lastEvaluatedKey)).toString('base64url');
}

// DynamoDB key attributes that get added to items
type DynamoKeys = 'PK' | 'SK' | 'GSI1PK' | 'GSI1SK' | 'GSI2PK' | 'GSI2SK';
const DYNAMO_KEYS: DynamoKeys[] = ['PK', 'SK', 'GSI1PK', 'GSI1SK', 'GSI2PK', 'GSI2SK'];

// Strip DynamoDB key attributes from an item
export function stripKeys<T extends { PK: string; SK: string }>(
  item: T
): Omit<T, DynamoKeys> {
  const result = { ...item };
  for (const key of DYNAMO_KEYS) {
    delete (result as Record<string, unknown>)[key];
  }
  return result as Omit<T, DynamoKeys>;
}

export function decodeCursor(cursor: string): Record<string, unknown> | undefined {
  try {
    return JSON.parse(Buffer.from(cursor, 'base64url').toString('utf-8'));
  } catch {
    return undefined;
  }
}
