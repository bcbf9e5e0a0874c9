import { ulid } from 'ulid';
import {
  AuditAction,
  AuditTargetType,
  type Product,
  type PaginatedResponse,
} from '@warranty/shared';
import { config } from '../config.js';
import {
  getItem,
  putItem,
  updateItem,
  deleteItem,
  queryItems,
  encodeCursor,
  decodeCursor,
  isConditionalCheckFailed,
} from '../dynamodb.js';
import { ConflictError, NotFoundError } from '../errors.js';
import { recordAuditEvent } from './audit.js';
import type { CreateProductInput, UpdateProductInput, PaginationInput } from '../validation.js';

const TABLE = config.tables.products;

type ProductItem = Product & {
  PK: string;
  SK: string;
  GSI1PK: string;
  GSI1SK: string;
};

function productKey(productId: string) {
  return { PK: `PRODUCT#${productId}`, SK: 'META' };
}

// Products list alphabetically under one index partition
function listingSortKey(name: string, productId: string): string {
  return `NAME#${name.toLowerCase()}#${productId}`;
}

function toProduct(item: ProductItem): Product {
  return {
    productId: item.productId,
    name: item.name,
    description: item.description ?? null,
    serialCount: item.serialCount ?? 0,
    createdAt: item.createdAt,
    updatedAt: item.updatedAt,
  };
}

export interface AuditContext {
  requestId?: string;
}

export async function productExists(productId: string): Promise<boolean> {
  const item = await getItem<{ PK: string }>({
    TableName: TABLE,
    Key: productKey(productId),
    ProjectionExpression: 'PK',
  });
  return item !== null;
}

export async function getProduct(productId: string): Promise<Product> {
  const item = await getItem<ProductItem>({
    TableName: TABLE,
    Key: productKey(productId),
  });

  if (!item) {
    throw new NotFoundError('Product', productId);
  }

  return toProduct(item);
}

export async function createProduct(
  input: CreateProductInput,
  actorId: string,
  context: AuditContext = {}
): Promise<Product> {
  const now = new Date().toISOString();
  const productId = ulid();

  const product: Product = {
    productId,
    name: input.name,
    description: input.description ?? null,
    serialCount: 0,
    createdAt: now,
    updatedAt: now,
  };

  await putItem({
    TableName: TABLE,
    Item: {
      ...productKey(productId),
      GSI1PK: 'PRODUCTS',
      GSI1SK: listingSortKey(product.name, productId),
      ...product,
    },
    ConditionExpression: 'attribute_not_exists(PK)',
  });

  await recordAuditEvent({
    action: AuditAction.CREATE_PRODUCT,
    targetType: AuditTargetType.PRODUCT,
    targetId: productId,
    actorId,
    details: { name: product.name },
    requestId: context.requestId,
  });

  return product;
}

export async function updateProduct(
  productId: string,
  input: UpdateProductInput,
  actorId: string,
  context: AuditContext = {}
): Promise<Product> {
  const now = new Date().toISOString();
  const sets = ['updatedAt = :now'];
  const values: Record<string, unknown> = { ':now': now };

  if (input.name !== undefined) {
    sets.push('#name = :name', 'GSI1SK = :sortKey');
    values[':name'] = input.name;
    values[':sortKey'] = listingSortKey(input.name, productId);
  }
  if (input.description !== undefined) {
    sets.push('description = :description');
    values[':description'] = input.description;
  }

  let item: ProductItem | null;
  try {
    // serialCount is maintained by the ledger and never set here
    item = await updateItem<ProductItem>({
      TableName: TABLE,
      Key: productKey(productId),
      UpdateExpression: `SET ${sets.join(', ')}`,
      ConditionExpression: 'attribute_exists(PK)',
      ...(input.name !== undefined && { ExpressionAttributeNames: { '#name': 'name' } }),
      ExpressionAttributeValues: values,
      ReturnValues: 'ALL_NEW',
    });
  } catch (error) {
    if (isConditionalCheckFailed(error)) {
      throw new NotFoundError('Product', productId);
    }
    throw error;
  }

  if (!item) {
    throw new NotFoundError('Product', productId);
  }

  await recordAuditEvent({
    action: AuditAction.UPDATE_PRODUCT,
    targetType: AuditTargetType.PRODUCT,
    targetId: productId,
    actorId,
    details: { changes: input },
    requestId: context.requestId,
  });

  return toProduct(item);
}

/**
 * Delete a product that has never had serials. The condition is evaluated on
 * the counter the ledger increments in the same transaction as each insert.
 */
export async function deleteProduct(
  productId: string,
  actorId: string,
  context: AuditContext = {}
): Promise<void> {
  try {
    await deleteItem({
      TableName: TABLE,
      Key: productKey(productId),
      ConditionExpression:
        'attribute_exists(PK) AND (attribute_not_exists(serialCount) OR serialCount = :zero)',
      ExpressionAttributeValues: { ':zero': 0 },
      ReturnValuesOnConditionCheckFailure: 'ALL_OLD',
    });
  } catch (error) {
    if (isConditionalCheckFailed(error)) {
      if (!error.Item) {
        throw new NotFoundError('Product', productId);
      }
      throw new ConflictError(
        `Product ${productId} has serial numbers and cannot be deleted`
      );
    }
    throw error;
  }

  await recordAuditEvent({
    action: AuditAction.DELETE_PRODUCT,
    targetType: AuditTargetType.PRODUCT,
    targetId: productId,
    actorId,
    requestId: context.requestId,
  });
}

export async function listProducts(
  query: PaginationInput
): Promise<PaginatedResponse<Product>> {
  const exclusiveStartKey = query.cursor ? decodeCursor(query.cursor) : undefined;

  const { items, lastEvaluatedKey } = await queryItems<ProductItem>({
    TableName: TABLE,
    IndexName: 'GSI1',
    KeyConditionExpression: 'GSI1PK = :pk',
    ExpressionAttributeValues: {
      ':pk': 'PRODUCTS',
    },
    Limit: query.limit,
    ExclusiveStartKey: exclusiveStartKey,
  });

  return {
    items: items.map(toProduct),
    cursor: lastEvaluatedKey ? encodeCursor(lastEvaluatedKey) : undefined,
    hasMore: !!lastEvaluatedKey,
  };
}
