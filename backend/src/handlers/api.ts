import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyStructuredResultV2,
  Context,
} from 'aws-lambda';
import { ZodError } from 'zod';
import type {
  ApiError,
  BillDownloadResponse,
  HealthResponse,
  PublicSerialView,
} from '@warranty/shared';
import { config } from '../lib/config.js';
import { createRequestLogger, type Logger } from '../lib/logger.js';
import {
  AppError,
  ForbiddenError,
  NotFoundError,
  RateLimitedError,
  UnauthorizedError,
  ValidationError,
} from '../lib/errors.js';
import { FixedWindowRateLimiter } from '../lib/rate-limiter.js';

// Services
import * as registrationService from '../lib/services/registration.js';
import * as importService from '../lib/services/serial-import.js';
import * as productService from '../lib/services/products.js';
import * as inventoryService from '../lib/services/inventory.js';
import * as ledgerService from '../lib/services/ledger.js';
import * as evidenceService from '../lib/services/evidence.js';
import * as auditService from '../lib/services/audit.js';

// Validation schemas
import {
  registerSerialSchema,
  importSerialsSchema,
  createProductSchema,
  updateProductSchema,
  paginationSchema,
  serialQuerySchema,
  auditQuerySchema,
  ulidSchema,
  uuidSchema,
} from '../lib/validation.js';

// Route handler type
type RouteHandler = (
  event: APIGatewayProxyEventV2,
  context: HandlerContext
) => Promise<APIGatewayProxyStructuredResultV2>;

interface Route {
  handler: RouteHandler;
}

interface HandlerContext {
  requestId: string;
  logger: Logger;
  userId?: string;
  signal: AbortSignal;
}

// Leave this much of the Lambda budget for compensation and the response
const CANCELLATION_MARGIN_MS = 2000;

const registrationLimiter = new FixedWindowRateLimiter(config.rateLimit.registration);

// Parse path parameters
function getPathParam(event: APIGatewayProxyEventV2, name: string): string {
  return event.pathParameters?.[name] || '';
}

// Products are keyed by ulid, users by their identity provider subject
function productIdParam(event: APIGatewayProxyEventV2): string {
  return ulidSchema.parse(getPathParam(event, 'productId'));
}

function userIdParam(event: APIGatewayProxyEventV2): string {
  return uuidSchema.parse(getPathParam(event, 'userId'));
}

// Parse query parameters
function getQueryParams(event: APIGatewayProxyEventV2): Record<string, string> {
  const params = event.queryStringParameters || {};
  // Filter out undefined values
  return Object.fromEntries(
    Object.entries(params).filter((entry): entry is [string, string] => entry[1] !== undefined)
  );
}

// Parse JSON body
function parseBody(event: APIGatewayProxyEventV2): unknown {
  if (!event.body) {
    throw new ValidationError('Request body is required');
  }
  try {
    return JSON.parse(event.isBase64Encoded
      ? Buffer.from(event.body, 'base64').toString('utf-8')
      : event.body);
  } catch {
    throw new ValidationError('Invalid JSON in request body');
  }
}

// Create JSON response
function jsonResponse(
  statusCode: number,
  body: unknown,
  headers?: Record<string, string>
): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    body: JSON.stringify(body),
  };
}

function errorResponse(
  statusCode: number,
  code: string,
  message: string,
  requestId: string
): APIGatewayProxyStructuredResultV2 {
  const body: ApiError = { error: { code, message, requestId } };
  return jsonResponse(statusCode, body);
}

function requireUser(ctx: HandlerContext): string {
  if (!ctx.userId) {
    throw new UnauthorizedError('Authentication required');
  }
  return ctx.userId;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// JWT authorizer claims; absent on routes without an authorizer
function getClaims(event: APIGatewayProxyEventV2): Record<string, unknown> | undefined {
  const requestContext: unknown = event.requestContext;
  if (!isRecord(requestContext) || !isRecord(requestContext.authorizer)) {
    return undefined;
  }
  const jwt = requestContext.authorizer.jwt;
  if (!isRecord(jwt) || !isRecord(jwt.claims)) {
    return undefined;
  }
  return jwt.claims;
}

// HTTP APIs pass list claims either as an array or as "[a b]" text
function getGroups(claims: Record<string, unknown>): string[] {
  const groups = claims['cognito:groups'];
  if (Array.isArray(groups)) {
    return groups.filter((group): group is string => typeof group === 'string');
  }
  if (typeof groups === 'string') {
    return groups.replace(/^\[|\]$/g, '').split(/[\s,]+/).filter(Boolean);
  }
  return [];
}

// Route definitions
const routes: Record<string, Route> = {
  // Public routes
  'GET /health': {
    handler: async () => {
      const response: HealthResponse = {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: config.version,
      };
      return jsonResponse(200, response);
    },
  },
  'GET /serials/{serialNumber}': {
    handler: async (event) => {
      const record = await registrationService.getSerialDetails(
        getPathParam(event, 'serialNumber')
      );
      const view: PublicSerialView = {
        serialNumber: record.serialNumber,
        status: record.status,
      };
      return jsonResponse(200, view);
    },
  },

  // Customer
  'POST /me/serials': {
    handler: async (event, ctx) => {
      const userId = requireUser(ctx);
      const decision = registrationLimiter.check(userId);
      if (!decision.allowed) {
        throw new RateLimitedError(decision.retryAfterSeconds);
      }
      const input = registerSerialSchema.parse(parseBody(event));
      const record = await registrationService.registerSerial(
        userId,
        input.serialNumber,
        { bytes: Buffer.from(input.bill.data, 'base64'), contentType: input.bill.contentType },
        { signal: ctx.signal, requestId: ctx.requestId }
      );
      return jsonResponse(201, record);
    },
  },
  'GET /me/serials': {
    handler: async (event, ctx) => {
      const records = await registrationService.listUserSerials(requireUser(ctx));
      return jsonResponse(200, { items: records });
    },
  },

  // Admin: Products
  'GET /admin/products': {
    handler: async (event) => {
      const query = paginationSchema.parse(getQueryParams(event));
      const result = await inventoryService.listProductsWithInventory(query);
      return jsonResponse(200, result);
    },
  },
  'POST /admin/products': {
    handler: async (event, ctx) => {
      const input = createProductSchema.parse(parseBody(event));
      const product = await productService.createProduct(input, requireUser(ctx), {
        requestId: ctx.requestId,
      });
      return jsonResponse(201, product);
    },
  },
  'GET /admin/products/{productId}': {
    handler: async (event) => {
      const product = await productService.getProduct(productIdParam(event));
      return jsonResponse(200, product);
    },
  },
  'PUT /admin/products/{productId}': {
    handler: async (event, ctx) => {
      const productId = productIdParam(event);
      const input = updateProductSchema.parse(parseBody(event));
      const product = await productService.updateProduct(productId, input, requireUser(ctx), {
        requestId: ctx.requestId,
      });
      return jsonResponse(200, product);
    },
  },
  'DELETE /admin/products/{productId}': {
    handler: async (event, ctx) => {
      await productService.deleteProduct(productIdParam(event), requireUser(ctx), {
        requestId: ctx.requestId,
      });
      return { statusCode: 204 };
    },
  },
  'GET /admin/products/{productId}/inventory': {
    handler: async (event) => {
      const inventory = await inventoryService.productInventory(
        productIdParam(event)
      );
      return jsonResponse(200, inventory);
    },
  },

  // Admin: Serials
  'GET /admin/products/{productId}/serials': {
    handler: async (event) => {
      const productId = productIdParam(event);
      const query = serialQuerySchema.parse(getQueryParams(event));
      await productService.getProduct(productId);
      const result = await ledgerService.listSerialsByProduct(productId, query);
      return jsonResponse(200, result);
    },
  },
  'POST /admin/products/{productId}/serials': {
    handler: async (event, ctx) => {
      const productId = productIdParam(event);
      const input = importSerialsSchema.parse(parseBody(event));
      const candidates = input.serials ?? importService.parseSerialCsv(input.csv ?? '');
      if (candidates.length > config.api.maxImportBatch) {
        throw new ValidationError(
          `At most ${config.api.maxImportBatch} serial numbers per import`
        );
      }
      const result = await importService.importSerials(productId, candidates, requireUser(ctx), {
        requestId: ctx.requestId,
      });
      return jsonResponse(importService.importStatusCode(result), result);
    },
  },
  'GET /admin/serials/{serialNumber}': {
    handler: async (event) => {
      const record = await registrationService.getSerialDetails(
        getPathParam(event, 'serialNumber')
      );
      return jsonResponse(200, record);
    },
  },
  'POST /admin/serials/{serialNumber}/disassociate': {
    handler: async (event, ctx) => {
      const record = await registrationService.disassociateSerial(
        getPathParam(event, 'serialNumber'),
        requireUser(ctx),
        { requestId: ctx.requestId }
      );
      return jsonResponse(200, record);
    },
  },
  'GET /admin/serials/{serialNumber}/bill': {
    handler: async (event) => {
      const record = await registrationService.getSerialDetails(
        getPathParam(event, 'serialNumber')
      );
      if (!record.evidenceReference) {
        throw new NotFoundError('Bill for serial number', record.serialNumber);
      }
      const { downloadUrl, expiresAt } = await evidenceService.getEvidenceDownloadUrl(
        record.evidenceReference
      );
      const response: BillDownloadResponse = {
        serialNumber: record.serialNumber,
        downloadUrl,
        expiresAt,
      };
      return jsonResponse(200, response);
    },
  },
  'GET /admin/users/{userId}/serials': {
    handler: async (event) => {
      const records = await registrationService.listUserSerials(userIdParam(event));
      return jsonResponse(200, { items: records });
    },
  },

  // Admin: Audit
  'GET /admin/audit': {
    handler: async (event) => {
      const query = auditQuerySchema.parse(getQueryParams(event));
      const result = await auditService.listAuditLogs(query);
      return jsonResponse(200, result);
    },
  },
};

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ValidationError(`Malformed path segment: ${segment}`);
  }
}

// Match route to handler
export function matchRoute(
  method: string,
  path: string
): { handler: RouteHandler; params: Record<string, string> } | null {
  const routeKey = `${method} ${path}`;

  // Direct match
  if (routes[routeKey]) {
    return { handler: routes[routeKey].handler, params: {} };
  }

  // Pattern matching with path parameters
  for (const [pattern, route] of Object.entries(routes)) {
    const [patternMethod, patternPath] = pattern.split(' ');
    if (patternMethod !== method) continue;

    const patternParts = patternPath.split('/');
    const pathParts = path.split('/');

    if (patternParts.length !== pathParts.length) continue;

    const params: Record<string, string> = {};
    let matches = true;

    for (let i = 0; i < patternParts.length; i++) {
      if (patternParts[i].startsWith('{') && patternParts[i].endsWith('}')) {
        const paramName = patternParts[i].slice(1, -1);
        // Serial numbers may contain an encoded '/'
        params[paramName] = decodePathSegment(pathParts[i]);
      } else if (patternParts[i] !== pathParts[i]) {
        matches = false;
        break;
      }
    }

    if (matches) {
      return { handler: route.handler, params };
    }
  }

  return null;
}

// Main handler
export async function handler(
  event: APIGatewayProxyEventV2,
  context: Context
): Promise<APIGatewayProxyStructuredResultV2> {
  const requestId = event.requestContext.requestId;
  const method = event.requestContext.http.method;
  const path = event.rawPath;

  const claims = getClaims(event);
  const userId = typeof claims?.sub === 'string' ? claims.sub : undefined;
  const isAdmin = !!claims && getGroups(claims).includes('admin');
  const logger = createRequestLogger(requestId, userId);

  logger.info({ method, path }, 'Request received');

  try {
    // Match route
    const match = matchRoute(method, path);

    if (!match) {
      return errorResponse(404, 'NOT_FOUND', `Route not found: ${method} ${path}`, requestId);
    }

    // Inject path parameters
    event.pathParameters = { ...event.pathParameters, ...match.params };

    if ((path.startsWith('/admin/') || path.startsWith('/me/')) && !userId) {
      throw new UnauthorizedError('Authentication required');
    }
    if (path.startsWith('/admin/') && !isAdmin) {
      throw new ForbiddenError('Admin access required');
    }

    const remainingMs = context.getRemainingTimeInMillis() - CANCELLATION_MARGIN_MS;
    const handlerContext: HandlerContext = {
      requestId,
      logger,
      userId,
      signal: AbortSignal.timeout(Math.max(1, remainingMs)),
    };

    // Execute handler
    const response = await match.handler(event, handlerContext);

    logger.info({ statusCode: response.statusCode }, 'Request completed');

    return response;
  } catch (error) {
    // Handle known errors
    if (error instanceof AppError) {
      logger.warn({ error: error.message, code: error.code }, 'Application error');
      const headers: Record<string, string> | undefined =
        error instanceof RateLimitedError
          ? { 'Retry-After': String(error.retryAfterSeconds) }
          : undefined;
      return jsonResponse(error.statusCode, error.toApiError(requestId), headers);
    }

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      logger.warn({ errors: error.errors }, 'Validation error');
      const body: ApiError = {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          requestId,
          details: { issues: error.errors },
        },
      };
      return jsonResponse(400, body);
    }

    // Unknown errors
    logger.error({ error }, 'Unexpected error');
    return errorResponse(500, 'INTERNAL_ERROR', 'An unexpected error occurred', requestId);
  }
}
