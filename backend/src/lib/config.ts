import { BillContentType } from '@warranty/shared';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

// Environment configuration
export const config = {
  // AWS Region
  region: process.env.AWS_REGION || 'us-east-1',

  // DynamoDB Tables
  tables: {
    serials: process.env.SERIALS_TABLE || 'WarrantySerials',
    products: process.env.PRODUCTS_TABLE || 'WarrantyProducts',
    users: process.env.USERS_TABLE || 'WarrantyUsers',
    audit: process.env.AUDIT_TABLE || 'WarrantyAudit',
  },

  // S3 Buckets
  buckets: {
    evidence: process.env.EVIDENCE_BUCKET || 'warranty-evidence',
  },

  // Serial ledger storage
  ledger: {
    maxAttempts: intFromEnv('LEDGER_MAX_ATTEMPTS', 3),
    backoffMs: intFromEnv('LEDGER_BACKOFF_MS', 100),
    // DynamoDB transactions hold at most 100 items; one is the product counter
    transactionChunkSize: 99,
    batchGetChunkSize: 100,
  },

  // Audit sink
  audit: {
    retryDelayMs: intFromEnv('AUDIT_RETRY_DELAY_MS', 500),
  },

  // Proof-of-purchase files
  evidence: {
    maxBytes: intFromEnv('MAX_BILL_SIZE_MB', 10) * 1024 * 1024,
    allowedContentTypes: [BillContentType.PDF, BillContentType.JPEG, BillContentType.PNG],
    deleteOnRelease: process.env.EVIDENCE_DELETE_ON_RELEASE === 'true',
    downloadUrlExpirySeconds: 900, // 15 minutes
  },

  // API settings
  api: {
    defaultPageSize: 50,
    maxPageSize: 100,
    maxImportBatch: 10_000,
  },

  // Per-user throttling of registration attempts
  rateLimit: {
    registration: {
      limit: intFromEnv('REGISTRATION_RATE_LIMIT', 10),
      windowMs: intFromEnv('REGISTRATION_RATE_WINDOW_MS', 60_000),
    },
  },

  // App version (set during build)
  version: process.env.APP_VERSION || '0.1.0',
} as const;
