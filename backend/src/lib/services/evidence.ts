import { ulid } from 'ulid';
import { BillContentType } from '@warranty/shared';
import { config } from '../config.js';
import {
  getPresignedDownloadUrl,
  getObjectMetadata,
  putObject,
  deleteObject,
} from '../s3.js';
import { logger } from '../logger.js';
import {
  FileTooLargeError,
  InvalidMimeTypeError,
  NotFoundError,
  ValidationError,
} from '../errors.js';

const BUCKET = config.buckets.evidence;

const EXTENSIONS: Record<BillContentType, string> = {
  [BillContentType.PDF]: 'pdf',
  [BillContentType.JPEG]: 'jpg',
  [BillContentType.PNG]: 'png',
};

function isBillContentType(contentType: string): contentType is BillContentType {
  const allowed: readonly string[] = config.evidence.allowedContentTypes;
  return allowed.includes(contentType);
}

// Size and type checks, run before anything is stored
export function validateEvidence(bytes: Buffer, contentType: string): BillContentType {
  const normalized = contentType.trim().toLowerCase();
  if (!isBillContentType(normalized)) {
    throw new InvalidMimeTypeError(contentType, config.evidence.allowedContentTypes);
  }
  if (bytes.length === 0) {
    throw new ValidationError('Bill file is empty');
  }
  if (bytes.length > config.evidence.maxBytes) {
    throw new FileTooLargeError(config.evidence.maxBytes);
  }
  return normalized;
}

/**
 * Store a proof-of-purchase file under a key unique to this attempt and return
 * that key as the evidence reference.
 */
export async function storeEvidence(
  bytes: Buffer,
  contentType: BillContentType,
  prefix: string
): Promise<string> {
  const safePrefix = prefix.replace(/[^A-Za-z0-9_-]/g, '_');
  const reference = `bills/${safePrefix}${ulid()}.${EXTENSIONS[contentType]}`;

  await putObject(BUCKET, reference, bytes, contentType, {
    'uploaded-at': new Date().toISOString(),
  });

  return reference;
}

// Idempotent: a missing object is logged and reported as false
export async function deleteEvidence(reference: string): Promise<boolean> {
  const metadata = await getObjectMetadata(BUCKET, reference);
  if (!metadata) {
    logger.warn({ reference }, 'Evidence file already absent');
    return false;
  }
  await deleteObject(BUCKET, reference);
  return true;
}

export async function getEvidenceDownloadUrl(
  reference: string
): Promise<{ downloadUrl: string; expiresAt: string }> {
  const metadata = await getObjectMetadata(BUCKET, reference);
  if (!metadata) {
    throw new NotFoundError('Evidence file', reference);
  }

  const expiresIn = config.evidence.downloadUrlExpirySeconds;
  const filename = reference.split('/').pop() || reference;
  const downloadUrl = await getPresignedDownloadUrl(BUCKET, reference, filename, expiresIn);

  return {
    downloadUrl,
    expiresAt: new Date(Date.now() + expiresIn * 1000).toISOString(),
  };
}
