import { AuditAction, AuditTargetType, type ImportSerialsResult } from '@warranty/shared';
import { NotFoundError } from '../errors.js';
import { normalizeSerialNumber, isWellFormedSerialNumber } from '../serial-number.js';
import { findExisting, insertBatch } from './ledger.js';
import { productExists } from './products.js';
import { recordAuditEvent } from './audit.js';

export interface ImportOptions {
  requestId?: string;
}

/**
 * First column of every non-empty line; the first such line is a header.
 * Quoted cells lose their surrounding quotes.
 */
export function parseSerialCsv(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.split(',')[0].trim().replace(/^"(.*)"$/, '$1').trim())
    .filter((cell) => cell.length > 0)
    .slice(1);
}

// 201 when everything new was added, 207 for a partial result, 409 when nothing was added
export function importStatusCode(result: ImportSerialsResult): 201 | 207 | 409 {
  if (result.addedCount === 0) {
    return 409;
  }
  return result.errors.length > 0 ? 207 : 201;
}

/**
 * Add candidate serial numbers to a product. Entries already present anywhere
 * in the ledger are reported as duplicates, malformed or failed entries as
 * errors; neither aborts the rest of the batch. Reported entries use the
 * caller's trimmed input text.
 */
export async function importSerials(
  productId: string,
  candidates: string[],
  actorId: string,
  options: ImportOptions = {}
): Promise<ImportSerialsResult> {
  const errors: string[] = [];
  const duplicates: string[] = [];
  // normalized -> first trimmed input that produced it
  const inputs = new Map<string, string>();
  const malformed = new Set<string>();

  for (const candidate of candidates) {
    const trimmed = candidate.trim();
    if (!trimmed) continue;

    const serialNumber = normalizeSerialNumber(trimmed);
    if (inputs.has(serialNumber) || malformed.has(serialNumber)) continue;

    if (isWellFormedSerialNumber(serialNumber)) {
      inputs.set(serialNumber, trimmed);
    } else {
      malformed.add(serialNumber);
      errors.push(`${trimmed}: invalid serial number format`);
    }
  }

  if (!(await productExists(productId))) {
    throw new NotFoundError('Product', productId);
  }

  if (inputs.size === 0) {
    return { addedCount: 0, duplicates, errors };
  }

  const existing = await findExisting([...inputs.keys()]);
  const fresh: string[] = [];

  for (const [serialNumber, input] of inputs) {
    if (existing.has(serialNumber)) {
      duplicates.push(input);
    } else {
      fresh.push(serialNumber);
    }
  }

  let addedCount = 0;
  if (fresh.length > 0) {
    const { inserted, failed } = await insertBatch(productId, fresh);
    addedCount = inserted.length;
    for (const { serialNumber, reason } of failed) {
      errors.push(`${inputs.get(serialNumber) ?? serialNumber}: ${reason}`);
    }
  }

  if (addedCount > 0) {
    await recordAuditEvent({
      action: AuditAction.BULK_ADD_SERIALS,
      targetType: AuditTargetType.PRODUCT,
      targetId: productId,
      actorId,
      details: {
        productId,
        addedCount,
        duplicateCount: duplicates.length,
        errorCount: errors.length,
      },
      requestId: options.requestId,
    });
  }

  return { addedCount, duplicates, errors };
}
