import { AuditAction, AuditTargetType, type SerialRecord } from '@warranty/shared';
import { config } from '../config.js';
import { logger } from '../logger.js';
import {
  NotFoundError,
  SerialAlreadyClaimedError,
  NotCurrentlyRegisteredError,
  UserNotEligibleError,
  EvidenceStorageFailedError,
  RequestCancelledError,
  ValidationError,
} from '../errors.js';
import { normalizeSerialNumber, isWellFormedSerialNumber } from '../serial-number.js';
import * as ledger from './ledger.js';
import { recordAuditEvent } from './audit.js';
import { isEligibleToRegister } from './users.js';
import { validateEvidence, storeEvidence, deleteEvidence } from './evidence.js';

export interface EvidenceUpload {
  bytes: Buffer;
  contentType: string;
}

export interface OperationOptions {
  signal?: AbortSignal;
  requestId?: string;
}

// Best effort: the caller's outcome is already decided by the original failure
async function discardEvidence(reference: string, cause: string): Promise<void> {
  try {
    await deleteEvidence(reference);
  } catch (error) {
    logger.error({ reference, cause, error }, 'Failed to delete orphaned evidence file');
  }
}

// Null unless the ledger shows this exact attempt as the current registration
async function findCommittedClaim(
  serialNumber: string,
  userId: string,
  evidenceReference: string
): Promise<SerialRecord | null> {
  try {
    const record = await ledger.lookupBySerial(serialNumber);
    if (record && record.ownerId === userId && record.evidenceReference === evidenceReference) {
      return record;
    }
  } catch (error) {
    logger.error({ serialNumber, error }, 'Could not confirm claim outcome');
  }
  return null;
}

async function auditRegistration(
  record: SerialRecord,
  userId: string,
  evidenceReference: string,
  requestId?: string
): Promise<void> {
  await recordAuditEvent({
    action: AuditAction.REGISTER_SERIAL,
    targetType: AuditTargetType.SERIAL,
    targetId: record.serialNumber,
    actorId: userId,
    details: { userId, serialNumber: record.serialNumber, evidenceReference },
    requestId,
  });
}

/**
 * Claim a serial number for a user. Evidence is stored before the claim and
 * deleted again whenever the claim does not commit, so a failed attempt leaves
 * neither a ledger change nor a file behind.
 */
export async function registerSerial(
  userId: string,
  rawSerialNumber: string,
  evidence: EvidenceUpload,
  options: OperationOptions = {}
): Promise<SerialRecord> {
  const serialNumber = normalizeSerialNumber(rawSerialNumber);
  if (!isWellFormedSerialNumber(serialNumber)) {
    throw new ValidationError('Invalid serial number format', { serialNumber: rawSerialNumber });
  }
  const contentType = validateEvidence(evidence.bytes, evidence.contentType);

  if (!(await isEligibleToRegister(userId))) {
    throw new UserNotEligibleError(userId);
  }

  if (options.signal?.aborted) {
    throw new RequestCancelledError();
  }

  let evidenceReference: string;
  try {
    evidenceReference = await storeEvidence(evidence.bytes, contentType, `bill_${userId}_`);
  } catch (error) {
    logger.error({ userId, serialNumber, error }, 'Evidence storage failed');
    throw new EvidenceStorageFailedError();
  }

  if (options.signal?.aborted) {
    await discardEvidence(evidenceReference, 'cancelled');
    throw new RequestCancelledError();
  }

  let result: ledger.ClaimResult;
  try {
    result = await ledger.claim(serialNumber, userId, evidenceReference);
  } catch (error) {
    // The write may have committed even though its response was lost
    const committed = await findCommittedClaim(serialNumber, userId, evidenceReference);
    if (committed) {
      logger.warn({ userId, serialNumber, error }, 'Claim committed despite storage error');
      await auditRegistration(committed, userId, evidenceReference, options.requestId);
      return committed;
    }
    await discardEvidence(evidenceReference, 'claim error');
    throw error;
  }

  if (!result.ok) {
    await discardEvidence(evidenceReference, result.reason);
    if (result.reason === 'NOT_FOUND') {
      throw new NotFoundError('Serial number', serialNumber);
    }
    throw new SerialAlreadyClaimedError(serialNumber);
  }

  // Committed: cancellation from here on no longer applies
  await auditRegistration(result.record, userId, evidenceReference, options.requestId);

  return result.record;
}

// Administrative reversal of a registration
export async function disassociateSerial(
  rawSerialNumber: string,
  actorId: string,
  options: OperationOptions = {}
): Promise<SerialRecord> {
  const serialNumber = normalizeSerialNumber(rawSerialNumber);
  if (!isWellFormedSerialNumber(serialNumber)) {
    throw new ValidationError('Invalid serial number format', { serialNumber: rawSerialNumber });
  }
  const result = await ledger.release(serialNumber);

  if (!result.ok) {
    if (result.reason === 'NOT_FOUND') {
      throw new NotFoundError('Serial number', serialNumber);
    }
    throw new NotCurrentlyRegisteredError(serialNumber);
  }

  await recordAuditEvent({
    action: AuditAction.DISASSOCIATE_SERIAL,
    targetType: AuditTargetType.SERIAL,
    targetId: serialNumber,
    actorId,
    details: {
      disassociatedFromUser: result.previousOwnerId,
      evidenceReference: result.previousEvidenceReference,
    },
    requestId: options.requestId,
  });

  if (config.evidence.deleteOnRelease && result.previousEvidenceReference) {
    await discardEvidence(result.previousEvidenceReference, 'released');
  }

  return result.record;
}

export async function getSerialDetails(rawSerialNumber: string): Promise<SerialRecord> {
  const record = await ledger.lookupBySerial(rawSerialNumber);
  if (!record) {
    throw new NotFoundError('Serial number', normalizeSerialNumber(rawSerialNumber));
  }
  return record;
}

export async function listUserSerials(userId: string): Promise<SerialRecord[]> {
  return ledger.listSerialsByOwner(userId);
}
