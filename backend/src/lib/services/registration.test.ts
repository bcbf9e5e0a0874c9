import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { SerialRecord } from '@warranty/shared';
import {
  NotFoundError,
  SerialAlreadyClaimedError,
  NotCurrentlyRegisteredError,
  UserNotEligibleError,
  EvidenceStorageFailedError,
  RequestCancelledError,
  TemporarilyUnavailableError,
  ValidationError,
  InvalidMimeTypeError,
} from '../errors.js';

// In-process ledger: the status check and the write happen in one synchronous
// step after an await, the way a conditional update is decided by the store.
const { serials, files, policy } = vi.hoisted(() => ({
  serials: new Map<string, SerialRecord>(),
  files: new Set<string>(),
  policy: { deleteOnRelease: false, uploads: 0 },
}));

vi.mock('./ledger.js', () => ({
  claim: vi.fn(async (serialNumber: string, ownerId: string, evidenceReference: string) => {
    await Promise.resolve();
    const current = serials.get(serialNumber);
    if (!current) return { ok: false, reason: 'NOT_FOUND' };
    if (current.status !== 'available') return { ok: false, reason: 'NOT_AVAILABLE' };
    const now = new Date().toISOString();
    const record: SerialRecord = {
      ...current,
      status: 'registered',
      ownerId,
      registeredAt: now,
      evidenceReference,
      updatedAt: now,
    };
    serials.set(serialNumber, record);
    return { ok: true, record };
  }),
  release: vi.fn(async (serialNumber: string) => {
    await Promise.resolve();
    const current = serials.get(serialNumber);
    if (!current) return { ok: false, reason: 'NOT_FOUND' };
    if (current.status !== 'registered' || !current.ownerId) {
      return { ok: false, reason: 'NOT_REGISTERED' };
    }
    const record: SerialRecord = {
      ...current,
      status: 'available',
      ownerId: null,
      registeredAt: null,
      evidenceReference: null,
      updatedAt: new Date().toISOString(),
    };
    serials.set(serialNumber, record);
    return {
      ok: true,
      record,
      previousOwnerId: current.ownerId,
      previousEvidenceReference: current.evidenceReference,
    };
  }),
  lookupBySerial: vi.fn(async (serialNumber: string) => serials.get(serialNumber) ?? null),
  listSerialsByOwner: vi.fn(async (ownerId: string) =>
    [...serials.values()].filter((record) => record.ownerId === ownerId)
  ),
  countsByProduct: vi.fn(async (productId: string) => {
    const records = [...serials.values()].filter((record) => record.productId === productId);
    return {
      uploaded: records.length,
      assigned: records.filter((record) => record.status === 'registered').length,
    };
  }),
}));

vi.mock('./evidence.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./evidence.js')>();
  return {
    validateEvidence: actual.validateEvidence,
    storeEvidence: vi.fn(async (_bytes: Buffer, _contentType: string, prefix: string) => {
      await Promise.resolve();
      policy.uploads += 1;
      const reference = `bills/${prefix}${policy.uploads}.pdf`;
      files.add(reference);
      return reference;
    }),
    deleteEvidence: vi.fn(async (reference: string) => files.delete(reference)),
  };
});

vi.mock('./users.js', () => ({
  isEligibleToRegister: vi.fn(),
}));

vi.mock('./audit.js', () => ({
  recordAuditEvent: vi.fn(),
}));

vi.mock('../logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock('../config.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../config.js')>();
  return {
    config: {
      ...actual.config,
      evidence: {
        ...actual.config.evidence,
        get deleteOnRelease() {
          return policy.deleteOnRelease;
        },
      },
    },
  };
});

// Import after mocks are set up
import {
  registerSerial,
  disassociateSerial,
  getSerialDetails,
  listUserSerials,
} from './registration.js';
import { claim, release, lookupBySerial, countsByProduct } from './ledger.js';
import { storeEvidence, deleteEvidence } from './evidence.js';
import { isEligibleToRegister } from './users.js';
import { recordAuditEvent } from './audit.js';
import { logger } from '../logger.js';

const bill = { bytes: Buffer.from('%PDF-1.4 test bill'), contentType: 'application/pdf' };

function seed(serialNumber: string, productId = 'prod-1') {
  serials.set(serialNumber, {
    serialId: `id-${serialNumber}`,
    serialNumber,
    productId,
    ownerId: null,
    status: 'available',
    registeredAt: null,
    evidenceReference: null,
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
  });
}

describe('registration', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    serials.clear();
    files.clear();
    policy.deleteOnRelease = false;
    policy.uploads = 0;
    vi.mocked(isEligibleToRegister).mockResolvedValue(true);
    vi.mocked(recordAuditEvent).mockResolvedValue(null);
  });

  describe('registerSerial', () => {
    it('lets exactly one of many concurrent claimants win', async () => {
      seed('A1');
      const users = ['user-1', 'user-2', 'user-3', 'user-4', 'user-5'];

      const results = await Promise.allSettled(
        users.map((userId) => registerSerial(userId, 'a1', bill))
      );

      const winners = results.filter((result) => result.status === 'fulfilled');
      const losers = results.filter(
        (result): result is PromiseRejectedResult => result.status === 'rejected'
      );
      expect(winners).toHaveLength(1);
      expect(losers).toHaveLength(4);
      for (const loser of losers) {
        expect(loser.reason).toBeInstanceOf(SerialAlreadyClaimedError);
      }

      const record = serials.get('A1');
      const winner = results.findIndex((result) => result.status === 'fulfilled');
      expect(record?.ownerId).toBe(users[winner]);
      // Only the winner's evidence remains
      expect([...files]).toEqual([record?.evidenceReference]);
    });

    it('registers an available serial and records the claim', async () => {
      seed('A1');
      seed('A2');

      const record = await registerSerial('user-1', ' a1 ', bill, { requestId: 'req-1' });

      expect(record.status).toBe('registered');
      expect(record.ownerId).toBe('user-1');
      expect(record.registeredAt).not.toBeNull();
      expect(record.evidenceReference).toBe('bills/bill_user-1_1.pdf');
      expect(storeEvidence).toHaveBeenCalledWith(bill.bytes, 'application/pdf', 'bill_user-1_');
      expect(recordAuditEvent).toHaveBeenCalledWith({
        action: 'register_serial',
        targetType: 'serial',
        targetId: 'A1',
        actorId: 'user-1',
        details: {
          userId: 'user-1',
          serialNumber: 'A1',
          evidenceReference: 'bills/bill_user-1_1.pdf',
        },
        requestId: 'req-1',
      });
    });

    it('rejects a second customer and leaves the inventory consistent', async () => {
      seed('A1');
      seed('A2');

      await registerSerial('user-1', 'A1', bill);
      await expect(registerSerial('user-2', 'A1', bill)).rejects.toThrow(
        SerialAlreadyClaimedError
      );

      expect(serials.get('A1')?.ownerId).toBe('user-1');
      await expect(countsByProduct('prod-1')).resolves.toEqual({ uploaded: 2, assigned: 1 });
      expect(files.size).toBe(1);
    });

    it('reports an unknown serial and removes its evidence', async () => {
      await expect(registerSerial('user-1', 'Z9', bill)).rejects.toThrow(NotFoundError);

      expect(storeEvidence).toHaveBeenCalledTimes(1);
      expect(deleteEvidence).toHaveBeenCalledWith('bills/bill_user-1_1.pdf');
      expect(files.size).toBe(0);
    });

    it('rejects ineligible users before storing anything', async () => {
      seed('A1');
      vi.mocked(isEligibleToRegister).mockResolvedValue(false);

      await expect(registerSerial('user-1', 'A1', bill)).rejects.toThrow(UserNotEligibleError);
      expect(storeEvidence).not.toHaveBeenCalled();
      expect(serials.get('A1')?.status).toBe('available');
    });

    it('rejects malformed serial numbers before any lookup', async () => {
      await expect(registerSerial('user-1', 'A 1', bill)).rejects.toThrow(ValidationError);
      expect(isEligibleToRegister).not.toHaveBeenCalled();
      expect(storeEvidence).not.toHaveBeenCalled();
    });

    it('rejects unsupported bill types before any lookup', async () => {
      seed('A1');
      const textBill = { bytes: Buffer.from('hello'), contentType: 'text/plain' };

      await expect(registerSerial('user-1', 'A1', textBill)).rejects.toThrow(
        InvalidMimeTypeError
      );
      expect(isEligibleToRegister).not.toHaveBeenCalled();
    });

    it('leaves the ledger untouched when evidence cannot be stored', async () => {
      seed('A1');
      vi.mocked(storeEvidence).mockRejectedValueOnce(new Error('bucket unavailable'));

      await expect(registerSerial('user-1', 'A1', bill)).rejects.toThrow(
        EvidenceStorageFailedError
      );
      expect(claim).not.toHaveBeenCalled();
      expect(serials.get('A1')?.status).toBe('available');
    });

    it('removes evidence when the claim fails on storage errors', async () => {
      seed('A1');
      vi.mocked(claim).mockRejectedValueOnce(new TemporarilyUnavailableError('claim'));

      await expect(registerSerial('user-1', 'A1', bill)).rejects.toThrow(
        TemporarilyUnavailableError
      );
      expect(files.size).toBe(0);
    });

    it('keeps a claim that committed before its storage error', async () => {
      seed('A1');
      vi.mocked(claim).mockImplementationOnce(async (serialNumber, ownerId, evidenceReference) => {
        const current = serials.get(serialNumber);
        if (current) {
          serials.set(serialNumber, {
            ...current,
            status: 'registered',
            ownerId,
            registeredAt: '2024-02-01T00:00:00.000Z',
            evidenceReference,
          });
        }
        throw new TemporarilyUnavailableError('claim');
      });

      const record = await registerSerial('user-1', 'A1', bill, { requestId: 'req-1' });

      expect(record.ownerId).toBe('user-1');
      expect(record.evidenceReference).toBe('bills/bill_user-1_1.pdf');
      expect([...files]).toEqual(['bills/bill_user-1_1.pdf']);
      expect(deleteEvidence).not.toHaveBeenCalled();
      expect(recordAuditEvent).toHaveBeenCalledWith({
        action: 'register_serial',
        targetType: 'serial',
        targetId: 'A1',
        actorId: 'user-1',
        details: {
          userId: 'user-1',
          serialNumber: 'A1',
          evidenceReference: 'bills/bill_user-1_1.pdf',
        },
        requestId: 'req-1',
      });
    });

    it('removes evidence when the claim outcome cannot be confirmed', async () => {
      seed('A1');
      vi.mocked(claim).mockRejectedValueOnce(new TemporarilyUnavailableError('claim'));
      vi.mocked(lookupBySerial).mockRejectedValueOnce(new TemporarilyUnavailableError('lookup'));

      await expect(registerSerial('user-1', 'A1', bill)).rejects.toThrow(
        TemporarilyUnavailableError
      );
      expect(files.size).toBe(0);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('keeps the original error when cleanup fails', async () => {
      seed('A1');
      await registerSerial('user-1', 'A1', bill);
      vi.mocked(deleteEvidence).mockRejectedValueOnce(new Error('delete failed'));

      await expect(registerSerial('user-2', 'A1', bill)).rejects.toThrow(
        SerialAlreadyClaimedError
      );
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('cleans up when cancelled between storing evidence and claiming', async () => {
      seed('A1');
      const controller = new AbortController();
      vi.mocked(storeEvidence).mockImplementationOnce(async () => {
        files.add('bills/cancelled.pdf');
        controller.abort();
        return 'bills/cancelled.pdf';
      });

      await expect(
        registerSerial('user-1', 'A1', bill, { signal: controller.signal })
      ).rejects.toThrow(RequestCancelledError);
      expect(claim).not.toHaveBeenCalled();
      expect(files.size).toBe(0);
      expect(serials.get('A1')?.status).toBe('available');
    });

    it('does nothing for a request cancelled up front', async () => {
      seed('A1');
      const controller = new AbortController();
      controller.abort();

      await expect(
        registerSerial('user-1', 'A1', bill, { signal: controller.signal })
      ).rejects.toThrow(RequestCancelledError);
      expect(storeEvidence).not.toHaveBeenCalled();
    });

    it('keeps a committed claim when cancelled afterwards', async () => {
      seed('A1');
      const controller = new AbortController();
      vi.mocked(recordAuditEvent).mockImplementationOnce(async () => {
        controller.abort();
        return null;
      });

      const record = await registerSerial('user-1', 'A1', bill, { signal: controller.signal });

      expect(record.ownerId).toBe('user-1');
      expect(files.size).toBe(1);
    });

    it('succeeds when the audit entry is dropped', async () => {
      seed('A1');
      vi.mocked(recordAuditEvent).mockResolvedValue(null);

      const record = await registerSerial('user-1', 'A1', bill);

      expect(record.status).toBe('registered');
      expect(serials.get('A1')?.ownerId).toBe('user-1');
    });
  });

  describe('disassociateSerial', () => {
    it('rejects a malformed serial number before touching the ledger', async () => {
      await expect(disassociateSerial('bad serial', 'admin-1')).rejects.toThrow(ValidationError);
      expect(release).not.toHaveBeenCalled();
    });

    it('supports register, disassociate, register again', async () => {
      seed('A1');

      await registerSerial('user-1', 'A1', bill);
      const released = await disassociateSerial('a1', 'admin-1');
      expect(released.status).toBe('available');
      expect(released.ownerId).toBeNull();
      expect(released.registeredAt).toBeNull();

      const again = await registerSerial('user-2', 'A1', bill);
      expect(again.ownerId).toBe('user-2');
      expect(serials.get('A1')?.ownerId).toBe('user-2');

      await disassociateSerial('A1', 'admin-1');
      const third = await registerSerial('user-2', 'A1', bill);
      expect(third.status).toBe('registered');
    });

    it('audits who the serial was taken from', async () => {
      seed('A1');
      await registerSerial('user-1', 'A1', bill);
      vi.mocked(recordAuditEvent).mockClear();

      await disassociateSerial('A1', 'admin-1', { requestId: 'req-2' });

      expect(recordAuditEvent).toHaveBeenCalledWith({
        action: 'disassociate_serial',
        targetType: 'serial',
        targetId: 'A1',
        actorId: 'admin-1',
        details: {
          disassociatedFromUser: 'user-1',
          evidenceReference: 'bills/bill_user-1_1.pdf',
        },
        requestId: 'req-2',
      });
    });

    it('retains the evidence file by default', async () => {
      seed('A1');
      await registerSerial('user-1', 'A1', bill);

      await disassociateSerial('A1', 'admin-1');

      expect(deleteEvidence).not.toHaveBeenCalled();
      expect(files.size).toBe(1);
    });

    it('deletes the evidence file when configured to', async () => {
      seed('A1');
      policy.deleteOnRelease = true;
      await registerSerial('user-1', 'A1', bill);

      await disassociateSerial('A1', 'admin-1');

      expect(files.size).toBe(0);
    });

    it('rejects a serial that is not registered', async () => {
      seed('A1');
      await expect(disassociateSerial('A1', 'admin-1')).rejects.toThrow(
        NotCurrentlyRegisteredError
      );
      expect(recordAuditEvent).not.toHaveBeenCalled();
    });

    it('rejects an unknown serial', async () => {
      await expect(disassociateSerial('Z9', 'admin-1')).rejects.toThrow(NotFoundError);
    });
  });

  describe('read helpers', () => {
    it('returns serial details or not found', async () => {
      seed('A1');
      await expect(getSerialDetails('A1')).resolves.toMatchObject({ serialNumber: 'A1' });
      await expect(getSerialDetails('Z9')).rejects.toThrow('Serial number not found: Z9');
    });

    it('lists the serials a user owns', async () => {
      seed('A1');
      seed('A2');
      await registerSerial('user-1', 'A2', bill);

      const records = await listUserSerials('user-1');

      expect(records.map((record) => record.serialNumber)).toEqual(['A2']);
    });
  });
});
