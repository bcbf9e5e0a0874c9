import { z } from 'zod';
import { AuditAction, AuditTargetType, SerialStatus } from '@warranty/shared';
import { config } from './config.js';
import { normalizeSerialNumber, isWellFormedSerialNumber } from './serial-number.js';

// Common validators
export const uuidSchema = z.string().uuid();
export const ulidSchema = z.string().regex(/^[0-9A-HJKMNP-TV-Z]{26}$/);

export const paginationSchema = z.object({
  limit: z.coerce.number().min(1).max(config.api.maxPageSize).optional().default(config.api.defaultPageSize),
  cursor: z.string().optional(),
});

// Serial numbers are trimmed and uppercased before the format check
export const serialNumberSchema = z
  .string()
  .max(200)
  .transform(normalizeSerialNumber)
  .refine(isWellFormedSerialNumber, { message: 'Invalid serial number format' });

export const billSchema = z.object({
  contentType: z.string().min(1).max(100),
  data: z.string().min(1).regex(/^[A-Za-z0-9+/=\r\n]+$/, 'Bill data must be base64'),
});

export const registerSerialSchema = z.object({
  serialNumber: serialNumberSchema,
  bill: billSchema,
});

// Bulk upload: either a list of serials or CSV text (first column, header row)
export const importSerialsSchema = z
  .object({
    serials: z.array(z.string().max(200)).min(1).max(config.api.maxImportBatch).optional(),
    csv: z.string().min(1).max(5 * 1024 * 1024).optional(),
  })
  .refine((input) => (input.serials === undefined) !== (input.csv === undefined), {
    message: 'Provide exactly one of serials or csv',
  });

// Product schemas
export const createProductSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().max(2000).nullable().optional(),
});

export const updateProductSchema = createProductSchema
  .partial()
  .refine((input) => input.name !== undefined || input.description !== undefined, {
    message: 'Nothing to update',
  });

const serialStatusValues = Object.values(SerialStatus) as [SerialStatus, ...SerialStatus[]];
const auditActionValues = Object.values(AuditAction) as [AuditAction, ...AuditAction[]];
const auditTargetTypeValues = Object.values(AuditTargetType) as [
  AuditTargetType,
  ...AuditTargetType[],
];

export const serialQuerySchema = paginationSchema.extend({
  status: z.enum(serialStatusValues).optional(),
});

export const auditQuerySchema = paginationSchema
  .extend({
    action: z.enum(auditActionValues).optional(),
    targetType: z.enum(auditTargetTypeValues).optional(),
    targetId: z.string().min(1).max(200).optional(),
    actorId: z.string().min(1).max(200).optional(),
  })
  .refine((query) => query.targetId === undefined || query.targetType !== undefined, {
    message: 'targetId requires targetType',
  });

// Export types
export type PaginationInput = z.infer<typeof paginationSchema>;
export type RegisterSerialInput = z.infer<typeof registerSerialSchema>;
export type ImportSerialsInput = z.infer<typeof importSerialsSchema>;
export type CreateProductInput = z.infer<typeof createProductSchema>;
export type UpdateProductInput = z.infer<typeof updateProductSchema>;
export type SerialQueryInput = z.infer<typeof serialQuerySchema>;
export type AuditQueryInput = z.infer<typeof auditQuerySchema>;
