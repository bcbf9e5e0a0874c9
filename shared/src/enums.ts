// Lifecycle state of a serial number in the ledger
export const SerialStatus = {
  AVAILABLE: 'available',
  REGISTERED: 'registered',
} as const;
export type SerialStatus = (typeof SerialStatus)[keyof typeof SerialStatus];

// Audit log action types
export const AuditAction = {
  REGISTER_SERIAL: 'register_serial',
  DISASSOCIATE_SERIAL: 'disassociate_serial',
  BULK_ADD_SERIALS: 'bulk_add_serials',
  CREATE_PRODUCT: 'create_product',
  UPDATE_PRODUCT: 'update_product',
  DELETE_PRODUCT: 'delete_product',
} as const;
export type AuditAction = (typeof AuditAction)[keyof typeof AuditAction];

// Kinds of records an audit entry can point at
export const AuditTargetType = {
  SERIAL: 'serial',
  PRODUCT: 'product',
  USER: 'user',
} as const;
export type AuditTargetType = (typeof AuditTargetType)[keyof typeof AuditTargetType];

// Content types accepted as proof of purchase
export const BillContentType = {
  PDF: 'application/pdf',
  JPEG: 'image/jpeg',
  PNG: 'image/png',
} as const;
export type BillContentType = (typeof BillContentType)[keyof typeof BillContentType];
