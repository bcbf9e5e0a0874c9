import type { AuditAction, AuditTargetType } from './enums.js';

// Audit log entry
export interface AuditLogEntry {
  logId: string;
  actorId: string;
  action: AuditAction;
  targetType: AuditTargetType;
  targetId: string;
  timestamp: string;
  details?: Record<string, unknown>;
  requestId?: string;
}
