import type { SerialStatus } from './enums.js';

// One physical unit's registration state
export interface SerialRecord {
  serialId: string;
  serialNumber: string;               // normalized (trimmed, uppercase)
  productId: string;
  ownerId: string | null;             // null while available
  status: SerialStatus;
  registeredAt: string | null;        // ISO timestamp, set only while registered
  evidenceReference: string | null;   // stored bill key, set only while registered
  createdAt: string;
  updatedAt: string;
}

// What anyone may learn about a serial number without owning it
export interface PublicSerialView {
  serialNumber: string;
  status: SerialStatus;
}

// Result of a bulk serial upload for one product
export interface ImportSerialsResult {
  addedCount: number;
  duplicates: string[];
  errors: string[];
}

export interface BillDownloadResponse {
  serialNumber: string;
  downloadUrl: string;
  expiresAt: string;
}
