// Serial numbers compare case-insensitively; the ledger stores the uppercase form
export const SERIAL_NUMBER_MAX_LENGTH = 64;
const SERIAL_NUMBER_PATTERN = /^[A-Z0-9][A-Z0-9._\-/]*$/;

export function normalizeSerialNumber(raw: string): string {
  return raw.trim().toUpperCase();
}

export function isWellFormedSerialNumber(normalized: string): boolean {
  return (
    normalized.length > 0 &&
    normalized.length <= SERIAL_NUMBER_MAX_LENGTH &&
    SERIAL_NUMBER_PATTERN.test(normalized)
  );
}
