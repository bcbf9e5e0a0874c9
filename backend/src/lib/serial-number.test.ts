import { describe, it, expect } from 'vitest';
import {
  normalizeSerialNumber,
  isWellFormedSerialNumber,
  SERIAL_NUMBER_MAX_LENGTH,
} from './serial-number.js';

describe('serial numbers', () => {
  it('normalizes by trimming and uppercasing', () => {
    expect(normalizeSerialNumber('  ab-12/x ')).toBe('AB-12/X');
  });

  it('accepts the allowed character set', () => {
    expect(isWellFormedSerialNumber('SN.2024_01-A/7')).toBe(true);
  });

  it('rejects empty, padded and oddly started values', () => {
    expect(isWellFormedSerialNumber('')).toBe(false);
    expect(isWellFormedSerialNumber('AB 12')).toBe(false);
    expect(isWellFormedSerialNumber('-AB12')).toBe(false);
    expect(isWellFormedSerialNumber('ab12')).toBe(false);
  });

  it('enforces the maximum length', () => {
    expect(isWellFormedSerialNumber('A'.repeat(SERIAL_NUMBER_MAX_LENGTH))).toBe(true);
    expect(isWellFormedSerialNumber('A'.repeat(SERIAL_NUMBER_MAX_LENGTH + 1))).toBe(false);
  });
});
