import type { EpochSeconds } from '../types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(raw: Record<string, unknown>, field: string): string {
  const value = raw[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Expected non-empty string field "${field}"`);
  }
  return value;
}

export function readEpoch(raw: Record<string, unknown>, field: string): EpochSeconds {
  const value = raw[field];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new Error(`Expected integer field "${field}"`);
  }
  return value;
}
