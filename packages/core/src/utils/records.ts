/**
 * Utility functions for working with records
 */

import type { DataRecord } from '../types/index.js';

/**
 * Check that a value is a plain object usable as a record.
 * Arrays, dates, class instances and null are rejected.
 */
export function isRecord(value: unknown): value is DataRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Prepend a prefix to every key, e.g. to qualify column names with a table alias
 */
export function prefixKeys(keys: readonly string[], prefix: string): string[] {
  return keys.map((key) => `${prefix}${key}`);
}

/**
 * Add an own, enumerable field. Plain assignment to `__proto__` would
 * replace the prototype instead.
 */
export function setField(record: DataRecord, key: string, value: unknown): void {
  Object.defineProperty(record, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
