/**
 * Date fields: `Date` in the application, `YYYY-MM-DD HH:MM:SS` in storage.
 */

import { TransformerError } from '@fieldbridge/core';
import type { FieldDeclaration } from '../types/index.js';

export interface DateFieldOptions {
  /**
   * Read and write the stored string in UTC (default), or in the host time zone.
   * In the host zone, a wall-clock time skipped by a daylight-saving change
   * (e.g. 02:30 on a spring-forward night) does not exist and is rejected
   * with CONVERSION_FAILED.
   */
  utc?: boolean;
}

const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function conversionFailed(message: string, value: unknown): TransformerError {
  return new TransformerError({
    code: 'CONVERSION_FAILED',
    message,
    suggestion: 'Dates are stored as "YYYY-MM-DD HH:MM:SS"',
    context: { value },
  });
}

export function formatDateTime(date: Date, utc = true): string {
  if (Number.isNaN(date.getTime())) {
    throw conversionFailed('Cannot format an invalid Date', date);
  }

  const [year, month, day, hours, minutes, seconds] = utc
    ? [date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate(), date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()]
    : [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes(), date.getSeconds()];

  return `${pad(year, 4)}-${pad(month)}-${pad(day)} ${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

export function parseDateTime(value: string, utc = true): Date {
  const match = DATE_TIME_PATTERN.exec(value);
  if (!match) {
    throw conversionFailed(`Invalid date-time string: "${value}"`, value);
  }

  const [year, month, day, hours, minutes, seconds] = [1, 2, 3, 4, 5, 6].map((group) => Number(match[group]));
  const date = new Date(0);
  if (utc) {
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hours, minutes, seconds, 0);
  } else {
    date.setFullYear(year, month - 1, day);
    date.setHours(hours, minutes, seconds, 0);
  }

  // Date rolls 2024-02-30 over to March; a round trip catches it
  if (formatDateTime(date, utc) !== value) {
    throw conversionFailed(`Date-time out of range: "${value}"`, value);
  }
  return date;
}

/**
 * Converter into the application: stored string to `Date`.
 * `Date` values (some drivers decode them already) are kept; null and undefined pass through.
 */
export function toAppDate(value: unknown, utc = true): Date | null | undefined {
  if (value === null || value === undefined || value instanceof Date) {
    return value;
  }
  if (typeof value !== 'string') {
    throw conversionFailed(`Expected a date-time string, received ${typeof value}`, value);
  }
  return parseDateTime(value, utc);
}

/**
 * Converter into storage: `Date` to the canonical string.
 * Strings already in canonical form are checked and kept.
 */
export function toExtDate(value: unknown, utc = true): string | null | undefined {
  if (value === null || value === undefined) {
    return value;
  }
  if (value instanceof Date) {
    return formatDateTime(value, utc);
  }
  if (typeof value === 'string') {
    parseDateTime(value, utc);
    return value;
  }
  throw conversionFailed(`Expected a Date, received ${typeof value}`, value);
}

export function dateField(app: string, ext: string, options: DateFieldOptions = {}): FieldDeclaration {
  const utc = options.utc ?? true;
  return {
    app,
    ext,
    toApp: (value) => toAppDate(value, utc),
    toExt: (value) => toExtDate(value, utc),
  };
}
