/**
 * Scalar casts for columns whose driver type differs from the application type,
 * e.g. numeric ids stored as strings.
 */

import { TransformerError } from '@fieldbridge/core';
import type { Converter, FieldDeclaration } from '../types/index.js';

export const SCALAR_TYPES = ['string', 'integer', 'number', 'boolean'] as const;
export type ScalarType = (typeof SCALAR_TYPES)[number];

const TRUE_STRINGS = new Set(['true', '1', 'yes', 'on']);
const FALSE_STRINGS = new Set(['false', '0', 'no', 'off', '']);

function castFailed(value: unknown, type: ScalarType): TransformerError {
  return new TransformerError({
    code: 'CONVERSION_FAILED',
    message: `Cannot cast ${typeof value} "${String(value)}" to ${type}`,
    context: { value, type },
  });
}

function toNumber(value: unknown, type: ScalarType): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  if (typeof value === 'boolean') return value ? 1 : 0;
  throw castFailed(value, type);
}

/** Cast a scalar; null and undefined pass through */
export function castValue(value: unknown, type: ScalarType): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  switch (type) {
    case 'string':
      return String(value);
    case 'integer':
      return Math.trunc(toNumber(value, type));
    case 'number':
      return toNumber(value, type);
    case 'boolean':
      if (typeof value === 'boolean') return value;
      if (typeof value === 'number') return value !== 0;
      if (typeof value === 'string') {
        const normalized = value.trim().toLowerCase();
        if (TRUE_STRINGS.has(normalized)) return true;
        if (FALSE_STRINGS.has(normalized)) return false;
      }
      throw castFailed(value, type);
  }
}

export function caster(type: ScalarType): Converter {
  return (value) => castValue(value, type);
}

/**
 * Rename a field and cast its value in each direction.
 * Pass `undefined` for a side that should keep the value as is.
 */
export function castField(
  app: string,
  ext: string,
  appType: ScalarType | undefined,
  extType: ScalarType | undefined
): FieldDeclaration {
  return {
    app,
    ext,
    toApp: appType ? caster(appType) : undefined,
    toExt: extType ? caster(extType) : undefined,
  };
}
