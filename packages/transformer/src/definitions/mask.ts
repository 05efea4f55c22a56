/**
 * Mask fields: a list of flag names in the application, an integer bitmask in storage.
 *
 * Encoding rejects flag names missing from the mask (UNKNOWN_FLAG) and counts
 * repeated names once. Decoding ignores set bits that no flag name covers and
 * returns names in ascending bit order.
 */

import { z } from 'zod';
import { TransformerError, formatZodIssues } from '@fieldbridge/core';
import type { FieldDeclaration } from '../types/index.js';

/** Highest bit that still fits in a safe integer */
export const MAX_MASK_BIT = 52;

const DECIMAL_DIGITS = /^\d+$/;

/** Flag name to bit position */
export type FlagMask = Readonly<Record<string, number>>;

export const flagMaskSchema = z
  .record(z.string().min(1), z.number().int().min(0).max(MAX_MASK_BIT))
  .superRefine((mask, ctx) => {
    const seen = new Map<number, string>();
    for (const [name, bit] of Object.entries(mask)) {
      const previous = seen.get(bit);
      if (previous !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Bit ${bit} is assigned to both "${previous}" and "${name}"`,
          path: [name],
        });
      }
      seen.set(bit, name);
    }
  });

export function validateMask(mask: unknown): FlagMask {
  const result = flagMaskSchema.safeParse(mask);
  if (!result.success) {
    throw new TransformerError({
      code: 'INVALID_ARGUMENT',
      message: formatZodIssues(result.error, 'Invalid flag mask'),
      cause: result.error,
    });
  }
  return result.data;
}

export function encodeMask(flags: unknown, mask: FlagMask): number | null | undefined {
  if (flags === null || flags === undefined) {
    return flags;
  }
  if (!Array.isArray(flags) && !(flags instanceof Set)) {
    throw new TransformerError({
      code: 'CONVERSION_FAILED',
      message: `Expected an array or Set of flag names, received ${typeof flags}`,
      context: { value: flags },
    });
  }

  const bits = new Set<number>();
  for (const flag of flags) {
    const bit = typeof flag === 'string' && Object.hasOwn(mask, flag) ? mask[flag] : undefined;
    if (bit === undefined) {
      throw new TransformerError({
        code: 'UNKNOWN_FLAG',
        message: `Unknown flag: ${String(flag)}`,
        suggestion: `Known flags: ${Object.keys(mask).join(', ')}`,
        context: { flag },
      });
    }
    bits.add(bit);
  }

  let value = 0;
  for (const bit of bits) {
    value += 2 ** bit;
  }
  return value;
}

export function decodeMask(value: unknown, mask: FlagMask): string[] | null | undefined {
  if (value === null || value === undefined) {
    return value;
  }

  // numeric columns often arrive as strings; only plain decimal digits count
  const bitmask = typeof value === 'string' && DECIMAL_DIGITS.test(value) ? Number(value) : value;
  if (typeof bitmask !== 'number' || !Number.isSafeInteger(bitmask) || bitmask < 0) {
    throw new TransformerError({
      code: 'CONVERSION_FAILED',
      message: `Expected a non-negative integer bitmask, received ${String(value)}`,
      context: { value },
    });
  }

  return Object.entries(mask)
    .sort(([, a], [, b]) => a - b)
    .filter(([, bit]) => Math.floor(bitmask / 2 ** bit) % 2 === 1)
    .map(([name]) => name);
}

export function maskField(app: string, ext: string, mask: FlagMask): FieldDeclaration {
  const flags = validateMask(mask);
  return {
    app,
    ext,
    toApp: (value) => decodeMask(value, flags),
    toExt: (value) => encodeMask(value, flags),
  };
}
