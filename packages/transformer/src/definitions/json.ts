/**
 * JSON fields: decoded structure in the application, JSON text in storage.
 */

import { TransformerError } from '@fieldbridge/core';
import type { FieldDeclaration } from '../types/index.js';

export function decodeJson(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value !== 'string') {
    throw new TransformerError({
      code: 'CONVERSION_FAILED',
      message: `Expected JSON text, received ${typeof value}`,
      context: { value },
    });
  }

  try {
    return JSON.parse(value);
  } catch (error) {
    throw new TransformerError({
      code: 'CONVERSION_FAILED',
      message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
      context: { value },
    });
  }
}

export function encodeJson(value: unknown): string | null | undefined {
  if (value === null || value === undefined) {
    return value;
  }

  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(value);
  } catch (error) {
    // BigInt values and circular structures
    throw new TransformerError({
      code: 'CONVERSION_FAILED',
      message: `Cannot encode value as JSON: ${error instanceof Error ? error.message : String(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (encoded === undefined) {
    throw new TransformerError({
      code: 'CONVERSION_FAILED',
      message: `Cannot encode ${typeof value} as JSON`,
    });
  }
  return encoded;
}

export function jsonField(app: string, ext: string): FieldDeclaration {
  return { app, ext, toApp: decodeJson, toExt: encodeJson };
}
