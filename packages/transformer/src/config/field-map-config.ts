/**
 * Declarative field maps
 *
 * A JSON-friendly description of a transformer, for mappings kept in
 * configuration rather than code.
 */

import { z } from 'zod';
import { TransformerError, parseConfig } from '@fieldbridge/core';
import {
  SCALAR_TYPES,
  castField,
  dateField,
  flagMaskSchema,
  jsonField,
  maskField,
} from '../definitions/index.js';
import { Transformer, type TransformerOptions } from '../transformer.js';
import type { FieldDeclaration } from '../types/index.js';

export const FIELD_TYPES = ['none', ...SCALAR_TYPES, 'date', 'json', 'mask'] as const;
export type FieldType = (typeof FIELD_TYPES)[number];

const scalarTypeSchema = z.enum(SCALAR_TYPES);

export const fieldEntrySchema = z
  .object({
    /** Name in application records */
    app: z.string().min(1),
    /** Name in external records */
    ext: z.string().min(1),
    /** Application-side value type (default: none, rename only) */
    type: z.enum(FIELD_TYPES).default('none'),
    /** Cast applied on the way into storage; scalar types only */
    extType: scalarTypeSchema.optional(),
    /** Flag name to bit position; mask fields only */
    mask: flagMaskSchema.optional(),
    /** Date fields only; default true */
    utc: z.boolean().optional(),
  })
  .strict()
  .superRefine((field, ctx) => {
    if (field.type === 'mask' && !field.mask) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'mask is required for mask fields',
        path: ['mask'],
      });
    }
    if (field.type !== 'mask' && field.mask) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'mask is only allowed for mask fields',
        path: ['mask'],
      });
    }
    if (field.type !== 'date' && field.utc !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'utc is only allowed for date fields',
        path: ['utc'],
      });
    }
    if (field.extType && field.type !== 'none' && !scalarTypeSchema.safeParse(field.type).success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `extType cannot be combined with type "${field.type}"`,
        path: ['extType'],
      });
    }
  });

export const fieldMapConfigSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    fields: z.array(fieldEntrySchema),
    virtual: z.array(z.string().min(1)).default([]),
  })
  .strict()
  .superRefine((config, ctx) => {
    const appNames = new Set<string>();
    const extNames = new Set<string>();
    config.fields.forEach((field, i) => {
      if (appNames.has(field.app)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate app field: ${field.app}`,
          path: ['fields', i, 'app'],
        });
      }
      if (extNames.has(field.ext)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate ext field: ${field.ext}`,
          path: ['fields', i, 'ext'],
        });
      }
      appNames.add(field.app);
      extNames.add(field.ext);
    });
  });

export type FieldEntry = z.output<typeof fieldEntrySchema>;
export type FieldMapConfig = z.output<typeof fieldMapConfigSchema>;

export function parseFieldMapConfig(input: unknown): FieldMapConfig {
  return parseConfig(fieldMapConfigSchema, input, 'Invalid field map');
}

function declarationFor(field: FieldEntry): FieldDeclaration {
  switch (field.type) {
    case 'none':
      return castField(field.app, field.ext, undefined, field.extType);
    case 'date':
      return dateField(field.app, field.ext, { utc: field.utc });
    case 'json':
      return jsonField(field.app, field.ext);
    case 'mask':
      if (!field.mask) {
        throw new TransformerError({
          code: 'CONFIGURATION_ERROR',
          message: `Mask field ${field.app} has no mask`,
        });
      }
      return maskField(field.app, field.ext, field.mask);
    default:
      return castField(field.app, field.ext, field.type, field.extType);
  }
}

export function declarationsFromConfig(config: FieldMapConfig): FieldDeclaration[] {
  return config.fields.map(declarationFor);
}

/**
 * Validate a field map and build a transformer from it.
 * Options may add hooks and a logger; fields and virtual names come from the map.
 */
export function createTransformerFromConfig(
  input: unknown,
  options: Omit<TransformerOptions, 'fields' | 'virtual'> = {}
): Transformer {
  const config = parseFieldMapConfig(input);
  return new Transformer({
    ...options,
    fields: declarationsFromConfig(config),
    virtual: config.virtual,
  });
}
