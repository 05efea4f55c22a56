/**
 * Transformer
 *
 * Moves records between their application shape and their external (storage)
 * shape. Each logical field is registered once and produces two definitions,
 * one per direction, keyed by the field's name on the side it comes from.
 */

import {
  TransformerError,
  createLogger,
  isRecord,
  prefixKeys,
  setField,
  type DataRecord,
  type Logger,
} from '@fieldbridge/core';
import { dateField, jsonField, maskField, type DateFieldOptions, type FlagMask } from './definitions/index.js';
import { resolveHooks, type DirectionHooks, type HookConfig } from './hooks.js';
import {
  Direction,
  assertDirection,
  opposite,
  type Converter,
  type FieldDeclaration,
  type FieldDefinition,
} from './types/index.js';

export interface TransformerOptions {
  /** Fields registered at construction, in order */
  fields?: readonly FieldDeclaration[];
  /** Passthrough field names */
  virtual?: readonly string[];
  hooks?: HookConfig;
  /** Defaults to a logger configured from FIELDBRIDGE_LOG_* */
  logger?: Logger;
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return typeof value;
}

function applyDefinition(definition: FieldDefinition, value: unknown): unknown {
  return definition.converter ? definition.converter(value, ...definition.converterArgs) : value;
}

export class Transformer {
  private readonly definitions: Record<Direction, Map<string, FieldDefinition>> = {
    [Direction.Application]: new Map(),
    [Direction.External]: new Map(),
  };
  private readonly virtualFields = new Set<string>();
  private readonly hooks: Record<Direction, DirectionHooks>;
  private readonly logger: Logger;

  constructor(options: TransformerOptions = {}) {
    this.logger = (options.logger ?? createLogger()).child({ component: 'transformer' });
    this.hooks = resolveHooks(options.hooks);

    for (const field of options.fields ?? []) {
      this.defineField(field);
    }
    for (const key of options.virtual ?? []) {
      this.defineVirtual(key);
    }
  }

  /**
   * Register a logical field.
   *
   * @param appKey - property name in application records
   * @param extKey - property name in external records
   * @param appConverter - applied to the external value when moving into the application
   * @param extConverter - applied to the application value when moving into storage
   */
  define(
    appKey: string,
    extKey: string,
    appConverter?: Converter | null,
    extConverter?: Converter | null,
    appArgs: readonly unknown[] = [],
    extArgs: readonly unknown[] = []
  ): void {
    this.definitions[Direction.External].set(appKey, {
      targetKey: extKey,
      sourceKey: appKey,
      converter: extConverter ?? undefined,
      converterArgs: extArgs,
    });
    this.definitions[Direction.Application].set(extKey, {
      targetKey: appKey,
      sourceKey: extKey,
      converter: appConverter ?? undefined,
      converterArgs: appArgs,
    });
    this.logger.debug('Defined field', { app: appKey, ext: extKey });
  }

  defineField(field: FieldDeclaration): void {
    this.define(field.app, field.ext, field.toApp, field.toExt, field.appArgs, field.extArgs);
  }

  /**
   * Mark a field as passthrough: copied unchanged in both directions
   * and left out of getKeys() and getMap().
   */
  defineVirtual(key: string): void {
    this.virtualFields.add(key);
  }

  /** `Date` in the application, `YYYY-MM-DD HH:MM:SS` in storage */
  defineDate(appKey: string, extKey: string, options?: DateFieldOptions): void {
    this.defineField(dateField(appKey, extKey, options));
  }

  /** Decoded structure in the application, JSON text in storage */
  defineJson(appKey: string, extKey: string): void {
    this.defineField(jsonField(appKey, extKey));
  }

  /** Flag names in the application, integer bitmask in storage */
  defineMask(appKey: string, extKey: string, mask: FlagMask): void {
    this.defineField(maskField(appKey, extKey, mask));
  }

  toApp(data: DataRecord): DataRecord;
  toApp(data: DataRecord | null | undefined): DataRecord | null;
  toApp(data: unknown, key: string): unknown;
  toApp(data: readonly unknown[], key: null | undefined, isBatch: true): Array<DataRecord | null>;
  toApp(data: unknown, key?: string | null, isBatch?: boolean): unknown;
  toApp(data: unknown, key: string | null = null, isBatch = false): unknown {
    return this.to(Direction.Application, data, key, isBatch);
  }

  toExt(data: DataRecord): DataRecord;
  toExt(data: DataRecord | null | undefined): DataRecord | null;
  toExt(data: unknown, key: string): unknown;
  toExt(data: readonly unknown[], key: null | undefined, isBatch: true): Array<DataRecord | null>;
  toExt(data: unknown, key?: string | null, isBatch?: boolean): unknown;
  toExt(data: unknown, key: string | null = null, isBatch = false): unknown {
    return this.to(Direction.External, data, key, isBatch);
  }

  toAppBatch(records: readonly unknown[]): Array<DataRecord | null> {
    return this.to(Direction.Application, records, null, true);
  }

  toExtBatch(records: readonly unknown[]): Array<DataRecord | null> {
    return this.to(Direction.External, records, null, true);
  }

  /**
   * Transform into `direction`.
   *
   * - `isBatch`: `data` is a list of records, each transformed as a record.
   * - `key`: `data` is the raw value of that one field; the converted value is returned.
   * - otherwise `data` is a single record. `null`, `undefined` and `''` yield `null`.
   *
   * `key` and `isBatch` cannot be combined.
   */
  to(direction: Direction, data: DataRecord): DataRecord;
  to(direction: Direction, data: DataRecord | null | undefined): DataRecord | null;
  to(direction: Direction, data: unknown, key: string): unknown;
  to(direction: Direction, data: readonly unknown[], key: null | undefined, isBatch: true): Array<DataRecord | null>;
  to(direction: Direction, data: unknown, key?: string | null, isBatch?: boolean): unknown;
  to(direction: Direction, data: unknown, key: string | null = null, isBatch = false): unknown {
    assertDirection(direction);

    if (isBatch) {
      if (key !== null && key !== undefined) {
        throw new TransformerError({
          code: 'INVALID_ARGUMENT',
          message: `Batch mode cannot be combined with a single field key (${key})`,
          suggestion: 'Transform single values one at a time, or drop the key to transform records',
          context: { key },
        });
      }
      return this.transformBatch(direction, data);
    }

    if (key !== null && key !== undefined) {
      return this.transformValue(direction, key, data);
    }

    return this.transformRecord(direction, data);
  }

  /**
   * Field names a record in `direction` is expected to carry, in registration order.
   * Virtual fields are not included.
   */
  getKeys(direction: Direction, prefix: string | null = null): string[] {
    assertDirection(direction);

    const keys = [...this.definitions[opposite(direction)].keys()];
    return prefix === null ? keys : prefixKeys(keys, prefix);
  }

  getKeysApp(prefix: string | null = null): string[] {
    return this.getKeys(Direction.Application, prefix);
  }

  getKeysExt(prefix: string | null = null): string[] {
    return this.getKeys(Direction.External, prefix);
  }

  /**
   * Map of every field's name in `direction` to its name on the other side
   */
  getMap(direction: Direction = Direction.Application): Record<string, string> {
    assertDirection(direction);

    const map: Record<string, string> = {};
    for (const definition of this.definitions[direction].values()) {
      setField(map, definition.targetKey, definition.sourceKey);
    }
    return map;
  }

  /**
   * Counterpart name of a field named `key` in `direction`, or null when unknown
   */
  getKey(direction: Direction, key: string): string | null {
    const map = this.getMap(direction);
    return Object.hasOwn(map, key) ? (map[key] ?? null) : null;
  }

  getKeyApp(key: string): string | null {
    return this.getKey(Direction.Application, key);
  }

  getKeyExt(key: string): string | null {
    return this.getKey(Direction.External, key);
  }

  /**
   * Whether a field named `key` can be transformed into `direction`
   */
  hasField(direction: Direction, key: string): boolean {
    assertDirection(direction);
    return this.definitions[direction].has(key);
  }

  isVirtual(key: string): boolean {
    return this.virtualFields.has(key);
  }

  private transformBatch(direction: Direction, data: unknown): Array<DataRecord | null> {
    if (!Array.isArray(data)) {
      throw new TransformerError({
        code: 'INVALID_ARGUMENT',
        message: `Batch mode expects an array of records, received ${describeValue(data)}`,
      });
    }
    return data.map((record: unknown) => this.transformRecord(direction, record));
  }

  private transformValue(direction: Direction, key: string, value: unknown): unknown {
    const definition = this.definitions[direction].get(key);
    if (!definition) {
      throw new TransformerError({
        code: 'UNKNOWN_FIELD',
        message: `Unknown key: ${key}`,
        suggestion: `Known keys: ${[...this.definitions[direction].keys()].join(', ')}`,
        context: { direction, key },
      });
    }
    return applyDefinition(definition, value);
  }

  private transformRecord(direction: Direction, data: unknown): DataRecord | null {
    if (data === null || data === undefined || data === '') {
      return null;
    }
    if (!isRecord(data)) {
      throw new TransformerError({
        code: 'INVALID_ARGUMENT',
        message: `Expected a record, received ${describeValue(data)}`,
        context: { direction },
      });
    }

    const hooks = this.hooks[direction];
    const definitions = this.definitions[direction];
    const input = hooks.before(data);
    const output: DataRecord = {};
    const dropped: string[] = [];

    for (const [field, value] of Object.entries(input)) {
      const definition = definitions.get(field);
      if (definition) {
        setField(output, definition.targetKey, applyDefinition(definition, value));
      } else if (this.virtualFields.has(field)) {
        setField(output, field, value);
      } else {
        dropped.push(field);
      }
    }

    if (dropped.length > 0) {
      this.logger.debug('Dropped unmapped fields', { direction, fields: dropped });
    }

    return hooks.after(output);
  }
}
