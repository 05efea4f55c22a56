/**
 * Converts a field value on its way into one direction.
 * Called as `converter(value, ...converterArgs)`; the return value is used as is.
 */
export type Converter = (value: unknown, ...args: unknown[]) => unknown;

/** How one field is renamed and converted when entering a direction */
export interface FieldDefinition {
  /** Field name in the destination representation */
  readonly targetKey: string;
  /** Field name in the origin representation */
  readonly sourceKey: string;
  /** Absent means the value is copied unchanged */
  readonly converter?: Converter;
  /** Extra positional arguments passed after the value */
  readonly converterArgs: readonly unknown[];
}

/**
 * Declarative form of one logical field, covering both directions.
 * Built by hand or by the helpers in `definitions/`.
 */
export interface FieldDeclaration {
  /** Name in application records */
  app: string;
  /** Name in external (storage) records */
  ext: string;
  /** Applied to the external value when moving into the application */
  toApp?: Converter;
  /** Applied to the application value when moving out to storage */
  toExt?: Converter;
  appArgs?: readonly unknown[];
  extArgs?: readonly unknown[];
}
