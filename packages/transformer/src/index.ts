/**
 * @fieldbridge/transformer
 *
 * Bidirectional field mapping between application and external records.
 */

export { Transformer } from './transformer.js';
export type { TransformerOptions } from './transformer.js';

// Directions and definition types
export * from './types/index.js';

// Record hooks
export { identityHooks, resolveHooks } from './hooks.js';
export type { RecordHook, DirectionHooks, HookConfig } from './hooks.js';

// Pre-built field declarations
export * from './definitions/index.js';

// Declarative field maps
export * from './config/index.js';
