export {
  FIELD_TYPES,
  fieldEntrySchema,
  fieldMapConfigSchema,
  parseFieldMapConfig,
  declarationsFromConfig,
  createTransformerFromConfig,
} from './field-map-config.js';
export type { FieldType, FieldEntry, FieldMapConfig } from './field-map-config.js';
