export { dateField, formatDateTime, parseDateTime, toAppDate, toExtDate } from './date.js';
export type { DateFieldOptions } from './date.js';
export { jsonField, decodeJson, encodeJson } from './json.js';
export {
  maskField,
  encodeMask,
  decodeMask,
  validateMask,
  flagMaskSchema,
  MAX_MASK_BIT,
} from './mask.js';
export type { FlagMask } from './mask.js';
export { castField, castValue, caster, SCALAR_TYPES } from './cast.js';
export type { ScalarType } from './cast.js';
