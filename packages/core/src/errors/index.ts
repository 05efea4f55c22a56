export { TransformerError } from './transformer-error.js';
export type { TransformerErrorCode, TransformerErrorDetails } from './transformer-error.js';
