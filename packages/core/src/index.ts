/**
 * @fieldbridge/core
 *
 * Shared types, errors, logging and validation helpers for fieldbridge packages
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './logging/index.js';

// Validation helpers
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
