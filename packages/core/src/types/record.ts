/**
 * Record types shared by every fieldbridge package
 */

/** A flat row of data, keyed by field name */
export type DataRecord = {
  [field: string]: unknown;
};
