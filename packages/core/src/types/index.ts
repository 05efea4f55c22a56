export type { DataRecord } from './record.js';
