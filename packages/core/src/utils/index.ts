export { isRecord, prefixKeys, setField } from './records.js';
