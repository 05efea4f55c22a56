export { formatZodIssues, parseConfig } from './zod.js';
