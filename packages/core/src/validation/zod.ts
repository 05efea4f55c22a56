import type { z } from 'zod';
import { TransformerError } from '../errors/index.js';

/**
 * Render zod issues as a bullet list, one `- path: message` line per issue
 */
export function formatZodIssues(err: z.ZodError, heading: string): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${heading}:\n${issues}`;
}

/**
 * Parse `input` with `schema`, raising CONFIGURATION_ERROR on failure
 */
export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  heading: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new TransformerError({
      code: 'CONFIGURATION_ERROR',
      message: formatZodIssues(result.error, heading),
      cause: result.error,
    });
  }
  return result.data;
}
