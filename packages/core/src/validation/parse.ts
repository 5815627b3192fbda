import type { z } from 'zod';

export type ParseResult<T> = { success: true; data: T } | { success: false; error: string };

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate raw tool arguments against a request schema.
 * Never throws; a failure carries every issue joined into one line.
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): ParseResult<z.output<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatIssues(result.error) };
}
