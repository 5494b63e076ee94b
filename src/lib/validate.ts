import { z } from 'zod';

/**
 * Validates a request body against a Zod schema.
 * Returns the parsed data on success, or the issues on failure.
 */
export function validateBody<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown,
): { success: true; data: z.infer<T> } | { success: false; issues: z.ZodIssue[] } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return { success: false, issues: result.error.issues };
  }
  return { success: true, data: result.data };
}

/** Flattens zod issues into `path: message` strings for error responses. */
export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
