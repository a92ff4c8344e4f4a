/**
 * Zod error formatting
 */

import type { z } from 'zod';

/**
 * Format zod issues as "path: message" strings
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
}
