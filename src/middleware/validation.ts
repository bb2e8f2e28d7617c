/**
 * Validation helpers
 *
 * Zod schemas for route and query parameters, and formatting of Zod issues
 * into the `{ field, message }` details used in error responses.
 */

import { z } from 'zod';
import type { ValidationErrorDetail } from '../utils/errors.js';

/**
 * Format Zod validation errors for API response
 *
 * @returns Array of field-level error details
 */
export function formatValidationErrors(error: z.ZodError): ValidationErrorDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Positive integer id given as a string (path or query parameter)
 */
export const idSchema = z.string()
  .regex(/^\d+$/, 'ID must be a positive integer')
  .transform((val) => parseInt(val, 10))
  .refine((val) => val > 0 && Number.isSafeInteger(val), 'ID must be a positive integer');

export const idParamsSchema = z.object({ id: idSchema });

/**
 * Product search query: `q` is required and must not be blank
 */
export const productSearchQuerySchema = z.object({
  q: z.string({ required_error: 'Please enter a product name to search.' })
    .trim()
    .min(1, 'Please enter a product name to search.'),
});

/**
 * Read an optional id from a query parameter
 *
 * Missing or malformed values yield `undefined` so pages can fall back to
 * their default selection.
 */
export function parseOptionalId(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const result = idSchema.safeParse(value);
  return result.success ? result.data : undefined;
}
