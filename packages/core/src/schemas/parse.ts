/**
 * Record parsing
 *
 * Every persisted artifact passes through parseRecord so a corrupt or
 * foreign file surfaces as a SchemaValidationError naming its kind.
 *
 * @module @phasegate/core/schemas/parse
 */

import type { z } from 'zod';
import { SchemaValidationError } from '../reliability/errors.js';

/**
 * Format zod issues as "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate data against a record schema, throwing SchemaValidationError
 */
export function parseRecord<S extends z.ZodTypeAny>(
  schema: S,
  kind: string,
  data: unknown,
  path?: string
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new SchemaValidationError(kind, formatIssues(result.error), { path });
  }
  return result.data;
}
