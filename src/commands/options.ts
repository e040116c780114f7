/**
 * Validation of loosely-typed command options (CLI flags, MCP tool arguments).
 */

import type { z } from 'zod';
import { ValidationError } from '../errors.js';

/**
 * Parse `raw` with `schema`. The first issue becomes a ValidationError
 * carrying the field path and the caller's value for that field.
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue?.path.join('.') || 'options';
  throw new ValidationError(
    field,
    fieldValue(raw, field),
    `Invalid ${field}: ${issue?.message ?? 'invalid'}`
  );
}

/** The caller's value for a top-level option, or the whole input for `options`. */
function fieldValue(raw: unknown, field: string): unknown {
  if (field === 'options' || typeof raw !== 'object' || raw === null) {
    return raw;
  }
  return Object.entries(raw).find(([key]) => key === field)?.[1];
}
