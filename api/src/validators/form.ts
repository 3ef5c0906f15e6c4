/**
 * HTML form parsing
 *
 * Forms are re-rendered with per-field messages when validation fails, so
 * the result carries the submitted values instead of throwing.
 */

import type { Context } from 'hono';
import type { z } from 'zod';

export type FieldErrors = Record<string, string>;
export type FormValues = Record<string, string>;

export type FormResult<T> =
  | { success: true; data: T }
  | { success: false; errors: FieldErrors; values: FormValues };

export async function parseForm<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<FormResult<z.output<T>>> {
  const body = await c.req.parseBody();

  const values: FormValues = {};
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      values[key] = value;
    }
  }

  const result = schema.safeParse(values);
  if (result.success) {
    return { success: true, data: result.data };
  }

  // First message per field
  const errors: FieldErrors = {};
  for (const issue of result.error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : 'form';
    errors[field] ??= issue.message;
  }
  return { success: false, errors, values };
}
