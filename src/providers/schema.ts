import type { z } from 'zod';
import { MalformedResponseError } from '../errors.js';

/**
 * Validate a provider response body, reporting every missing or mistyped
 * field as a MalformedResponseError.
 */
export function parseResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  provider: string
): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedResponseError(provider, detail, { cause: result.error });
  }
  return result.data;
}
