import type { z } from 'zod';
import { MalformedResponseError } from './errors';

/**
 * Validate a vendor payload, reporting failures as MalformedResponseError.
 */
export function parsePayload<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  url: string
): z.output<T> {
  const result = schema.safeParse(value);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw MalformedResponseError.invalidPayload(url, details);
  }

  return result.data;
}
