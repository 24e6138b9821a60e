import { z } from 'zod';
import { ValidationError } from '@/errors';

/**
 * Parse input with a zod schema, throwing a ValidationError (400) carrying
 * the flattened issues when it doesn't match.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  message: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, result.error.flatten());
  }
  return result.data;
}
