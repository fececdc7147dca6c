import { z } from 'zod';
import { ValidationError } from '../utils/errors';

/**
 * Parse untrusted input against a schema, raising ValidationError (400)
 * with the flattened issue list on failure.
 */
export const parseArgs = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> => {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw new ValidationError('Invalid request', result.error.flatten());
  }

  return result.data;
};
