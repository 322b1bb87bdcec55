/**
 * Request Validation
 * Layer: Interfaces (HTTP)
 *
 * Parses part of a request against a Zod schema and returns the typed,
 * coerced result ("5" → 5, defaults filled in). On failure it throws a
 * ValidationError (400) listing every issue, which the global error handler
 * turns into the response.
 *
 *   const { page, size } = validate(listUsersQuerySchema, req.query);
 *
 * Express 5 exposes `req.query` as a getter, so the parsed value is returned
 * to the controller instead of being written back onto the request.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { z } from 'zod';

export function validate<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}
