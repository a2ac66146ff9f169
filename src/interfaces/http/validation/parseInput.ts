/**
 * Request Validation
 * Layer: Interfaces (HTTP)
 *
 * Controllers run the raw query through a Zod schema before touching it.
 * On success they get the parsed data, with coercions applied ("0.3" → 0.3,
 * "a,b" → ['a', 'b']) and fully typed. On failure a ValidationError (400)
 * carries every issue message; the global error handler turns it into the
 * response, so the service is never reached.
 *
 * Express 5 exposes `req.query` as a read-only getter, so the parsed value is
 * returned to the controller instead of being written back onto the request.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { z } from 'zod/v4';

export function parseInput<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}
