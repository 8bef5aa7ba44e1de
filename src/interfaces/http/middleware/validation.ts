/**
 * Request Validation Middleware Factory
 * Layer: Interfaces (HTTP)
 *
 * `validate(schema, source)` returns a middleware that checks one part of the
 * request against a Zod schema before the controller sees it:
 *
 *   router.post('/templates/compile', validate(compileTemplateSchema, 'body'), controller.compile);
 *
 * On success `req[source]` is replaced with the parsed data. On failure a
 * ValidationError (400) listing every issue is thrown for the global error
 * handler; the controller is never reached.
 *
 * `query` is not a valid source: Express 5 exposes req.query as a getter and
 * it cannot be reassigned.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod';

export function validate<T extends z.ZodType>(schema: T, source: 'body' | 'params') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[source]);

    if (!result.success) {
      const messages = result.error.issues.map((issue) => issue.message).join('; ');
      throw new ValidationError(messages);
    }

    (req as unknown as Record<string, unknown>)[source] = result.data;
    next();
  };
}
