/**
 * Request Validation
 *
 * zod-based parsing of request bodies, route params and query strings.
 * A failed parse throws a 400 ApiError listing every issue; the central
 * error handler renders it.
 */

import type { Request } from 'express';
import type { z, ZodTypeAny } from 'zod';
import { errors } from './errorHandler';

function parseOrThrow<T extends ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw errors.badRequest(`${what} validation failed`, {
      errors: result.error.errors.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

export function parseBody<T extends ZodTypeAny>(schema: T, req: Request): z.output<T> {
  return parseOrThrow(schema, req.body ?? {}, 'Request body');
}

export function parseQuery<T extends ZodTypeAny>(schema: T, req: Request): z.output<T> {
  return parseOrThrow(schema, req.query, 'Query parameter');
}

export function parseParams<T extends ZodTypeAny>(schema: T, req: Request): z.output<T> {
  return parseOrThrow(schema, req.params, 'Parameter');
}
