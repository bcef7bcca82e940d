/**
 * Request ID Middleware
 *
 * Takes the caller's X-Request-ID (or X-Correlation-ID) or generates one,
 * and exposes it on the request, the response locals and the response
 * header so error responses and logs can be correlated.
 */

import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import type pino from 'pino';
import { createRequestLogger } from '../lib/logger';

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export function getRequestId(req: Request): string {
  return headerValue(req, 'x-request-id') || headerValue(req, 'x-correlation-id') || randomUUID();
}

export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = getRequestId(req);

  req.id = requestId;
  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);
  req.logger = createRequestLogger({ requestId, path: req.path, method: req.method });

  next();
}

// Extend Express types
declare global {
  namespace Express {
    interface Request {
      id?: string;
      logger?: pino.Logger;
    }
  }
}
