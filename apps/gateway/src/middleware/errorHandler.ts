import type { NextFunction, Response } from 'express';
import { ZodError } from 'zod';
import { RateLimitedError, StreamError, toError, type Logger } from '@streamscribe/stream-engine';

import type { AuthenticatedRequest } from './auth.js';

interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId?: string;
  };
}

interface ResolvedError {
  statusCode: number;
  code: string;
  message: string;
  details?: unknown;
}

function resolveError(error: unknown): ResolvedError {
  if (error instanceof StreamError) {
    return { statusCode: error.statusCode, code: error.code, message: error.message, details: error.details };
  }
  if (error instanceof ZodError) {
    return { statusCode: 400, code: 'INVALID_PAYLOAD', message: 'Invalid payload', details: error.flatten() };
  }
  return { statusCode: 500, code: 'INTERNAL', message: toError(error).message };
}

export function createErrorHandler(logger: Logger) {
  return (err: unknown, req: AuthenticatedRequest, res: Response, _next: NextFunction) => {
    const resolved = resolveError(err);
    const requestId = req.requestId;

    const bindings = { err: toError(err), path: req.path, method: req.method, ip: req.ip, requestId };
    if (resolved.statusCode >= 500) {
      logger.error(bindings, 'Request error');
    } else {
      logger.warn(bindings, 'Request rejected');
    }

    if (err instanceof RateLimitedError) {
      res.setHeader('Retry-After', String(Math.ceil(err.retryAfterMs / 1000)));
    }

    const message =
      resolved.statusCode === 500 && process.env.NODE_ENV === 'production' ? 'Internal server error' : resolved.message;

    const payload: ErrorEnvelope = {
      error: {
        code: resolved.code,
        message,
      },
    };
    if (typeof resolved.details !== 'undefined') {
      payload.error.details = resolved.details;
    }
    if (requestId) {
      payload.error.requestId = requestId;
    }
    res.status(resolved.statusCode).json(payload);
  };
}

