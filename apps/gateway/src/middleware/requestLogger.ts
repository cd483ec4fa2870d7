import crypto from 'node:crypto';

import type { NextFunction, Response } from 'express';
import type { Logger } from '@streamscribe/stream-engine';

import type { AuthenticatedRequest } from './auth.js';

export function createRequestLogger(logger: Logger) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const start = Date.now();
    const incoming = req.headers['x-request-id'];
    const requestId = typeof incoming === 'string' && incoming ? incoming : crypto.randomUUID();
    req.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: Date.now() - start,
          ip: req.ip,
          requestId,
          client: req.client?.clientKey,
          userId: req.client?.userId,
        },
        'HTTP Request',
      );
    });

    next();
  };
}
