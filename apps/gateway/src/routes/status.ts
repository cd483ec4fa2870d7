import { Router, type RequestHandler } from 'express';
import type { StreamEngine } from '@streamscribe/stream-engine';

export interface StatusRoutesOptions {
  engine: StreamEngine;
  /** Run before `/v1/status`, e.g. authentication and rate limiting. */
  guards: RequestHandler[];
  version: string;
}

export function createStatusRouter({ engine, guards, version }: StatusRoutesOptions): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version,
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/v1/status', ...guards, (_req, res) => {
    res.json(engine.health());
  });

  return router;
}
