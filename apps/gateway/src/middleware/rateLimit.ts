import type { NextFunction, Response } from 'express';
import { RateLimitedError, TokenBucketRateLimiter } from '@streamscribe/stream-engine';

import type { AuthenticatedRequest } from './auth.js';

export interface HttpRateLimitOptions {
  /** Requests per minute for clients without a limit of their own. */
  perMinute: number;
  now?: () => number;
}

// Per API key/IP rate limiter; a key's own `rate_limit` overrides the default
export function createRateLimiter(options: HttpRateLimitOptions) {
  const limiters = new Map<number, { limiter: TokenBucketRateLimiter; stop: () => void }>();

  const limiterFor = (perMinute: number) => {
    let entry = limiters.get(perMinute);
    if (!entry) {
      const limiter = new TokenBucketRateLimiter({
        capacity: perMinute,
        refillPerSecond: perMinute / 60,
        now: options.now,
      });
      entry = { limiter, stop: limiter.startPruning() };
      limiters.set(perMinute, entry);
    }
    return entry.limiter;
  };

  const middleware = (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const identifier = req.client?.clientKey ?? (req.ip || req.socket.remoteAddress || 'unknown');
    const limit = req.client?.rateLimit ?? options.perMinute;
    const limiter = limiterFor(limit);

    res.setHeader('X-RateLimit-Limit', String(limit));
    if (!limiter.allow(identifier)) {
      res.setHeader('X-RateLimit-Remaining', '0');
      next(new RateLimitedError(limiter.retryAfterMs(identifier)));
      return;
    }

    res.setHeader('X-RateLimit-Remaining', String(limiter.remaining(identifier)));
    next();
  };

  const stop = () => {
    for (const entry of limiters.values()) {
      entry.stop();
    }
    limiters.clear();
  };

  return Object.assign(middleware, { stop });
}
