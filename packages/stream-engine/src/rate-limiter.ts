export interface RateLimiterOptions {
  capacity: number;
  refillPerSecond: number;
  /** Buckets untouched for this long are pruned. */
  idleTtlMs?: number;
  now?: () => number;
}

export interface RateBucket {
  key: string;
  tokens: number;
  lastRefill: number;
}

/**
 * Token bucket per client key. Every read-modify-write of a bucket happens
 * synchronously inside one call, so callers on the event loop never observe a
 * half-applied refill.
 */
export class TokenBucketRateLimiter {
  private readonly buckets = new Map<string, RateBucket>();
  private readonly now: () => number;
  private readonly idleTtlMs: number;

  constructor(private readonly options: RateLimiterOptions) {
    if (options.capacity <= 0 || options.refillPerSecond <= 0) {
      throw new Error('Rate limiter capacity and refill rate must be positive');
    }
    this.now = options.now ?? Date.now;
    this.idleTtlMs = options.idleTtlMs ?? 10 * 60 * 1000;
  }

  get size(): number {
    return this.buckets.size;
  }

  allow(key: string, cost = 1): boolean {
    const bucket = this.refill(key);
    if (bucket.tokens < cost) {
      return false;
    }
    bucket.tokens -= cost;
    return true;
  }

  remaining(key: string): number {
    return Math.floor(this.refill(key).tokens);
  }

  retryAfterMs(key: string, cost = 1): number {
    const bucket = this.refill(key);
    const missing = cost - bucket.tokens;
    if (missing <= 0) {
      return 0;
    }
    return Math.ceil((missing / this.options.refillPerSecond) * 1000);
  }

  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, bucket] of this.buckets.entries()) {
      const idle = now - bucket.lastRefill >= this.idleTtlMs;
      if (idle) {
        this.buckets.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  startPruning(intervalMs = 60_000): () => void {
    const timer = setInterval(() => this.prune(), intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  private refill(key: string): RateBucket {
    const now = this.now();
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { key, tokens: this.options.capacity, lastRefill: now };
      this.buckets.set(key, bucket);
      return bucket;
    }

    const elapsedMs = Math.max(0, now - bucket.lastRefill);
    bucket.tokens = Math.min(
      this.options.capacity,
      bucket.tokens + (elapsedMs / 1000) * this.options.refillPerSecond,
    );
    bucket.lastRefill = now;
    return bucket;
  }
}
