export type StreamErrorCode =
  | 'CAPACITY_EXCEEDED'
  | 'UNKNOWN_SESSION'
  | 'PROVIDER_TIMEOUT'
  | 'PROVIDER_ERROR'
  | 'ALL_PROVIDERS_EXHAUSTED'
  | 'QUEUE_UNAVAILABLE'
  | 'REORDER_TIMEOUT'
  | 'UNAUTHORIZED'
  | 'RATE_LIMITED';

/**
 * Base class for every failure the engine reports. `statusCode` is what the
 * gateway answers with when the error reaches an HTTP boundary.
 */
export class StreamError extends Error {
  constructor(
    message: string,
    readonly code: StreamErrorCode,
    readonly statusCode = 500,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class CapacityExceededError extends StreamError {
  constructor(reason: 'process' | 'client' | 'rate', details?: Record<string, unknown>) {
    super(`Session capacity exceeded (${reason} limit)`, 'CAPACITY_EXCEEDED', 503, { reason, ...details });
  }
}

export class UnknownSessionError extends StreamError {
  constructor(sessionId: string, state?: string) {
    super(
      state ? `Session ${sessionId} is ${state}` : `Session ${sessionId} not found`,
      'UNKNOWN_SESSION',
      404,
      { sessionId, ...(state ? { state } : {}) },
    );
  }
}

export class ProviderTimeoutError extends StreamError {
  constructor(provider: string, timeoutMs: number) {
    super(`Provider ${provider} timed out after ${timeoutMs}ms`, 'PROVIDER_TIMEOUT', 504, { provider, timeoutMs });
  }
}

export class ProviderError extends StreamError {
  constructor(provider: string, message: string, readonly original?: unknown) {
    super(`Provider ${provider} failed: ${message}`, 'PROVIDER_ERROR', 502, { provider });
  }
}

export class AllProvidersExhaustedError extends StreamError {
  constructor(segmentKey: string, attempts: number) {
    super(`All providers exhausted for ${segmentKey} after ${attempts} attempts`, 'ALL_PROVIDERS_EXHAUSTED', 502, {
      segmentKey,
      attempts,
    });
  }
}

export class QueueUnavailableError extends StreamError {
  constructor(message: string, readonly original?: unknown) {
    super(message, 'QUEUE_UNAVAILABLE', 503);
  }
}

export class ReorderTimeoutError extends StreamError {
  constructor(sessionId: string, expected: number, buffered: number[]) {
    super(`Gap at sequence ${expected} for session ${sessionId} was not filled in time`, 'REORDER_TIMEOUT', 500, {
      sessionId,
      expected,
      buffered,
    });
  }
}

export class UnauthorizedError extends StreamError {
  constructor(message = 'Unauthorized') {
    super(message, 'UNAUTHORIZED', 401);
  }
}

export class RateLimitedError extends StreamError {
  constructor(readonly retryAfterMs: number) {
    super('Too many requests', 'RATE_LIMITED', 429, { retryAfterMs });
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
