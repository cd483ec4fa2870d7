import type {
  AttemptOutcome,
  AudioSegment,
  ProviderAttempt,
  ProviderHealth,
  TranscriptionFailureCode,
  TranscriptionResult,
} from '@streamscribe/shared-types';

import { AllProvidersExhaustedError, ProviderTimeoutError, toError } from './errors.js';
import { createComponentLogger, type Logger } from './logger.js';
import type { ProviderTranscript, TranscriptionProvider } from './providers/types.js';

export interface DispatcherOptions {
  /** Tried in order; the first is the primary. */
  providers: TranscriptionProvider[];
  timeoutMs?: number;
  /** Calls per provider when it fails with an error. Timeouts move on at once. */
  attemptsPerProvider?: number;
  maxInFlightPerSession?: number;
  attemptLogSize?: number;
  healthWindow?: number;
  logger?: Logger;
  onAttempt?: (attempt: ProviderAttempt) => void;
  now?: () => number;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

interface SessionSlots {
  active: number;
  waiters: Array<() => void>;
  controllers: Set<AbortController>;
}

type AttemptResult =
  | { kind: 'success'; transcript: ProviderTranscript; attemptId: string }
  | { kind: 'timeout' }
  | { kind: 'error' }
  | { kind: 'cancelled' };

type Settled =
  | { kind: 'success'; transcript: ProviderTranscript }
  | { kind: 'error'; error: unknown };

export function segmentKey(segment: Pick<AudioSegment, 'sessionId' | 'sequence'>): string {
  return `${segment.sessionId}:${segment.sequence}`;
}

/**
 * Sends segments to transcription providers with retry and fallback.
 *
 * A session never has more than `maxInFlightPerSession` segments at a
 * provider; further segments wait for a slot. Sessions do not share slots.
 */
export class ProviderDispatcher {
  private readonly providers: TranscriptionProvider[];
  private readonly timeoutMs: number;
  private readonly attemptsPerProvider: number;
  private readonly maxInFlight: number;
  private readonly attemptLogSize: number;
  private readonly healthWindow: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  private readonly inflight = new Map<string, Promise<TranscriptionResult>>();
  private readonly slots = new Map<string, SessionSlots>();
  private readonly attemptLog: ProviderAttempt[] = [];
  private readonly outcomes = new Map<string, AttemptOutcome[]>();
  private attemptCounter = 0;

  constructor(private readonly options: DispatcherOptions) {
    if (options.providers.length === 0) {
      throw new Error('At least one transcription provider is required');
    }
    this.providers = options.providers;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.attemptsPerProvider = Math.max(1, options.attemptsPerProvider ?? 2);
    this.maxInFlight = Math.max(1, options.maxInFlightPerSession ?? 2);
    this.attemptLogSize = options.attemptLogSize ?? 500;
    this.healthWindow = options.healthWindow ?? 50;
    this.logger = createComponentLogger('dispatcher', options.logger);
    this.now = options.now ?? Date.now;
  }

  get providerNames(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  /**
   * Resolves with exactly one final result for the segment. Provider failures
   * never reject; they end in a result carrying a `failure` marker.
   */
  dispatch(segment: AudioSegment, options: DispatchOptions = {}): Promise<TranscriptionResult> {
    const key = segmentKey(segment);
    const existing = this.inflight.get(key);
    if (existing) {
      this.logger.debug({ segmentKey: key }, 'Joining in-flight dispatch for segment');
      return existing;
    }

    const promise = this.run(segment, key, options.signal).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, promise);
    return promise;
  }

  /** Aborts running attempts and queued segments of a session. */
  cancelSession(sessionId: string): number {
    const slots = this.slots.get(sessionId);
    if (!slots) {
      return 0;
    }
    const controllers = Array.from(slots.controllers);
    for (const controller of controllers) {
      controller.abort();
    }
    if (controllers.length > 0) {
      this.logger.info({ sessionId, cancelled: controllers.length }, 'Cancelled in-flight dispatches');
    }
    return controllers.length;
  }

  inFlightCount(sessionId: string): number {
    return this.slots.get(sessionId)?.active ?? 0;
  }

  queuedCount(sessionId: string): number {
    return this.slots.get(sessionId)?.waiters.length ?? 0;
  }

  recentAttempts(segment?: Pick<AudioSegment, 'sessionId' | 'sequence'>): ProviderAttempt[] {
    if (!segment) {
      return [...this.attemptLog];
    }
    const key = segmentKey(segment);
    return this.attemptLog.filter((attempt) => attempt.segmentKey === key);
  }

  providerHealth(): ProviderHealth[] {
    return this.providers.map((provider) => {
      const recent = this.outcomes.get(provider.name) ?? [];
      const failures = recent.filter((outcome) => outcome !== 'success').length;
      return {
        name: provider.name,
        attempts: recent.length,
        errorRate: recent.length === 0 ? 0 : failures / recent.length,
      };
    });
  }

  private async run(segment: AudioSegment, key: string, signal?: AbortSignal): Promise<TranscriptionResult> {
    const startedAt = this.now();
    const slots = this.slotsFor(segment.sessionId);
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener('abort', forwardAbort, { once: true });
    slots.controllers.add(controller);

    try {
      const acquired = await this.acquire(slots, controller.signal);
      if (!acquired) {
        return this.failureResult(segment, key, startedAt, 'CANCELLED', 'Dispatch cancelled before start');
      }

      try {
        return await this.attemptProviders(segment, key, controller.signal, startedAt);
      } finally {
        this.release(slots);
      }
    } finally {
      slots.controllers.delete(controller);
      signal?.removeEventListener('abort', forwardAbort);
      this.dropIdleSlots(segment.sessionId, slots);
    }
  }

  private async attemptProviders(
    segment: AudioSegment,
    key: string,
    signal: AbortSignal,
    startedAt: number,
  ): Promise<TranscriptionResult> {
    let attemptNumber = 0;

    for (const provider of this.providers) {
      for (let call = 1; call <= this.attemptsPerProvider; call += 1) {
        if (signal.aborted) {
          return this.failureResult(segment, key, startedAt, 'CANCELLED', 'Dispatch cancelled');
        }

        attemptNumber += 1;
        const outcome = await this.attempt(provider, segment, key, attemptNumber, signal);

        if (outcome.kind === 'success') {
          return {
            sessionId: segment.sessionId,
            sequence: segment.sequence,
            text: outcome.transcript.text,
            confidence: outcome.transcript.confidence,
            isFinal: true,
            provider: provider.name,
            latencyMs: this.now() - startedAt,
            attemptId: outcome.attemptId,
          };
        }
        if (outcome.kind === 'cancelled') {
          return this.failureResult(segment, key, startedAt, 'CANCELLED', 'Dispatch cancelled');
        }
        if (outcome.kind === 'timeout') {
          break;
        }
      }
    }

    const exhausted = new AllProvidersExhaustedError(key, attemptNumber);
    this.logger.warn({ segmentKey: key, attempts: attemptNumber }, exhausted.message);
    return this.failureResult(segment, key, startedAt, 'ALL_PROVIDERS_EXHAUSTED', exhausted.message);
  }

  private async attempt(
    provider: TranscriptionProvider,
    segment: AudioSegment,
    key: string,
    attemptNumber: number,
    parentSignal: AbortSignal,
  ): Promise<AttemptResult> {
    this.attemptCounter += 1;
    const attemptId = `${key}:${attemptNumber}:${this.attemptCounter.toString(36)}`;
    const controller = new AbortController();
    const startedAt = this.now();
    let timer: NodeJS.Timeout | undefined;
    let markCancelled: () => void = () => undefined;

    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.timeoutMs);
    });
    const cancelled = new Promise<'cancelled'>((resolve) => {
      markCancelled = () => resolve('cancelled');
    });
    const onParentAbort = () => {
      controller.abort();
      markCancelled();
    };
    parentSignal.addEventListener('abort', onParentAbort, { once: true });

    const settled: Promise<Settled> = Promise.resolve()
      .then(() =>
        provider.transcribe({
          audio: segment.payload,
          format: segment.format,
          sampleRate: segment.sampleRate,
          channels: segment.channels,
          signal: controller.signal,
        }),
      )
      .then(
        (transcript): Settled => ({ kind: 'success', transcript }),
        (error: unknown): Settled => ({ kind: 'error', error }),
      );

    try {
      const winner = await Promise.race([settled, timedOut, cancelled]);

      if (winner === 'cancelled') {
        this.discardLateAnswer(settled, provider.name, attemptId);
        return { kind: 'cancelled' };
      }

      if (winner === 'timeout') {
        controller.abort();
        this.discardLateAnswer(settled, provider.name, attemptId);
        const timeout = new ProviderTimeoutError(provider.name, this.timeoutMs);
        this.record({
          attemptId,
          segmentKey: key,
          provider: provider.name,
          attempt: attemptNumber,
          outcome: 'timeout',
          latencyMs: this.now() - startedAt,
          error: timeout.message,
        });
        return { kind: 'timeout' };
      }

      if (winner.kind === 'success') {
        this.record({
          attemptId,
          segmentKey: key,
          provider: provider.name,
          attempt: attemptNumber,
          outcome: 'success',
          latencyMs: this.now() - startedAt,
        });
        return { kind: 'success', transcript: winner.transcript, attemptId };
      }

      const error = toError(winner.error);
      this.record({
        attemptId,
        segmentKey: key,
        provider: provider.name,
        attempt: attemptNumber,
        outcome: 'error',
        latencyMs: this.now() - startedAt,
        error: error.message,
      });
      this.logger.warn({ err: error, attemptId, provider: provider.name }, 'Provider attempt failed');
      return { kind: 'error' };
    } finally {
      clearTimeout(timer);
      parentSignal.removeEventListener('abort', onParentAbort);
    }
  }

  private discardLateAnswer(settled: Promise<Settled>, provider: string, attemptId: string): void {
    void settled.then((late) => {
      if (late.kind === 'success') {
        this.logger.debug({ attemptId, provider }, 'Discarding answer of superseded attempt');
      }
    });
  }

  private record(attempt: ProviderAttempt): void {
    this.attemptLog.push(attempt);
    while (this.attemptLog.length > this.attemptLogSize) {
      this.attemptLog.shift();
    }

    let recent = this.outcomes.get(attempt.provider);
    if (!recent) {
      recent = [];
      this.outcomes.set(attempt.provider, recent);
    }
    recent.push(attempt.outcome);
    while (recent.length > this.healthWindow) {
      recent.shift();
    }

    this.options.onAttempt?.(attempt);
  }

  private failureResult(
    segment: AudioSegment,
    key: string,
    startedAt: number,
    code: TranscriptionFailureCode,
    message: string,
  ): TranscriptionResult {
    return {
      sessionId: segment.sessionId,
      sequence: segment.sequence,
      text: '',
      confidence: 0,
      isFinal: true,
      provider: 'none',
      latencyMs: this.now() - startedAt,
      attemptId: `${key}:${code.toLowerCase()}`,
      failure: { code, message },
    };
  }

  private slotsFor(sessionId: string): SessionSlots {
    let slots = this.slots.get(sessionId);
    if (!slots) {
      slots = { active: 0, waiters: [], controllers: new Set() };
      this.slots.set(sessionId, slots);
    }
    return slots;
  }

  private acquire(slots: SessionSlots, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) {
      return Promise.resolve(false);
    }
    if (slots.active < this.maxInFlight) {
      slots.active += 1;
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        const index = slots.waiters.indexOf(grant);
        if (index >= 0) {
          slots.waiters.splice(index, 1);
        }
        resolve(false);
      };
      function grant() {
        signal.removeEventListener('abort', onAbort);
        resolve(true);
      }
      slots.waiters.push(grant);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private release(slots: SessionSlots): void {
    const next = slots.waiters.shift();
    if (next) {
      // The slot passes straight to the next waiter.
      next();
      return;
    }
    slots.active = Math.max(0, slots.active - 1);
  }

  private dropIdleSlots(sessionId: string, slots: SessionSlots): void {
    if (slots.active === 0 && slots.waiters.length === 0 && slots.controllers.size === 0) {
      if (this.slots.get(sessionId) === slots) {
        this.slots.delete(sessionId);
      }
    }
  }
}
