import { randomUUID } from 'node:crypto';

import { SegmentAssembler } from '@streamscribe/audio-utils';
import type {
  AudioDescriptor,
  AudioSegment,
  OutboundMessage,
  SessionState,
  TranscriptionResult,
} from '@streamscribe/shared-types';

import type { ResultBroadcaster } from './broadcaster.js';
import { ResultChannel } from './channel.js';
import type { ProviderDispatcher } from './dispatcher.js';
import { CapacityExceededError, UnknownSessionError, toError } from './errors.js';
import { createComponentLogger, type Logger } from './logger.js';
import type { QueueBridge } from './queue/bridge.js';
import type { TokenBucketRateLimiter } from './rate-limiter.js';

export interface SessionLimits {
  maxSessions: number;
  maxSessionsPerClient: number;
  drainGraceMs: number;
  idleTimeoutMs: number;
  windowMs: number;
  maxBufferBytes: number;
  channelCapacity: number;
  /** How long a queued segment waits for a worker's result before it is dispatched in process. */
  queueResultTimeoutMs: number;
}

export const DEFAULT_SESSION_LIMITS: SessionLimits = {
  maxSessions: 500,
  maxSessionsPerClient: 3,
  drainGraceMs: 5000,
  idleTimeoutMs: 60_000,
  windowMs: 250,
  maxBufferBytes: 64 * 1024,
  channelCapacity: 256,
  queueResultTimeoutMs: 30_000,
};

export const DEFAULT_AUDIO: AudioDescriptor = {
  format: 's16le',
  sampleRate: 16000,
  channels: 1,
};

export interface SessionManagerOptions {
  dispatcher: ProviderDispatcher;
  broadcaster: ResultBroadcaster;
  bridge?: QueueBridge;
  rateLimiter?: TokenBucketRateLimiter;
  limits?: Partial<SessionLimits>;
  logger?: Logger;
  now?: () => number;
  generateId?: () => string;
}

export interface OpenSessionRequest {
  clientKey: string;
  audio?: Partial<AudioDescriptor>;
}

export interface OpenedSession {
  sessionId: string;
  channel: ResultChannel<OutboundMessage>;
}

export interface SessionSnapshot {
  sessionId: string;
  clientKey: string;
  state: SessionState;
  audio: AudioDescriptor;
  createdAt: number;
  lastActivityAt: number;
  nextSequence: number;
  pendingSegments: number;
}

interface SessionRecord {
  id: string;
  clientKey: string;
  audio: AudioDescriptor;
  state: SessionState;
  createdAt: number;
  lastActivityAt: number;
  counter: { next: number };
  assembler: SegmentAssembler;
  pending: Set<number>;
  queueDeadlines: Map<number, NodeJS.Timeout>;
  onDrained?: () => void;
  closing?: Promise<void>;
}

/**
 * Owns every live session: its sequence counter, assembler and pending
 * segments. Ingestion routes segments and returns at once; results come back
 * through `complete` and go out through the broadcaster.
 */
export class SessionManager {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly perClient = new Map<string, number>();
  private readonly limits: SessionLimits;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly generateId: () => string;
  private sweepTimer?: NodeJS.Timeout;
  private readonly detachBridge?: () => void;

  constructor(private readonly options: SessionManagerOptions) {
    this.limits = { ...DEFAULT_SESSION_LIMITS, ...options.limits };
    this.logger = createComponentLogger('session-manager', options.logger);
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
    this.detachBridge = options.bridge?.onResult((result) => this.complete(result));
  }

  openSession(request: OpenSessionRequest): OpenedSession {
    const { clientKey } = request;

    if (this.sessions.size >= this.limits.maxSessions) {
      throw new CapacityExceededError('process', { limit: this.limits.maxSessions });
    }
    const clientSessions = this.perClient.get(clientKey) ?? 0;
    if (clientSessions >= this.limits.maxSessionsPerClient) {
      throw new CapacityExceededError('client', { limit: this.limits.maxSessionsPerClient });
    }
    const limiter = this.options.rateLimiter;
    if (limiter && !limiter.allow(clientKey)) {
      throw new CapacityExceededError('rate', { retryAfterMs: limiter.retryAfterMs(clientKey) });
    }

    const sessionId = this.generateId();
    const audio: AudioDescriptor = { ...DEFAULT_AUDIO, ...request.audio };
    const counter = { next: 0 };
    const assembler = new SegmentAssembler({
      ...audio,
      sessionId,
      windowMs: this.limits.windowMs,
      maxBufferBytes: this.limits.maxBufferBytes,
      nextSequence: () => counter.next++,
      now: this.now,
    });
    const channel = new ResultChannel<OutboundMessage>({
      capacity: this.limits.channelCapacity,
      isDroppable: (message) => message.type === 'transcription' && !message.isFinal,
    });

    const createdAt = this.now();
    this.options.broadcaster.register(sessionId, channel);
    this.sessions.set(sessionId, {
      id: sessionId,
      clientKey,
      audio,
      state: 'active',
      createdAt,
      lastActivityAt: createdAt,
      counter,
      assembler,
      pending: new Set(),
      queueDeadlines: new Map(),
    });
    this.perClient.set(clientKey, clientSessions + 1);

    this.logger.info({ sessionId, clientKey, ...audio }, 'Session opened');
    return { sessionId, channel };
  }

  /** Feeds bytes to the session's assembler. Returns the number of segments emitted. */
  ingest(sessionId: string, bytes: Uint8Array): number {
    const session = this.sessions.get(sessionId);
    if (!session || session.state !== 'active') {
      throw new UnknownSessionError(sessionId, session?.state);
    }

    session.lastActivityAt = this.now();
    const segments = session.assembler.feed(bytes);
    for (const segment of segments) {
      this.route(session, segment);
    }
    return segments.length;
  }

  closeSession(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return Promise.resolve();
    }
    if (!session.closing) {
      session.closing = this.drainAndClose(session);
    }
    return session.closing;
  }

  getSession(sessionId: string): SessionSnapshot | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return undefined;
    }
    return {
      sessionId: session.id,
      clientKey: session.clientKey,
      state: session.state,
      audio: { ...session.audio },
      createdAt: session.createdAt,
      lastActivityAt: session.lastActivityAt,
      nextSequence: session.counter.next,
      pendingSegments: session.pending.size,
    };
  }

  activeSessionCount(): number {
    return this.sessions.size;
  }

  sessionCountFor(clientKey: string): number {
    return this.perClient.get(clientKey) ?? 0;
  }

  /** Accepts a result from the dispatcher or the queue. Results of unknown or closed sessions are discarded. */
  complete(result: TranscriptionResult): void {
    const session = this.sessions.get(result.sessionId);
    if (!session || session.state === 'closed') {
      this.logger.debug(
        { sessionId: result.sessionId, sequence: result.sequence },
        'Discarding result for closed session',
      );
      return;
    }

    this.options.broadcaster.deliver(result);
    if (!result.isFinal) {
      return;
    }
    session.pending.delete(result.sequence);
    this.clearQueueDeadline(session, result.sequence);
    session.lastActivityAt = this.now();
    if (session.pending.size === 0) {
      session.onDrained?.();
    }
  }

  start(sweepIntervalMs = Math.max(1000, Math.floor(this.limits.idleTimeoutMs / 4))): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      this.sweepIdle();
    }, sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  /** Closes sessions with no audio and no pending results for `idleTimeoutMs`. */
  sweepIdle(): number {
    const now = this.now();
    let closed = 0;
    for (const session of this.sessions.values()) {
      const idle = now - session.lastActivityAt >= this.limits.idleTimeoutMs;
      if (session.state === 'active' && session.pending.size === 0 && idle) {
        this.logger.info({ sessionId: session.id }, 'Closing idle session');
        this.closeSession(session.id).catch((error: unknown) => {
          this.logger.error({ err: toError(error), sessionId: session.id }, 'Failed to close idle session');
        });
        closed += 1;
      }
    }
    return closed;
  }

  async shutdown(): Promise<void> {
    this.stop();
    await Promise.all(Array.from(this.sessions.keys()).map((sessionId) => this.closeSession(sessionId)));
    this.detachBridge?.();
  }

  private route(session: SessionRecord, segment: AudioSegment): void {
    session.pending.add(segment.sequence);
    this.forward(session, segment).catch((error: unknown) => {
      this.logger.error(
        { err: toError(error), sessionId: segment.sessionId, sequence: segment.sequence },
        'Failed to route segment',
      );
    });
  }

  private async forward(session: SessionRecord, segment: AudioSegment): Promise<void> {
    const bridge = this.options.bridge;
    if (bridge && bridge.state() === 'connected') {
      try {
        await bridge.publish(segment);
        this.armQueueDeadline(session, segment);
        return;
      } catch (error) {
        this.logger.debug(
          { err: toError(error), sessionId: segment.sessionId, sequence: segment.sequence },
          'Queue publish failed, dispatching directly',
        );
      }
    }

    await this.dispatchDirectly(segment);
  }

  private async dispatchDirectly(segment: AudioSegment): Promise<void> {
    const result = await this.options.dispatcher.dispatch(segment);
    this.complete(result);
  }

  /**
   * A queued segment with no result by the deadline is dispatched in process.
   * Whichever final arrives second is dropped by the broadcaster as a duplicate.
   */
  private armQueueDeadline(session: SessionRecord, segment: AudioSegment): void {
    if (!session.pending.has(segment.sequence)) {
      return;
    }
    const timer = setTimeout(() => {
      session.queueDeadlines.delete(segment.sequence);
      if (session.state === 'closed' || !session.pending.has(segment.sequence)) {
        return;
      }
      this.logger.warn(
        { sessionId: segment.sessionId, sequence: segment.sequence, timeoutMs: this.limits.queueResultTimeoutMs },
        'No queued result before the deadline, dispatching directly',
      );
      this.dispatchDirectly(segment).catch((error: unknown) => {
        this.logger.error(
          { err: toError(error), sessionId: segment.sessionId, sequence: segment.sequence },
          'Failed to dispatch overdue segment',
        );
      });
    }, this.limits.queueResultTimeoutMs);
    timer.unref();
    session.queueDeadlines.set(segment.sequence, timer);
  }

  private clearQueueDeadline(session: SessionRecord, sequence: number): void {
    const timer = session.queueDeadlines.get(sequence);
    if (timer) {
      clearTimeout(timer);
      session.queueDeadlines.delete(sequence);
    }
  }

  private async drainAndClose(session: SessionRecord): Promise<void> {
    session.state = 'draining';
    const tail = session.assembler.flush();
    if (tail) {
      this.route(session, tail);
    }

    await this.waitForPending(session);
    if (session.pending.size > 0) {
      const cancelled = this.options.dispatcher.cancelSession(session.id);
      this.logger.warn(
        { sessionId: session.id, pending: session.pending.size, cancelled },
        'Drain grace elapsed with segments outstanding',
      );
    }

    session.state = 'closed';
    for (const timer of session.queueDeadlines.values()) {
      clearTimeout(timer);
    }
    session.queueDeadlines.clear();
    this.sessions.delete(session.id);
    const remaining = (this.perClient.get(session.clientKey) ?? 1) - 1;
    if (remaining > 0) {
      this.perClient.set(session.clientKey, remaining);
    } else {
      this.perClient.delete(session.clientKey);
    }
    this.options.broadcaster.unregister(session.id);

    this.logger.info(
      { sessionId: session.id, segments: session.counter.next, durationMs: this.now() - session.createdAt },
      'Session closed',
    );
  }

  private waitForPending(session: SessionRecord): Promise<void> {
    if (session.pending.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const finish = () => {
        clearTimeout(timer);
        session.onDrained = undefined;
        resolve();
      };
      const timer = setTimeout(finish, this.limits.drainGraceMs);
      session.onDrained = finish;
    });
  }
}
