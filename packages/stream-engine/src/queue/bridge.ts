import { randomUUID } from 'node:crypto';

import {
  AUDIO_SEGMENTS_TOPIC,
  TRANSCRIPTION_RESULTS_TOPIC,
  type AudioSegment,
  type QueueState,
  type TranscriptionResult,
} from '@streamscribe/shared-types';

import { QueueUnavailableError, toError } from '../errors.js';
import { createComponentLogger, type Logger } from '../logger.js';
import type { BrokerMessage, MessageBroker } from './broker.js';
import { decodeResult, encodeSegment } from './codec.js';

export interface QueueBridgeOptions {
  broker: MessageBroker;
  logger?: Logger;
  reconnectIntervalMs?: number;
  /** Result keys remembered for de-duplication. */
  dedupeWindow?: number;
  /** Each gateway instance reads every result, so the group is unique per process by default. */
  resultGroupId?: string;
}

export type ResultHandler = (result: TranscriptionResult) => void;

/**
 * Moves segments onto `audio.segments` and results off
 * `transcription.results`. When the broker fails the bridge reports
 * `degraded`, callers dispatch directly, and a reconnect is retried on a
 * timer.
 */
export class QueueBridge {
  private readonly broker: MessageBroker;
  private readonly logger: Logger;
  private readonly reconnectIntervalMs: number;
  private readonly dedupeWindow: number;
  private readonly resultGroupId: string;
  private readonly handlers = new Set<ResultHandler>();
  private readonly seen = new Set<string>();
  private current: QueueState = 'disabled';
  private reconnectTimer?: NodeJS.Timeout;
  private stopped = true;
  private publishCounter = 0;

  constructor(options: QueueBridgeOptions) {
    this.broker = options.broker;
    this.logger = createComponentLogger('queue-bridge', options.logger);
    this.reconnectIntervalMs = options.reconnectIntervalMs ?? 5000;
    this.dedupeWindow = options.dedupeWindow ?? 2048;
    this.resultGroupId = options.resultGroupId ?? `stream-gateway-${randomUUID()}`;
  }

  state(): QueueState {
    return this.current;
  }

  /** Never rejects: a broker that cannot be reached leaves the bridge degraded. */
  async start(): Promise<void> {
    this.stopped = false;
    try {
      await this.connect();
      this.logger.info({ broker: this.broker.name }, 'Queue bridge connected');
    } catch (error) {
      this.degrade(error);
    }
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    this.current = 'disabled';
    await this.broker.disconnect();
  }

  onResult(handler: ResultHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /** Returns the attempt id the envelope was published under. */
  async publish(segment: AudioSegment): Promise<string> {
    if (this.current !== 'connected') {
      throw new QueueUnavailableError(`Queue is ${this.current}`);
    }

    this.publishCounter += 1;
    const attemptId = `${segment.sessionId}:${segment.sequence}:q${this.publishCounter.toString(36)}`;
    try {
      await this.broker.publish(AUDIO_SEGMENTS_TOPIC, segment.sessionId, encodeSegment(segment, attemptId));
      return attemptId;
    } catch (error) {
      this.degrade(error);
      throw new QueueUnavailableError(`Publishing segment ${segment.sessionId}:${segment.sequence} failed`, error);
    }
  }

  private async connect(): Promise<void> {
    await this.broker.connect();
    await this.broker.subscribe(TRANSCRIPTION_RESULTS_TOPIC, this.resultGroupId, (message) =>
      this.handleMessage(message),
    );
    this.current = 'connected';
  }

  private degrade(error: unknown): void {
    if (this.stopped) {
      return;
    }
    if (this.current !== 'degraded') {
      this.logger.warn(
        { err: toError(error), broker: this.broker.name },
        'Queue unavailable, falling back to direct dispatch',
      );
    }
    this.current = 'degraded';
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.stopped) {
      return;
    }
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.reconnect().catch((error: unknown) => {
        this.logger.debug({ err: toError(error) }, 'Queue reconnect failed');
        this.scheduleReconnect();
      });
    }, this.reconnectIntervalMs);
    this.reconnectTimer.unref();
  }

  private async reconnect(): Promise<void> {
    if (this.stopped) {
      return;
    }
    await this.broker.disconnect();
    await this.connect();
    this.logger.info({ broker: this.broker.name }, 'Queue connection restored');
  }

  private async handleMessage(message: BrokerMessage): Promise<void> {
    let decoded: ReturnType<typeof decodeResult>;
    try {
      decoded = decodeResult(message.value);
    } catch (error) {
      this.logger.warn({ err: toError(error), key: message.key }, 'Discarding malformed result envelope');
      return;
    }

    const { attemptId, result } = decoded;
    const key = `${result.sessionId}:${result.sequence}:${attemptId}:${result.isFinal ? 'final' : 'interim'}`;
    if (this.seen.has(key)) {
      this.logger.debug({ key }, 'Dropping redelivered result');
      return;
    }
    this.remember(key);

    for (const handler of this.handlers) {
      handler(result);
    }
  }

  private remember(key: string): void {
    this.seen.add(key);
    while (this.seen.size > this.dedupeWindow) {
      const oldest = this.seen.values().next();
      if (oldest.done) {
        break;
      }
      this.seen.delete(oldest.value);
    }
  }
}
