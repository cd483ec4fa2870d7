import {
  AUDIO_SEGMENTS_TOPIC,
  DISPATCH_WORKER_GROUP,
  TRANSCRIPTION_RESULTS_TOPIC,
} from '@streamscribe/shared-types';
import {
  createComponentLogger,
  decodeSegment,
  encodeResult,
  toError,
  type BrokerMessage,
  type DecodedSegment,
  type Logger,
  type MessageBroker,
  type ProviderDispatcher,
} from '@streamscribe/stream-engine';

export interface DispatchWorkerOptions {
  broker: MessageBroker;
  dispatcher: ProviderDispatcher;
  logger?: Logger;
  groupId?: string;
  concurrency?: number;
  /** Attempt ids remembered to skip redelivered segments. */
  dedupeWindow?: number;
}

export interface DispatchWorkerStats {
  processed: number;
  duplicates: number;
  malformed: number;
}

/**
 * Consumes `audio.segments`, runs each segment through the provider chain and
 * publishes the outcome on `transcription.results` under the attempt id the
 * gateway assigned.
 */
export class DispatchWorker {
  private readonly logger: Logger;
  private readonly seen = new Set<string>();
  private readonly inFlight = new Set<string>();
  private readonly dedupeWindow: number;
  private readonly counters: DispatchWorkerStats = { processed: 0, duplicates: 0, malformed: 0 };
  private running = false;

  constructor(private readonly options: DispatchWorkerOptions) {
    this.logger = createComponentLogger('dispatch-worker', options.logger);
    this.dedupeWindow = options.dedupeWindow ?? 4096;
  }

  get isRunning(): boolean {
    return this.running;
  }

  stats(): DispatchWorkerStats {
    return { ...this.counters };
  }

  async start(): Promise<void> {
    const { broker } = this.options;
    const groupId = this.options.groupId ?? DISPATCH_WORKER_GROUP;
    await broker.connect();
    await broker.subscribe(AUDIO_SEGMENTS_TOPIC, groupId, (message) => this.handle(message), {
      concurrency: this.options.concurrency,
    });
    this.running = true;
    this.logger.info(
      { broker: broker.name, groupId, providers: this.options.dispatcher.providerNames },
      'Dispatch worker consuming',
    );
  }

  async stop(): Promise<void> {
    this.running = false;
    await this.options.broker.disconnect();
  }

  private async handle(message: BrokerMessage): Promise<void> {
    let decoded: DecodedSegment;
    try {
      decoded = decodeSegment(message.value);
    } catch (error) {
      this.counters.malformed += 1;
      this.logger.warn({ err: toError(error), key: message.key }, 'Discarding malformed segment envelope');
      return;
    }

    const { attemptId, segment } = decoded;
    if (this.seen.has(attemptId) || this.inFlight.has(attemptId)) {
      this.counters.duplicates += 1;
      this.logger.debug({ attemptId }, 'Skipping redelivered segment');
      return;
    }

    // An attempt is done once its result is published; until then a redelivery runs again.
    this.inFlight.add(attemptId);
    try {
      const result = await this.options.dispatcher.dispatch(segment);
      await this.options.broker.publish(
        TRANSCRIPTION_RESULTS_TOPIC,
        segment.sessionId,
        encodeResult(result, attemptId),
      );
      this.remember(attemptId);
      this.counters.processed += 1;
      this.logger.debug(
        { sessionId: segment.sessionId, sequence: segment.sequence, provider: result.provider, failed: Boolean(result.failure) },
        'Segment dispatched',
      );
    } finally {
      this.inFlight.delete(attemptId);
    }
  }

  private remember(attemptId: string): void {
    this.seen.add(attemptId);
    while (this.seen.size > this.dedupeWindow) {
      const oldest = this.seen.values().next();
      if (oldest.done) {
        break;
      }
      this.seen.delete(oldest.value);
    }
  }
}
