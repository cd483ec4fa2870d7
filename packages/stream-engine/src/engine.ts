import type { HealthStatus } from '@streamscribe/shared-types';

import { ResultBroadcaster, type BroadcasterOptions } from './broadcaster.js';
import { ProviderDispatcher, type DispatcherOptions } from './dispatcher.js';
import { buildHealthStatus } from './health.js';
import type { Logger } from './logger.js';
import type { TranscriptionProvider } from './providers/types.js';
import type { MessageBroker } from './queue/broker.js';
import { QueueBridge, type QueueBridgeOptions } from './queue/bridge.js';
import { TokenBucketRateLimiter, type RateLimiterOptions } from './rate-limiter.js';
import { SessionManager, type SessionLimits } from './session-manager.js';

export interface StreamEngineOptions {
  providers: TranscriptionProvider[];
  logger: Logger;
  /** Without a broker every segment is dispatched in process. */
  broker?: MessageBroker;
  dispatcher?: Omit<DispatcherOptions, 'providers' | 'logger'>;
  broadcaster?: Omit<BroadcasterOptions, 'logger'>;
  bridge?: Omit<QueueBridgeOptions, 'broker' | 'logger'>;
  sessions?: Partial<SessionLimits>;
  /** Session-creation budget per client key. */
  sessionRate?: Omit<RateLimiterOptions, 'now'>;
}

export interface StreamEngine {
  sessions: SessionManager;
  dispatcher: ProviderDispatcher;
  broadcaster: ResultBroadcaster;
  rateLimiter?: TokenBucketRateLimiter;
  bridge?: QueueBridge;
  start(): Promise<void>;
  stop(): Promise<void>;
  health(): HealthStatus;
}

export function createStreamEngine(options: StreamEngineOptions): StreamEngine {
  const { logger } = options;
  const dispatcher = new ProviderDispatcher({ ...options.dispatcher, providers: options.providers, logger });
  const broadcaster = new ResultBroadcaster({ ...options.broadcaster, logger });
  const rateLimiter = options.sessionRate ? new TokenBucketRateLimiter(options.sessionRate) : undefined;
  const bridge = options.broker ? new QueueBridge({ ...options.bridge, broker: options.broker, logger }) : undefined;
  const sessions = new SessionManager({
    dispatcher,
    broadcaster,
    bridge,
    rateLimiter,
    limits: options.sessions,
    logger,
  });

  let stopPruning: (() => void) | undefined;

  return {
    sessions,
    dispatcher,
    broadcaster,
    rateLimiter,
    bridge,
    async start() {
      sessions.start();
      stopPruning = rateLimiter?.startPruning();
      await bridge?.start();
    },
    async stop() {
      stopPruning?.();
      await sessions.shutdown();
      await bridge?.stop();
    },
    health() {
      return buildHealthStatus({ sessions, dispatcher, bridge });
    },
  };
}
