export * from './errors.js';
export { createComponentLogger, type Logger } from './logger.js';
export { ResultChannel, type ResultChannelOptions } from './channel.js';
export { TokenBucketRateLimiter, type RateBucket, type RateLimiterOptions } from './rate-limiter.js';
export { ProviderDispatcher, segmentKey, type DispatchOptions, type DispatcherOptions } from './dispatcher.js';
export {
  ResultBroadcaster,
  toOutboundMessage,
  type BroadcasterOptions,
  type BroadcasterStats,
} from './broadcaster.js';
export {
  DEFAULT_AUDIO,
  DEFAULT_SESSION_LIMITS,
  SessionManager,
  type OpenSessionRequest,
  type OpenedSession,
  type SessionLimits,
  type SessionManagerOptions,
  type SessionSnapshot,
} from './session-manager.js';
export { PROVIDER_ERROR_RATE_THRESHOLD, buildHealthStatus, type HealthSources } from './health.js';
export { createStreamEngine, type StreamEngine, type StreamEngineOptions } from './engine.js';
export * from './providers/index.js';
export type { BrokerMessage, MessageBroker, MessageHandler, SubscribeOptions } from './queue/broker.js';
export { InMemoryBroker, type InMemoryBrokerOptions } from './queue/memory-broker.js';
export { KafkaBroker, type KafkaBrokerOptions } from './queue/kafka-broker.js';
export {
  decodeResult,
  decodeSegment,
  encodeResult,
  encodeSegment,
  resultEnvelopeSchema,
  segmentEnvelopeSchema,
  type DecodedSegment,
} from './queue/codec.js';
export { QueueBridge, type QueueBridgeOptions, type ResultHandler } from './queue/bridge.js';
