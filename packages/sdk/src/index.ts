export { StreamScribeClient } from './client.js';
export { TranscriptAccumulator, type TranscriptAggregationResult } from './aggregators.js';
export { TypedEventEmitter } from './emitter.js';
export { parseServerMessage } from './messages.js';
export type {
  ConnectionState,
  SessionInfo,
  StreamScribeClientOptions,
  StreamScribeEventMap,
  StreamScribeTextState,
} from './types.js';
