export type AudioFormat = 's16le' | 'f32le' | 'wav' | 'webm' | 'ogg';

export const PCM_FORMATS: ReadonlySet<AudioFormat> = new Set<AudioFormat>(['s16le', 'f32le']);

export interface AudioDescriptor {
  format: AudioFormat;
  sampleRate: number;
  channels: number;
}

export interface AudioSegment extends AudioDescriptor {
  sessionId: string;
  sequence: number;
  payload: Uint8Array;
  capturedAt: number;
  startMs: number;
  endMs: number;
  isFinalChunk: boolean;
}

export type SessionState = 'active' | 'draining' | 'closed';

export type TranscriptionFailureCode = 'ALL_PROVIDERS_EXHAUSTED' | 'CANCELLED';

export interface TranscriptionFailure {
  code: TranscriptionFailureCode;
  message: string;
}

export interface TranscriptionResult {
  sessionId: string;
  sequence: number;
  text: string;
  confidence: number;
  isFinal: boolean;
  provider: string;
  latencyMs: number;
  attemptId: string;
  failure?: TranscriptionFailure;
}

export type AttemptOutcome = 'success' | 'timeout' | 'error';

export interface ProviderAttempt {
  attemptId: string;
  segmentKey: string;
  provider: string;
  attempt: number;
  outcome: AttemptOutcome;
  latencyMs: number;
  error?: string;
}

export interface SessionReadyMessage {
  type: 'session';
  sessionId: string;
  timestamp: string;
}

export interface TranscriptionMessage {
  type: 'transcription';
  sequence: number;
  text: string;
  confidence: number;
  isFinal: boolean;
  provider: string;
  timestamp: string;
}

export interface ErrorMessage {
  type: 'error';
  code: string;
  sequence?: number;
  text: string;
  confidence: number;
  isFinal: boolean;
  timestamp: string;
}

export interface PongMessage {
  type: 'pong';
  timestamp: string;
}

/** Reply to `get_status`. Times are ISO-8601. */
export interface StatusMessage {
  type: 'status';
  sessionId: string;
  state: SessionState;
  nextSequence: number;
  pendingSegments: number;
  createdAt: string;
  lastActivityAt: string;
  timestamp: string;
}

export type OutboundMessage =
  | SessionReadyMessage
  | TranscriptionMessage
  | ErrorMessage
  | PongMessage
  | StatusMessage;

export type InboundControlMessage = { type: 'ping' } | { type: 'stop' } | { type: 'get_status' };

export interface QueueEnvelope<T> {
  sessionId: string;
  sequence: number;
  attemptId: string;
  payload: T;
}

export interface SegmentPayload extends AudioDescriptor {
  audio: string;
  capturedAt: number;
  startMs: number;
  endMs: number;
  isFinalChunk: boolean;
}

export type SegmentEnvelope = QueueEnvelope<SegmentPayload>;
export type ResultEnvelope = QueueEnvelope<TranscriptionResult>;

export type QueueState = 'connected' | 'degraded' | 'disabled';

export interface ProviderHealth {
  name: string;
  attempts: number;
  errorRate: number;
}

export interface HealthStatus {
  status: 'ok' | 'degraded';
  activeSessions: number;
  providers: ProviderHealth[];
  queue: QueueState;
  timestamp: string;
}

export const AUDIO_SEGMENTS_TOPIC = 'audio.segments';
export const TRANSCRIPTION_RESULTS_TOPIC = 'transcription.results';
export const DISPATCH_WORKER_GROUP = 'stt-dispatch-workers';
export const STREAM_PATH = '/v1/stream';
export const DEFAULT_GROQ_MODEL = 'whisper-large-v3-turbo';
export const DEFAULT_OPENAI_MODEL = 'whisper-1';
