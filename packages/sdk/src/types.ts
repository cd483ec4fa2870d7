import type { AudioDescriptor, ErrorMessage, StatusMessage, TranscriptionMessage } from '@streamscribe/shared-types';

export type ConnectionState = 'idle' | 'connecting' | 'open' | 'closing' | 'closed';

export interface StreamScribeClientOptions {
  /** Gateway stream endpoint, e.g. `ws://localhost:8080/v1/stream`. */
  url: string;
  apiKey: string;
  audio?: Partial<AudioDescriptor>;
  /** How long `connect` waits for the session greeting. */
  connectTimeoutMs?: number;
}

export interface StreamScribeTextState {
  finalizedText: string;
  pendingText: string;
}

export interface SessionInfo {
  sessionId: string;
  openedAt: string;
}

export interface StreamScribeEventMap {
  connection: ConnectionState;
  session: SessionInfo;
  transcript: TranscriptionMessage;
  serverError: ErrorMessage;
  status: StatusMessage;
  state: StreamScribeTextState;
  error: Error;
}

export type EventListener<T> = (payload: T) => void;
