import WebSocket, { type RawData } from 'ws';

import type { ErrorMessage, TranscriptionMessage } from '@streamscribe/shared-types';

import { TranscriptAccumulator, type TranscriptAggregationResult } from './aggregators.js';
import { TypedEventEmitter } from './emitter.js';
import { parseServerMessage } from './messages.js';
import type {
  ConnectionState,
  SessionInfo,
  StreamScribeClientOptions,
  StreamScribeEventMap,
  StreamScribeTextState,
} from './types.js';

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class StreamScribeClient {
  private readonly emitter = new TypedEventEmitter<StreamScribeEventMap>();
  private readonly transcripts = new TranscriptAccumulator();

  private socket: WebSocket | undefined;
  private connectionState: ConnectionState = 'idle';
  private session: SessionInfo | undefined;
  private state: StreamScribeTextState = {
    finalizedText: '',
    pendingText: '',
  };

  constructor(private readonly options: StreamScribeClientOptions) {}

  getState(): StreamScribeTextState {
    return this.state;
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  getSession(): SessionInfo | undefined {
    return this.session;
  }

  on<K extends keyof StreamScribeEventMap>(event: K, listener: (payload: StreamScribeEventMap[K]) => void): () => void {
    return this.emitter.on(event, listener);
  }

  off<K extends keyof StreamScribeEventMap>(event: K, listener: (payload: StreamScribeEventMap[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof StreamScribeEventMap>(event: K, listener: (payload: StreamScribeEventMap[K]) => void): () => void {
    return this.emitter.once(event, listener);
  }

  /** Opens the stream and resolves once the gateway has assigned a session. */
  connect(): Promise<SessionInfo> {
    if (this.socket && this.session && this.connectionState === 'open') {
      return Promise.resolve(this.session);
    }
    if (this.socket) {
      return Promise.reject(new Error('Connection already in progress'));
    }

    const socket = new WebSocket(this.buildUrl(), {
      headers: { 'x-api-key': this.options.apiKey },
    });
    this.socket = socket;
    this.updateConnectionState('connecting');

    socket.on('message', (data, isBinary) => {
      if (!isBinary) {
        this.handleMessage(rawDataToString(data));
      }
    });
    socket.on('close', () => {
      this.socket = undefined;
      this.session = undefined;
      this.updateConnectionState('closed');
    });
    socket.on('error', (error) => {
      this.emitter.emit('error', error);
    });

    return new Promise<SessionInfo>((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        socket.terminate();
        reject(new Error('Timed out waiting for the stream session'));
      }, this.options.connectTimeoutMs ?? 10_000);

      const onSession = (info: SessionInfo) => {
        cleanup();
        resolve(info);
      };
      const onFailure = (error: Error) => {
        cleanup();
        reject(error);
      };
      const onClose = (code: number, reason: Buffer) => {
        cleanup();
        reject(new Error(`Stream closed before a session was assigned (${code}${reason.length ? `: ${reason.toString()}` : ''})`));
      };
      const onUnexpectedResponse = (_request: unknown, response: { statusCode?: number }) => {
        cleanup();
        socket.terminate();
        reject(new Error(`Stream handshake rejected with status ${response.statusCode ?? 'unknown'}`));
      };
      const cleanup = () => {
        clearTimeout(timer);
        unsubscribe();
        socket.off('error', onFailure);
        socket.off('close', onClose);
        socket.off('unexpected-response', onUnexpectedResponse);
      };

      const unsubscribe = this.emitter.once('session', onSession);
      socket.once('error', onFailure);
      socket.once('close', onClose);
      socket.once('unexpected-response', onUnexpectedResponse);
    });
  }

  sendAudio(chunk: Uint8Array): void {
    const socket = this.requireOpenSocket();
    socket.send(chunk, { binary: true });
  }

  ping(): void {
    this.requireOpenSocket().send(JSON.stringify({ type: 'ping' }));
  }

  /** The gateway answers with a `status` event. */
  requestStatus(): void {
    this.requireOpenSocket().send(JSON.stringify({ type: 'get_status' }));
  }

  /**
   * Asks the gateway to finish the session. Resolves after the remaining
   * transcripts have arrived and the gateway closed the stream.
   */
  stop(): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.resolve();
    }
    this.updateConnectionState('closing');
    return new Promise((resolve) => {
      socket.once('close', () => resolve());
      socket.send(JSON.stringify({ type: 'stop' }));
    });
  }

  disconnect(): void {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.updateConnectionState('closing');
    socket.close(1000, 'client disconnect');
    this.transcripts.reset();
    this.updateState({ finalizedText: '', pendingText: '' });
  }

  private buildUrl(): string {
    const url = new URL(this.options.url);
    const audio = this.options.audio ?? {};
    if (audio.format) url.searchParams.set('format', audio.format);
    if (audio.sampleRate) url.searchParams.set('sampleRate', String(audio.sampleRate));
    if (audio.channels) url.searchParams.set('channels', String(audio.channels));
    return url.toString();
  }

  private requireOpenSocket(): WebSocket {
    if (!this.socket || this.socket.readyState !== WebSocket.OPEN) {
      throw new Error('Stream is not open');
    }
    return this.socket;
  }

  private handleMessage(raw: string): void {
    try {
      const message = parseServerMessage(raw);
      switch (message.type) {
        case 'session':
          this.session = { sessionId: message.sessionId, openedAt: message.timestamp };
          this.updateConnectionState('open');
          this.emitter.emit('session', this.session);
          break;
        case 'transcription':
          this.handleTranscript(message);
          break;
        case 'error':
          this.handleServerError(message);
          break;
        case 'status':
          this.emitter.emit('status', message);
          break;
        case 'pong':
          break;
      }
    } catch (error) {
      this.emitter.emit('error', toError(error));
    }
  }

  private handleTranscript(message: TranscriptionMessage): void {
    this.emitter.emit('transcript', message);
    this.applyAggregation(this.transcripts.ingest(message));
  }

  private handleServerError(message: ErrorMessage): void {
    this.emitter.emit('serverError', message);
    this.applyAggregation(this.transcripts.ingest(message));
  }

  private applyAggregation(result: TranscriptAggregationResult | null): void {
    if (result) {
      this.updateState(result);
    }
  }

  private updateState(patch: Partial<StreamScribeTextState>): void {
    this.state = {
      ...this.state,
      ...patch,
    };
    this.emitter.emit('state', this.state);
  }

  private updateConnectionState(state: ConnectionState): void {
    if (this.connectionState === state) {
      return;
    }
    this.connectionState = state;
    this.emitter.emit('connection', state);
  }
}
