import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';

import WebSocket, { WebSocketServer, type RawData } from 'ws';
import { z } from 'zod';
import {
  CapacityExceededError,
  StreamError,
  TokenBucketRateLimiter,
  UnknownSessionError,
  toError,
  type Logger,
  type OpenedSession,
  type ResultChannel,
  type SessionManager,
} from '@streamscribe/stream-engine';
import { STREAM_PATH, type AudioDescriptor, type OutboundMessage } from '@streamscribe/shared-types';

import { extractToken, type AuthorizedClient, type Authorizer } from '../middleware/auth.js';

const audioQuerySchema = z.object({
  format: z.enum(['s16le', 'f32le', 'wav', 'webm', 'ogg']).optional(),
  sampleRate: z.coerce.number().int().min(8000).max(48000).optional(),
  channels: z.coerce.number().int().min(1).max(2).optional(),
});

const controlMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('stop') }),
  z.object({ type: z.literal('get_status') }),
]);

/** Close code for "try again later". */
const CLOSE_TRY_AGAIN_LATER = 1013;
const CLOSE_INTERNAL_ERROR = 1011;

export interface StreamServerOptions {
  sessions: SessionManager;
  authorizer: Authorizer;
  logger: Logger;
  path?: string;
  /**
   * Per-session ingest budget; 0 or undefined disables the throttle. Bursts up
   * to twice the budget pass, and a single frame larger than that is charged
   * as a full burst.
   */
  ingestBytesPerSecond?: number;
}

export interface StreamServer {
  readonly wss: WebSocketServer;
  close(): Promise<void>;
}

function now(): string {
  return new Date().toISOString();
}

function errorMessage(code: string, text: string, sequence?: number): OutboundMessage {
  return {
    type: 'error',
    code,
    ...(sequence === undefined ? {} : { sequence }),
    text,
    confidence: 0,
    isFinal: true,
    timestamp: now(),
  };
}

function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return data instanceof ArrayBuffer ? Buffer.from(data) : data;
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.write(
    `HTTP/1.1 ${status} ${reason}\r\n` +
      'Connection: close\r\n' +
      'Content-Type: text/plain\r\n' +
      `Content-Length: ${Buffer.byteLength(reason)}\r\n` +
      '\r\n' +
      reason,
  );
  socket.destroy();
}

function send(ws: WebSocket, message: OutboundMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

async function pumpChannel(ws: WebSocket, channel: ResultChannel<OutboundMessage>): Promise<void> {
  for await (const message of channel) {
    send(ws, message);
  }
}

/**
 * Serves `/v1/stream`: authorizes the upgrade, opens a session, feeds binary
 * frames to it and drains its result channel back onto the socket.
 */
export function attachStreamServer(server: Server, options: StreamServerOptions): StreamServer {
  const { sessions, authorizer, logger } = options;
  const path = options.path ?? STREAM_PATH;
  const wss = new WebSocketServer({ noServer: true });

  async function handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const url = new URL(request.url ?? '/', 'http://localhost');
    if (url.pathname !== path) {
      rejectUpgrade(socket, 404, 'Not Found');
      return;
    }

    const token = extractToken(request.headers, url);
    const client = token ? await authorizer.authorize(token) : null;
    if (!client) {
      logger.warn({ ip: request.socket.remoteAddress }, 'Rejected unauthorized stream');
      rejectUpgrade(socket, 401, 'Unauthorized');
      return;
    }

    const query = audioQuerySchema.safeParse(Object.fromEntries(url.searchParams));
    if (!query.success) {
      rejectUpgrade(socket, 400, 'Bad Request');
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      serveConnection(ws, client, query.data);
    });
  }

  function serveConnection(ws: WebSocket, client: AuthorizedClient, audio: Partial<AudioDescriptor>): void {
    let opened: OpenedSession;
    try {
      opened = sessions.openSession({ clientKey: client.clientKey, audio });
    } catch (error) {
      if (error instanceof CapacityExceededError) {
        logger.warn({ clientKey: client.clientKey, details: error.details }, 'Refusing stream, capacity exceeded');
        send(ws, errorMessage(error.code, error.message));
        ws.close(CLOSE_TRY_AGAIN_LATER, 'capacity exceeded');
        return;
      }
      const failure = toError(error);
      logger.error({ err: failure, clientKey: client.clientKey }, 'Failed to open session');
      send(ws, errorMessage(error instanceof StreamError ? error.code : 'INTERNAL', failure.message));
      ws.close(CLOSE_INTERNAL_ERROR, 'session failed');
      return;
    }

    const { sessionId, channel } = opened;
    const burstBytes = (options.ingestBytesPerSecond ?? 0) * 2;
    const throttle =
      burstBytes > 0
        ? new TokenBucketRateLimiter({ capacity: burstBytes, refillPerSecond: burstBytes / 2 })
        : undefined;

    send(ws, { type: 'session', sessionId, timestamp: now() });
    const pump = pumpChannel(ws, channel);

    let finishing: Promise<void> | undefined;
    const finish = (): Promise<void> => {
      finishing ??= sessions
        .closeSession(sessionId)
        .then(() => pump)
        .then(() => {
          if (ws.readyState === WebSocket.OPEN) {
            ws.close(1000, 'session closed');
          }
        })
        .catch((error: unknown) => {
          logger.error({ err: toError(error), sessionId }, 'Failed to finish session');
        });
      return finishing;
    };

    const handleAudio = (bytes: Uint8Array) => {
      if (throttle && !throttle.allow(sessionId, Math.min(bytes.byteLength, burstBytes))) {
        send(ws, errorMessage('RATE_LIMITED', 'Audio arriving faster than the ingest limit; chunk dropped'));
        return;
      }
      try {
        sessions.ingest(sessionId, bytes);
      } catch (error) {
        if (error instanceof UnknownSessionError) {
          send(ws, errorMessage(error.code, error.message));
          return;
        }
        logger.error({ err: toError(error), sessionId }, 'Failed to ingest audio');
        send(ws, errorMessage('INTERNAL', 'Failed to ingest audio'));
      }
    };

    const sendStatus = () => {
      const snapshot = sessions.getSession(sessionId);
      if (!snapshot) {
        send(ws, errorMessage('UNKNOWN_SESSION', `Session ${sessionId} is no longer open`));
        return;
      }
      send(ws, {
        type: 'status',
        sessionId,
        state: snapshot.state,
        nextSequence: snapshot.nextSequence,
        pendingSegments: snapshot.pendingSegments,
        createdAt: new Date(snapshot.createdAt).toISOString(),
        lastActivityAt: new Date(snapshot.lastActivityAt).toISOString(),
        timestamp: now(),
      });
    };

    const handleControl = (raw: string) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        send(ws, errorMessage('INVALID_MESSAGE', 'Control messages must be JSON'));
        return;
      }
      const control = controlMessageSchema.safeParse(parsed);
      if (!control.success) {
        send(ws, errorMessage('INVALID_MESSAGE', 'Unknown control message'));
        return;
      }
      switch (control.data.type) {
        case 'ping':
          send(ws, { type: 'pong', timestamp: now() });
          return;
        case 'get_status':
          sendStatus();
          return;
        case 'stop':
          void finish();
          return;
      }
    };

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        handleAudio(toBuffer(data));
      } else {
        handleControl(toBuffer(data).toString('utf8'));
      }
    });
    ws.on('close', () => {
      void finish();
    });
    ws.on('error', (error) => {
      logger.warn({ err: error, sessionId }, 'Stream socket error');
    });
  }

  const onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    handleUpgrade(request, socket, head).catch((error: unknown) => {
      logger.error({ err: toError(error) }, 'Stream upgrade failed');
      rejectUpgrade(socket, 500, 'Internal Server Error');
    });
  };
  server.on('upgrade', onUpgrade);

  return {
    wss,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.off('upgrade', onUpgrade);
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
