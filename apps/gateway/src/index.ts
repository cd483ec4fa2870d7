import { createServer, type Server } from 'node:http';

import cors from 'cors';
import express, { type Express } from 'express';
import {
  KafkaBroker,
  createProviders,
  createStreamEngine,
  providerSpecsFromEnv,
  toError,
  type Logger,
  type MessageBroker,
  type StreamEngine,
} from '@streamscribe/stream-engine';

import { loadEnvironmentFiles, parseEnv, type Env } from './config.js';
import { createSupabaseClient } from './lib/supabase.js';
import { createLogger } from './logger.js';
import {
  ApiKeyAuthorizer,
  StaticKeyAuthorizer,
  SupabaseApiKeyStore,
  apiKeyAuth,
  type Authorizer,
} from './middleware/auth.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { createRateLimiter } from './middleware/rateLimit.js';
import { createRequestLogger } from './middleware/requestLogger.js';
import { createStatusRouter } from './routes/status.js';
import { attachStreamServer, type StreamServer } from './ws/stream.js';

export const GATEWAY_VERSION = '1.0.0';

export interface GatewayOptions {
  env: Env;
  logger: Logger;
  engine: StreamEngine;
  authorizer: Authorizer;
}

export interface Gateway {
  app: Express;
  server: Server;
  stream: StreamServer;
  /** Resolves with the bound port. */
  listen(port?: number, host?: string): Promise<number>;
  close(): Promise<void>;
}

export function createGateway({ env, logger, engine, authorizer }: GatewayOptions): Gateway {
  const app = express();

  app.use(cors(env.CORS_ORIGIN ? { origin: env.CORS_ORIGIN.split(',').map((item) => item.trim()) } : undefined));
  app.use(express.json({ limit: '1mb' }));
  app.use(createRequestLogger(logger));

  const statusRateLimiter = createRateLimiter({ perMinute: env.STATUS_RATE_LIMIT });
  app.use(
    createStatusRouter({
      engine,
      guards: [apiKeyAuth(authorizer), statusRateLimiter],
      version: GATEWAY_VERSION,
    }),
  );

  // Error handling middleware (must be last)
  app.use(createErrorHandler(logger));

  const server = createServer(app);
  const stream = attachStreamServer(server, {
    sessions: engine.sessions,
    authorizer,
    logger,
    ingestBytesPerSecond: env.INGEST_BYTES_PER_SEC,
  });

  return {
    app,
    server,
    stream,
    listen: (port = env.GATEWAY_PORT, host = env.GATEWAY_HOST) =>
      new Promise<number>((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
          server.off('error', reject);
          const address = server.address();
          resolve(typeof address === 'object' && address ? address.port : port);
        });
      }),
    async close() {
      statusRateLimiter.stop();
      await stream.close();
      await new Promise<void>((resolve, reject) => {
        if (!server.listening) {
          resolve();
          return;
        }
        server.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}

export function createAuthorizer(env: Env, logger: Logger): Authorizer {
  if (env.AUTH_MODE === 'supabase' && env.SUPABASE_URL && env.SUPABASE_SERVICE_KEY) {
    const store = new SupabaseApiKeyStore(createSupabaseClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY));
    return new ApiKeyAuthorizer(store, { logger });
  }
  if (env.GATEWAY_API_KEYS.length === 0) {
    logger.warn('No GATEWAY_API_KEYS configured; every stream will be rejected');
  }
  return new StaticKeyAuthorizer(env.GATEWAY_API_KEYS);
}

export function createBroker(env: Env, logger: Logger): MessageBroker | undefined {
  if (env.QUEUE_DRIVER !== 'kafka') {
    return undefined;
  }
  return new KafkaBroker({ clientId: env.KAFKA_CLIENT_ID, brokers: env.KAFKA_BROKERS, logger });
}

export function createEngineFromEnv(env: Env, logger: Logger): StreamEngine {
  return createStreamEngine({
    providers: createProviders(providerSpecsFromEnv(env)),
    logger,
    broker: createBroker(env, logger),
    dispatcher: {
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
      attemptsPerProvider: env.PROVIDER_ATTEMPTS,
      maxInFlightPerSession: env.MAX_IN_FLIGHT_PER_SESSION,
    },
    broadcaster: {
      reorderBufferSize: env.REORDER_BUFFER_SIZE,
      reorderTimeoutMs: env.REORDER_TIMEOUT_MS,
    },
    bridge: { reconnectIntervalMs: env.QUEUE_RECONNECT_MS },
    sessions: {
      maxSessions: env.MAX_SESSIONS,
      maxSessionsPerClient: env.MAX_SESSIONS_PER_CLIENT,
      idleTimeoutMs: env.SESSION_IDLE_TIMEOUT_MS,
      drainGraceMs: env.DRAIN_GRACE_MS,
      windowMs: env.WINDOW_MS,
      maxBufferBytes: env.MAX_BUFFER_BYTES,
      queueResultTimeoutMs: env.QUEUE_RESULT_TIMEOUT_MS,
    },
    sessionRate: {
      capacity: env.SESSION_RATE_CAPACITY,
      refillPerSecond: env.SESSION_RATE_REFILL_PER_SEC,
    },
  });
}

async function main(): Promise<void> {
  loadEnvironmentFiles();
  const env = parseEnv(process.env, createLogger());
  const logger = createLogger(env.LOG_LEVEL);

  const engine = createEngineFromEnv(env, logger);
  const gateway = createGateway({ env, logger, engine, authorizer: createAuthorizer(env, logger) });

  await engine.start();
  const port = await gateway.listen();
  logger.info(
    { port, providers: engine.dispatcher.providerNames, queue: engine.bridge?.state() ?? 'disabled' },
    'Gateway listening',
  );

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down gateway');
    try {
      await engine.stop();
      await gateway.close();
    } catch (error) {
      logger.error({ err: toError(error) }, 'Gateway shutdown failed');
      process.exitCode = 1;
    }
  };

  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    createLogger().error({ err: toError(error) }, 'Gateway failed to start');
    process.exitCode = 1;
  });
}
