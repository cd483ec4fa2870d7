import { existsSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { providerEnvSchema, type Logger } from '@streamscribe/stream-engine';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const appRoot = path.resolve(__dirname, '..');
const repoRoot = path.resolve(__dirname, '../../..');

const envCandidates = [
  path.join(repoRoot, '.env'),
  path.join(repoRoot, '.env.local'),
  path.join(appRoot, '.env'),
  path.join(appRoot, '.env.local'),
];

export function loadEnvironmentFiles(): void {
  for (const envPath of envCandidates) {
    if (existsSync(envPath)) {
      loadEnv({ path: envPath, override: true });
    }
  }
}

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean),
  );

export const envSchema = providerEnvSchema.extend({
  GATEWAY_PORT: z.coerce.number().int().default(8080),
  GATEWAY_HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  AUTH_MODE: z.enum(['static', 'supabase']).default('static'),
  GATEWAY_API_KEYS: commaList,
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_KEY: z.string().min(1).optional(),

  QUEUE_DRIVER: z.enum(['none', 'kafka']).default('none'),
  KAFKA_BROKERS: commaList,
  KAFKA_CLIENT_ID: z.string().default('stream-gateway'),
  QUEUE_RECONNECT_MS: z.coerce.number().int().positive().default(5000),
  QUEUE_RESULT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  MAX_SESSIONS: z.coerce.number().int().positive().default(500),
  MAX_SESSIONS_PER_CLIENT: z.coerce.number().int().positive().default(3),
  SESSION_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  DRAIN_GRACE_MS: z.coerce.number().int().nonnegative().default(5000),
  WINDOW_MS: z.coerce.number().positive().default(250),
  MAX_BUFFER_BYTES: z.coerce.number().int().positive().default(64 * 1024),

  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  PROVIDER_ATTEMPTS: z.coerce.number().int().min(1).default(2),
  MAX_IN_FLIGHT_PER_SESSION: z.coerce.number().int().min(1).default(2),
  REORDER_BUFFER_SIZE: z.coerce.number().int().min(1).default(8),
  REORDER_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),

  SESSION_RATE_CAPACITY: z.coerce.number().positive().default(10),
  SESSION_RATE_REFILL_PER_SEC: z.coerce.number().positive().default(1),
  STATUS_RATE_LIMIT: z.coerce.number().positive().default(60),
  /** 0 disables the per-session ingest throttle. */
  INGEST_BYTES_PER_SEC: z.coerce.number().nonnegative().default(0),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv, logger: Logger): Env {
  try {
    const env = envSchema.parse(source);
    if (env.AUTH_MODE === 'supabase' && (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_KEY)) {
      throw new Error('SUPABASE_URL and SUPABASE_SERVICE_KEY are required when AUTH_MODE=supabase');
    }
    if (env.QUEUE_DRIVER === 'kafka' && env.KAFKA_BROKERS.length === 0) {
      throw new Error('KAFKA_BROKERS is required when QUEUE_DRIVER=kafka');
    }
    return env;
  } catch (error) {
    logger.error({ err: error }, 'Invalid environment configuration');
    throw error;
  }
}
