import { existsSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { DISPATCH_WORKER_GROUP } from '@streamscribe/shared-types';
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

export const envSchema = providerEnvSchema.extend({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  KAFKA_BROKERS: z
    .string()
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean),
    )
    .pipe(z.array(z.string()).min(1)),
  KAFKA_CLIENT_ID: z.string().default('stt-worker'),
  WORKER_GROUP_ID: z.string().default(DISPATCH_WORKER_GROUP),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  PROVIDER_ATTEMPTS: z.coerce.number().int().min(1).default(2),
  MAX_IN_FLIGHT_PER_SESSION: z.coerce.number().int().min(1).default(2),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv, logger: Logger): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    logger.error({ err: error }, 'Invalid environment configuration');
    throw error;
  }
}
