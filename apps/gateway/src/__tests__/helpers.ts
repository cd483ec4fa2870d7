import pino from 'pino';
import {
  createStreamEngine,
  type ProviderTranscript,
  type StreamEngineOptions,
  type TranscriptionProvider,
  type TranscriptionRequest,
} from '@streamscribe/stream-engine';

import { envSchema, type Env } from '../config.js';
import { StaticKeyAuthorizer } from '../middleware/auth.js';
import { createGateway } from '../index.js';

export const silentLogger = pino({ level: 'silent' });

export const TEST_KEY = 'test-secret';

export function testEnv(overrides: Record<string, string> = {}): Env {
  return envSchema.parse({ GATEWAY_API_KEYS: TEST_KEY, ...overrides });
}

/** Transcribes a window as the character of its first byte. */
export class EchoProvider implements TranscriptionProvider {
  readonly name = 'echo';
  readonly calls: TranscriptionRequest[] = [];

  async transcribe(request: TranscriptionRequest): Promise<ProviderTranscript> {
    this.calls.push(request);
    return { text: String.fromCharCode(request.audio[0]), confidence: 0.9 };
  }
}

export function buildGateway(
  options: { env?: Env; engine?: Partial<Omit<StreamEngineOptions, 'providers' | 'logger'>> } = {},
) {
  const env = options.env ?? testEnv();
  const provider = new EchoProvider();
  const engine = createStreamEngine({ ...options.engine, providers: [provider], logger: silentLogger });
  const gateway = createGateway({
    env,
    logger: silentLogger,
    engine,
    authorizer: new StaticKeyAuthorizer(env.GATEWAY_API_KEYS),
  });
  return { env, engine, gateway, provider };
}
