import { describe, expect, it } from 'vitest';

import { parseEnv } from '../config.js';
import { silentLogger } from './helpers.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({}, silentLogger);

    expect(env.GATEWAY_PORT).toBe(8080);
    expect(env.STT_PROVIDERS).toEqual(['groq']);
    expect(env.QUEUE_DRIVER).toBe('none');
    expect(env.REORDER_BUFFER_SIZE).toBe(8);
    expect(env.GATEWAY_API_KEYS).toEqual([]);
  });

  it('splits comma lists', () => {
    const env = parseEnv({ GATEWAY_API_KEYS: 'a, b,,c', STT_PROVIDERS: 'openai,groq' }, silentLogger);

    expect(env.GATEWAY_API_KEYS).toEqual(['a', 'b', 'c']);
    expect(env.STT_PROVIDERS).toEqual(['openai', 'groq']);
  });

  it('requires supabase credentials in supabase mode', () => {
    expect(() => parseEnv({ AUTH_MODE: 'supabase' }, silentLogger)).toThrow(
      'SUPABASE_URL and SUPABASE_SERVICE_KEY are required when AUTH_MODE=supabase',
    );
  });

  it('requires brokers for the kafka driver', () => {
    expect(() => parseEnv({ QUEUE_DRIVER: 'kafka' }, silentLogger)).toThrow('KAFKA_BROKERS is required');
  });

  it('rejects an unknown provider', () => {
    expect(() => parseEnv({ STT_PROVIDERS: 'whisper.cpp' }, silentLogger)).toThrow();
  });
});
