import { z } from 'zod';
import { DEFAULT_GROQ_MODEL, DEFAULT_OPENAI_MODEL } from '@streamscribe/shared-types';

import { GroqWhisperProvider } from './groq.js';
import { HttpTranscriptionProvider } from './http.js';
import { OpenAIWhisperProvider } from './openai.js';
import type { TranscriptionProvider } from './types.js';

const providerKindSchema = z.enum(['groq', 'openai', 'http']);

function optionalTrimmed() {
  return z
    .string()
    .optional()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : undefined;
    });
}

/**
 * Environment fragment shared by every process that builds providers. The
 * order of `STT_PROVIDERS` is the fallback order.
 */
export const providerEnvSchema = z.object({
  STT_PROVIDERS: z
    .string()
    .default('groq')
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim().toLowerCase())
        .filter(Boolean),
    )
    .pipe(z.array(providerKindSchema).min(1)),
  GROQ_API_KEY: optionalTrimmed(),
  GROQ_STT_MODEL: z.string().default(DEFAULT_GROQ_MODEL),
  OPENAI_API_KEY: optionalTrimmed(),
  OPENAI_STT_MODEL: z.string().default(DEFAULT_OPENAI_MODEL),
  HTTP_STT_URL: z.string().url().optional(),
  HTTP_STT_API_KEY: optionalTrimmed(),
  STT_LANGUAGE: optionalTrimmed(),
  STT_PROMPT: optionalTrimmed(),
  STT_TEMPERATURE: z.coerce.number().min(0).max(1).default(0),
});

export type ProviderEnv = z.infer<typeof providerEnvSchema>;
export type ProviderKind = z.infer<typeof providerKindSchema>;

interface WhisperSpecBase {
  apiKey: string;
  model: string;
  language?: string;
  prompt?: string;
  temperature: number;
}

export type ProviderSpec =
  | ({ kind: 'groq' } & WhisperSpecBase)
  | ({ kind: 'openai' } & WhisperSpecBase)
  | { kind: 'http'; url: string; apiKey?: string };

export function providerSpecsFromEnv(env: ProviderEnv): ProviderSpec[] {
  const shared = {
    language: env.STT_LANGUAGE,
    prompt: env.STT_PROMPT,
    temperature: env.STT_TEMPERATURE,
  };

  return env.STT_PROVIDERS.map((kind): ProviderSpec => {
    switch (kind) {
      case 'groq':
        if (!env.GROQ_API_KEY) {
          throw new Error('GROQ_API_KEY is required when groq is listed in STT_PROVIDERS');
        }
        return { kind, apiKey: env.GROQ_API_KEY, model: env.GROQ_STT_MODEL, ...shared };
      case 'openai':
        if (!env.OPENAI_API_KEY) {
          throw new Error('OPENAI_API_KEY is required when openai is listed in STT_PROVIDERS');
        }
        return { kind, apiKey: env.OPENAI_API_KEY, model: env.OPENAI_STT_MODEL, ...shared };
      case 'http':
        if (!env.HTTP_STT_URL) {
          throw new Error('HTTP_STT_URL is required when http is listed in STT_PROVIDERS');
        }
        return { kind, url: env.HTTP_STT_URL, apiKey: env.HTTP_STT_API_KEY };
    }
  });
}

export function createProvider(spec: ProviderSpec): TranscriptionProvider {
  switch (spec.kind) {
    case 'groq':
      return new GroqWhisperProvider(spec);
    case 'openai':
      return new OpenAIWhisperProvider(spec);
    case 'http':
      return new HttpTranscriptionProvider(spec);
  }
}

export function createProviders(specs: ProviderSpec[]): TranscriptionProvider[] {
  const seen = new Set<ProviderKind>();
  return specs
    .filter((spec) => {
      if (seen.has(spec.kind)) {
        return false;
      }
      seen.add(spec.kind);
      return true;
    })
    .map(createProvider);
}
