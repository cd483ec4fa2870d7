export type { ProviderTranscript, TranscriptionProvider, TranscriptionRequest } from './types.js';
export { GroqWhisperProvider, type GroqProviderOptions } from './groq.js';
export { OpenAIWhisperProvider, type OpenAIProviderOptions } from './openai.js';
export { HttpTranscriptionProvider, type HttpProviderOptions } from './http.js';
export { clampConfidence, confidenceFromResponse } from './whisper.js';
export {
  createProvider,
  createProviders,
  providerEnvSchema,
  providerSpecsFromEnv,
  type ProviderEnv,
  type ProviderKind,
  type ProviderSpec,
} from './config.js';
