import type { AudioDescriptor } from '@streamscribe/shared-types';

export interface TranscriptionRequest extends AudioDescriptor {
  audio: Uint8Array;
  signal: AbortSignal;
}

export interface ProviderTranscript {
  text: string;
  confidence: number;
}

/**
 * The only contract the engine needs from a speech backend. Implementations
 * throw on failure and should stop work when `signal` aborts.
 */
export interface TranscriptionProvider {
  readonly name: string;
  transcribe(request: TranscriptionRequest): Promise<ProviderTranscript>;
}
