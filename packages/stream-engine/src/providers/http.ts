import { z } from 'zod';
import { mimeTypeFor, toWavBuffer } from '@streamscribe/audio-utils';

import { ProviderError } from '../errors.js';
import type { ProviderTranscript, TranscriptionProvider, TranscriptionRequest } from './types.js';
import { clampConfidence } from './whisper.js';

const responseSchema = z.object({
  text: z.string(),
  confidence: z.number().optional(),
});

export interface HttpProviderOptions {
  url: string;
  name?: string;
  apiKey?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Self-hosted model server: the audio is POSTed as the request body and the
 * server answers `{ text, confidence? }`.
 */
export class HttpTranscriptionProvider implements TranscriptionProvider {
  readonly name: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpProviderOptions) {
    this.name = options.name ?? 'http';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async transcribe(request: TranscriptionRequest): Promise<ProviderTranscript> {
    const response = await this.fetchImpl(this.options.url, {
      method: 'POST',
      headers: {
        'Content-Type': mimeTypeFor(request.format),
        'X-Sample-Rate': String(request.sampleRate),
        'X-Channels': String(request.channels),
        ...(this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {}),
      },
      body: toWavBuffer(request.audio, request),
      signal: request.signal,
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new ProviderError(this.name, `responded with ${response.status}: ${errorBody}`);
    }

    const parsed = responseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(this.name, 'returned an invalid payload', parsed.error);
    }

    const text = parsed.data.text.trim();
    return {
      text,
      confidence: clampConfidence(parsed.data.confidence ?? (text ? 0.5 : 0)),
    };
  }
}
