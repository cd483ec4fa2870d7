import Groq, { toFile } from 'groq-sdk';
import { DEFAULT_GROQ_MODEL } from '@streamscribe/shared-types';
import { fileExtensionFor, mimeTypeFor, toWavBuffer } from '@streamscribe/audio-utils';

import type { ProviderTranscript, TranscriptionProvider, TranscriptionRequest } from './types.js';
import { confidenceFromResponse, whisperResponseSchema } from './whisper.js';

type TranscriptionParams = Parameters<Groq['audio']['transcriptions']['create']>[0];

export interface GroqProviderOptions {
  apiKey: string;
  name?: string;
  model?: string;
  language?: string;
  prompt?: string;
  temperature?: number;
  client?: Groq;
}

export class GroqWhisperProvider implements TranscriptionProvider {
  readonly name: string;
  private readonly client: Groq;

  constructor(private readonly options: GroqProviderOptions) {
    this.name = options.name ?? 'groq';
    // Retries belong to the dispatcher, not the SDK.
    this.client = options.client ?? new Groq({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async transcribe(request: TranscriptionRequest): Promise<ProviderTranscript> {
    const file = await toFile(
      toWavBuffer(request.audio, request),
      `segment.${fileExtensionFor(request.format)}`,
      { type: mimeTypeFor(request.format) },
    );

    const requestPayload: TranscriptionParams = {
      file,
      model: this.options.model ?? DEFAULT_GROQ_MODEL,
      response_format: 'verbose_json',
      temperature: this.options.temperature ?? 0,
      ...(this.options.language ? { language: this.options.language } : {}),
      ...(this.options.prompt ? { prompt: this.options.prompt } : {}),
    };

    const raw = await this.client.audio.transcriptions.create(requestPayload, { signal: request.signal });
    const response = whisperResponseSchema.parse(raw);

    return {
      text: response.text?.trim() ?? '',
      confidence: confidenceFromResponse(response),
    };
  }
}
