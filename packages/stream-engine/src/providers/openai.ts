import OpenAI, { toFile } from 'openai';
import { DEFAULT_OPENAI_MODEL } from '@streamscribe/shared-types';
import { fileExtensionFor, mimeTypeFor, toWavBuffer } from '@streamscribe/audio-utils';

import type { ProviderTranscript, TranscriptionProvider, TranscriptionRequest } from './types.js';
import { confidenceFromResponse, whisperResponseSchema } from './whisper.js';

export interface OpenAIProviderOptions {
  apiKey: string;
  name?: string;
  model?: string;
  language?: string;
  prompt?: string;
  temperature?: number;
  client?: OpenAI;
}

export class OpenAIWhisperProvider implements TranscriptionProvider {
  readonly name: string;
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIProviderOptions) {
    this.name = options.name ?? 'openai';
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async transcribe(request: TranscriptionRequest): Promise<ProviderTranscript> {
    const file = await toFile(
      toWavBuffer(request.audio, request),
      `segment.${fileExtensionFor(request.format)}`,
      { type: mimeTypeFor(request.format) },
    );

    const raw = await this.client.audio.transcriptions.create(
      {
        file,
        model: this.options.model ?? DEFAULT_OPENAI_MODEL,
        response_format: 'verbose_json',
        temperature: this.options.temperature ?? 0,
        ...(this.options.language ? { language: this.options.language } : {}),
        ...(this.options.prompt ? { prompt: this.options.prompt } : {}),
      },
      { signal: request.signal },
    );
    const response = whisperResponseSchema.parse(raw);

    return {
      text: response.text?.trim() ?? '',
      confidence: confidenceFromResponse(response),
    };
  }
}
