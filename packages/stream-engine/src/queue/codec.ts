import { z } from 'zod';

import type {
  AudioSegment,
  ResultEnvelope,
  SegmentEnvelope,
  TranscriptionResult,
} from '@streamscribe/shared-types';

const segmentPayloadSchema = z.object({
  format: z.enum(['s16le', 'f32le', 'wav', 'webm', 'ogg']),
  sampleRate: z.number().int().positive(),
  channels: z.number().int().positive(),
  audio: z.string(),
  capturedAt: z.number(),
  startMs: z.number().nonnegative(),
  endMs: z.number().nonnegative(),
  isFinalChunk: z.boolean(),
});

const transcriptionResultSchema = z.object({
  sessionId: z.string().min(1),
  sequence: z.number().int().nonnegative(),
  text: z.string(),
  confidence: z.number().min(0).max(1),
  isFinal: z.boolean(),
  provider: z.string(),
  latencyMs: z.number().nonnegative(),
  attemptId: z.string(),
  failure: z
    .object({
      code: z.enum(['ALL_PROVIDERS_EXHAUSTED', 'CANCELLED']),
      message: z.string(),
    })
    .optional(),
});

function envelopeSchema<T extends z.ZodTypeAny>(payload: T) {
  return z.object({
    sessionId: z.string().min(1),
    sequence: z.number().int().nonnegative(),
    attemptId: z.string().min(1),
    payload,
  });
}

export const segmentEnvelopeSchema = envelopeSchema(segmentPayloadSchema);
export const resultEnvelopeSchema = envelopeSchema(transcriptionResultSchema);

export interface DecodedSegment {
  attemptId: string;
  segment: AudioSegment;
}

export function encodeSegment(segment: AudioSegment, attemptId: string): string {
  const envelope: SegmentEnvelope = {
    sessionId: segment.sessionId,
    sequence: segment.sequence,
    attemptId,
    payload: {
      format: segment.format,
      sampleRate: segment.sampleRate,
      channels: segment.channels,
      audio: Buffer.from(segment.payload.buffer, segment.payload.byteOffset, segment.payload.byteLength).toString(
        'base64',
      ),
      capturedAt: segment.capturedAt,
      startMs: segment.startMs,
      endMs: segment.endMs,
      isFinalChunk: segment.isFinalChunk,
    },
  };
  return JSON.stringify(envelope);
}

export function decodeSegment(value: string): DecodedSegment {
  const envelope = segmentEnvelopeSchema.parse(JSON.parse(value));
  const { audio, ...descriptor } = envelope.payload;
  return {
    attemptId: envelope.attemptId,
    segment: {
      ...descriptor,
      sessionId: envelope.sessionId,
      sequence: envelope.sequence,
      payload: new Uint8Array(Buffer.from(audio, 'base64')),
    },
  };
}

export function encodeResult(result: TranscriptionResult, attemptId = result.attemptId): string {
  const envelope: ResultEnvelope = {
    sessionId: result.sessionId,
    sequence: result.sequence,
    attemptId,
    payload: result,
  };
  return JSON.stringify(envelope);
}

export function decodeResult(value: string): { attemptId: string; result: TranscriptionResult } {
  const envelope = resultEnvelopeSchema.parse(JSON.parse(value));
  return { attemptId: envelope.attemptId, result: envelope.payload };
}
