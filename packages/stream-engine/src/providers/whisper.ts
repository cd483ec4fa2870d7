import { z } from 'zod';

const whisperSegmentSchema = z
  .object({
    text: z.string().optional(),
    avg_logprob: z.number().optional(),
    confidence: z.number().optional(),
  })
  .passthrough();

export const whisperResponseSchema = z
  .object({
    text: z.string().optional(),
    segments: z.array(whisperSegmentSchema).optional(),
  })
  .passthrough();

export type WhisperSegment = z.infer<typeof whisperSegmentSchema>;
export type WhisperVerboseResponse = z.infer<typeof whisperResponseSchema>;

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(1, value));
}

function segmentConfidence(segment: WhisperSegment): number {
  if (typeof segment.confidence === 'number') {
    return clampConfidence(segment.confidence);
  }
  if (typeof segment.avg_logprob === 'number') {
    return clampConfidence(Math.exp(segment.avg_logprob));
  }
  return 0.5;
}

/**
 * Confidence for a whole response, weighting each segment by the length of
 * its text. Responses without segments report 0.5 when they carry text.
 */
export function confidenceFromResponse(response: WhisperVerboseResponse): number {
  const text = response.text?.trim() ?? '';
  const segments = response.segments ?? [];

  let weighted = 0;
  let total = 0;
  for (const segment of segments) {
    const weight = Math.max(1, segment.text?.trim().length ?? 0);
    weighted += segmentConfidence(segment) * weight;
    total += weight;
  }

  if (total === 0) {
    return text ? 0.5 : 0;
  }
  return clampConfidence(weighted / total);
}
