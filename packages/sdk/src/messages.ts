import { z } from 'zod';

import type { OutboundMessage } from '@streamscribe/shared-types';

const serverMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('session'),
    sessionId: z.string(),
    timestamp: z.string(),
  }),
  z.object({
    type: z.literal('transcription'),
    sequence: z.number().int().nonnegative(),
    text: z.string(),
    confidence: z.number(),
    isFinal: z.boolean(),
    provider: z.string(),
    timestamp: z.string(),
  }),
  z.object({
    type: z.literal('error'),
    code: z.string(),
    sequence: z.number().int().nonnegative().optional(),
    text: z.string(),
    confidence: z.number(),
    isFinal: z.boolean(),
    timestamp: z.string(),
  }),
  z.object({
    type: z.literal('pong'),
    timestamp: z.string(),
  }),
  z.object({
    type: z.literal('status'),
    sessionId: z.string(),
    state: z.enum(['active', 'draining', 'closed']),
    nextSequence: z.number().int().nonnegative(),
    pendingSegments: z.number().int().nonnegative(),
    createdAt: z.string(),
    lastActivityAt: z.string(),
    timestamp: z.string(),
  }),
]);

export function parseServerMessage(raw: string): OutboundMessage {
  return serverMessageSchema.parse(JSON.parse(raw));
}
