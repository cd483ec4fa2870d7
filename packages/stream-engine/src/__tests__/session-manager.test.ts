import { describe, expect, it } from 'vitest';

import type { OutboundMessage } from '@streamscribe/shared-types';

import { ResultBroadcaster } from '../broadcaster.js';
import type { ResultChannel } from '../channel.js';
import { ProviderDispatcher } from '../dispatcher.js';
import { CapacityExceededError, UnknownSessionError } from '../errors.js';
import type { TranscriptionProvider } from '../providers/types.js';
import { TokenBucketRateLimiter } from '../rate-limiter.js';
import { SessionManager, type SessionLimits } from '../session-manager.js';
import { ScriptedProvider, echoFirstByte, hangs, silentLogger } from './fakes.js';

const WINDOW_BYTES = 8000;

function windowOf(char: string): Uint8Array {
  return new Uint8Array(WINDOW_BYTES).fill(char.charCodeAt(0));
}

async function collect(channel: ResultChannel<OutboundMessage>): Promise<OutboundMessage[]> {
  const messages: OutboundMessage[] = [];
  for await (const message of channel) {
    messages.push(message);
  }
  return messages;
}

function textsOf(messages: OutboundMessage[]): string[] {
  return messages.map((message) => (message.type === 'transcription' || message.type === 'error' ? message.text : ''));
}

function setup(
  options: {
    providers?: TranscriptionProvider[];
    limits?: Partial<SessionLimits>;
    rateLimiter?: TokenBucketRateLimiter;
    timeoutMs?: number;
  } = {},
) {
  const clock = { now: 1_700_000_000_000 };
  const dispatcher = new ProviderDispatcher({
    providers: options.providers ?? [echoFirstByte('primary')],
    timeoutMs: options.timeoutMs,
    logger: silentLogger,
  });
  const broadcaster = new ResultBroadcaster({ logger: silentLogger });
  let ids = 0;
  const manager = new SessionManager({
    dispatcher,
    broadcaster,
    rateLimiter: options.rateLimiter,
    limits: options.limits,
    logger: silentLogger,
    now: () => clock.now,
    generateId: () => `session-${++ids}`,
  });
  return { manager, dispatcher, broadcaster, clock };
}

describe('SessionManager', () => {
  it('opens sessions with a fresh sequence counter', () => {
    const { manager } = setup();

    const { sessionId } = manager.openSession({ clientKey: 'client-a' });

    expect(sessionId).toBe('session-1');
    expect(manager.getSession(sessionId)).toMatchObject({
      clientKey: 'client-a',
      state: 'active',
      nextSequence: 0,
      pendingSegments: 0,
      audio: { format: 's16le', sampleRate: 16000, channels: 1 },
    });
    expect(manager.activeSessionCount()).toBe(1);
  });

  it('refuses sessions past the process cap without keeping any state', () => {
    const { manager, broadcaster } = setup({ limits: { maxSessions: 2 } });
    manager.openSession({ clientKey: 'client-a' });
    manager.openSession({ clientKey: 'client-b' });

    expect(() => manager.openSession({ clientKey: 'client-c' })).toThrow(CapacityExceededError);
    expect(manager.activeSessionCount()).toBe(2);
    expect(manager.sessionCountFor('client-c')).toBe(0);
    expect(broadcaster.isRegistered('session-3')).toBe(false);
  });

  it('refuses a client past its own cap', () => {
    const { manager } = setup({ limits: { maxSessionsPerClient: 1 } });
    manager.openSession({ clientKey: 'client-a' });

    let refusal: unknown;
    try {
      manager.openSession({ clientKey: 'client-a' });
    } catch (error) {
      refusal = error;
    }

    expect(refusal).toBeInstanceOf(CapacityExceededError);
    expect(refusal).toMatchObject({ code: 'CAPACITY_EXCEEDED', statusCode: 503, details: { reason: 'client' } });
    expect(manager.sessionCountFor('client-a')).toBe(1);
    expect(manager.openSession({ clientKey: 'client-b' }).sessionId).toBe('session-2');
  });

  it('refuses a client the rate limiter turns away', () => {
    const rateLimiter = new TokenBucketRateLimiter({ capacity: 1, refillPerSecond: 1, now: () => 0 });
    const { manager } = setup({ rateLimiter });
    manager.openSession({ clientKey: 'client-a' });

    expect(() => manager.openSession({ clientKey: 'client-a' })).toThrow('Session capacity exceeded (rate limit)');
    expect(manager.sessionCountFor('client-a')).toBe(1);
  });

  it('delivers three windows as three ordered finals', async () => {
    const { manager } = setup();
    const { sessionId, channel } = manager.openSession({ clientKey: 'client-a' });
    const received = collect(channel);

    expect(manager.ingest(sessionId, windowOf('a'))).toBe(1);
    expect(manager.ingest(sessionId, windowOf('b'))).toBe(1);
    expect(manager.ingest(sessionId, windowOf('c'))).toBe(1);
    await manager.closeSession(sessionId);

    const messages = await received;
    expect(textsOf(messages)).toEqual(['a', 'b', 'c']);
    expect(messages.every((message) => message.type === 'transcription' && message.isFinal)).toBe(true);
  });

  it('keeps sequence order when a later segment finishes first', async () => {
    const slowFirst = new ScriptedProvider('primary', async (request) => {
      const text = String.fromCharCode(request.audio[0]);
      if (text === 'a') {
        await new Promise((resolve) => setTimeout(resolve, 30));
      }
      return { text, confidence: 0.8 };
    });
    const { manager } = setup({ providers: [slowFirst] });
    const { sessionId, channel } = manager.openSession({ clientKey: 'client-a' });
    const received = collect(channel);

    manager.ingest(sessionId, windowOf('a'));
    manager.ingest(sessionId, windowOf('b'));
    await manager.closeSession(sessionId);

    expect(textsOf(await received)).toEqual(['a', 'b']);
  });

  it('flushes the partial remainder as the final chunk on close', async () => {
    const { manager } = setup();
    const { sessionId, channel } = manager.openSession({ clientKey: 'client-a' });
    const received = collect(channel);

    expect(manager.ingest(sessionId, new Uint8Array(4000).fill('d'.charCodeAt(0)))).toBe(0);
    await manager.closeSession(sessionId);

    expect(textsOf(await received)).toEqual(['d']);
  });

  it('closes within the drain grace and writes nothing afterwards', async () => {
    const { manager, dispatcher, broadcaster } = setup({
      providers: [hangs('primary')],
      timeoutMs: 60_000,
      limits: { drainGraceMs: 30 },
    });
    const { sessionId, channel } = manager.openSession({ clientKey: 'client-a' });
    const received = collect(channel);

    manager.ingest(sessionId, windowOf('a'));
    manager.ingest(sessionId, windowOf('b'));
    expect(manager.getSession(sessionId)?.pendingSegments).toBe(2);

    const startedAt = Date.now();
    await manager.closeSession(sessionId);

    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(manager.getSession(sessionId)).toBeUndefined();
    expect(channel.isClosed).toBe(true);
    expect(await received).toEqual([]);

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(dispatcher.inFlightCount(sessionId)).toBe(0);
    expect(broadcaster.stats().delivered).toBe(0);
    expect(manager.sessionCountFor('client-a')).toBe(0);
  });

  it('shares one close between concurrent callers', async () => {
    const { manager } = setup();
    const { sessionId } = manager.openSession({ clientKey: 'client-a' });

    const first = manager.closeSession(sessionId);
    expect(manager.closeSession(sessionId)).toBe(first);
    await first;

    await expect(manager.closeSession(sessionId)).resolves.toBeUndefined();
  });

  it('rejects audio for unknown and closing sessions', async () => {
    const { manager } = setup();
    const { sessionId } = manager.openSession({ clientKey: 'client-a' });

    expect(() => manager.ingest('missing', windowOf('a'))).toThrow(UnknownSessionError);

    const closing = manager.closeSession(sessionId);
    expect(() => manager.ingest(sessionId, windowOf('a'))).toThrow(`Session ${sessionId} is draining`);
    await closing;
    expect(() => manager.ingest(sessionId, windowOf('a'))).toThrow(`Session ${sessionId} not found`);
  });

  it('discards results for sessions it no longer has', async () => {
    const { manager, broadcaster } = setup();
    const { sessionId } = manager.openSession({ clientKey: 'client-a' });
    await manager.closeSession(sessionId);

    manager.complete({
      sessionId,
      sequence: 0,
      text: 'late',
      confidence: 1,
      isFinal: true,
      provider: 'primary',
      latencyMs: 5,
      attemptId: 'late',
    });

    expect(broadcaster.stats().delivered).toBe(0);
  });

  it('closes idle sessions on sweep', async () => {
    const { manager, clock } = setup({ limits: { idleTimeoutMs: 60_000 } });
    const idle = manager.openSession({ clientKey: 'client-a' });
    clock.now += 30_000;
    const busy = manager.openSession({ clientKey: 'client-b' });
    clock.now += 30_000;

    expect(manager.sweepIdle()).toBe(1);
    await manager.closeSession(idle.sessionId);

    expect(manager.getSession(idle.sessionId)).toBeUndefined();
    expect(manager.getSession(busy.sessionId)?.state).toBe('active');
  });

  it('closes every session on shutdown', async () => {
    const { manager } = setup();
    const first = manager.openSession({ clientKey: 'client-a' });
    const second = manager.openSession({ clientKey: 'client-b' });

    await manager.shutdown();

    expect(manager.activeSessionCount()).toBe(0);
    expect(first.channel.isClosed).toBe(true);
    expect(second.channel.isClosed).toBe(true);
  });
});
