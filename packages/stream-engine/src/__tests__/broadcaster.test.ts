import { afterEach, describe, expect, it, vi } from 'vitest';

import type { OutboundMessage } from '@streamscribe/shared-types';

import { ResultBroadcaster } from '../broadcaster.js';
import { ResultChannel } from '../channel.js';
import { makeResult, silentLogger } from './fakes.js';

async function drain(channel: ResultChannel<OutboundMessage>): Promise<OutboundMessage[]> {
  const messages: OutboundMessage[] = [];
  while (channel.size > 0) {
    const next = await channel.next();
    if (!next.done) {
      messages.push(next.value);
    }
  }
  return messages;
}

function sequencesOf(messages: OutboundMessage[]): Array<number | undefined> {
  return messages.map((message) =>
    message.type === 'transcription' || message.type === 'error' ? message.sequence : undefined,
  );
}

function setup(options: { reorderBufferSize?: number; reorderTimeoutMs?: number } = {}) {
  const broadcaster = new ResultBroadcaster({ ...options, logger: silentLogger, now: () => 0 });
  const channel = new ResultChannel<OutboundMessage>();
  broadcaster.register('session-1', channel);
  return { broadcaster, channel };
}

describe('ResultBroadcaster', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('emits in-order finals as transcription messages', async () => {
    const { broadcaster, channel } = setup();

    broadcaster.deliver(makeResult({ sequence: 0, text: 'a' }));
    broadcaster.deliver(makeResult({ sequence: 1, text: 'b' }));
    broadcaster.deliver(makeResult({ sequence: 2, text: 'c' }));

    expect(await drain(channel)).toEqual([
      {
        type: 'transcription',
        sequence: 0,
        text: 'a',
        confidence: 0.9,
        isFinal: true,
        provider: 'primary',
        timestamp: '1970-01-01T00:00:00.000Z',
      },
      expect.objectContaining({ sequence: 1, text: 'b' }),
      expect.objectContaining({ sequence: 2, text: 'c' }),
    ]);
  });

  it('holds early finals until the gap is filled', async () => {
    const { broadcaster, channel } = setup();

    broadcaster.deliver(makeResult({ sequence: 2 }));
    expect(channel.size).toBe(0);
    expect(broadcaster.bufferedCount('session-1')).toBe(1);

    broadcaster.deliver(makeResult({ sequence: 0 }));
    broadcaster.deliver(makeResult({ sequence: 1 }));

    expect(sequencesOf(await drain(channel))).toEqual([0, 1, 2]);
    expect(broadcaster.bufferedCount('session-1')).toBe(0);
    expect(broadcaster.nextExpected('session-1')).toBe(3);
  });

  it('drops a second final for the same sequence', async () => {
    const { broadcaster, channel } = setup();

    expect(broadcaster.deliver(makeResult({ sequence: 0 }))).toBe(true);
    expect(broadcaster.deliver(makeResult({ sequence: 0, text: 'again' }))).toBe(false);

    expect(await drain(channel)).toHaveLength(1);
    expect(broadcaster.stats().duplicatesDropped).toBe(1);
  });

  it('passes interim results through and drops them once the sequence is final', async () => {
    const { broadcaster, channel } = setup();

    broadcaster.deliver(makeResult({ sequence: 1, isFinal: false, text: 'par' }));
    broadcaster.deliver(makeResult({ sequence: 0 }));
    broadcaster.deliver(makeResult({ sequence: 1, text: 'partial' }));
    expect(broadcaster.deliver(makeResult({ sequence: 1, isFinal: false, text: 'late' }))).toBe(false);

    const messages = await drain(channel);
    expect(messages.map((message) => (message.type === 'transcription' ? [message.sequence, message.isFinal] : []))).toEqual([
      [1, false],
      [0, true],
      [1, true],
    ]);
    expect(broadcaster.stats().staleDropped).toBe(1);
  });

  it('flushes buffered finals when a gap outlives the reorder timeout', async () => {
    vi.useFakeTimers();
    const { broadcaster, channel } = setup({ reorderTimeoutMs: 2000 });

    broadcaster.deliver(makeResult({ sequence: 1 }));
    broadcaster.deliver(makeResult({ sequence: 2 }));

    vi.advanceTimersByTime(1999);
    expect(channel.size).toBe(0);

    vi.advanceTimersByTime(1);
    expect(sequencesOf(await drain(channel))).toEqual([1, 2]);
    expect(broadcaster.nextExpected('session-1')).toBe(3);

    expect(broadcaster.deliver(makeResult({ sequence: 0 }))).toBe(true);
    expect(broadcaster.deliver(makeResult({ sequence: 0 }))).toBe(false);
    expect(sequencesOf(await drain(channel))).toEqual([0]);
    expect(broadcaster.stats().reorderViolations).toBe(2);
  });

  it('skips the gap when the reorder buffer overflows', async () => {
    const { broadcaster, channel } = setup({ reorderBufferSize: 2 });

    broadcaster.deliver(makeResult({ sequence: 1 }));
    broadcaster.deliver(makeResult({ sequence: 2 }));
    expect(channel.size).toBe(0);

    broadcaster.deliver(makeResult({ sequence: 3 }));

    expect(sequencesOf(await drain(channel))).toEqual([1, 2, 3]);
    expect(broadcaster.nextExpected('session-1')).toBe(4);
    expect(broadcaster.stats().reorderViolations).toBe(1);
  });

  it('delivers a late final from anywhere in a wide skipped gap exactly once', async () => {
    const { broadcaster, channel } = setup({ reorderBufferSize: 2 });

    broadcaster.deliver(makeResult({ sequence: 1000 }));
    broadcaster.deliver(makeResult({ sequence: 1001 }));
    broadcaster.deliver(makeResult({ sequence: 1002 }));
    expect(broadcaster.nextExpected('session-1')).toBe(1003);

    expect(broadcaster.deliver(makeResult({ sequence: 0 }))).toBe(true);
    expect(broadcaster.deliver(makeResult({ sequence: 500 }))).toBe(true);
    expect(broadcaster.deliver(makeResult({ sequence: 999 }))).toBe(true);
    expect(broadcaster.deliver(makeResult({ sequence: 500 }))).toBe(false);

    expect(sequencesOf(await drain(channel))).toEqual([1000, 1001, 1002, 0, 500, 999]);
    expect(broadcaster.stats()).toMatchObject({ reorderViolations: 4, duplicatesDropped: 1 });
  });

  it('turns failure results into error messages and keeps the session going', async () => {
    const { broadcaster, channel } = setup();

    broadcaster.deliver(
      makeResult({
        sequence: 0,
        text: '',
        confidence: 0,
        provider: 'none',
        failure: { code: 'ALL_PROVIDERS_EXHAUSTED', message: 'All providers exhausted for session-1:0 after 4 attempts' },
      }),
    );
    broadcaster.deliver(makeResult({ sequence: 1, text: 'next' }));

    const messages = await drain(channel);
    expect(messages[0]).toEqual({
      type: 'error',
      code: 'ALL_PROVIDERS_EXHAUSTED',
      sequence: 0,
      text: 'All providers exhausted for session-1:0 after 4 attempts',
      confidence: 0,
      isFinal: true,
      timestamp: '1970-01-01T00:00:00.000Z',
    });
    expect(messages[1]).toMatchObject({ type: 'transcription', sequence: 1, text: 'next' });
  });

  it('closes the channel on unregister and ignores later results', () => {
    const { broadcaster, channel } = setup();
    broadcaster.deliver(makeResult({ sequence: 3 }));

    broadcaster.unregister('session-1');

    expect(channel.isClosed).toBe(true);
    expect(broadcaster.isRegistered('session-1')).toBe(false);
    expect(broadcaster.deliver(makeResult({ sequence: 0 }))).toBe(false);
  });

  it('rejects registering the same session twice', () => {
    const { broadcaster } = setup();
    expect(() => broadcaster.register('session-1', new ResultChannel())).toThrow(
      'Session session-1 is already registered',
    );
  });
});
