import { describe, expect, it, vi } from 'vitest';

import type { ProviderAttempt } from '@streamscribe/shared-types';

import { ProviderDispatcher } from '../dispatcher.js';
import {
  DeferredProvider,
  ScriptedProvider,
  alwaysFails,
  echoFirstByte,
  hangs,
  makeSegment,
  silentLogger,
} from './fakes.js';

describe('ProviderDispatcher', () => {
  it('returns the primary provider transcript as a final result', async () => {
    const dispatcher = new ProviderDispatcher({ providers: [echoFirstByte('primary')], logger: silentLogger });

    const result = await dispatcher.dispatch(makeSegment());

    expect(result).toMatchObject({
      sessionId: 'session-1',
      sequence: 0,
      text: 'a',
      confidence: 0.9,
      isFinal: true,
      provider: 'primary',
    });
    expect(result.failure).toBeUndefined();
    expect(result.attemptId.startsWith('session-1:0:1:')).toBe(true);
    expect(dispatcher.recentAttempts().map((attempt) => attempt.outcome)).toEqual(['success']);
  });

  it('falls back to the secondary after exactly one primary timeout per segment', async () => {
    const primary = hangs('primary');
    const secondary = echoFirstByte('secondary');
    const dispatcher = new ProviderDispatcher({
      providers: [primary, secondary],
      timeoutMs: 20,
      logger: silentLogger,
    });

    const segments = [0, 1, 2].map((sequence) => makeSegment({ sequence }));
    const results = await Promise.all(segments.map((segment) => dispatcher.dispatch(segment)));

    expect(results.map((result) => result.provider)).toEqual(['secondary', 'secondary', 'secondary']);
    expect(results.map((result) => result.sequence)).toEqual([0, 1, 2]);

    for (const segment of segments) {
      const primaryAttempts = dispatcher
        .recentAttempts(segment)
        .filter((attempt) => attempt.provider === 'primary');
      expect(primaryAttempts).toHaveLength(1);
      expect(primaryAttempts[0].outcome).toBe('timeout');
    }
    expect(primary.calls.every((call) => call.signal.aborted)).toBe(true);
  });

  it('produces exactly one exhausted final after every attempt fails', async () => {
    const attempts: ProviderAttempt[] = [];
    const dispatcher = new ProviderDispatcher({
      providers: [alwaysFails('primary'), alwaysFails('secondary')],
      logger: silentLogger,
      onAttempt: (attempt) => attempts.push(attempt),
    });

    const result = await dispatcher.dispatch(makeSegment({ sequence: 4 }));

    expect(result).toMatchObject({
      sequence: 4,
      text: '',
      confidence: 0,
      isFinal: true,
      provider: 'none',
      failure: { code: 'ALL_PROVIDERS_EXHAUSTED' },
    });
    expect(attempts.map((attempt) => [attempt.provider, attempt.attempt, attempt.outcome])).toEqual([
      ['primary', 1, 'error'],
      ['primary', 2, 'error'],
      ['secondary', 3, 'error'],
      ['secondary', 4, 'error'],
    ]);
  });

  it('retries the same provider once after an explicit error', async () => {
    const flaky = new ScriptedProvider('primary', async (_request, call) => {
      if (call === 1) {
        throw new Error('503 from upstream');
      }
      return { text: 'recovered', confidence: 0.7 };
    });
    const secondary = echoFirstByte('secondary');
    const dispatcher = new ProviderDispatcher({ providers: [flaky, secondary], logger: silentLogger });

    const result = await dispatcher.dispatch(makeSegment());

    expect(result.provider).toBe('primary');
    expect(result.text).toBe('recovered');
    expect(secondary.calls).toHaveLength(0);
    expect(dispatcher.recentAttempts().map((attempt) => attempt.outcome)).toEqual(['error', 'success']);
  });

  it('keeps at most two segments of a session in flight without holding up other sessions', async () => {
    const provider = new DeferredProvider();
    const dispatcher = new ProviderDispatcher({ providers: [provider], logger: silentLogger });

    const first = [0, 1, 2].map((sequence) => dispatcher.dispatch(makeSegment({ sequence })));
    const other = dispatcher.dispatch(makeSegment({ sessionId: 'session-2' }));

    await vi.waitFor(() => expect(provider.calls).toHaveLength(3));
    expect(dispatcher.inFlightCount('session-1')).toBe(2);
    expect(dispatcher.queuedCount('session-1')).toBe(1);
    expect(dispatcher.inFlightCount('session-2')).toBe(1);

    provider.resolveNext('zero');
    await vi.waitFor(() => expect(provider.calls).toHaveLength(4));
    expect(dispatcher.queuedCount('session-1')).toBe(0);

    provider.resolveNext('one');
    provider.resolveNext('other');
    provider.resolveNext('two');

    const results = await Promise.all([...first, other]);
    expect(results.map((result) => result.text)).toEqual(['zero', 'one', 'two', 'other']);
    expect(dispatcher.inFlightCount('session-1')).toBe(0);
  });

  it('joins a concurrent dispatch of the same segment', async () => {
    const provider = echoFirstByte('primary');
    const dispatcher = new ProviderDispatcher({ providers: [provider], logger: silentLogger });

    const first = dispatcher.dispatch(makeSegment());
    const second = dispatcher.dispatch(makeSegment());

    expect(second).toBe(first);
    await first;
    expect(provider.calls).toHaveLength(1);
  });

  it('cancels running and queued dispatches of a session', async () => {
    const provider = new DeferredProvider();
    const dispatcher = new ProviderDispatcher({ providers: [provider], logger: silentLogger });

    const pending = [0, 1, 2].map((sequence) => dispatcher.dispatch(makeSegment({ sequence })));
    await vi.waitFor(() => expect(provider.calls).toHaveLength(2));

    expect(dispatcher.cancelSession('session-1')).toBe(3);

    const results = await Promise.all(pending);
    expect(results.map((result) => result.failure?.code)).toEqual(['CANCELLED', 'CANCELLED', 'CANCELLED']);
    expect(provider.calls.every((call) => call.signal.aborted)).toBe(true);
    expect(dispatcher.inFlightCount('session-1')).toBe(0);
    expect(dispatcher.cancelSession('session-1')).toBe(0);
  });

  it('reports a recent error rate per provider', async () => {
    const dispatcher = new ProviderDispatcher({
      providers: [hangs('primary'), echoFirstByte('secondary')],
      timeoutMs: 10,
      logger: silentLogger,
    });

    await dispatcher.dispatch(makeSegment({ sequence: 0 }));
    await dispatcher.dispatch(makeSegment({ sequence: 1 }));

    expect(dispatcher.providerHealth()).toEqual([
      { name: 'primary', attempts: 2, errorRate: 1 },
      { name: 'secondary', attempts: 2, errorRate: 0 },
    ]);
  });

  it('refuses to start without providers', () => {
    expect(() => new ProviderDispatcher({ providers: [] })).toThrow('At least one transcription provider is required');
  });
});
