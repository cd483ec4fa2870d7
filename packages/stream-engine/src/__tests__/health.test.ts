import { describe, expect, it } from 'vitest';

import type { QueueState } from '@streamscribe/shared-types';

import { createStreamEngine } from '../engine.js';
import { buildHealthStatus } from '../health.js';
import { InMemoryBroker } from '../queue/memory-broker.js';
import { echoFirstByte, silentLogger } from './fakes.js';

function sources(errorRate: number, queue?: QueueState) {
  return {
    sessions: { activeSessionCount: () => 4 },
    dispatcher: { providerHealth: () => [{ name: 'groq', attempts: 10, errorRate }] },
    bridge: queue ? { state: () => queue } : undefined,
    now: () => 0,
  };
}

describe('buildHealthStatus', () => {
  it('reports ok with healthy providers and no queue', () => {
    expect(buildHealthStatus(sources(0.1))).toEqual({
      status: 'ok',
      activeSessions: 4,
      providers: [{ name: 'groq', attempts: 10, errorRate: 0.1 }],
      queue: 'disabled',
      timestamp: '1970-01-01T00:00:00.000Z',
    });
  });

  it('degrades when a provider fails half of its recent attempts', () => {
    expect(buildHealthStatus(sources(0.5)).status).toBe('degraded');
  });

  it('degrades when the queue is degraded', () => {
    expect(buildHealthStatus(sources(0, 'degraded')).status).toBe('degraded');
    expect(buildHealthStatus(sources(0, 'connected')).status).toBe('ok');
  });
});

describe('createStreamEngine', () => {
  it('wires sessions through the queue and reports health', async () => {
    const engine = createStreamEngine({
      providers: [echoFirstByte('primary')],
      logger: silentLogger,
      broker: new InMemoryBroker({ logger: silentLogger }),
      sessionRate: { capacity: 5, refillPerSecond: 1 },
    });
    await engine.start();

    engine.sessions.openSession({ clientKey: 'client-a' });
    expect(engine.health()).toMatchObject({
      status: 'ok',
      activeSessions: 1,
      providers: [{ name: 'primary', attempts: 0, errorRate: 0 }],
      queue: 'connected',
    });

    await engine.stop();
    expect(engine.sessions.activeSessionCount()).toBe(0);
    expect(engine.bridge?.state()).toBe('disabled');
  });
});
