import type { OutboundMessage, TranscriptionResult } from '@streamscribe/shared-types';

import type { ResultChannel } from './channel.js';
import { ReorderTimeoutError } from './errors.js';
import { createComponentLogger, type Logger } from './logger.js';

export interface BroadcasterOptions {
  reorderBufferSize?: number;
  reorderTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface BroadcasterStats {
  delivered: number;
  reorderViolations: number;
  duplicatesDropped: number;
  staleDropped: number;
}

interface OrderingState {
  channel: ResultChannel<OutboundMessage>;
  nextSequence: number;
  buffer: Map<number, TranscriptionResult>;
  skipped: SkippedRanges;
  gapTimer?: NodeJS.Timeout;
  gapSequence?: number;
}

/**
 * Sequences the ordering cursor moved past without a final, kept as half-open
 * ranges so a wide gap costs one entry. Each sequence is taken at most once.
 */
class SkippedRanges {
  private readonly ranges: Array<{ from: number; to: number }> = [];

  /** Ranges arrive in ascending order since the cursor only moves forward. */
  add(from: number, to: number): void {
    if (to <= from) {
      return;
    }
    const last = this.ranges.at(-1);
    if (last && last.to === from) {
      last.to = to;
      return;
    }
    this.ranges.push({ from, to });
  }

  take(sequence: number): boolean {
    const index = this.ranges.findIndex((range) => sequence >= range.from && sequence < range.to);
    if (index === -1) {
      return false;
    }
    const { from, to } = this.ranges[index];
    const remainder = [
      { from, to: sequence },
      { from: sequence + 1, to },
    ].filter((range) => range.to > range.from);
    this.ranges.splice(index, 1, ...remainder);
    return true;
  }
}

export function toOutboundMessage(result: TranscriptionResult, timestamp: string): OutboundMessage {
  if (result.failure) {
    return {
      type: 'error',
      code: result.failure.code,
      sequence: result.sequence,
      text: result.failure.message,
      confidence: 0,
      isFinal: true,
      timestamp,
    };
  }

  return {
    type: 'transcription',
    sequence: result.sequence,
    text: result.text,
    confidence: result.confidence,
    isFinal: result.isFinal,
    provider: result.provider,
    timestamp,
  };
}

/**
 * Writes results to each session's channel in sequence order.
 *
 * Finals advance the expected sequence; early finals wait in a bounded
 * reorder buffer. A gap that outlives `reorderTimeoutMs`, or a buffer that
 * outgrows `reorderBufferSize`, is skipped rather than stalling the session.
 * Interim results bypass ordering.
 */
export class ResultBroadcaster {
  private readonly sessions = new Map<string, OrderingState>();
  private readonly bufferSize: number;
  private readonly reorderTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly counters: BroadcasterStats = {
    delivered: 0,
    reorderViolations: 0,
    duplicatesDropped: 0,
    staleDropped: 0,
  };

  constructor(options: BroadcasterOptions = {}) {
    this.bufferSize = Math.max(1, options.reorderBufferSize ?? 8);
    this.reorderTimeoutMs = options.reorderTimeoutMs ?? 2000;
    this.logger = createComponentLogger('broadcaster', options.logger);
    this.now = options.now ?? Date.now;
  }

  register(sessionId: string, channel: ResultChannel<OutboundMessage>): void {
    if (this.sessions.has(sessionId)) {
      throw new Error(`Session ${sessionId} is already registered`);
    }
    this.sessions.set(sessionId, {
      channel,
      nextSequence: 0,
      buffer: new Map(),
      skipped: new SkippedRanges(),
    });
  }

  /** Stops delivery for a session and closes its channel. Buffered results are dropped. */
  unregister(sessionId: string): void {
    const state = this.sessions.get(sessionId);
    if (!state) {
      return;
    }
    this.clearGapTimer(state);
    if (state.buffer.size > 0) {
      this.logger.debug({ sessionId, dropped: state.buffer.size }, 'Dropping buffered results of closed session');
    }
    state.buffer.clear();
    state.channel.close();
    this.sessions.delete(sessionId);
  }

  isRegistered(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  bufferedCount(sessionId: string): number {
    return this.sessions.get(sessionId)?.buffer.size ?? 0;
  }

  nextExpected(sessionId: string): number | undefined {
    return this.sessions.get(sessionId)?.nextSequence;
  }

  stats(): BroadcasterStats {
    return { ...this.counters };
  }

  /** Returns false when the result was dropped. */
  deliver(result: TranscriptionResult): boolean {
    const state = this.sessions.get(result.sessionId);
    if (!state) {
      this.logger.debug(
        { sessionId: result.sessionId, sequence: result.sequence },
        'Dropping result for inactive session',
      );
      return false;
    }

    if (!result.isFinal) {
      if (result.sequence < state.nextSequence || state.buffer.has(result.sequence)) {
        this.counters.staleDropped += 1;
        return false;
      }
      this.emit(state, result);
      return true;
    }

    if (result.sequence < state.nextSequence) {
      if (state.skipped.take(result.sequence)) {
        this.counters.reorderViolations += 1;
        this.logger.warn(
          { sessionId: result.sessionId, sequence: result.sequence, expected: state.nextSequence },
          'Delivering late result out of order',
        );
        this.emit(state, result);
        return true;
      }
      this.counters.duplicatesDropped += 1;
      return false;
    }

    if (state.buffer.has(result.sequence)) {
      this.counters.duplicatesDropped += 1;
      return false;
    }

    if (result.sequence === state.nextSequence) {
      this.emit(state, result);
      state.nextSequence += 1;
      this.drainContiguous(state);
    } else {
      state.buffer.set(result.sequence, result);
      if (state.buffer.size > this.bufferSize) {
        this.skipFirstGap(result.sessionId, state);
      }
    }

    this.scheduleGapTimer(result.sessionId, state);
    return true;
  }

  private emit(state: OrderingState, result: TranscriptionResult): void {
    const timestamp = new Date(this.now()).toISOString();
    if (state.channel.push(toOutboundMessage(result, timestamp))) {
      this.counters.delivered += 1;
    }
  }

  private drainContiguous(state: OrderingState): void {
    let next = state.buffer.get(state.nextSequence);
    while (next) {
      state.buffer.delete(state.nextSequence);
      this.emit(state, next);
      state.nextSequence += 1;
      next = state.buffer.get(state.nextSequence);
    }
  }

  private skipFirstGap(sessionId: string, state: OrderingState): void {
    const lowest = Math.min(...state.buffer.keys());
    this.counters.reorderViolations += 1;
    this.logger.warn(
      { sessionId, expected: state.nextSequence, resumeAt: lowest, buffered: state.buffer.size },
      'Reorder buffer full, skipping gap',
    );
    state.skipped.add(state.nextSequence, lowest);
    state.nextSequence = lowest;
    this.drainContiguous(state);
  }

  private flushOnTimeout(sessionId: string, state: OrderingState): void {
    state.gapTimer = undefined;
    state.gapSequence = undefined;
    if (state.buffer.size === 0) {
      return;
    }

    const ordered = Array.from(state.buffer.keys()).sort((a, b) => a - b);
    const timeout = new ReorderTimeoutError(sessionId, state.nextSequence, ordered);
    this.counters.reorderViolations += 1;
    this.logger.warn({ err: timeout, sessionId }, 'Reorder timeout, flushing buffered results');

    for (const sequence of ordered) {
      const result = state.buffer.get(sequence);
      if (!result) {
        continue;
      }
      state.skipped.add(state.nextSequence, sequence);
      state.buffer.delete(sequence);
      this.emit(state, result);
      state.nextSequence = sequence + 1;
    }
  }

  private scheduleGapTimer(sessionId: string, state: OrderingState): void {
    if (state.buffer.size === 0) {
      this.clearGapTimer(state);
      return;
    }
    if (state.gapTimer && state.gapSequence === state.nextSequence) {
      return;
    }

    this.clearGapTimer(state);
    state.gapSequence = state.nextSequence;
    state.gapTimer = setTimeout(() => this.flushOnTimeout(sessionId, state), this.reorderTimeoutMs);
    state.gapTimer.unref();
  }

  private clearGapTimer(state: OrderingState): void {
    if (state.gapTimer) {
      clearTimeout(state.gapTimer);
    }
    state.gapTimer = undefined;
    state.gapSequence = undefined;
  }
}
