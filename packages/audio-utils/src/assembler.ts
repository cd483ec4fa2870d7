import { PCM_FORMATS, type AudioDescriptor, type AudioSegment } from '@streamscribe/shared-types';

import { calculateWindowBytes, durationForBytes, frameBytes } from './pcm.js';

export interface SegmentAssemblerConfig extends AudioDescriptor {
  sessionId: string;
  /** Window length for PCM formats. */
  windowMs: number;
  /** Emission threshold for container formats, where bytes carry no duration. */
  maxBufferBytes: number;
  nextSequence: () => number;
  now?: () => number;
}

interface AssemblyState {
  buffer: Uint8Array;
  cursor: number;
}

function createEmptyState(capacity: number): AssemblyState {
  return {
    buffer: new Uint8Array(capacity),
    cursor: 0,
  };
}

function appendBytes(state: AssemblyState, bytes: Uint8Array): AssemblyState {
  const remaining = state.buffer.length - state.cursor;
  if (bytes.length > remaining) {
    throw new Error('Segment window overflow');
  }

  state.buffer.set(bytes, state.cursor);
  state.cursor += bytes.length;
  return state;
}

function hasWindow(state: AssemblyState): boolean {
  return state.cursor === state.buffer.length;
}

/**
 * Accumulates arbitrarily sized network writes into fixed audio windows.
 *
 * PCM input is cut on time boundaries (`windowMs`); container formats such as
 * webm are cut on `maxBufferBytes`. Sequence numbers are drawn from the owning
 * session so the counter has a single owner.
 */
export class SegmentAssembler {
  private readonly state: AssemblyState;
  private readonly timed: boolean;
  private readonly descriptor: AudioDescriptor;
  private readonly now: () => number;
  private elapsedMs = 0;

  constructor(private readonly config: SegmentAssemblerConfig) {
    this.descriptor = {
      format: config.format,
      sampleRate: config.sampleRate,
      channels: config.channels,
    };
    this.timed = PCM_FORMATS.has(config.format);
    this.now = config.now ?? Date.now;

    const capacity = this.timed
      ? calculateWindowBytes(this.descriptor, config.windowMs)
      : config.maxBufferBytes;

    if (capacity <= 0) {
      throw new Error('Assembler window must hold at least one frame');
    }

    this.state = createEmptyState(capacity);
  }

  get windowBytes(): number {
    return this.state.buffer.length;
  }

  get bufferedBytes(): number {
    return this.state.cursor;
  }

  feed(bytes: Uint8Array): AudioSegment[] {
    const outputs: AudioSegment[] = [];
    let offset = 0;

    while (offset < bytes.length) {
      const available = this.state.buffer.length - this.state.cursor;
      const take = Math.min(available, bytes.length - offset);
      appendBytes(this.state, bytes.subarray(offset, offset + take));
      offset += take;

      if (hasWindow(this.state)) {
        outputs.push(this.emit(this.state.cursor, false));
      }
    }

    return outputs;
  }

  /** Emits the partial remainder, marked as the last chunk of the session. */
  flush(): AudioSegment | undefined {
    const usable = this.timed
      ? this.state.cursor - (this.state.cursor % frameBytes(this.descriptor))
      : this.state.cursor;

    if (usable === 0) {
      this.state.cursor = 0;
      return undefined;
    }

    return this.emit(usable, true);
  }

  private emit(byteLength: number, isFinalChunk: boolean): AudioSegment {
    const payload = this.state.buffer.slice(0, byteLength);
    const durationMs = this.timed ? durationForBytes(this.descriptor, byteLength) : 0;
    const startMs = this.elapsedMs;
    this.elapsedMs += durationMs;
    this.state.cursor = 0;

    return {
      ...this.descriptor,
      sessionId: this.config.sessionId,
      sequence: this.config.nextSequence(),
      payload,
      capturedAt: this.now(),
      startMs,
      endMs: this.elapsedMs,
      isFinalChunk,
    };
  }
}
