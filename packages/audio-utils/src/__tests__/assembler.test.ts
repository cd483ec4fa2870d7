import { describe, expect, it } from 'vitest';

import { SegmentAssembler, type SegmentAssemblerConfig } from '../index.js';

function createAssembler(overrides: Partial<SegmentAssemblerConfig> = {}) {
  let sequence = 0;
  return new SegmentAssembler({
    sessionId: 'session-1',
    format: 's16le',
    sampleRate: 16000,
    channels: 1,
    windowMs: 250,
    maxBufferBytes: 1024,
    nextSequence: () => sequence++,
    now: () => 1_700_000_000_000,
    ...overrides,
  });
}

describe('SegmentAssembler', () => {
  it('sizes a 250ms window of 16kHz mono s16le at 8000 bytes', () => {
    expect(createAssembler().windowBytes).toBe(8000);
  });

  it('emits exactly one segment with sequence 0 for one window fed in fragments', () => {
    const assembler = createAssembler();

    expect(assembler.feed(new Uint8Array(3000))).toEqual([]);
    expect(assembler.feed(new Uint8Array(3000))).toEqual([]);
    const segments = assembler.feed(new Uint8Array(2000));

    expect(segments).toHaveLength(1);
    expect(segments[0].sequence).toBe(0);
    expect(segments[0].payload.byteLength).toBe(8000);
    expect(segments[0].startMs).toBe(0);
    expect(segments[0].endMs).toBe(250);
    expect(segments[0].isFinalChunk).toBe(false);
    expect(assembler.bufferedBytes).toBe(0);
  });

  it('assigns strictly increasing sequences across two windows', () => {
    const assembler = createAssembler();

    const first = assembler.feed(new Uint8Array(5000));
    const rest = assembler.feed(new Uint8Array(11000));
    const sequences = [...first, ...rest].map((segment) => segment.sequence);

    expect(sequences).toEqual([0, 1]);
    expect(rest[1].startMs).toBe(250);
    expect(rest[1].endMs).toBe(500);
  });

  it('emits several windows from a single large write', () => {
    const assembler = createAssembler();
    const segments = assembler.feed(new Uint8Array(8000 * 3 + 10));

    expect(segments.map((segment) => segment.sequence)).toEqual([0, 1, 2]);
    expect(assembler.bufferedBytes).toBe(10);
  });

  it('keeps fragment bytes in order inside a segment', () => {
    const assembler = createAssembler({ windowMs: 0.25 });
    expect(assembler.windowBytes).toBe(8);

    assembler.feed(Uint8Array.from([1, 2, 3]));
    const [segment] = assembler.feed(Uint8Array.from([4, 5, 6, 7, 8]));

    expect(Array.from(segment.payload)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('flushes the remainder trimmed to whole frames and marks it final', () => {
    const assembler = createAssembler();
    assembler.feed(new Uint8Array(1001));

    const segment = assembler.flush();

    expect(segment?.payload.byteLength).toBe(1000);
    expect(segment?.isFinalChunk).toBe(true);
    expect(segment?.sequence).toBe(0);
    expect(segment?.endMs).toBe(31);
    expect(assembler.flush()).toBeUndefined();
  });

  it('returns nothing on flush when no audio is buffered', () => {
    expect(createAssembler().flush()).toBeUndefined();
  });

  it('cuts container formats on the byte threshold', () => {
    const assembler = createAssembler({ format: 'webm', maxBufferBytes: 100 });
    const segments = assembler.feed(new Uint8Array(250));

    expect(segments).toHaveLength(2);
    expect(segments[0].format).toBe('webm');
    expect(segments[0].endMs).toBe(0);
    expect(assembler.flush()?.payload.byteLength).toBe(50);
  });

  it('rejects a window too short to hold a frame', () => {
    expect(() => createAssembler({ windowMs: 0.01 })).toThrow('Assembler window must hold at least one frame');
  });
});
