import type { AudioDescriptor, AudioFormat } from '@streamscribe/shared-types';

export function bytesPerSample(format: AudioFormat): number {
  switch (format) {
    case 's16le':
      return 2;
    case 'f32le':
      return 4;
    default:
      throw new Error(`Format ${format} has no fixed sample width`);
  }
}

export function calculateSamples(
  sampleRate: number,
  durationMs: number,
  channels = 1,
): number {
  return Math.floor((sampleRate * durationMs * channels) / 1000);
}

/**
 * Byte length of a window of PCM audio, rounded down to whole frames so a
 * window never splits a sample across channels.
 */
export function calculateWindowBytes(descriptor: AudioDescriptor, windowMs: number): number {
  const frames = calculateSamples(descriptor.sampleRate, windowMs, 1);
  return frames * descriptor.channels * bytesPerSample(descriptor.format);
}

export function frameBytes(descriptor: AudioDescriptor): number {
  return descriptor.channels * bytesPerSample(descriptor.format);
}

export function durationForBytes(descriptor: AudioDescriptor, byteLength: number): number {
  const frames = Math.floor(byteLength / frameBytes(descriptor));
  return Math.round((frames / descriptor.sampleRate) * 1000);
}

export function float32ToPcm16(input: Float32Array): Int16Array {
  const output = new Int16Array(input.length);
  for (let i = 0; i < input.length; i += 1) {
    const s = Math.max(-1, Math.min(1, input[i]));
    output[i] = s < 0 ? s * 0x8000 : s * 0x7fff;
  }
  return output;
}

export function encodePcm16ToWav(samples: Int16Array, sampleRate: number, channels: number): Buffer {
  const pcmBuffer = Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength);
  const headerSize = 44;
  const wavBuffer = Buffer.alloc(headerSize + pcmBuffer.length);

  wavBuffer.write('RIFF', 0);
  wavBuffer.writeUInt32LE(36 + pcmBuffer.length, 4);
  wavBuffer.write('WAVE', 8);
  wavBuffer.write('fmt ', 12);
  wavBuffer.writeUInt32LE(16, 16);
  wavBuffer.writeUInt16LE(1, 20);
  wavBuffer.writeUInt16LE(channels, 22);
  wavBuffer.writeUInt32LE(sampleRate, 24);
  const byteRate = sampleRate * channels * 2;
  wavBuffer.writeUInt32LE(byteRate, 28);
  const blockAlign = channels * 2;
  wavBuffer.writeUInt16LE(blockAlign, 32);
  wavBuffer.writeUInt16LE(16, 34);
  wavBuffer.write('data', 36);
  wavBuffer.writeUInt32LE(pcmBuffer.length, 40);

  pcmBuffer.copy(wavBuffer, headerSize);
  return wavBuffer;
}

/**
 * Wrap raw PCM bytes in a WAV container. Payloads already in a container
 * format are returned unchanged.
 */
export function toWavBuffer(payload: Uint8Array, descriptor: AudioDescriptor): Buffer {
  const copy = payload.slice();
  switch (descriptor.format) {
    case 's16le':
      return encodePcm16ToWav(
        new Int16Array(copy.buffer, 0, Math.floor(copy.byteLength / Int16Array.BYTES_PER_ELEMENT)),
        descriptor.sampleRate,
        descriptor.channels,
      );
    case 'f32le':
      return encodePcm16ToWav(
        float32ToPcm16(
          new Float32Array(copy.buffer, 0, Math.floor(copy.byteLength / Float32Array.BYTES_PER_ELEMENT)),
        ),
        descriptor.sampleRate,
        descriptor.channels,
      );
    default:
      return Buffer.from(copy);
  }
}

const FILE_EXTENSIONS: Record<AudioFormat, string> = {
  s16le: 'wav',
  f32le: 'wav',
  wav: 'wav',
  webm: 'webm',
  ogg: 'ogg',
};

const MIME_TYPES: Record<AudioFormat, string> = {
  s16le: 'audio/wav',
  f32le: 'audio/wav',
  wav: 'audio/wav',
  webm: 'audio/webm',
  ogg: 'audio/ogg',
};

export function fileExtensionFor(format: AudioFormat): string {
  return FILE_EXTENSIONS[format];
}

export function mimeTypeFor(format: AudioFormat): string {
  return MIME_TYPES[format];
}
