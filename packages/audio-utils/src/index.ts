export {
  bytesPerSample,
  calculateSamples,
  calculateWindowBytes,
  durationForBytes,
  encodePcm16ToWav,
  fileExtensionFor,
  float32ToPcm16,
  frameBytes,
  mimeTypeFor,
  toWavBuffer,
} from './pcm.js';
export { SegmentAssembler, type SegmentAssemblerConfig } from './assembler.js';
