/**
 * @clicksynth/clickpack
 *
 * Clickpack samples: decoding, directory loading and the sample pool.
 */

export type {
  AudioSample,
  LoadClickpackOptions,
  LoadedClickpack,
  ClickpackStats,
} from './types.js';
export { sampleFrames, sampleDuration } from './types.js';

export { SamplePool } from './pool.js';

export {
  decodeSampleFile,
  decodeWav,
  encodeWav,
  isWav,
  decodeWithFfmpeg,
  deinterleaveF32,
  DEFAULT_DECODE_RATE,
  type WavSampleFormat,
  type FfmpegDecodeOptions,
} from './decoders/index.js';

export { loadClickpack } from './loader.js';
