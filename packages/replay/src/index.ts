/**
 * @clicksynth/replay
 *
 * Replay decoders, format detection and timeline normalization.
 */

export type { ReplayFormat, RawEvent, RawReplay, Decoder, FormatDescriptor } from './types.js';

export { BinaryReader, hasMagic, type Endian } from './binary/reader.js';

export {
  FORMATS,
  FORMAT_TAGS,
  isReplayFormat,
  formatPlaintext,
  parseOsuFrames,
  speedForMods,
} from './formats/index.js';

export { detectFormat } from './detect.js';

export {
  normalizeReplay,
  DEFAULT_FPS,
  DEFAULT_MAX_DURATION,
  type NormalizeOptions,
} from './normalize.js';

export { decodeReplay, parseReplay, readReplay, type ParseReplayOptions } from './decode.js';
