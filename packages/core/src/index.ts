/**
 * @clicksynth/core
 * 
 * Core package containing:
 * - Timeline and click category types
 * - Error taxonomy
 * - Seedable random source
 * - External binary resolution
 */

// Types
export type {
  Player,
  ActionKind,
  Button,
  Physics,
  Action,
  ActionTimeline,
} from './types/action.js';
export { otherPlayer } from './types/action.js';

export type { TimingClass, ClickCategory, PlayerSide } from './types/clicks.js';
export {
  TIMING_CLASSES,
  CLICK_CATEGORIES,
  PLAYER_SIDES,
  categoryFor,
  categoryDirName,
} from './types/clicks.js';

// Random
export { createRandom, type RandomSource } from './random.js';

// Errors
export {
  ClicksynthError,
  FormatError,
  TimelineError,
  SampleDecodeError,
  ClickpackError,
  RenderError,
  RenderCancelledError,
  OutputError,
  ConfigValidationError,
  type RenderStage,
} from './errors/index.js';

// Binary configuration
export { ffmpegBinary, type BinaryConfig } from './config/binaries.js';
