/**
 * @clicksynth/render
 *
 * Click classification, volume and pitch shaping, and the mixing engine.
 */

export {
  renderConfigSchema,
  expressionVariableSchema,
  parseRenderConfig,
  DEFAULT_FALLBACK_ORDER,
  type RenderConfig,
  type RenderConfigInput,
  type ExpressionTarget,
} from './config.js';

export {
  compileVolumeExpression,
  EXPRESSION_VARIABLES,
  MAX_EXPRESSION_LENGTH,
  type ExpressionVariable,
  type ExpressionScope,
  type VolumeExpression,
} from './expression.js';

export { classifyActions, classifyTiming, type ClassifiedAction } from './classifier.js';
export { actionGain, spamOffset, shapesVolume, type GainInput } from './volume.js';
export { drawPitch, pitchStepRange } from './pitch.js';
export { resample, sampleProblem } from './resampler.js';

export {
  planRender,
  mixPlan,
  applyNoise,
  renderTimeline,
  normalizeOutput,
  clampOutput,
  peakOf,
  resolveSample,
  pickIndex,
  OUTPUT_CHANNELS,
  DEFAULT_WINDOW_FRAMES,
  type OutputBuffer,
  type Placement,
  type SkippedAction,
  type RenderPlan,
  type RenderOptions,
  type RenderStats,
  type RenderResult,
} from './engine.js';

export { writeWav, wavFormatFor, type BitDepth } from './output.js';
export { runRenderJob, type RenderJob, type RenderJobProgress, type RenderJobResult } from './job.js';
