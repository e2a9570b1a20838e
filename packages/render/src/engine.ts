/**
 * Render Engine
 *
 * Two stages:
 * 1. `planRender` walks the timeline once, in order, and decides everything
 *    that depends on earlier actions or on the random source: category,
 *    sample, pitch, gain, offset and the cut length of each lane.
 * 2. `mixPlan` adds the planned placements into the output. The buffer is
 *    split into fixed windows and every window only reads the plan, so
 *    windows can be mixed in any order.
 *
 * Each stage is a generator that yields between chunks of work. The sync
 * exports drain it in one go; `renderTimeline` drains it across event loop
 * turns so an abort signal raised mid-render is seen.
 */

import { setImmediate as nextTurn } from 'node:timers/promises';

import type {
  ActionKind,
  ActionTimeline,
  Button,
  ClickCategory,
  Player,
  PlayerSide,
  RandomSource,
  RenderStage,
  TimingClass,
} from '@clicksynth/core';
import {
  TIMING_CLASSES,
  RenderCancelledError,
  RenderError,
  categoryFor,
  createRandom,
  otherPlayer,
} from '@clicksynth/core';
import type { AudioSample, SamplePool } from '@clicksynth/clickpack';
import { createLogger } from '@clicksynth/utils';
import { classifyActions, type ClassifiedAction } from './classifier.js';
import type { RenderConfig } from './config.js';
import { compileVolumeExpression, type ExpressionScope, type VolumeExpression } from './expression.js';
import { drawPitch } from './pitch.js';
import { resample, sampleProblem } from './resampler.js';
import { actionGain, shapesVolume } from './volume.js';

const logger = createLogger({ module: 'render-engine' });

export const OUTPUT_CHANNELS = 2;
export const DEFAULT_WINDOW_FRAMES = 1 << 16;
const PLAN_CHUNK_ACTIONS = 1024;

export interface OutputBuffer {
  sampleRate: number;
  /** Planar stereo */
  channels: Float32Array[];
}

export interface Placement {
  index: number;
  player: Player;
  side: PlayerSide;
  category: ClickCategory;
  timing: TimingClass;
  sampleName: string;
  pitch: number;
  gain: number;
  /** First output frame */
  offset: number;
  /** Frames written, after cut truncation */
  length: number;
  audio: readonly Float32Array[];
}

export interface SkippedAction {
  index: number;
  player: Player;
  category: ClickCategory;
}

export interface RenderPlan {
  sampleRate: number;
  /** Output length in frames */
  length: number;
  placements: Placement[];
  skipped: SkippedAction[];
  /** Actions whose expression failed to evaluate and counted as 0 */
  expressionFailures: number[];
}

export interface RenderOptions {
  /** Defaults to a source seeded from `config.seed` */
  random?: RandomSource;
  signal?: AbortSignal;
  windowFrames?: number;
}

export interface RenderStats {
  actions: number;
  placed: number;
  skipped: number;
  frames: number;
  durationSeconds: number;
  peak: number;
  /** Samples clamped to [-1, 1] when not normalizing */
  clipped: number;
  elapsedMs: number;
}

export interface RenderResult {
  output: OutputBuffer;
  plan: RenderPlan;
  stats: RenderStats;
}

const SIDES: Record<Player, Record<Button, readonly PlayerSide[]>> = {
  p1: { jump: ['player1'], left: ['left1', 'player1'], right: ['right1', 'player1'] },
  p2: { jump: ['player2'], left: ['left2', 'player2'], right: ['right2', 'player2'] },
};

const KIND_CATEGORIES: Record<ActionKind, readonly ClickCategory[]> = {
  press: TIMING_CLASSES.map((timing) => categoryFor(timing, 'press')),
  release: TIMING_CLASSES.map((timing) => categoryFor(timing, 'release')),
};

type Steps<T> = Generator<void, T, undefined>;

function drain<T>(steps: Steps<T>): T {
  for (;;) {
    const step = steps.next();
    if (step.done) {
      return step.value;
    }
  }
}

async function drainAsync<T>(steps: Steps<T>): Promise<T> {
  for (;;) {
    const step = steps.next();
    if (step.done) {
      return step.value;
    }
    await nextTurn();
  }
}

function throwIfAborted(signal: AbortSignal | undefined, stage: RenderStage): void {
  if (signal?.aborted) {
    throw new RenderCancelledError(stage);
  }
}

interface ResolvedSample {
  side: PlayerSide;
  category: ClickCategory;
  samples: readonly AudioSample[];
}

/**
 * Find the samples for an action. Direction buttons prefer their own side
 * folder, a player without any sample of the action's kind borrows the other
 * player's, and categories are tried in fallback order.
 */
export function resolveSample(
  pool: SamplePool,
  item: ClassifiedAction,
  fallbackOrder: RenderConfig['fallbackOrder']
): ResolvedSample | undefined {
  const { player, button, kind } = item.action;
  const kindCategories = KIND_CATEGORIES[kind];

  const own = SIDES[player][button];
  const sides = own.some((side) => pool.hasSamples(side, kindCategories))
    ? own
    : SIDES[otherPlayer(player)][button];

  for (const side of sides) {
    for (const timing of fallbackOrder[item.timing]) {
      const category = categoryFor(timing, kind);
      const samples = pool.lookup(side, category);
      if (samples.length > 0) {
        return { side, category, samples };
      }
    }
  }
  return undefined;
}

/** Uniform pick that avoids repeating `previous` when there is a choice */
export function pickIndex(count: number, previous: number | undefined, random: RandomSource): number {
  if (count <= 1) {
    return 0;
  }
  if (previous === undefined || previous >= count) {
    return random.int(0, count - 1);
  }
  const index = random.int(0, count - 2);
  return index >= previous ? index + 1 : index;
}

function expressionScope(
  item: ClassifiedAction,
  timeline: ActionTimeline,
  totalFrames: number,
  random: RandomSource
): ExpressionScope {
  const { action } = item;
  return {
    frame: action.frame,
    fps: timeline.fps,
    time: action.time,
    x: action.physics?.x ?? 0,
    y: action.physics?.y ?? 0,
    p: totalFrames > 0 ? action.frame / totalFrames : 0,
    player2: action.player === 'p2' ? 1 : 0,
    rot: action.physics?.rotation ?? 0,
    accel: action.physics?.yAccel ?? 0,
    down: action.kind === 'press' ? 1 : 0,
    frames: totalFrames,
    level_time: totalFrames / timeline.fps,
    rand: random.next(),
  };
}

interface ExpressionEffect {
  exprValue: number;
  jitterRange: [number, number];
  timeOffset: number;
}

function applyExpression(
  expression: VolumeExpression | undefined,
  config: RenderConfig,
  scope: () => ExpressionScope,
  onFailure: (error: unknown) => void
): ExpressionEffect {
  const { volumeVar } = config.volume;
  const effect: ExpressionEffect = { exprValue: 0, jitterRange: [-volumeVar, volumeVar], timeOffset: 0 };
  if (!expression) {
    return effect;
  }

  const values = scope();
  let value: number;
  try {
    value = expression.evaluate(values);
  } catch (error) {
    onFailure(error);
    value = 0;
  }
  switch (config.expression.variable) {
    case 'value':
      effect.exprValue = value;
      break;
    case 'variation': {
      const range = Math.abs(value);
      effect.jitterRange = config.expression.negative ? [-range, range] : [0, range];
      break;
    }
    case 'time-offset':
      effect.timeOffset = value;
      break;
    case 'none':
      break;
  }
  return effect;
}

export function planRender(
  timeline: ActionTimeline,
  pool: SamplePool,
  config: RenderConfig,
  options: RenderOptions = {}
): RenderPlan {
  return drain(planSteps(timeline, pool, config, options));
}

function* planSteps(
  timeline: ActionTimeline,
  pool: SamplePool,
  config: RenderConfig,
  options: RenderOptions
): Steps<RenderPlan> {
  const { sampleRate } = config;
  if (timeline.actions.length === 0) {
    throw new RenderError('plan', 'timeline has no actions');
  }
  if (!(sampleRate > 0)) {
    throw new RenderError('plan', `output sample rate must be positive, got ${sampleRate}`);
  }

  const random = options.random ?? createRandom(config.seed);
  const expression =
    config.expression.variable === 'none' ? undefined : compileVolumeExpression(config.expression.source);
  const classified = classifyActions(timeline.actions, config.timings);
  const totalFrames = timeline.actions.reduce((max, action) => Math.max(max, action.frame), 0);

  const variants = new Map<AudioSample, Map<number, Float32Array[]>>();
  const variant = (sample: AudioSample, pitch: number, index: number): Float32Array[] => {
    let byPitch = variants.get(sample);
    if (!byPitch) {
      const problem = sampleProblem(sample);
      if (problem) {
        throw new RenderError('resample', problem, index);
      }
      byPitch = new Map<number, Float32Array[]>();
      variants.set(sample, byPitch);
    }
    let audio = byPitch.get(pitch);
    if (!audio) {
      audio = resample(sample.channels, (pitch * sample.sampleRate) / sampleRate);
      byPitch.set(pitch, audio);
    }
    return audio;
  };

  const lastPick = new Map<string, number>();
  const lanes = new Map<string, Placement>();
  const placements: Placement[] = [];
  const skipped: SkippedAction[] = [];
  const expressionFailures: number[] = [];
  let firstFailure: unknown;

  for (const item of classified) {
    if (item.index > 0 && item.index % PLAN_CHUNK_ACTIONS === 0) {
      yield;
    }
    throwIfAborted(options.signal, 'plan');
    const { action } = item;

    const resolved = resolveSample(pool, item, config.fallbackOrder);
    if (!resolved) {
      skipped.push({ index: item.index, player: action.player, category: item.category });
      continue;
    }

    const lane = `${resolved.side}:${resolved.category}`;
    const pick = pickIndex(resolved.samples.length, lastPick.get(lane), random);
    lastPick.set(lane, pick);
    const sample = resolved.samples[pick];

    const pitch = drawPitch(config.pitch, random);
    const effect = applyExpression(
      expression,
      config,
      () => expressionScope(item, timeline, totalFrames, random),
      (error) => {
        if (expressionFailures.length === 0) {
          firstFailure = error;
        }
        expressionFailures.push(item.index);
      }
    );
    const [low, high] = effect.jitterRange;
    const jitter = shapesVolume(action.kind, config.volume) ? random.range(low, high) : 0;
    const gain = actionGain(
      { kind: action.kind, gap: item.gap, jitter, exprValue: effect.exprValue },
      config.volume
    );

    const audio = variant(sample, pitch, item.index);
    const placement: Placement = {
      index: item.index,
      player: action.player,
      side: resolved.side,
      category: resolved.category,
      timing: item.timing,
      sampleName: sample.name,
      pitch,
      gain,
      offset: Math.round(Math.max(0, action.time + effect.timeOffset) * sampleRate),
      length: audio[0]?.length ?? 0,
      audio,
    };

    if (config.cutSounds) {
      const previous = lanes.get(lane);
      if (previous && placement.offset >= previous.offset) {
        previous.length = Math.min(previous.length, placement.offset - previous.offset);
      }
      lanes.set(lane, placement);
    }

    placements.push(placement);
  }

  if (skipped.length > 0) {
    const missing = [...new Set(skipped.map((s) => `${s.player}:${s.category}`))];
    logger.warn({ skipped: skipped.length, missing }, 'No sample for some actions, they were skipped');
  }

  if (expressionFailures.length > 0) {
    logger.warn(
      { failed: expressionFailures.length, firstAction: expressionFailures[0], err: firstFailure },
      'Volume expression failed for some actions, they used 0'
    );
  }

  const length = placements.reduce((max, p) => Math.max(max, p.offset + p.length), 0);

  return { sampleRate, length, placements, skipped, expressionFailures };
}

/**
 * Add every placement into a fresh stereo buffer, one window at a time
 */
export function mixPlan(plan: RenderPlan, options: RenderOptions = {}): OutputBuffer {
  return drain(mixSteps(plan, options));
}

function* mixSteps(plan: RenderPlan, options: RenderOptions): Steps<OutputBuffer> {
  const windowFrames = Math.max(1, options.windowFrames ?? DEFAULT_WINDOW_FRAMES);
  const channels = Array.from({ length: OUTPUT_CHANNELS }, () => new Float32Array(plan.length));

  const windowCount = Math.ceil(plan.length / windowFrames);
  const buckets: Placement[][] = Array.from({ length: windowCount }, () => []);
  for (const placement of plan.placements) {
    if (placement.length <= 0) {
      continue;
    }
    const first = Math.floor(placement.offset / windowFrames);
    const last = Math.floor((placement.offset + placement.length - 1) / windowFrames);
    for (let w = first; w <= last; w++) {
      buckets[w].push(placement);
    }
  }

  for (let w = 0; w < windowCount; w++) {
    if (w > 0) {
      yield;
    }
    throwIfAborted(options.signal, 'mix');
    const start = w * windowFrames;
    const end = Math.min(start + windowFrames, plan.length);

    for (const placement of buckets[w]) {
      const from = Math.max(start, placement.offset);
      const to = Math.min(end, placement.offset + placement.length);
      for (let c = 0; c < OUTPUT_CHANNELS; c++) {
        const source = placement.audio[Math.min(c, placement.audio.length - 1)];
        const target = channels[c];
        for (let i = from; i < to; i++) {
          target[i] += source[i - placement.offset] * placement.gain;
        }
      }
    }
  }

  return { sampleRate: plan.sampleRate, channels };
}

/**
 * Loop the noise sample over the whole output
 */
export function applyNoise(
  output: OutputBuffer,
  noise: AudioSample,
  volume: number,
  options: RenderOptions = {}
): void {
  drain(noiseSteps(output, noise, volume, options));
}

function* noiseSteps(
  output: OutputBuffer,
  noise: AudioSample,
  volume: number,
  options: RenderOptions
): Steps<void> {
  const problem = sampleProblem(noise);
  if (problem) {
    throw new RenderError('noise', problem);
  }

  const audio = resample(noise.channels, noise.sampleRate / output.sampleRate);
  const noiseLength = audio[0]?.length ?? 0;
  if (noiseLength === 0) {
    return;
  }

  const frames = output.channels[0]?.length ?? 0;
  const windowFrames = Math.max(1, options.windowFrames ?? DEFAULT_WINDOW_FRAMES);
  for (let start = 0; start < frames; start += windowFrames) {
    if (start > 0) {
      yield;
    }
    throwIfAborted(options.signal, 'noise');
    const end = Math.min(start + windowFrames, frames);
    for (let c = 0; c < output.channels.length; c++) {
      const source = audio[Math.min(c, audio.length - 1)];
      const target = output.channels[c];
      for (let i = start; i < end; i++) {
        target[i] += source[i % noiseLength] * volume;
      }
    }
  }
}

/** Largest absolute sample value */
export function peakOf(output: OutputBuffer): number {
  let peak = 0;
  for (const channel of output.channels) {
    for (const value of channel) {
      peak = Math.max(peak, Math.abs(value));
    }
  }
  return peak;
}

/**
 * Scale so the peak magnitude is exactly 1. Returns the peak before scaling.
 */
export function normalizeOutput(output: OutputBuffer): number {
  const peak = peakOf(output);
  if (peak > 0) {
    for (const channel of output.channels) {
      for (let i = 0; i < channel.length; i++) {
        channel[i] = channel[i] / peak;
      }
    }
  }
  return peak;
}

/** Clamp to [-1, 1], returning how many samples were out of range */
export function clampOutput(output: OutputBuffer): number {
  let clipped = 0;
  for (const channel of output.channels) {
    for (let i = 0; i < channel.length; i++) {
      const value = channel[i];
      if (value > 1 || value < -1) {
        channel[i] = value > 1 ? 1 : -1;
        clipped++;
      }
    }
  }
  return clipped;
}

/**
 * Plan, mix, add noise and finalize, giving the event loop a turn between
 * chunks so `options.signal` can cancel a long render
 */
export async function renderTimeline(
  timeline: ActionTimeline,
  pool: SamplePool,
  config: RenderConfig,
  options: RenderOptions = {}
): Promise<RenderResult> {
  const startTime = Date.now();

  const plan = await drainAsync(planSteps(timeline, pool, config, options));
  await nextTurn();
  const output = await drainAsync(mixSteps(plan, options));

  if (config.noise.enabled) {
    const noise = pool.noiseSample();
    if (noise) {
      await nextTurn();
      await drainAsync(noiseSteps(output, noise, config.noise.volume, options));
    } else {
      logger.warn('Noise is enabled but the clickpack has no noise file');
    }
  }

  await nextTurn();
  throwIfAborted(options.signal, 'finalize');
  let peak: number;
  let clipped = 0;
  if (config.normalize) {
    peak = normalizeOutput(output);
  } else {
    peak = peakOf(output);
    clipped = clampOutput(output);
  }

  const stats: RenderStats = {
    actions: timeline.actions.length,
    placed: plan.placements.length,
    skipped: plan.skipped.length,
    frames: plan.length,
    durationSeconds: plan.length / plan.sampleRate,
    peak,
    clipped,
    elapsedMs: Date.now() - startTime,
  };

  logger.info(stats, 'Rendered timeline');

  return { output, plan, stats };
}
