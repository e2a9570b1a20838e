/**
 * Render flags
 *
 * Commander argument parsers and the mapping from `render` flags to a
 * validated RenderConfig. Flags left out fall through to the schema defaults.
 */

import { InvalidArgumentError } from 'commander';
import { dirname, join } from 'node:path';
import { FORMAT_TAGS, isReplayFormat, type ReplayFormat } from '@clicksynth/replay';
import { parseRenderConfig, type BitDepth, type RenderConfig } from '@clicksynth/render';
import { getBasename } from '@clicksynth/utils';

export interface RenderFlags {
  clicks?: string;
  output?: string;
  format?: ReplayFormat;
  sampleRate?: number;
  bitDepth?: BitDepth;
  seed?: string;
  pitch: boolean;
  pitchFrom?: number;
  pitchTo?: number;
  pitchStep?: number;
  hardTiming?: number;
  regularTiming?: number;
  softTiming?: number;
  volume?: number;
  volumeVar?: number;
  spam: boolean;
  spamTime?: number;
  spamFactor?: number;
  spamMax?: number;
  changeReleasesVolume?: boolean;
  cutSounds?: boolean;
  noise?: boolean;
  noiseVolume?: number;
  normalize?: boolean;
  expr?: string;
  exprVariable?: string;
  exprPositive?: boolean;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseBitDepth(value: string): BitDepth {
  if (value === '16') return 16;
  if (value === '32') return 32;
  throw new InvalidArgumentError('Bit depth must be 16 or 32.');
}

export function parseFormat(value: string): ReplayFormat {
  if (!isReplayFormat(value)) {
    throw new InvalidArgumentError(`Unknown format. Known formats: ${FORMAT_TAGS.join(', ')}`);
  }
  return value;
}

/**
 * @throws ConfigValidationError when the combined settings are invalid
 */
export function renderConfigFromFlags(flags: RenderFlags, defaults: { sampleRate: number }): RenderConfig {
  return parseRenderConfig({
    timings: {
      hard: flags.hardTiming,
      regular: flags.regularTiming,
      soft: flags.softTiming,
    },
    pitch: {
      enabled: flags.pitch,
      from: flags.pitchFrom,
      to: flags.pitchTo,
      step: flags.pitchStep,
    },
    volume: {
      spamEnabled: flags.spam,
      spamTime: flags.spamTime,
      spamVolOffsetFactor: flags.spamFactor,
      maxSpamVolOffset: flags.spamMax,
      changeReleasesVolume: flags.changeReleasesVolume,
      globalVolume: flags.volume,
      volumeVar: flags.volumeVar,
    },
    sampleRate: flags.sampleRate ?? defaults.sampleRate,
    cutSounds: flags.cutSounds,
    noise: {
      enabled: flags.noise,
      volume: flags.noiseVolume,
    },
    normalize: flags.normalize,
    expression: {
      source: flags.expr,
      variable: flags.exprVariable ?? (flags.expr ? 'value' : undefined),
      negative: flags.exprPositive === undefined ? undefined : !flags.exprPositive,
    },
    seed: flags.seed,
  });
}

/** `replay.mhr.json` -> `replay.mhr.wav`, beside the replay */
export function defaultOutputPath(replayPath: string): string {
  return join(dirname(replayPath), `${getBasename(replayPath)}.wav`);
}
