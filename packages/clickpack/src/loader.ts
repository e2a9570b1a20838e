/**
 * Clickpack Loader
 *
 * Layout:
 * ```
 * clickpack/[player1|player2|left1|right1|left2|right2/]
 *   {hardclicks,hardreleases,clicks,releases,...}/*.wav
 *   noise.* | whitenoise.*
 * ```
 * A pack without side folders serves both players. A side without category
 * folders has its loose files loaded as regular clicks.
 */

import { basename, join, relative } from 'node:path';
import type { ClickCategory, PlayerSide } from '@clicksynth/core';
import {
  CLICK_CATEGORIES,
  PLAYER_SIDES,
  ClickpackError,
  SampleDecodeError,
  categoryDirName,
} from '@clicksynth/core';
import { createLogger, isDirectory, listFiles } from '@clicksynth/utils';
import { decodeSampleFile } from './decoders/index.js';
import { SamplePool } from './pool.js';
import type { AudioSample, LoadClickpackOptions, LoadedClickpack } from './types.js';

const logger = createLogger({ module: 'clickpack-loader' });

const NOISE_PREFIXES = ['noise', 'whitenoise'];
const DEFAULT_CONCURRENCY = 8;

interface SampleJob {
  path: string;
  category: ClickCategory;
  targets: readonly PlayerSide[];
}

function isHidden(filePath: string): boolean {
  return basename(filePath).startsWith('.');
}

function isNoiseFile(filePath: string): boolean {
  const name = basename(filePath).toLowerCase();
  return NOISE_PREFIXES.some((prefix) => name.startsWith(prefix));
}

async function collectJobs(dir: string, targets: readonly PlayerSide[]): Promise<SampleJob[]> {
  const jobs: SampleJob[] = [];

  for (const category of CLICK_CATEGORIES) {
    const files = await listFiles(join(dir, categoryDirName(category)));
    for (const path of files.filter((file) => !isHidden(file))) {
      jobs.push({ path, category, targets });
    }
  }

  if (jobs.length === 0) {
    const loose = (await listFiles(dir)).filter((file) => !isHidden(file) && !isNoiseFile(file));
    if (loose.length > 0) {
      logger.debug({ dir, files: loose.length }, 'No category folders, loading loose files as clicks');
    }
    for (const path of loose) {
      jobs.push({ path, category: 'click', targets });
    }
  }

  return jobs;
}

/**
 * Decode files in bounded batches. Files that fail to decode are reported
 * through `onSkip` and left out of the result.
 */
async function decodeAll<T extends { path: string }>(
  items: readonly T[],
  root: string,
  options: LoadClickpackOptions,
  onSkip: (error: SampleDecodeError) => void
): Promise<Array<{ item: T; sample: AudioSample }>> {
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const decoded: Array<{ item: T; sample: AudioSample }> = [];

  for (let i = 0; i < items.length; i += concurrency) {
    const batch = items.slice(i, i + concurrency);
    const results = await Promise.all(
      batch.map(async (item) => {
        try {
          const sample = await decodeSampleFile(item.path, relative(root, item.path), {
            ffmpegPath: options.ffmpegPath,
            sampleRate: options.sampleRate,
          });
          return { item, sample };
        } catch (error) {
          if (error instanceof SampleDecodeError) {
            onSkip(error);
            return undefined;
          }
          throw error;
        }
      })
    );
    for (const result of results) {
      if (result) {
        decoded.push(result);
      }
    }
  }

  return decoded;
}

export async function loadClickpack(
  dir: string,
  options: LoadClickpackOptions = {}
): Promise<LoadedClickpack> {
  const startTime = Date.now();

  if (!(await isDirectory(dir))) {
    throw new ClickpackError(dir, 'Clickpack directory not found');
  }

  const presentSides: PlayerSide[] = [];
  for (const side of PLAYER_SIDES) {
    if (await isDirectory(join(dir, side))) {
      presentSides.push(side);
    }
  }
  const shared = presentSides.length === 0;
  if (shared) {
    logger.warn({ dir }, 'Clickpack has no player folders, using it for both players');
  }

  const jobs = shared
    ? await collectJobs(dir, ['player1', 'player2'])
    : (await Promise.all(presentSides.map((side) => collectJobs(join(dir, side), [side])))).flat();

  const warnings: string[] = [];
  const onSkip = (error: SampleDecodeError): void => {
    logger.warn({ file: error.filePath }, error.message);
    warnings.push(error.message);
  };

  const pool = new SamplePool();
  for (const { item, sample } of await decodeAll(jobs, dir, options, onSkip)) {
    for (const side of item.targets) {
      pool.add(side, item.category, sample);
    }
  }

  // root noise wins over a side-scoped one
  const noiseDirs = [dir, ...presentSides.map((side) => join(dir, side))];
  for (const noiseDir of noiseDirs) {
    const candidates = (await listFiles(noiseDir))
      .filter((file) => !isHidden(file) && isNoiseFile(file))
      .map((path) => ({ path }));
    const [noise] = await decodeAll(candidates.slice(0, 1), dir, options, onSkip);
    if (noise) {
      logger.info({ file: noise.item.path }, 'Found noise file');
      pool.setNoise(noise.sample);
      break;
    }
  }

  if (pool.size === 0) {
    throw new ClickpackError(dir, 'No click samples could be loaded');
  }

  const stats = {
    samples: pool.size,
    skipped: warnings.length,
    sides: pool.sides(),
    shared,
    hasNoise: pool.noiseSample() !== undefined,
    longestSample: pool.longestDuration,
    durationMs: Date.now() - startTime,
  };

  logger.info({ dir, ...stats }, 'Loaded clickpack');

  return { pool, warnings, stats };
}
