/**
 * Render Job
 *
 * Replay file + clickpack directory -> WAV file, reporting progress per stage.
 */

import type { ReplayFormat } from '@clicksynth/replay';
import { readReplay } from '@clicksynth/replay';
import { loadClickpack } from '@clicksynth/clickpack';
import { RenderCancelledError } from '@clicksynth/core';
import { createLogger } from '@clicksynth/utils';
import type { RenderConfig } from './config.js';
import { renderTimeline, type RenderStats } from './engine.js';
import { writeWav, type BitDepth } from './output.js';

const logger = createLogger({ module: 'render-job' });

export interface RenderJobProgress {
  percent: number;
  stage: 'replay' | 'clickpack' | 'render' | 'output' | 'done';
  details?: string;
}

export interface RenderJob {
  replayPath: string;
  clickpackDir: string;
  outputPath: string;
  config: RenderConfig;
  /** Skip detection */
  format?: ReplayFormat;
  bitDepth?: BitDepth;
  ffmpegPath?: string;
  signal?: AbortSignal;
  onProgress?: (progress: RenderJobProgress) => void;
}

export interface RenderJobResult {
  format: string;
  fps: number;
  stats: RenderStats;
  warnings: string[];
  bytesWritten: number;
  durationMs: number;
}

export async function runRenderJob(job: RenderJob): Promise<RenderJobResult> {
  const startTime = Date.now();
  const report = job.onProgress ?? (() => undefined);

  report({ percent: 0, stage: 'replay', details: job.replayPath });
  const timeline = await readReplay(job.replayPath, { format: job.format });

  report({ percent: 20, stage: 'clickpack', details: job.clickpackDir });
  const clickpack = await loadClickpack(job.clickpackDir, {
    sampleRate: job.config.sampleRate,
    ffmpegPath: job.ffmpegPath,
  });

  report({ percent: 40, stage: 'render', details: `${timeline.actions.length} actions` });
  const { output, plan, stats } = await renderTimeline(timeline, clickpack.pool, job.config, {
    signal: job.signal,
  });

  const warnings = [...clickpack.warnings];
  if (plan.expressionFailures.length > 0) {
    warnings.push(
      `Volume expression failed on ${plan.expressionFailures.length} actions (first #${plan.expressionFailures[0]}), they used 0`
    );
  }

  if (job.signal?.aborted) {
    throw new RenderCancelledError('finalize');
  }
  report({ percent: 80, stage: 'output', details: job.outputPath });
  const bytesWritten = await writeWav(job.outputPath, output, job.bitDepth);

  const durationMs = Date.now() - startTime;
  report({ percent: 100, stage: 'done' });

  logger.info(
    { replay: job.replayPath, format: timeline.format, output: job.outputPath, durationMs },
    'Render job completed'
  );

  return {
    format: timeline.format,
    fps: timeline.fps,
    stats,
    warnings,
    bytesWritten,
    durationMs,
  };
}
