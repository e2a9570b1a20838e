/**
 * Render Command
 * 
 * Render a replay to a WAV file with a clickpack.
 */

import ora from 'ora';
import chalk from 'chalk';
import { RenderCancelledError } from '@clicksynth/core';
import { runRenderJob, type RenderJobProgress } from '@clicksynth/render';
import { formatDuration, formatTimecode } from '@clicksynth/utils';
import { config } from '../config/index.js';
import { defaultOutputPath, renderConfigFromFlags, type RenderFlags } from '../lib/flags.js';
import { printError, printFailure, printHeader, printKeyValue, printWarning } from '../lib/output.js';

const stageText: Record<RenderJobProgress['stage'], string> = {
  replay: 'Reading replay...',
  clickpack: 'Loading clickpack...',
  render: 'Rendering...',
  output: 'Writing output...',
  done: 'Done',
};

export async function renderCommand(replay: string, options: RenderFlags): Promise<void> {
  const clickpackDir = options.clicks ?? config.defaultClickpack;
  if (!clickpackDir) {
    printError('No clickpack given. Pass --clicks <dir> or run "clicksynth config defaultClickpack <dir>"');
    process.exit(1);
  }

  const outputPath = options.output ?? defaultOutputPath(replay);
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  const spinner = ora(stageText.replay).start();

  try {
    const renderConfig = renderConfigFromFlags(options, config);
    const result = await runRenderJob({
      replayPath: replay,
      clickpackDir,
      outputPath,
      config: renderConfig,
      format: options.format,
      bitDepth: options.bitDepth ?? config.bitDepth,
      ffmpegPath: config.ffmpegPath,
      signal: controller.signal,
      onProgress: (progress) => {
        spinner.text = stageText[progress.stage];
      },
    });

    spinner.succeed(`Rendered ${chalk.cyan(outputPath)}`);

    const { stats } = result;
    printHeader('Render Summary');
    printKeyValue('Format', `${result.format} @ ${result.fps} fps`);
    printKeyValue('Actions', `${stats.placed} placed / ${stats.actions} total`);
    printKeyValue('Length', formatTimecode(stats.durationSeconds));
    printKeyValue('Peak', stats.peak.toFixed(3));
    printKeyValue('Took', formatDuration(result.durationMs));

    if (stats.skipped > 0) {
      printWarning(`${stats.skipped} actions had no matching sample and were skipped`);
    }
    if (stats.clipped > 0) {
      printWarning(`${stats.clipped} samples clipped; try --normalize or a lower --volume`);
    }
    for (const warning of result.warnings) {
      printWarning(warning);
    }
  } catch (error) {
    if (error instanceof RenderCancelledError) {
      spinner.warn('Render cancelled, nothing was written');
      process.exit(130);
    }
    spinner.fail('Render failed');
    printFailure(error, config.debug);
    process.exit(1);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
