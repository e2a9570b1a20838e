/**
 * Info Command
 * 
 * Show what a replay file contains.
 */

import chalk from 'chalk';
import { FORMATS, formatPlaintext, isReplayFormat, readReplay, type ReplayFormat } from '@clicksynth/replay';
import { formatTimecode } from '@clicksynth/utils';
import { summarizeTimeline } from '../lib/timeline.js';
import { config } from '../config/index.js';
import { printFailure, printHeader, printKeyValue } from '../lib/output.js';

interface InfoOptions {
  format?: ReplayFormat;
  plaintext?: boolean;
}

export async function infoCommand(replay: string, options: InfoOptions): Promise<void> {
  try {
    const timeline = await readReplay(replay, { format: options.format });

    if (options.plaintext) {
      process.stdout.write(formatPlaintext(timeline, timeline.fps));
      return;
    }

    const summary = summarizeTimeline(timeline);

    printHeader('Replay');
    printKeyValue('File', replay);
    printKeyValue(
      'Format',
      isReplayFormat(summary.format) ? `${FORMATS[summary.format].name} (${summary.format})` : summary.format
    );
    printKeyValue('FPS', summary.fps);
    printKeyValue('Actions', summary.actions);
    printKeyValue('Duration', formatTimecode(summary.duration));
    console.log();

    for (const player of summary.players) {
      console.log(
        `  ${chalk.cyan(player.player)} ` +
        `${player.presses} presses, ${player.releases} releases`
      );
    }
  } catch (error) {
    printFailure(error, config.debug);
    process.exit(1);
  }
}
