#!/usr/bin/env tsx
/**
 * CLI Entry Point
 * 
 * Command-line interface for clicksynth. Commands parse their flags and hand
 * off to the library packages.
 */

// before any package creates its logger from LOG_LEVEL
import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { FORMAT_TAGS } from '@clicksynth/replay';

import { renderCommand } from './commands/render.js';
import { infoCommand } from './commands/info.js';
import { formatsCommand } from './commands/formats.js';
import { configCommand } from './commands/config.js';
import { parseBitDepth, parseFormat, parseNumber } from './lib/flags.js';

const program = new Command();

program
  .name('clicksynth')
  .description('Render replay inputs into click audio')
  .version('1.0.0');

// ============================================
// RENDER
// ============================================

program
  .command('render <replay>')
  .description('Render a replay to a WAV file')
  .option('-c, --clicks <dir>', 'Clickpack directory')
  .option('-o, --output <path>', 'Output WAV path (default: next to the replay)')
  .option('-f, --format <tag>', `Replay format, skips detection (${FORMAT_TAGS.join(', ')})`, parseFormat)
  .option('-r, --sample-rate <hz>', 'Output sample rate', parseNumber)
  .option('-b, --bit-depth <bits>', 'Output bit depth, 16 or 32', parseBitDepth)
  .option('--seed <seed>', 'Seed for reproducible output')
  .option('--no-pitch', 'Disable pitch variation')
  .option('--pitch-from <ratio>', 'Lowest pitch', parseNumber)
  .option('--pitch-to <ratio>', 'Highest pitch', parseNumber)
  .option('--pitch-step <ratio>', 'Pitch step', parseNumber)
  .option('--hard-timing <seconds>', 'Minimum gap for hard clicks', parseNumber)
  .option('--regular-timing <seconds>', 'Minimum gap for regular clicks', parseNumber)
  .option('--soft-timing <seconds>', 'Minimum gap for soft clicks', parseNumber)
  .option('--volume <gain>', 'Global volume', parseNumber)
  .option('--volume-var <amount>', 'Random volume variation, ±', parseNumber)
  .option('--no-spam', 'Disable spam volume dampening')
  .option('--spam-time <seconds>', 'Gap below which clicks count as spam', parseNumber)
  .option('--spam-factor <factor>', 'Spam volume offset factor', parseNumber)
  .option('--spam-max <offset>', 'Largest spam volume offset', parseNumber)
  .option('--change-releases-volume', 'Apply variation and spam dampening to releases')
  .option('--cut-sounds', 'Cut each sound where the next one of its kind starts')
  .option('--noise', 'Mix the clickpack noise file under the clicks')
  .option('--noise-volume <gain>', 'Noise volume', parseNumber)
  .option('--normalize', 'Normalize the output peak to 1')
  .option('--expr <expression>', 'Volume expression')
  .option('--expr-variable <mode>', 'What the expression drives: value, variation, time-offset')
  .option('--expr-positive', 'Variation expressions only raise the volume')
  .action(renderCommand);

// ============================================
// REPLAYS
// ============================================

program
  .command('info <replay>')
  .description('Show format, fps and action counts of a replay')
  .option('-f, --format <tag>', 'Replay format, skips detection', parseFormat)
  .option('--plaintext', 'Print the replay in the plain text format')
  .action(infoCommand);

program
  .command('formats')
  .description('List supported replay formats')
  .action(formatsCommand);

// ============================================
// CONFIGURATION
// ============================================

program
  .command('config [key] [value]')
  .description('List, get or set persisted defaults')
  .option('--reset', 'Reset to defaults')
  .action(configCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('clicksynth --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();
