/**
 * Config Command
 * 
 * View and manage persisted render defaults.
 */

import chalk from 'chalk';
import {
  CONFIG_KEYS,
  coerceConfigValue,
  config,
  isConfigKey,
  loadConfigFile,
  saveConfigFile,
  type ConfigKey,
} from '../config/index.js';
import { printError, printFailure, printHeader, printKeyValue, printSuccess } from '../lib/output.js';

interface ConfigOptions {
  reset?: boolean;
}

const configDescriptions: Record<ConfigKey, string> = {
  sampleRate: 'Output sample rate in Hz',
  bitDepth: 'Output WAV bit depth (16 or 32)',
  ffmpegPath: 'ffmpeg executable for non-WAV clickpack files',
  defaultClickpack: 'Clickpack used when --clicks is not given',
};

export function configCommand(key: string | undefined, value: string | undefined, options: ConfigOptions): void {
  try {
    if (options.reset) {
      saveConfigFile(config.configDir, config.configFile, {});
      printSuccess('Configuration reset to defaults');
      return;
    }
    if (!key) {
      listConfig();
      return;
    }
    if (!isConfigKey(key)) {
      printError(`Unknown config key: ${key}`);
      console.log(chalk.gray(`Valid keys: ${CONFIG_KEYS.join(', ')}`));
      process.exit(1);
    }
    if (value === undefined) {
      printKeyValue(key, loadConfigFile(config.configFile)[key] ?? 'not set');
      return;
    }

    const current = loadConfigFile(config.configFile);
    saveConfigFile(config.configDir, config.configFile, { ...current, ...coerceConfigValue(key, value) });
    printSuccess(`Set ${key} = ${value}`);
  } catch (error) {
    printFailure(error, config.debug);
    process.exit(1);
  }
}

function listConfig(): void {
  const values = loadConfigFile(config.configFile);
  printHeader('CLI Configuration');

  for (const key of CONFIG_KEYS) {
    console.log(`${chalk.cyan(key)}: ${values[key] ?? chalk.gray('not set')}`);
    console.log(`  ${chalk.gray(configDescriptions[key])}`);
    console.log();
  }

  console.log(chalk.gray(`Stored in ${config.configFile}`));
  console.log(chalk.gray('Use "clicksynth config <key> <value>" to set a value'));
}
