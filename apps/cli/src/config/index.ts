/**
 * CLI Configuration
 *
 * Environment overrides (the entry point loads a .env file from the working
 * directory first) plus persisted defaults in ~/.clicksynth/config.json.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { configPaths, loadConfigFile } from './file.js';

// Environment schema
const envSchema = z.object({
  CLICKSYNTH_HOME: z.string().optional(),
  CLICKSYNTH_FFMPEG_PATH: z.string().optional(),
  CLICKSYNTH_DEBUG: z.string().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

const env = envSchema.parse(process.env);
const paths = configPaths(homedir(), env.CLICKSYNTH_HOME);
const fileConfig = loadConfigFile(paths.file);

export const config = {
  sampleRate: fileConfig.sampleRate,
  bitDepth: fileConfig.bitDepth,
  ffmpegPath: env.CLICKSYNTH_FFMPEG_PATH ?? fileConfig.ffmpegPath,
  defaultClickpack: fileConfig.defaultClickpack,
  debug: env.CLICKSYNTH_DEBUG === 'true',
  configDir: paths.dir,
  configFile: paths.file,
} as const;

export {
  CONFIG_KEYS,
  configFileSchema,
  coerceConfigValue,
  isConfigKey,
  loadConfigFile,
  saveConfigFile,
  type ConfigFile,
  type ConfigKey,
} from './file.js';
