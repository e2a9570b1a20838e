/**
 * Binary Configuration
 * 
 * Resolves the ffmpeg executable used to decode non-WAV clickpack samples.
 * 
 * Priority order:
 * 1. Environment variable (FFMPEG_PATH)
 * 2. Custom binary folder (packages/core/binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: 'env' | 'bundled' | 'path';
}

function resolveBinaryPath(name: string, envVar: string): BinaryConfig {
  const exeName = process.platform === 'win32' ? `${name}.exe` : name;

  const envPath = process.env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  const bundledPath = join(BINARY_ROOT, getOsFolder(), exeName);
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }

  // Let the system PATH resolve it, failing at spawn time if missing
  return { name, envVar, resolvedPath: name, source: 'path' };
}

let _ffmpeg: BinaryConfig | null = null;

/**
 * Get the ffmpeg binary configuration (cached)
 */
export function ffmpegBinary(): BinaryConfig {
  if (!_ffmpeg) {
    _ffmpeg = resolveBinaryPath('ffmpeg', 'FFMPEG_PATH');
  }
  return _ffmpeg;
}
