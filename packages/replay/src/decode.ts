/**
 * Replay decoding entry points
 */

import { readFile } from 'node:fs/promises';
import type { ActionTimeline } from '@clicksynth/core';
import { createLogger } from '@clicksynth/utils';
import { detectFormat } from './detect.js';
import { FORMATS } from './formats/index.js';
import { normalizeReplay, type NormalizeOptions } from './normalize.js';
import type { RawReplay, ReplayFormat } from './types.js';

const logger = createLogger({ module: 'replay' });

export interface ParseReplayOptions extends NormalizeOptions {
  /** Skip detection and decode as this format */
  format?: ReplayFormat;
}

export function decodeReplay(bytes: Uint8Array, format: ReplayFormat): RawReplay {
  return FORMATS[format].decode(bytes);
}

/**
 * Detect, decode and normalize an in-memory replay
 */
export function parseReplay(
  fileName: string,
  bytes: Uint8Array,
  options: ParseReplayOptions = {}
): ActionTimeline {
  const format = options.format ?? detectFormat(fileName, bytes);
  const raw = decodeReplay(bytes, format);

  logger.info(
    { file: fileName, format, fps: raw.fps, events: raw.events.length },
    'Decoded replay'
  );

  return normalizeReplay(raw, options);
}

export async function readReplay(
  filePath: string,
  options: ParseReplayOptions = {}
): Promise<ActionTimeline> {
  const bytes = await readFile(filePath);
  return parseReplay(filePath, bytes, options);
}
