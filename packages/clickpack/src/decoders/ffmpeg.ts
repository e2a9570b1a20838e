/**
 * ffmpeg decoder
 *
 * Everything that isn't a WAV file is piped through ffmpeg as raw
 * little-endian float stereo at the requested rate.
 */

import { ffmpegBinary, SampleDecodeError } from '@clicksynth/core';
import { createLogger, executeCommand, type CommandResult } from '@clicksynth/utils';
import type { AudioSample } from '../types.js';

const logger = createLogger({ module: 'ffmpeg-decoder' });

export const DEFAULT_DECODE_RATE = 44100;
const DECODE_CHANNELS = 2;

export interface FfmpegDecodeOptions {
  ffmpegPath?: string;
  sampleRate?: number;
  timeout?: number;
}

/** Split interleaved f32le stereo into planar channels */
export function deinterleaveF32(raw: Buffer, channelCount: number): Float32Array[] {
  const frames = Math.floor(raw.length / (4 * channelCount));
  const channels = Array.from({ length: channelCount }, () => new Float32Array(frames));

  for (let frame = 0; frame < frames; frame++) {
    for (let ch = 0; ch < channelCount; ch++) {
      channels[ch][frame] = raw.readFloatLE((frame * channelCount + ch) * 4);
    }
  }
  return channels;
}

export async function decodeWithFfmpeg(
  filePath: string,
  name: string,
  options: FfmpegDecodeOptions = {}
): Promise<AudioSample> {
  const {
    ffmpegPath = ffmpegBinary().resolvedPath,
    sampleRate = DEFAULT_DECODE_RATE,
    timeout = 30000,
  } = options;

  const args = [
    '-nostdin',
    '-hide_banner',
    '-loglevel', 'error',
    '-i', filePath,
    '-vn', // No video
    '-ac', String(DECODE_CHANNELS),
    '-ar', String(sampleRate),
    '-f', 'f32le',
    '-acodec', 'pcm_f32le',
    'pipe:1',
  ];

  let result: CommandResult;
  try {
    result = await executeCommand(ffmpegPath, args, { timeout });
  } catch (error) {
    throw new SampleDecodeError(filePath, `could not run ${ffmpegPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (result.timedOut) {
    throw new SampleDecodeError(filePath, `ffmpeg timed out after ${timeout}ms`);
  }
  if (result.exitCode !== 0) {
    const reason = result.stderr.trim().split('\n').pop() ?? '';
    throw new SampleDecodeError(filePath, `ffmpeg exited with code ${result.exitCode}${reason ? `: ${reason}` : ''}`);
  }

  const channels = deinterleaveF32(result.stdout, DECODE_CHANNELS);
  logger.debug({ file: filePath, frames: channels[0]?.length ?? 0, durationMs: result.duration }, 'Decoded with ffmpeg');

  return { name, sampleRate, channels };
}
