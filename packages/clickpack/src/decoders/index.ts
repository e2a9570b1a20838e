/**
 * Sample file decoding
 */

import { readFile } from 'node:fs/promises';
import { SampleDecodeError } from '@clicksynth/core';
import { getExtension } from '@clicksynth/utils';
import type { AudioSample } from '../types.js';
import { decodeWithFfmpeg, type FfmpegDecodeOptions } from './ffmpeg.js';
import { decodeWav } from './wav.js';

export async function decodeSampleFile(
  filePath: string,
  name: string,
  options: FfmpegDecodeOptions = {}
): Promise<AudioSample> {
  if (getExtension(filePath) !== 'wav') {
    return decodeWithFfmpeg(filePath, name, options);
  }

  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (error) {
    throw new SampleDecodeError(filePath, error instanceof Error ? error.message : String(error));
  }
  return decodeWav(bytes, name);
}

export { decodeWav, encodeWav, isWav, type WavSampleFormat } from './wav.js';
export { decodeWithFfmpeg, deinterleaveF32, DEFAULT_DECODE_RATE, type FfmpegDecodeOptions } from './ffmpeg.js';
