/**
 * Output writer
 */

import { OutputError } from '@clicksynth/core';
import { encodeWav, type WavSampleFormat } from '@clicksynth/clickpack';
import { createLogger, safeWriteFile } from '@clicksynth/utils';
import type { OutputBuffer } from './engine.js';

const logger = createLogger({ module: 'render-output' });

export type BitDepth = 16 | 32;

export function wavFormatFor(bitDepth: BitDepth): WavSampleFormat {
  return bitDepth === 16 ? 'pcm16' : 'float32';
}

/**
 * Write the buffer as a stereo WAV file, creating parent directories.
 * @throws OutputError when the file can't be written
 */
export async function writeWav(filePath: string, output: OutputBuffer, bitDepth: BitDepth = 32): Promise<number> {
  const bytes = encodeWav(output.channels, output.sampleRate, wavFormatFor(bitDepth));
  try {
    await safeWriteFile(filePath, bytes);
  } catch (error) {
    throw new OutputError(filePath, error);
  }

  logger.info({ path: filePath, bytes: bytes.length, bitDepth }, 'Wrote output');
  return bytes.length;
}
