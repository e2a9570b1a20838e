/**
 * WAV codec
 *
 * Decodes RIFF/WAVE files in process: integer PCM (8/16/24/32-bit), IEEE
 * float (32/64-bit) and WAVE_FORMAT_EXTENSIBLE wrappers of either. Encodes
 * planar float audio as 16-bit PCM or 32-bit float.
 */

import { SampleDecodeError } from '@clicksynth/core';
import type { AudioSample } from '../types.js';

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export type WavSampleFormat = 'pcm16' | 'float32';

interface WavFormat {
  tag: number;
  channels: number;
  sampleRate: number;
  blockAlign: number;
  bitsPerSample: number;
}

function readFormat(buf: Buffer, offset: number, size: number, name: string): WavFormat {
  if (size < 16) {
    throw new SampleDecodeError(name, `fmt chunk too short (${size} bytes)`);
  }

  let tag = buf.readUInt16LE(offset);
  const channels = buf.readUInt16LE(offset + 2);
  const sampleRate = buf.readUInt32LE(offset + 4);
  const blockAlign = buf.readUInt16LE(offset + 12);
  const bitsPerSample = buf.readUInt16LE(offset + 14);

  if (tag === WAVE_FORMAT_EXTENSIBLE) {
    if (size < 40) {
      throw new SampleDecodeError(name, 'extensible fmt chunk without a sub-format');
    }
    // first two bytes of the sub-format GUID carry the real format tag
    tag = buf.readUInt16LE(offset + 24);
  }

  return { tag, channels, sampleRate, blockAlign, bitsPerSample };
}

function sampleReader(format: WavFormat, buf: Buffer, name: string): (offset: number) => number {
  const { tag, bitsPerSample } = format;

  if (tag === WAVE_FORMAT_PCM) {
    switch (bitsPerSample) {
      case 8:
        return (offset) => (buf.readUInt8(offset) - 128) / 128;
      case 16:
        return (offset) => buf.readInt16LE(offset) / 32768;
      case 24:
        return (offset) => buf.readIntLE(offset, 3) / 8388608;
      case 32:
        return (offset) => buf.readInt32LE(offset) / 2147483648;
    }
  }

  if (tag === WAVE_FORMAT_IEEE_FLOAT) {
    switch (bitsPerSample) {
      case 32:
        return (offset) => buf.readFloatLE(offset);
      case 64:
        return (offset) => buf.readDoubleLE(offset);
    }
  }

  throw new SampleDecodeError(name, `unsupported encoding (format 0x${tag.toString(16)}, ${bitsPerSample}-bit)`);
}

export function isWav(bytes: Uint8Array): boolean {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return buf.length >= 12 && buf.toString('latin1', 0, 4) === 'RIFF' && buf.toString('latin1', 8, 12) === 'WAVE';
}

export function decodeWav(bytes: Uint8Array, name: string): AudioSample {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (!isWav(buf)) {
    throw new SampleDecodeError(name, 'missing RIFF/WAVE header');
  }

  let format: WavFormat | undefined;
  let dataOffset = -1;
  let dataSize = 0;

  let offset = 12;
  while (offset + 8 <= buf.length) {
    const id = buf.toString('latin1', offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ') {
      format = readFormat(buf, body, Math.min(size, buf.length - body), name);
    } else if (id === 'data') {
      dataOffset = body;
      // streaming writers leave the size at 0 or 0xFFFFFFFF
      dataSize = Math.min(size === 0 ? buf.length - body : size, buf.length - body);
      break;
    }

    offset = body + size + (size % 2);
  }

  if (!format) {
    throw new SampleDecodeError(name, 'no fmt chunk');
  }
  if (dataOffset < 0) {
    throw new SampleDecodeError(name, 'no data chunk');
  }
  if (format.channels === 0 || format.sampleRate === 0 || format.blockAlign === 0) {
    throw new SampleDecodeError(name, 'zero channels, sample rate or block size');
  }

  const read = sampleReader(format, buf, name);
  const bytesPerSample = format.bitsPerSample / 8;
  if (format.blockAlign < format.channels * bytesPerSample) {
    throw new SampleDecodeError(name, `block size ${format.blockAlign} too small for ${format.channels} channels`);
  }
  const frames = Math.floor(dataSize / format.blockAlign);
  const channels = Array.from({ length: format.channels }, () => new Float32Array(frames));

  for (let frame = 0; frame < frames; frame++) {
    const frameOffset = dataOffset + frame * format.blockAlign;
    for (let ch = 0; ch < format.channels; ch++) {
      channels[ch][frame] = read(frameOffset + ch * bytesPerSample);
    }
  }

  return { name, sampleRate: format.sampleRate, channels };
}

/**
 * Interleave planar channels into a WAV file.
 * 16-bit output is clamped to [-1, 1]; float output is written as is.
 */
export function encodeWav(
  channels: readonly Float32Array[],
  sampleRate: number,
  sampleFormat: WavSampleFormat = 'float32'
): Buffer {
  const numChannels = channels.length;
  const frames = channels[0]?.length ?? 0;
  const bytesPerSample = sampleFormat === 'pcm16' ? 2 : 4;
  const blockAlign = numChannels * bytesPerSample;
  const dataLength = frames * blockAlign;
  const buffer = Buffer.alloc(44 + dataLength);

  // RIFF header
  buffer.write('RIFF', 0, 'latin1');
  buffer.writeUInt32LE(36 + dataLength, 4);
  buffer.write('WAVE', 8, 'latin1');

  // fmt chunk
  buffer.write('fmt ', 12, 'latin1');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(sampleFormat === 'pcm16' ? WAVE_FORMAT_PCM : WAVE_FORMAT_IEEE_FLOAT, 20);
  buffer.writeUInt16LE(numChannels, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * blockAlign, 28);
  buffer.writeUInt16LE(blockAlign, 32);
  buffer.writeUInt16LE(bytesPerSample * 8, 34);

  // data chunk
  buffer.write('data', 36, 'latin1');
  buffer.writeUInt32LE(dataLength, 40);

  let offset = 44;
  for (let frame = 0; frame < frames; frame++) {
    for (let ch = 0; ch < numChannels; ch++) {
      const value = channels[ch][frame];
      if (sampleFormat === 'pcm16') {
        const s = Math.max(-1, Math.min(1, value));
        buffer.writeInt16LE(Math.round(s * 32767), offset);
      } else {
        buffer.writeFloatLE(value, offset);
      }
      offset += bytesPerSample;
    }
  }

  return buffer;
}
