/**
 * Small fixed-record binary formats from older bots.
 *
 * | Format   | Header                              | Record |
 * |----------|-------------------------------------|--------|
 * | kdbot    | f32 fps                             | i32 frame, u8 down, u8 p2 |
 * | rush     | i16 fps                             | i32 frame, u8 flags (bit0 down, bit1 p2) |
 * | silicate | f64 fps, u32 count                  | u32 `frame << 4 \| p2 << 1 \| down` |
 * | ddhor    | "DDHR", i16 fps, i32 p1, i32 p2     | f32 frame, u8 down |
 */

import type { Player } from '@clicksynth/core';
import { FormatError } from '@clicksynth/core';
import { BinaryReader, hasMagic } from '../binary/reader.js';
import type { RawEvent, RawReplay } from '../types.js';

export function decodeKdbot(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'kdbot');
  const fps = reader.f32();

  const events: RawEvent[] = [];
  while (reader.remaining > 0) {
    const frame = reader.i32();
    const down = reader.u8() !== 0;
    const p2 = reader.u8() !== 0;
    events.push({ kind: down ? 'press' : 'release', player: p2 ? 'p2' : 'p1', frame });
  }

  return { format: 'kdbot', fps, events, implicitPlayer: false };
}

export function decodeRush(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'rush');
  const fps = reader.i16();

  const events: RawEvent[] = [];
  while (reader.remaining > 0) {
    const frame = reader.i32();
    const flags = reader.u8();
    events.push({
      kind: (flags & 1) !== 0 ? 'press' : 'release',
      player: (flags & 2) !== 0 ? 'p2' : 'p1',
      frame,
    });
  }

  return { format: 'rush', fps, events, implicitPlayer: false };
}

export function decodeSilicate(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'silicate');
  const fps = reader.f64();
  const count = reader.u32();

  const events: RawEvent[] = [];
  for (let i = 0; i < count; i++) {
    const packed = reader.u32();
    events.push({
      kind: (packed & 1) !== 0 ? 'press' : 'release',
      player: (packed & 2) !== 0 ? 'p2' : 'p1',
      frame: packed >>> 4,
    });
  }

  return { format: 'silicate', fps, events, implicitPlayer: false };
}

export function isDdhor(bytes: Uint8Array): boolean {
  return hasMagic(bytes, 'DDHR');
}

export function decodeDdhor(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'ddhor');

  const magic = reader.ascii(4);
  if (magic !== 'DDHR') {
    throw new FormatError('ddhor', 'magic "DDHR"', JSON.stringify(magic));
  }
  const fps = reader.i16();
  const p1Count = reader.i32();
  const p2Count = reader.i32();
  if (p1Count < 0 || p2Count < 0) {
    throw new FormatError('ddhor', 'non-negative action counts', `${p1Count}, ${p2Count}`);
  }

  const events: RawEvent[] = [];
  const readBlock = (player: Player, count: number): void => {
    for (let i = 0; i < count; i++) {
      // frames are stored as floats; sub-frame values are kept
      const frame = reader.f32();
      const down = reader.u8() !== 0;
      events.push({ kind: down ? 'press' : 'release', player, frame });
    }
  };
  readBlock('p1', p1Count);
  readBlock('p2', p2Count);

  return { format: 'ddhor', fps, events, implicitPlayer: false };
}
