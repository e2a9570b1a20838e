/**
 * zBot frame replays (.zbf)
 * 
 * Header: f32 frame delta, f32 speedhack. Records: i32 frame, then two
 * ASCII flags ('1' = 0x31) for "down" and "player 1".
 */

import { FormatError } from '@clicksynth/core';
import { createLogger } from '@clicksynth/utils';
import { BinaryReader } from '../binary/reader.js';
import type { RawEvent, RawReplay } from '../types.js';

const logger = createLogger({ module: 'format-zbf' });

const ASCII_ONE = 0x31;

export function decodeZbot(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'zbot');

  const delta = reader.f32();
  let speedhack = reader.f32();
  if (speedhack === 0) {
    logger.warn('zbf speedhack is 0, defaulting to 1');
    speedhack = 1;
  }

  const fps = 1 / delta / speedhack;
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new FormatError('zbot', 'a positive frame delta', String(delta));
  }

  const events: RawEvent[] = [];
  while (reader.remaining > 0) {
    const frame = reader.i32();
    const down = reader.u8() === ASCII_ONE;
    const p1 = reader.u8() === ASCII_ONE;
    events.push({ kind: down ? 'press' : 'release', player: p1 ? 'p1' : 'p2', frame });
  }

  return { format: 'zbot', fps, events, implicitPlayer: false };
}
