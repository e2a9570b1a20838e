/**
 * osu! replays (.osr)
 *
 * The header is a run of fixed-width fields and optional ULEB128-prefixed
 * strings; the input stream is an LZMA-compressed list of
 * `delta|x|y|keys` frames separated by commas. Mouse 1 is mapped to player 1
 * and mouse 2 to player 2, both emitted on key transitions.
 */

import lzma from 'lzma';
import { FormatError } from '@clicksynth/core';
import { createLogger } from '@clicksynth/utils';
import { BinaryReader } from '../binary/reader.js';
import type { RawEvent, RawReplay } from '../types.js';

const logger = createLogger({ module: 'format-osu' });

const OSU_STRING_PRESENT = 0x0b;
const OSU_SEED_FRAME = -12345;

const MOD_DOUBLE_TIME = 1 << 6;
const MOD_HALF_TIME = 1 << 8;

const KEY_M1 = 1 << 0;
const KEY_M2 = 1 << 1;

function skipOsuString(reader: BinaryReader): void {
  const marker = reader.u8();
  if (marker === OSU_STRING_PRESENT) {
    reader.skip(reader.uleb128());
  } else if (marker !== 0) {
    throw new FormatError('osu', 'string marker 0x00 or 0x0b', `0x${marker.toString(16)}`);
  }
}

export function speedForMods(mods: number): number {
  if ((mods & MOD_DOUBLE_TIME) !== 0) return 1.5;
  if ((mods & MOD_HALF_TIME) !== 0) return 0.75;
  return 1;
}

/**
 * Turn a decompressed frame list into press/release events.
 * Frame times are milliseconds of map time; `speed` converts them to
 * wall-clock seconds.
 */
export function parseOsuFrames(text: string, speed: number): RawEvent[] {
  const events: RawEvent[] = [];
  let elapsed = 0;
  let held = { p1: false, p2: false };

  for (const entry of text.split(',')) {
    if (entry.trim() === '') {
      continue;
    }

    const fields = entry.split('|');
    const delta = Number(fields[0]);
    const keys = Number(fields[3]);
    if (fields.length < 4 || !Number.isInteger(delta) || !Number.isInteger(keys)) {
      throw new FormatError('osu', 'a "delta|x|y|keys" frame', JSON.stringify(entry));
    }

    if (delta === OSU_SEED_FRAME) {
      continue;
    }

    elapsed += delta;
    const time = Math.max(0, elapsed) / 1000 / speed;
    const state = { p1: (keys & KEY_M1) !== 0, p2: (keys & KEY_M2) !== 0 };

    if (state.p1 !== held.p1) {
      events.push({ kind: state.p1 ? 'press' : 'release', player: 'p1', time });
    }
    if (state.p2 !== held.p2) {
      events.push({ kind: state.p2 ? 'press' : 'release', player: 'p2', time });
    }
    held = state;
  }

  return events;
}

export function decodeOsu(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'osu');

  reader.u8(); // game mode
  reader.i32(); // game version
  skipOsuString(reader); // beatmap hash
  skipOsuString(reader); // player name
  skipOsuString(reader); // replay hash

  // 300s, 100s, 50s, gekis, katus, misses, score, max combo, perfect flag
  reader.skip(6 * 2 + 4 + 2 + 1);
  const mods = reader.i32();
  const speed = speedForMods(mods);

  skipOsuString(reader); // life bar graph
  reader.skip(8); // timestamp

  const compressedLength = reader.u32();
  const compressed = reader.bytes(compressedLength);

  let decompressed: string | number[];
  try {
    decompressed = lzma.decompress(compressed);
  } catch (error) {
    throw new FormatError('osu', 'an LZMA frame stream', error instanceof Error ? error.message : String(error));
  }
  const text = typeof decompressed === 'string' ? decompressed : Buffer.from(decompressed).toString('latin1');

  const events = parseOsuFrames(text, speed);
  logger.debug({ mods, speed, events: events.length }, 'Parsed osu! replay');

  return { format: 'osu', fps: null, events, implicitPlayer: false };
}
