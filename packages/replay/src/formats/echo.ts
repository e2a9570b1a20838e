/**
 * Echo replays (.echo)
 * 
 * Three generations share the extension:
 * - binary: big-endian "META" magic and type word, little-endian body;
 *   debug replays ("DBG\0") use 24-byte records, regular ones 6-byte records
 * - new JSON: `{ fps, inputs: [{ frame, holding, player_2 }] }`
 * - old JSON: `{ FPS, "Echo Replay": [{ Frame, Hold, "Player 2" }] }`
 */

import { z } from 'zod';
import { FormatError } from '@clicksynth/core';
import { isObject } from '@clicksynth/utils';
import { BinaryReader, hasMagic } from '../binary/reader.js';
import type { RawEvent, RawReplay } from '../types.js';
import { parseJson, parseWithSchema } from './shared.js';

const ECHO_MAGIC = 0x4d455441; // "META"
const ECHO_DEBUG_TYPE = 0x44424700; // "DBG\0"
const ECHO_FPS_OFFSET = 24;
const ECHO_ACTIONS_OFFSET = 48;

const newEchoSchema = z.object({
  fps: z.number().positive(),
  inputs: z.array(
    z.object({
      frame: z.number().int().nonnegative(),
      holding: z.boolean(),
      player_2: z.boolean().default(false),
    })
  ),
});

const oldEchoSchema = z.object({
  FPS: z.number().positive(),
  'Echo Replay': z.array(
    z.object({
      Frame: z.number().int().nonnegative(),
      Hold: z.boolean(),
      'Player 2': z.boolean().default(false),
    })
  ),
});

export function decodeEcho(bytes: Uint8Array): RawReplay {
  if (hasMagic(bytes, 'META')) {
    return decodeEchoBinary(bytes);
  }
  return decodeEchoJson(bytes);
}

function decodeEchoBinary(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'echo');

  const magic = reader.u32('be');
  if (magic !== ECHO_MAGIC) {
    throw new FormatError('echo', 'magic "META"', `0x${magic.toString(16)}`);
  }
  const type = reader.u32('be');
  const recordSize = type === ECHO_DEBUG_TYPE ? 24 : 6;

  reader.seek(ECHO_FPS_OFFSET);
  const fps = reader.f32();
  reader.seek(ECHO_ACTIONS_OFFSET);

  const events: RawEvent[] = [];
  while (reader.remaining > 0) {
    const frame = reader.u32();
    const down = reader.u8() === 1;
    const p1 = reader.u8() === 0;
    reader.skip(recordSize - 6);
    events.push({ kind: down ? 'press' : 'release', player: p1 ? 'p1' : 'p2', frame });
  }

  return { format: 'echo', fps, events, implicitPlayer: false };
}

function decodeEchoJson(bytes: Uint8Array): RawReplay {
  const doc = parseJson('echo', bytes);

  if (isObject(doc) && 'Echo Replay' in doc) {
    const old = parseWithSchema('echo', oldEchoSchema, doc);
    return {
      format: 'echo',
      fps: old.FPS,
      events: old['Echo Replay'].map((input): RawEvent => ({
        kind: input.Hold ? 'press' : 'release',
        player: input['Player 2'] ? 'p2' : 'p1',
        frame: input.Frame,
      })),
      implicitPlayer: false,
    };
  }

  const replay = parseWithSchema('echo', newEchoSchema, doc);
  return {
    format: 'echo',
    fps: replay.fps,
    events: replay.inputs.map((input): RawEvent => ({
      kind: input.holding ? 'press' : 'release',
      player: input.player_2 ? 'p2' : 'p1',
      frame: input.frame,
    })),
    implicitPlayer: false,
  };
}
