/**
 * Mega Hack replays
 * 
 * - `.mhr.json`: JSON document with `meta.fps` and an `events` list. A `p2`
 *   flag on an event routes the actions after it to player 2.
 * - `.mhr`: little-endian binary behind a big-endian "HACK" magic, one
 *   32-byte record per action.
 */

import { z } from 'zod';
import { FormatError } from '@clicksynth/core';
import { createLogger } from '@clicksynth/utils';
import { BinaryReader } from '../binary/reader.js';
import type { RawEvent, RawReplay } from '../types.js';
import { parseJson, parseWithSchema } from './shared.js';

const logger = createLogger({ module: 'format-mhr' });

const MHR_MAGIC = 0x4841434b; // "HACK"
const MHR_RECORD_SIZE = 32;

const mhrJsonSchema = z.object({
  meta: z.object({
    fps: z.number().positive(),
  }),
  events: z.array(
    z.object({
      frame: z.number().int().nonnegative(),
      down: z.boolean().optional(),
      p2: z.boolean().optional(),
    })
  ),
});

export function decodeMhrJson(bytes: Uint8Array): RawReplay {
  const doc = parseWithSchema('mhr-json', mhrJsonSchema, parseJson('mhr-json', bytes));
  const events: RawEvent[] = [];
  let nextP2 = false;

  for (const ev of doc.events) {
    // position-only events carry no button state
    if (ev.down === undefined) {
      continue;
    }

    events.push({
      kind: ev.down ? 'press' : 'release',
      player: nextP2 ? 'p2' : 'p1',
      frame: ev.frame,
    });

    if (ev.p2 !== undefined) {
      nextP2 = ev.p2;
    }
  }

  return { format: 'mhr-json', fps: doc.meta.fps, events, implicitPlayer: false };
}

export function decodeMhrBinary(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'mhr');

  const magic = reader.u32('be');
  if (magic !== MHR_MAGIC) {
    throw new FormatError('mhr', 'magic "HACK"', `0x${magic.toString(16).padStart(8, '0')}`);
  }

  reader.seek(12);
  const fps = reader.u32();
  reader.seek(28);
  const count = reader.u32();
  logger.debug({ fps, count }, 'Parsed mhr header');

  if (count * MHR_RECORD_SIZE > reader.remaining) {
    throw new FormatError(
      'mhr',
      `${count} actions (${count * MHR_RECORD_SIZE} bytes)`,
      `${reader.remaining} bytes`
    );
  }

  const events: RawEvent[] = [];
  for (let i = 0; i < count; i++) {
    reader.skip(2);
    const down = reader.u8() === 1;
    const p1 = reader.u8() === 0;
    const frame = reader.u32();
    reader.skip(24);

    events.push({ kind: down ? 'press' : 'release', player: p1 ? 'p1' : 'p2', frame });
  }

  return { format: 'mhr', fps, events, implicitPlayer: false };
}
