/**
 * TASbot replays (.json)
 * 
 * One entry per frame holding both players' mouse state; state changes are
 * picked out later by the normalizer's dedupe pass.
 */

import { z } from 'zod';
import type { RawEvent, RawReplay } from '../types.js';
import { parseJson, parseWithSchema } from './shared.js';

const clickState = z.object({ click: z.number().int() });

const tasbotSchema = z.object({
  fps: z.number().positive(),
  macro: z.array(
    z.object({
      frame: z.number().int().nonnegative(),
      player_1: clickState,
      player_2: clickState,
    })
  ),
});

export function decodeTasbot(bytes: Uint8Array): RawReplay {
  const doc = parseWithSchema('tasbot', tasbotSchema, parseJson('tasbot', bytes));
  const events: RawEvent[] = [];

  for (const entry of doc.macro) {
    events.push({
      kind: entry.player_1.click === 1 ? 'press' : 'release',
      player: 'p1',
      frame: entry.frame,
    });
    events.push({
      kind: entry.player_2.click === 1 ? 'press' : 'release',
      player: 'p2',
      frame: entry.frame,
    });
  }

  return { format: 'tasbot', fps: doc.fps, events, implicitPlayer: false };
}
