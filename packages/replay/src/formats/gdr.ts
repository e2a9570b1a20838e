/**
 * GDReplayFormat 1 (.gdr)
 *
 * MessagePack document, with plain JSON accepted as a fallback. Inputs
 * optionally carry a physics correction recorded by the bot.
 */

import { decode as decodeMsgpack } from '@msgpack/msgpack';
import { z } from 'zod';
import type { Button } from '@clicksynth/core';
import { createLogger } from '@clicksynth/utils';
import type { RawEvent, RawReplay } from '../types.js';
import { parseJson, parseWithSchema } from './shared.js';

const logger = createLogger({ module: 'format-gdr' });

const GDR_DEFAULT_FPS = 240;

const gdrSchema = z.object({
  framerate: z.number().positive().default(GDR_DEFAULT_FPS),
  inputs: z.array(
    z.object({
      frame: z.number().int().nonnegative(),
      btn: z.number().int().default(1),
      '2p': z.boolean().default(false),
      down: z.boolean(),
      correction: z
        .object({
          xPos: z.number().default(0),
          yPos: z.number().default(0),
          rotation: z.number().default(0),
          yVel: z.number().default(0),
        })
        .optional(),
    })
  ),
});

export function gdrButton(btn: number): Button {
  switch (btn) {
    case 2:
      return 'left';
    case 3:
      return 'right';
    default:
      return 'jump';
  }
}

function readDocument(bytes: Uint8Array): unknown {
  try {
    return decodeMsgpack(bytes);
  } catch (error) {
    logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Not MessagePack, trying JSON');
    return parseJson('gdr', bytes);
  }
}

export function decodeGdr(bytes: Uint8Array): RawReplay {
  const doc = parseWithSchema('gdr', gdrSchema, readDocument(bytes));

  const events: RawEvent[] = doc.inputs.map((input): RawEvent => ({
    kind: input.down ? 'press' : 'release',
    player: input['2p'] ? 'p2' : 'p1',
    button: gdrButton(input.btn),
    frame: input.frame,
    physics: input.correction && {
      x: input.correction.xPos,
      y: input.correction.yPos,
      rotation: input.correction.rotation,
      yAccel: input.correction.yVel,
    },
  }));

  return { format: 'gdr', fps: doc.framerate, events, implicitPlayer: false };
}
