/**
 * `.replay` files
 * 
 * Two unrelated bots share the extension:
 * - OmegaBot 2 serializes its replay struct with bincode (little-endian,
 *   u32 enum tags, u64 lengths).
 * - ReplayBot writes an "RPLY" magic, a version byte and fixed 5-byte records.
 */

import { FormatError } from '@clicksynth/core';
import { createLogger } from '@clicksynth/utils';
import { BinaryReader, hasMagic } from '../binary/reader.js';
import type { RawEvent, RawReplay } from '../types.js';

const logger = createLogger({ module: 'format-replay' });

// OmegaBot 2 enum tags
const OBOT_LOCATION_XPOS = 0;
const OBOT_LOCATION_FRAME = 1;
const OBOT_REPLAY_XPOS = 0;

const ObotClick = {
  None: 0,
  FpsChange: 1,
  Player1Down: 2,
  Player1Up: 3,
  Player2Down: 4,
  Player2Up: 5,
} as const;

export function decodeObot2(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'obot2');

  const initialFps = reader.f32();
  reader.f32(); // current fps, runtime state
  const replayType = reader.u32();
  if (replayType === OBOT_REPLAY_XPOS) {
    throw new FormatError('obot2', 'a frame replay', 'an x-position replay (no frames stored)');
  }
  reader.u64(); // current click index
  const count = reader.u64();

  if (!(initialFps > 0)) {
    throw new FormatError('obot2', 'a positive initial fps', String(initialFps));
  }

  const events: RawEvent[] = [];
  let currentFps = initialFps;
  let skippedXpos = 0;

  for (let i = 0; i < count; i++) {
    const locationTag = reader.u32();
    const location = reader.u32();
    const clickTag = reader.u32();

    if (locationTag !== OBOT_LOCATION_FRAME && locationTag !== OBOT_LOCATION_XPOS) {
      throw new FormatError('obot2', 'location tag 0 or 1', String(locationTag));
    }

    if (clickTag === ObotClick.FpsChange) {
      currentFps = reader.f32();
      continue;
    }
    if (clickTag === ObotClick.None) {
      continue;
    }
    if (clickTag > ObotClick.Player2Up) {
      throw new FormatError('obot2', 'click tag 0-5', String(clickTag));
    }
    if (locationTag === OBOT_LOCATION_XPOS) {
      skippedXpos++;
      continue;
    }

    const down = clickTag === ObotClick.Player1Down || clickTag === ObotClick.Player2Down;
    const p2 = clickTag === ObotClick.Player2Down || clickTag === ObotClick.Player2Up;
    events.push({
      kind: down ? 'press' : 'release',
      player: p2 ? 'p2' : 'p1',
      frame: location,
      time: location / currentFps,
    });
  }

  if (skippedXpos > 0) {
    logger.warn({ skippedXpos }, 'Skipped x-position actions in a frame replay');
  }

  return { format: 'obot2', fps: initialFps, events, implicitPlayer: false };
}

export function isReplayBot(bytes: Uint8Array): boolean {
  return hasMagic(bytes, 'RPLY');
}

export function decodeReplayBot(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'replaybot');

  const magic = reader.ascii(4);
  if (magic !== 'RPLY') {
    throw new FormatError('replaybot', 'magic "RPLY"', JSON.stringify(magic));
  }

  const version = reader.u8();
  if (version < 2) {
    throw new FormatError('replaybot', 'version 2 or newer', `version ${version} (x-position only)`);
  }
  const type = reader.u8();
  if (type !== 1) {
    throw new FormatError('replaybot', 'a frame replay', 'an x-position replay');
  }
  const fps = reader.f32();

  const events: RawEvent[] = [];
  while (reader.remaining > 0) {
    const frame = reader.u32();
    const flags = reader.u8();
    events.push({
      kind: (flags & 1) !== 0 ? 'press' : 'release',
      player: (flags & 2) !== 0 ? 'p2' : 'p1',
      frame,
    });
  }

  return { format: 'replaybot', fps, events, implicitPlayer: false };
}
