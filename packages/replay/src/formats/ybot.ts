/**
 * yBot replays
 * 
 * - yBot frame (`.ybf`): f32 fps, i32 count, then (u32 frame, u32 flags).
 * - yBot 2 (`.ybot`): "ybot" magic, versioned metadata block, length-prefixed
 *   blobs, then varint-encoded actions whose frame is a delta from the
 *   previous action. Flags 0b1111 (or a zero button) carry an fps change.
 */

import type { Button } from '@clicksynth/core';
import { FormatError } from '@clicksynth/core';
import { createLogger } from '@clicksynth/utils';
import { BinaryReader, hasMagic } from '../binary/reader.js';
import type { RawEvent, RawReplay } from '../types.js';

const logger = createLogger({ module: 'format-ybot' });

const YBOT_HEADER_LENGTH = 16;
const YBOT_META_FPS_OFFSET = 24;
const YBOT_DEFAULT_FPS = 240;

const YBOT_BUTTONS: Record<number, Button> = {
  1: 'jump',
  2: 'left',
  3: 'right',
};

export function decodeYbotFrame(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'ybot-frame');

  const fps = reader.f32();
  const count = reader.i32();
  if (count < 0) {
    throw new FormatError('ybot-frame', 'a non-negative action count', String(count));
  }

  const events: RawEvent[] = [];
  for (let i = 0; i < count; i++) {
    const frame = reader.u32();
    const flags = reader.u32();
    events.push({
      kind: (flags & 0b10) !== 0 ? 'press' : 'release',
      player: (flags & 0b01) !== 0 ? 'p2' : 'p1',
      frame,
    });
  }

  return { format: 'ybot-frame', fps, events, implicitPlayer: false };
}

export function isYbot2(bytes: Uint8Array): boolean {
  return hasMagic(bytes, 'ybot');
}

export function decodeYbot2(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'ybot2');

  const magic = reader.ascii(4);
  if (magic !== 'ybot') {
    throw new FormatError('ybot2', 'magic "ybot"', JSON.stringify(magic));
  }
  const version = reader.u32();
  const metaLength = reader.u32();
  const blobCount = reader.u32();

  // Missing metadata fields read as 0xFF bytes, which is NaN for an f32
  let fps = YBOT_DEFAULT_FPS;
  if (YBOT_META_FPS_OFFSET + 4 <= metaLength) {
    reader.seek(YBOT_HEADER_LENGTH + YBOT_META_FPS_OFFSET);
    const stored = reader.f32();
    if (Number.isFinite(stored) && stored > 0) {
      fps = stored;
    }
  }

  reader.seek(YBOT_HEADER_LENGTH);
  reader.skip(metaLength);
  for (let i = 0; i < blobCount; i++) {
    reader.skip(reader.u32());
  }

  logger.debug({ version, metaLength, blobCount, fps }, 'Parsed ybot header');

  const initialFps = fps;
  const events: RawEvent[] = [];
  let frame = 0;
  let time = 0;

  while (reader.remaining > 0) {
    const packed = reader.uleb128();
    const flags = packed % 16;
    const delta = Math.floor(packed / 16);

    frame += delta;
    time += delta / fps;

    const button = YBOT_BUTTONS[flags >> 2];
    if (flags === 0b1111 || button === undefined) {
      fps = reader.f32();
      if (!(fps > 0)) {
        throw new FormatError('ybot2', 'a positive fps change', String(fps));
      }
      continue;
    }

    events.push({
      kind: (flags & 0b10) !== 0 ? 'press' : 'release',
      player: (flags & 0b01) !== 0 ? 'p1' : 'p2',
      button,
      frame,
      time,
    });
  }

  return { format: 'ybot2', fps: initialFps, events, implicitPlayer: false };
}
