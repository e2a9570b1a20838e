/**
 * GDReplayFormat 2 (.gdr2)
 *
 * Compact binary successor to GDR: varint integers, big-endian floats and
 * per-player input lists whose frames are deltas from the previous input.
 * When the header names an input extension, each input carries a
 * length-prefixed extension block; "Phys" blocks hold the player's physics.
 */

import type { Physics, Player } from '@clicksynth/core';
import { FormatError } from '@clicksynth/core';
import { createLogger } from '@clicksynth/utils';
import { BinaryReader } from '../binary/reader.js';
import type { RawEvent, RawReplay } from '../types.js';
import { gdrButton } from './gdr.js';

const logger = createLogger({ module: 'format-gdr2' });

const GDR2_VERSION = 2;
const GDR2_MAX_STRING = 0xffff;
const PHYSICS_EXTENSION = 'Phys';

function readString(reader: BinaryReader): string {
  const length = reader.varint32();
  if (length < 0 || length > GDR2_MAX_STRING) {
    throw new FormatError('gdr2', `a string of at most ${GDR2_MAX_STRING} bytes`, `${length} bytes`);
  }
  return reader.utf8(length);
}

function readPhysics(block: Uint8Array): Physics {
  const reader = new BinaryReader(block, 'gdr2');
  const x = reader.f32('be');
  const y = reader.f32('be');
  const rotation = reader.f32('be');
  reader.f64('be'); // x velocity
  const yVelocity = reader.f64('be');
  return { x, y, rotation, yAccel: yVelocity };
}

export function decodeGdr2(bytes: Uint8Array): RawReplay {
  const reader = new BinaryReader(bytes, 'gdr2');

  const magic = reader.ascii(3);
  if (magic !== 'GDR') {
    throw new FormatError('gdr2', 'magic "GDR"', JSON.stringify(magic));
  }
  const version = reader.varint32();
  if (version !== GDR2_VERSION) {
    throw new FormatError('gdr2', `version ${GDR2_VERSION}`, `version ${version}`);
  }

  const inputTag = readString(reader);
  const author = readString(reader);
  readString(reader); // description
  reader.f32('be'); // duration
  reader.varint32(); // game version
  const framerate = reader.f64('be');
  reader.varint32(); // seed
  reader.varint32(); // coins
  reader.u8(); // low detail mode
  const platformer = reader.u8() !== 0;
  const botName = readString(reader);
  reader.varint32(); // bot version
  reader.varint32(); // level id
  const levelName = readString(reader);

  reader.skip(reader.varint32());

  const deaths = reader.varint32();
  for (let i = 0; i < deaths; i++) {
    reader.varint32();
  }

  const total = reader.varint32();
  const p1Count = reader.varint32();
  if (total < 0 || p1Count < 0 || p1Count > total) {
    throw new FormatError('gdr2', 'player 1 inputs within the input total', `${p1Count} of ${total}`);
  }

  logger.debug({ author, botName, levelName, platformer, inputs: total }, 'Parsed gdr2 header');

  const events: RawEvent[] = [];
  const readInputs = (player: Player, count: number): void => {
    let frame = 0;
    for (let i = 0; i < count; i++) {
      const packed = reader.varint32();
      let delta: number;
      let button = 1;
      if (platformer) {
        delta = packed >>> 3;
        button = (packed >> 1) & 0b11;
      } else {
        delta = packed >>> 1;
      }
      frame += delta;

      const event: RawEvent = {
        kind: (packed & 1) !== 0 ? 'press' : 'release',
        player,
        button: gdrButton(button),
        frame,
      };

      if (inputTag !== '') {
        const block = reader.bytes(reader.varint32());
        if (inputTag === PHYSICS_EXTENSION && block.length > 0) {
          event.physics = readPhysics(block);
        }
      }
      events.push(event);
    }
  };

  readInputs('p1', p1Count);
  readInputs('p2', total - p1Count);

  return { format: 'gdr2', fps: framerate, events, implicitPlayer: false };
}
