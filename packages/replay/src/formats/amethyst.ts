/**
 * Amethyst replays (.thyst)
 *
 * Plain text in four blocks: player 1 clicks, player 1 releases, player 2
 * clicks, player 2 releases. Each block is a count line followed by that
 * many action times in seconds.
 */

import type { ActionKind, Player } from '@clicksynth/core';
import { FormatError } from '@clicksynth/core';
import type { RawEvent, RawReplay } from '../types.js';
import { decodeText } from './shared.js';

const BLOCKS: ReadonlyArray<[Player, ActionKind]> = [
  ['p1', 'press'],
  ['p1', 'release'],
  ['p2', 'press'],
  ['p2', 'release'],
];

export function decodeAmethyst(bytes: Uint8Array): RawReplay {
  const lines = decodeText('amethyst', bytes).split('\n');
  let cursor = 0;

  const next = (what: string): string => {
    const line = lines[cursor];
    if (line === undefined) {
      throw new FormatError('amethyst', what, 'end of file');
    }
    cursor++;
    return line.trim();
  };

  const events: RawEvent[] = [];

  for (const [player, kind] of BLOCKS) {
    const countLine = next(`${player} ${kind} count`);
    const count = Number(countLine);
    if (!Number.isInteger(count) || count < 0) {
      throw new FormatError('amethyst', `a ${player} ${kind} count`, JSON.stringify(countLine));
    }

    for (let i = 0; i < count; i++) {
      const timeLine = next(`${player} ${kind} time`);
      const time = Number(timeLine);
      if (timeLine === '' || Number.isNaN(time)) {
        throw new FormatError('amethyst', 'an action time in seconds', JSON.stringify(timeLine));
      }
      events.push({ kind, player, time });
    }
  }

  return { format: 'amethyst', fps: null, events, implicitPlayer: false };
}
