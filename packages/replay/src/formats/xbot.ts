/**
 * xBot replays (.xbot)
 *
 * ```
 * fps: 240
 * frames
 * 1 120
 * 0 131
 * ```
 * State 0/1 is player 1 up/down, 2/3 is player 2 up/down.
 */

import { FormatError } from '@clicksynth/core';
import type { RawEvent, RawReplay } from '../types.js';
import { decodeText, splitLines } from './shared.js';

export function decodeXbot(bytes: Uint8Array): RawReplay {
  const lines = splitLines(decodeText('xbot', bytes));

  const fpsMatch = /^fps:\s*(\d+(?:\.\d+)?)$/.exec(lines[0] ?? '');
  if (!fpsMatch?.[1]) {
    throw new FormatError('xbot', '"fps: N" header', JSON.stringify(lines[0] ?? ''));
  }
  const fps = Number(fpsMatch[1]);

  const mode = lines[1] ?? '';
  if (mode === 'pos') {
    throw new FormatError('xbot', 'a frame replay', 'a position replay');
  }
  if (mode !== 'frames') {
    throw new FormatError('xbot', '"frames"', JSON.stringify(mode));
  }

  const events: RawEvent[] = [];
  for (const line of lines.slice(2)) {
    if (line === '') {
      continue;
    }
    const [stateField, frameField, extra] = line.split(/\s+/);
    const state = Number(stateField);
    const frame = Number(frameField);
    if (extra !== undefined || !Number.isInteger(state) || state < 0 || state > 3 || !Number.isInteger(frame)) {
      throw new FormatError('xbot', 'a "state frame" line', JSON.stringify(line));
    }
    events.push({
      kind: state % 2 === 1 ? 'press' : 'release',
      player: state >= 2 ? 'p2' : 'p1',
      frame,
    });
  }

  return { format: 'xbot', fps, events, implicitPlayer: false };
}
