/**
 * Plain text replays (.txt)
 *
 * First non-comment line is the fps, every following line is
 * `frame down [player] [button]`, where `down` is 0/1, `player` is 1/2 and
 * `button` is jump/left/right. Lines starting with `#` are comments. A missing
 * player column leaves the action to the implicit player.
 */

import type { ActionTimeline, Button, Player } from '@clicksynth/core';
import { FormatError } from '@clicksynth/core';
import type { RawEvent, RawReplay } from '../types.js';
import { decodeText, splitLines } from './shared.js';

const BUTTONS: readonly Button[] = ['jump', 'left', 'right'];

function isButton(value: string): value is Button {
  return BUTTONS.some((button) => button === value);
}

function parsePlayer(field: string, line: string): Player {
  if (field === '1') return 'p1';
  if (field === '2') return 'p2';
  throw new FormatError('plaintext', 'player 1 or 2', JSON.stringify(line));
}

export function decodePlaintext(bytes: Uint8Array): RawReplay {
  const lines = splitLines(decodeText('plaintext', bytes)).filter(
    (line) => line !== '' && !line.startsWith('#')
  );

  const fpsLine = lines[0];
  const fps = Number(fpsLine);
  if (fpsLine === undefined || !Number.isFinite(fps) || fps <= 0) {
    throw new FormatError('plaintext', 'an fps line', JSON.stringify(fpsLine ?? ''));
  }

  const events: RawEvent[] = [];
  let implicitPlayer = false;

  for (const line of lines.slice(1)) {
    const fields = line.split(/\s+/);
    const [frameField = '', downField = '', playerField, buttonField] = fields;
    const frame = Number(frameField);
    if (fields.length > 4 || !Number.isInteger(frame) || (downField !== '0' && downField !== '1')) {
      throw new FormatError('plaintext', 'a "frame down [player] [button]" line', JSON.stringify(line));
    }

    const event: RawEvent = { kind: downField === '1' ? 'press' : 'release', frame };
    if (playerField === undefined) {
      implicitPlayer = true;
    } else {
      event.player = parsePlayer(playerField, line);
    }
    if (buttonField !== undefined) {
      if (!isButton(buttonField)) {
        throw new FormatError('plaintext', 'button jump, left or right', JSON.stringify(buttonField));
      }
      event.button = buttonField;
    }
    events.push(event);
  }

  return { format: 'plaintext', fps, events, implicitPlayer };
}

/**
 * Write a timeline in the plaintext format. Frames are recomputed from
 * `time × fps`, so the output reads back to the same actions at that fps.
 */
export function formatPlaintext(timeline: ActionTimeline, fps: number): string {
  const lines = [String(fps)];
  for (const action of timeline.actions) {
    const fields = [
      String(Math.round(action.time * fps)),
      action.kind === 'press' ? '1' : '0',
      action.player === 'p1' ? '1' : '2',
    ];
    if (action.button !== 'jump') {
      fields.push(action.button);
    }
    lines.push(fields.join(' '));
  }
  return lines.join('\n') + '\n';
}
