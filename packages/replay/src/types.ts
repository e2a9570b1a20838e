/**
 * Replay Types
 */

import type { ActionKind, Button, Physics, Player } from '@clicksynth/core';

export type ReplayFormat =
  | 'mhr-json'
  | 'mhr'
  | 'tasbot'
  | 'zbot'
  | 'obot2'
  | 'replaybot'
  | 'ybot-frame'
  | 'ybot2'
  | 'echo'
  | 'amethyst'
  | 'osu'
  | 'gdr'
  | 'gdr2'
  | 'xbot'
  | 'kdbot'
  | 'rush'
  | 'silicate'
  | 'ddhor'
  | 'plaintext';

/**
 * One decoded input event, before normalization.
 * At least one of `frame` / `time` is set; `time` wins when both are.
 */
export interface RawEvent {
  kind: ActionKind;
  /** Absent for formats that only record a single implicit player */
  player?: Player;
  button?: Button;
  frame?: number;
  /** Seconds */
  time?: number;
  physics?: Physics;
}

export interface RawReplay {
  format: ReplayFormat;
  /** Frames per second stored in the file, null when the format has none */
  fps: number | null;
  events: RawEvent[];
  /** True when some events carry no player and must be assigned one */
  implicitPlayer: boolean;
}

export type Decoder = (bytes: Uint8Array) => RawReplay;

export interface FormatDescriptor {
  tag: ReplayFormat;
  name: string;
  /** Lowercase extensions without the leading dot; compound ones like "mhr.json" allowed */
  extensions: readonly string[];
  decode: Decoder;
  /** Magic-byte / payload-shape check used when an extension is shared or missing */
  sniff?: (bytes: Uint8Array) => boolean;
}
