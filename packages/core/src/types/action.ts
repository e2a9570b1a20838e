/**
 * Timeline Types
 * 
 * The canonical action model every replay format is normalized into.
 */

export type Player = 'p1' | 'p2';

export type ActionKind = 'press' | 'release';

/** Input button. Platformer replays distinguish left/right movement. */
export type Button = 'jump' | 'left' | 'right';

export interface Physics {
  x: number;
  y: number;
  rotation: number;
  /** Vertical velocity/acceleration as stored by the recording bot */
  yAccel: number;
}

export interface Action {
  player: Player;
  kind: ActionKind;
  /** Seconds since the start of the replay */
  time: number;
  button: Button;
  /** Source frame index (derived from time for time-based formats) */
  frame: number;
  physics?: Physics;
}

export interface ActionTimeline {
  format: string;
  fps: number;
  actions: readonly Action[];
  /** Time of the last action in seconds */
  duration: number;
}

export function otherPlayer(player: Player): Player {
  return player === 'p1' ? 'p2' : 'p1';
}
