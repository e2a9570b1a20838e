/**
 * Timeline summary for `info`
 */

import type { ActionTimeline, ActionKind, Player } from '@clicksynth/core';

export interface PlayerSummary {
  player: Player;
  presses: number;
  releases: number;
}

export interface TimelineSummary {
  format: string;
  fps: number;
  actions: number;
  duration: number;
  players: PlayerSummary[];
}

export function summarizeTimeline(timeline: ActionTimeline): TimelineSummary {
  const counts = new Map<Player, Record<ActionKind, number>>();
  for (const action of timeline.actions) {
    const entry = counts.get(action.player) ?? { press: 0, release: 0 };
    entry[action.kind]++;
    counts.set(action.player, entry);
  }

  const players = [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([player, entry]) => ({ player, presses: entry.press, releases: entry.release }));

  return {
    format: timeline.format,
    fps: timeline.fps,
    actions: timeline.actions.length,
    duration: timeline.duration,
    players,
  };
}
