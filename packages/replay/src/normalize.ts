/**
 * Timeline Normalizer
 *
 * Converts decoded events into the canonical ActionTimeline: seconds for
 * every action, an explicit player and button, time order and no repeated
 * button states.
 */

import type { Action, ActionTimeline, Player } from '@clicksynth/core';
import { TimelineError } from '@clicksynth/core';
import { createLogger } from '@clicksynth/utils';
import type { RawEvent, RawReplay } from './types.js';

const logger = createLogger({ module: 'normalize' });

export const DEFAULT_FPS = 240;
export const DEFAULT_MAX_DURATION = 24 * 60 * 60;

export interface NormalizeOptions {
  /** Used when the replay stores no fps */
  defaultFps?: number;
  /** Player assigned to events that carry none */
  implicitPlayer?: Player;
  sort?: boolean;
  /** Drop presses of a held button and releases of a released one */
  dedupe?: boolean;
  /** Seconds */
  maxDuration?: number;
}

function eventTime(event: RawEvent, index: number, fps: number): { time: number; frame: number } {
  if (event.time !== undefined) {
    if (!Number.isFinite(event.time) || event.time < 0) {
      throw new TimelineError(`Action #${index} has invalid time ${event.time}`, { index, time: event.time });
    }
    return { time: event.time, frame: event.frame ?? Math.round(event.time * fps) };
  }

  if (event.frame !== undefined) {
    if (!Number.isFinite(event.frame) || event.frame < 0) {
      throw new TimelineError(`Action #${index} has invalid frame ${event.frame}`, { index, frame: event.frame });
    }
    return { time: event.frame / fps, frame: event.frame };
  }

  throw new TimelineError(`Action #${index} has neither a frame nor a time`, { index });
}

export function normalizeReplay(raw: RawReplay, options: NormalizeOptions = {}): ActionTimeline {
  const {
    defaultFps = DEFAULT_FPS,
    implicitPlayer = 'p1',
    sort = true,
    dedupe = true,
    maxDuration = DEFAULT_MAX_DURATION,
  } = options;

  const fps = raw.fps ?? defaultFps;
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new TimelineError(`Replay fps must be positive, got ${fps}`, { format: raw.format, fps });
  }

  const timed = raw.events.map((event, index) => {
    const { time, frame } = eventTime(event, index, fps);
    if (time > maxDuration) {
      throw new TimelineError(
        `Action #${index} at ${time}s is beyond the ${maxDuration}s limit`,
        { index, time, maxDuration }
      );
    }
    const action: Action = {
      player: event.player ?? implicitPlayer,
      kind: event.kind,
      time,
      button: event.button ?? 'jump',
      frame,
    };
    if (event.physics) {
      action.physics = { ...event.physics };
    }
    return { action, index };
  });

  if (sort) {
    timed.sort((a, b) => a.action.time - b.action.time || a.index - b.index);
  }

  let actions = timed.map(({ action }) => action);

  if (dedupe) {
    const held = new Map<string, boolean>();
    actions = actions.filter((action) => {
      const key = `${action.player}:${action.button}`;
      const down = action.kind === 'press';
      if ((held.get(key) ?? false) === down) {
        return false;
      }
      held.set(key, down);
      return true;
    });
  }

  const last = actions[actions.length - 1];
  const timeline: ActionTimeline = {
    format: raw.format,
    fps,
    actions: Object.freeze(actions.map((action) => Object.freeze(action))),
    duration: last ? last.time : 0,
  };

  logger.debug(
    {
      format: raw.format,
      fps,
      events: raw.events.length,
      actions: actions.length,
      dropped: raw.events.length - actions.length,
    },
    'Normalized replay'
  );

  return Object.freeze(timeline);
}
