/**
 * Click Classifier
 *
 * A single pass over the timeline that tracks, per player, the previous
 * action of each kind and the previous action of any kind.
 */

import type { Action, ActionKind, ClickCategory, Player, TimingClass } from '@clicksynth/core';
import { categoryFor } from '@clicksynth/core';
import type { RenderConfig } from './config.js';

export interface ClassifiedAction {
  action: Action;
  /** Position in the timeline */
  index: number;
  timing: TimingClass;
  category: ClickCategory;
  /** Seconds since the player's previous action of the same kind, null for the first */
  elapsed: number | null;
  /** Seconds since the player's previous action of any kind, null for the first */
  gap: number | null;
}

export function classifyTiming(elapsed: number, timings: RenderConfig['timings']): TimingClass {
  if (elapsed >= timings.hard) return 'hard';
  if (elapsed >= timings.regular) return 'regular';
  if (elapsed >= timings.soft) return 'soft';
  return 'micro';
}

export function classifyActions(
  actions: readonly Action[],
  timings: RenderConfig['timings']
): ClassifiedAction[] {
  const lastOfKind = new Map<`${Player}:${ActionKind}`, number>();
  const lastAny = new Map<Player, number>();

  return actions.map((action, index) => {
    const kindKey = `${action.player}:${action.kind}` as const;
    const previousOfKind = lastOfKind.get(kindKey);
    const previous = lastAny.get(action.player);

    const elapsed = previousOfKind === undefined ? null : action.time - previousOfKind;
    const gap = previous === undefined ? null : action.time - previous;
    const timing = elapsed === null ? 'regular' : classifyTiming(elapsed, timings);

    lastOfKind.set(kindKey, action.time);
    lastAny.set(action.player, action.time);

    return {
      action,
      index,
      timing,
      category: categoryFor(timing, action.kind),
      elapsed,
      gap,
    };
  });
}
