/**
 * Volume shaping
 */

import type { ActionKind } from '@clicksynth/core';
import type { RenderConfig } from './config.js';

type VolumeConfig = RenderConfig['volume'];

/**
 * Dampening for fast repeated input. Zero once the gap reaches `spamTime`,
 * growing linearly as the gap shrinks, capped at `maxSpamVolOffset`.
 */
export function spamOffset(gap: number | null, volume: VolumeConfig): number {
  if (!volume.spamEnabled || gap === null || gap >= volume.spamTime) {
    return 0;
  }
  return Math.min(volume.spamVolOffsetFactor * (volume.spamTime - gap), volume.maxSpamVolOffset);
}

/** Releases keep a flat volume unless `changeReleasesVolume` is set */
export function shapesVolume(kind: ActionKind, volume: VolumeConfig): boolean {
  return kind === 'press' || volume.changeReleasesVolume;
}

export interface GainInput {
  kind: ActionKind;
  gap: number | null;
  jitter: number;
  /** Added by a "value" volume expression */
  exprValue: number;
}

export function actionGain(input: GainInput, volume: VolumeConfig): number {
  const shaped = shapesVolume(input.kind, volume);
  const jitter = shaped ? input.jitter : 0;
  const spam = shaped ? spamOffset(input.gap, volume) : 0;
  return Math.max(0, volume.globalVolume * (1 + jitter + input.exprValue - spam));
}
