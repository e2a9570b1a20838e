/**
 * Pitch selection
 *
 * Pitches are whole multiples of `step` inside [from, to], so every sample
 * has a small fixed set of variants that can be cached.
 */

import type { RandomSource } from '@clicksynth/core';
import type { RenderConfig } from './config.js';

type PitchConfig = RenderConfig['pitch'];

const EPSILON = 1e-9;

/** Inclusive range of step multipliers k such that k × step lies in [from, to] */
export function pitchStepRange(pitch: PitchConfig): { min: number; max: number } {
  return {
    min: Math.ceil(pitch.from / pitch.step - EPSILON),
    max: Math.floor(pitch.to / pitch.step + EPSILON),
  };
}

export function drawPitch(pitch: PitchConfig, random: RandomSource): number {
  if (!pitch.enabled) {
    return 1;
  }
  const { min, max } = pitchStepRange(pitch);
  if (max < min) {
    return 1;
  }
  return random.int(min, max) * pitch.step;
}
