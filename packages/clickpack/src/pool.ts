/**
 * Sample Pool
 *
 * Decoded clickpack sounds keyed by player side and click category, plus an
 * optional noise loop. Any (side, category) pair may be empty.
 */

import type { ClickCategory, PlayerSide } from '@clicksynth/core';
import { CLICK_CATEGORIES, PLAYER_SIDES } from '@clicksynth/core';
import { sampleDuration, type AudioSample } from './types.js';

const EMPTY: readonly AudioSample[] = Object.freeze([]);

export class SamplePool {
  private readonly samples = new Map<PlayerSide, Map<ClickCategory, AudioSample[]>>();
  private noise: AudioSample | undefined;

  add(side: PlayerSide, category: ClickCategory, ...samples: AudioSample[]): this {
    let categories = this.samples.get(side);
    if (!categories) {
      categories = new Map<ClickCategory, AudioSample[]>();
      this.samples.set(side, categories);
    }
    const existing = categories.get(category);
    if (existing) {
      existing.push(...samples);
    } else if (samples.length > 0) {
      categories.set(category, [...samples]);
    }
    return this;
  }

  setNoise(sample: AudioSample | undefined): this {
    this.noise = sample;
    return this;
  }

  lookup(side: PlayerSide, category: ClickCategory): readonly AudioSample[] {
    return this.samples.get(side)?.get(category) ?? EMPTY;
  }

  noiseSample(): AudioSample | undefined {
    return this.noise;
  }

  /** True when the side has at least one sample among the given categories */
  hasSamples(side: PlayerSide, categories: readonly ClickCategory[] = CLICK_CATEGORIES): boolean {
    return categories.some((category) => this.lookup(side, category).length > 0);
  }

  /** Sides holding at least one sample */
  sides(): PlayerSide[] {
    return PLAYER_SIDES.filter((side) => this.hasSamples(side));
  }

  /** Number of click samples, noise excluded */
  get size(): number {
    let total = 0;
    for (const categories of this.samples.values()) {
      for (const list of categories.values()) {
        total += list.length;
      }
    }
    return total;
  }

  /** Longest click sample in seconds, noise excluded */
  get longestDuration(): number {
    let longest = 0;
    for (const categories of this.samples.values()) {
      for (const list of categories.values()) {
        for (const sample of list) {
          longest = Math.max(longest, sampleDuration(sample));
        }
      }
    }
    return longest;
  }
}
