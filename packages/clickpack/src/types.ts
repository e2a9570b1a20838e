/**
 * Clickpack Types
 */

import type { PlayerSide } from '@clicksynth/core';
import type { SamplePool } from './pool.js';

/** Decoded audio, one Float32Array per channel in [-1, 1] */
export interface AudioSample {
  name: string;
  sampleRate: number;
  channels: Float32Array[];
}

export interface LoadClickpackOptions {
  /** Rate ffmpeg decodes non-WAV files to; WAV files keep their own rate */
  sampleRate?: number;
  /** ffmpeg executable, defaults to the resolved binary */
  ffmpegPath?: string;
  /** Files decoded at the same time */
  concurrency?: number;
}

export interface ClickpackStats {
  samples: number;
  skipped: number;
  sides: PlayerSide[];
  /** True when the pack has no side folders and serves both players */
  shared: boolean;
  hasNoise: boolean;
  /** Seconds, noise excluded */
  longestSample: number;
  durationMs: number;
}

export interface LoadedClickpack {
  pool: SamplePool;
  /** One message per file that failed to decode */
  warnings: string[];
  stats: ClickpackStats;
}

export function sampleFrames(sample: AudioSample): number {
  return sample.channels[0]?.length ?? 0;
}

/** Duration in seconds */
export function sampleDuration(sample: AudioSample): number {
  return sample.sampleRate > 0 ? sampleFrames(sample) / sample.sampleRate : 0;
}
