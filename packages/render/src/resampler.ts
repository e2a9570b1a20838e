/**
 * Linear-interpolation resampler
 */

import type { AudioSample } from '@clicksynth/clickpack';

/**
 * Resample planar audio. `ratio` is the number of source frames consumed per
 * output frame: `pitch × sourceRate / outputRate`.
 */
export function resample(channels: readonly Float32Array[], ratio: number): Float32Array[] {
  if (ratio === 1) {
    return [...channels];
  }

  return channels.map((input) => {
    const length = input.length === 0 ? 0 : Math.ceil(input.length / ratio);
    const output = new Float32Array(length);
    const last = input.length - 1;

    for (let i = 0; i < length; i++) {
      const position = i * ratio;
      const index = Math.floor(position);
      const frac = position - index;
      const a = input[index];
      const b = index < last ? input[index + 1] : a;
      output[i] = a + (b - a) * frac;
    }
    return output;
  });
}

/** Reason a decoded sample can't be rendered, or undefined when it is usable */
export function sampleProblem(sample: AudioSample): string | undefined {
  if (!(sample.sampleRate > 0)) {
    return `sample ${sample.name} has sample rate ${sample.sampleRate}`;
  }
  if (sample.channels.length === 0) {
    return `sample ${sample.name} has no channels`;
  }
  const frames = sample.channels[0].length;
  for (const channel of sample.channels) {
    if (channel.length !== frames) {
      return `sample ${sample.name} has channels of different lengths`;
    }
    for (const value of channel) {
      if (!Number.isFinite(value)) {
        return `sample ${sample.name} contains non-finite values`;
      }
    }
  }
  return undefined;
}
