import { describe, it, expect } from 'vitest';
import { SamplePool } from './pool.js';
import type { AudioSample } from './types.js';

function sample(name: string, frames: number, sampleRate = 1000): AudioSample {
  return { name, sampleRate, channels: [new Float32Array(frames)] };
}

describe('SamplePool', () => {
  it('returns an empty list for missing categories', () => {
    const pool = new SamplePool();

    expect(pool.lookup('player1', 'hardclick')).toEqual([]);
    expect(pool.hasSamples('player1')).toBe(false);
    expect(pool.size).toBe(0);
  });

  it('collects samples per side and category', () => {
    const a = sample('a', 10);
    const b = sample('b', 20);
    const pool = new SamplePool().add('player1', 'click', a).add('player1', 'click', b).add('left2', 'release', a);

    expect(pool.lookup('player1', 'click')).toEqual([a, b]);
    expect(pool.lookup('player2', 'click')).toEqual([]);
    expect(pool.sides()).toEqual(['player1', 'left2']);
    expect(pool.size).toBe(3);
  });

  it('checks a subset of categories', () => {
    const pool = new SamplePool().add('player2', 'softrelease', sample('r', 5));

    expect(pool.hasSamples('player2', ['click', 'hardclick'])).toBe(false);
    expect(pool.hasSamples('player2', ['release', 'softrelease'])).toBe(true);
  });

  it('reports the longest click, ignoring noise', () => {
    const pool = new SamplePool()
      .add('player1', 'click', sample('short', 100))
      .add('player2', 'hardclick', sample('long', 250))
      .setNoise(sample('noise', 5000));

    expect(pool.longestDuration).toBe(0.25);
    expect(pool.noiseSample()?.name).toBe('noise');
  });
});
