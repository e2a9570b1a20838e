import { describe, it, expect } from 'vitest';
import { createRandom } from '@clicksynth/core';
import { drawPitch, pitchStepRange } from './pitch.js';

describe('pitchStepRange', () => {
  it('covers every multiple of step inside the range', () => {
    expect(pitchStepRange({ enabled: true, from: 0.98, to: 1.02, step: 0.0005 })).toEqual({ min: 1960, max: 2040 });
    expect(pitchStepRange({ enabled: true, from: 0.9, to: 1.3, step: 0.25 })).toEqual({ min: 4, max: 5 });
  });
});

describe('drawPitch', () => {
  it('returns 1 when disabled', () => {
    expect(drawPitch({ enabled: false, from: 0.5, to: 0.6, step: 0.1 }, createRandom('pitch'))).toBe(1);
  });

  it('only yields multiples of step inside the range', () => {
    const random = createRandom('pitch');
    const seen = new Set<number>();
    for (let i = 0; i < 200; i++) {
      seen.add(drawPitch({ enabled: true, from: 0.9, to: 1.3, step: 0.25 }, random));
    }
    expect([...seen].sort()).toEqual([1, 1.25]);
  });

  it('stays within a fine-grained range', () => {
    const random = createRandom('fine');
    for (let i = 0; i < 200; i++) {
      const pitch = drawPitch({ enabled: true, from: 0.98, to: 1.02, step: 0.0005 }, random);
      const k = pitch / 0.0005;
      expect(Math.abs(k - Math.round(k))).toBeLessThan(1e-6);
      expect(pitch).toBeGreaterThan(0.98 - 1e-9);
      expect(pitch).toBeLessThan(1.02 + 1e-9);
    }
  });
});
