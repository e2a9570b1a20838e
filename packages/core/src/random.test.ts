import { describe, it, expect } from 'vitest';
import { createRandom } from './random.js';

describe('createRandom', () => {
  it('reproduces the same sequence for the same seed', () => {
    const a = createRandom('test-seed');
    const b = createRandom('test-seed');
    const seqA = Array.from({ length: 8 }, () => a.next());
    const seqB = Array.from({ length: 8 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('keeps range and int draws inside their bounds', () => {
    const rng = createRandom('bounds');
    for (let i = 0; i < 500; i++) {
      const f = rng.range(-0.2, 0.2);
      expect(f).toBeGreaterThanOrEqual(-0.2);
      expect(f).toBeLessThanOrEqual(0.2);

      const n = rng.int(3, 7);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(3);
      expect(n).toBeLessThanOrEqual(7);
    }
  });
});
