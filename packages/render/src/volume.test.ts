import { describe, it, expect } from 'vitest';
import { parseRenderConfig } from './config.js';
import { actionGain, shapesVolume, spamOffset } from './volume.js';

const volume = parseRenderConfig({}).volume;

describe('spamOffset', () => {
  it('is zero without a gap or past spamTime', () => {
    expect(spamOffset(null, volume)).toBe(0);
    expect(spamOffset(0.3, volume)).toBe(0);
    expect(spamOffset(1, volume)).toBe(0);
  });

  it('grows linearly as the gap shrinks', () => {
    expect(spamOffset(0.2, volume)).toBeCloseTo(0.09, 10);
    expect(spamOffset(0, volume)).toBeCloseTo(0.27, 10);
  });

  it('is clamped to maxSpamVolOffset', () => {
    expect(spamOffset(0.05, { ...volume, spamVolOffsetFactor: 2 })).toBe(0.3);
  });

  it('never increases with the gap', () => {
    const config = { ...volume, spamVolOffsetFactor: 1.5 };
    let previous = Infinity;
    for (let gap = 0; gap <= 0.5; gap += 0.01) {
      const offset = spamOffset(gap, config);
      expect(offset).toBeLessThanOrEqual(previous);
      expect(offset).toBeLessThanOrEqual(config.maxSpamVolOffset);
      previous = offset;
    }
  });

  it('is off when spam dampening is disabled', () => {
    expect(spamOffset(0, { ...volume, spamEnabled: false })).toBe(0);
  });
});

describe('actionGain', () => {
  it('applies jitter and expression to presses', () => {
    expect(actionGain({ kind: 'press', gap: null, jitter: 0.1, exprValue: 0.2 }, volume)).toBeCloseTo(1.3, 10);
  });

  it('keeps releases flat unless configured', () => {
    const input = { kind: 'release' as const, gap: 0.1, jitter: 0.1, exprValue: 0 };

    expect(shapesVolume('release', volume)).toBe(false);
    expect(actionGain(input, volume)).toBe(1);
    expect(actionGain(input, { ...volume, changeReleasesVolume: true })).toBeCloseTo(1.1 - 0.18, 10);
  });

  it('scales by globalVolume and never goes negative', () => {
    expect(actionGain({ kind: 'press', gap: null, jitter: 0, exprValue: 0 }, { ...volume, globalVolume: 0.5 })).toBe(0.5);
    expect(actionGain({ kind: 'press', gap: null, jitter: -5, exprValue: 0 }, volume)).toBe(0);
  });
});
