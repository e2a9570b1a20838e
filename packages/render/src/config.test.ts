import { describe, it, expect } from 'vitest';
import { ConfigValidationError } from '@clicksynth/core';
import { parseRenderConfig } from './config.js';

describe('parseRenderConfig', () => {
  it('fills in every default', () => {
    const config = parseRenderConfig({});

    expect(config.sampleRate).toBe(44100);
    expect(config.timings).toEqual({ hard: 2, regular: 0.15, soft: 0.025 });
    expect(config.pitch.enabled).toBe(true);
    expect(config.expression.variable).toBe('none');
    expect(config.fallbackOrder.hard).toEqual(['hard', 'regular', 'soft', 'micro']);
    expect(config.seed).toBeUndefined();
  });

  it('keeps nested overrides and defaults their siblings', () => {
    const config = parseRenderConfig({ volume: { globalVolume: 0.5 }, cutSounds: true });

    expect(config.volume.globalVolume).toBe(0.5);
    expect(config.volume.spamTime).toBe(0.3);
    expect(config.cutSounds).toBe(true);
  });

  it('rejects timings that are not descending', () => {
    expect(() => parseRenderConfig({ timings: { hard: 0.1, regular: 0.2, soft: 0.01 } })).toThrow(
      'Validation failed for timings'
    );
  });

  it('rejects an inverted pitch range', () => {
    expect(() => parseRenderConfig({ pitch: { from: 1.1, to: 0.9 } })).toThrow(
      'Validation failed for pitch: "from" must not exceed "to"'
    );
  });

  it('rejects a pitch range without a multiple of step', () => {
    expect(() => parseRenderConfig({ pitch: { from: 1.01, to: 1.02, step: 0.5 } })).toThrow(
      'Validation failed for pitch: range must contain at least one multiple of "step"'
    );
  });

  it('rejects a non-positive sample rate', () => {
    expect(() => parseRenderConfig({ sampleRate: 0 })).toThrow(ConfigValidationError);
    expect(() => parseRenderConfig({ sampleRate: 0 })).toThrow('Validation failed for sampleRate');
  });

  it('requires an expression source when an expression is active', () => {
    expect(() => parseRenderConfig({ expression: { variable: 'value' } })).toThrow(
      'Validation failed for expression.source: required when the expression drives "value"'
    );
  });

  it('compiles the expression up front', () => {
    expect(() => parseRenderConfig({ expression: { variable: 'value', source: 'speed * 2' } })).toThrow(
      'unknown variable speed'
    );
    expect(parseRenderConfig({ expression: { variable: 'value', source: 'p * 0.2' } }).expression.source).toBe(
      'p * 0.2'
    );
  });

  it('requires each fallback list to contain its own class', () => {
    const fallbackOrder = {
      hard: ['regular'],
      regular: ['regular'],
      soft: ['soft'],
      micro: ['micro'],
    };

    expect(() => parseRenderConfig({ fallbackOrder })).toThrow(
      'Validation failed for fallbackOrder.hard: must include "hard" itself'
    );
  });
});
