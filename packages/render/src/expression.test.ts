import { describe, it, expect } from 'vitest';
import { ConfigValidationError } from '@clicksynth/core';
import { compileVolumeExpression, MAX_EXPRESSION_LENGTH, type ExpressionScope } from './expression.js';

function scope(overrides: Partial<ExpressionScope> = {}): ExpressionScope {
  return {
    frame: 120,
    fps: 240,
    time: 0.5,
    x: 30,
    y: 105,
    p: 0.25,
    player2: 0,
    rot: 90,
    accel: -2,
    down: 1,
    frames: 480,
    level_time: 2,
    rand: 0.5,
    ...overrides,
  };
}

describe('compileVolumeExpression', () => {
  it('evaluates arithmetic over the action variables', () => {
    const expression = compileVolumeExpression('frame / fps + down');

    expect(expression.evaluate(scope())).toBe(1.5);
    expect(expression.evaluate(scope({ down: 0 }))).toBe(0.5);
  });

  it('supports the built-in math functions', () => {
    expect(compileVolumeExpression('abs(accel) + max(1, 3) + sin(0)').evaluate(scope())).toBe(5);
  });

  it('turns comparisons into 0 or 1', () => {
    const expression = compileVolumeExpression('x > 10');

    expect(expression.evaluate(scope())).toBe(1);
    expect(expression.evaluate(scope({ x: 5 }))).toBe(0);
  });

  it('maps non-finite results to 0', () => {
    expect(compileVolumeExpression('1 / (down - 1)').evaluate(scope())).toBe(0);
  });

  it('rejects unknown variables', () => {
    expect(() => compileVolumeExpression('speed + lives')).toThrow(
      'Validation failed for expression.source: unknown variables speed, lives'
    );
  });

  it('has no unseeded random function', () => {
    expect(() => compileVolumeExpression('random(1)')).toThrow(
      'Validation failed for expression.source: unknown variable random (known:'
    );
    expect(compileVolumeExpression('rand * 2').evaluate(scope())).toBe(1);
  });

  it('throws at evaluation when a variable is called', () => {
    const expression = compileVolumeExpression('frame(1)');

    expect(() => expression.evaluate(scope())).toThrow();
  });

  it('rejects syntax errors', () => {
    expect(() => compileVolumeExpression('1 +')).toThrow(ConfigValidationError);
  });

  it('rejects over-long sources', () => {
    const source = '1+'.repeat(MAX_EXPRESSION_LENGTH) + '1';

    expect(() => compileVolumeExpression(source)).toThrow(`longer than ${MAX_EXPRESSION_LENGTH} characters`);
  });
});
