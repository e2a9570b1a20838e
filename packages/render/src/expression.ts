/**
 * Volume Expression
 *
 * User-authored arithmetic evaluated once per action. Compiled with
 * expr-eval restricted to arithmetic, comparison, logic and the built-in
 * math functions; member access and assignment are off and only the
 * variables below may be referenced. `random()` is removed so every draw
 * comes from the render's seeded source through `rand`.
 */

import exprEval from 'expr-eval';
import { ConfigValidationError } from '@clicksynth/core';

export const MAX_EXPRESSION_LENGTH = 512;

export const EXPRESSION_VARIABLES = [
  'frame',
  'fps',
  'time',
  'x',
  'y',
  'p',
  'player2',
  'rot',
  'accel',
  'down',
  'frames',
  'level_time',
  'rand',
] as const;

export type ExpressionVariable = (typeof EXPRESSION_VARIABLES)[number];
export type ExpressionScope = Record<ExpressionVariable, number>;

export interface VolumeExpression {
  readonly source: string;
  /** Throws when evaluation fails, e.g. calling a variable as a function */
  evaluate(scope: ExpressionScope): number;
}

const parser = new exprEval.Parser({
  allowMemberAccess: false,
  operators: {
    assignment: false,
    in: false,
    concatenate: false,
  },
});
delete parser.functions.random;

function isKnownVariable(name: string): name is ExpressionVariable {
  return EXPRESSION_VARIABLES.some((variable) => variable === name);
}

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * @throws ConfigValidationError on syntax errors, unknown variables or an
 * over-long source
 */
export function compileVolumeExpression(source: string): VolumeExpression {
  if (source.length > MAX_EXPRESSION_LENGTH) {
    throw new ConfigValidationError('expression.source', `longer than ${MAX_EXPRESSION_LENGTH} characters`);
  }

  let expression: ReturnType<typeof parser.parse>;
  try {
    expression = parser.parse(source);
  } catch (error) {
    throw new ConfigValidationError('expression.source', message(error));
  }

  const unknown = expression.variables().filter((name) => !isKnownVariable(name));
  if (unknown.length > 0) {
    throw new ConfigValidationError(
      'expression.source',
      `unknown variable${unknown.length > 1 ? 's' : ''} ${unknown.join(', ')} (known: ${EXPRESSION_VARIABLES.join(', ')})`
    );
  }

  return {
    source,
    evaluate(scope: ExpressionScope): number {
      // comparisons yield booleans
      const result = Number(expression.evaluate(scope));
      return Number.isFinite(result) ? result : 0;
    },
  };
}
