/**
 * Render Configuration
 *
 * Zod schema for every tunable of a render. All fields have defaults, so
 * `parseRenderConfig({})` yields a complete configuration.
 */

import { z } from 'zod';
import type { TimingClass } from '@clicksynth/core';
import { ConfigValidationError, TIMING_CLASSES } from '@clicksynth/core';
import { compileVolumeExpression, MAX_EXPRESSION_LENGTH } from './expression.js';

export const DEFAULT_FALLBACK_ORDER: Readonly<Record<TimingClass, readonly TimingClass[]>> = {
  hard: ['hard', 'regular', 'soft', 'micro'],
  regular: ['regular', 'hard', 'soft', 'micro'],
  soft: ['soft', 'micro', 'regular', 'hard'],
  micro: ['micro', 'soft', 'regular', 'hard'],
};

const timingClassSchema = z.enum(['hard', 'regular', 'soft', 'micro']);
const fallbackListSchema = z.array(timingClassSchema).min(1);

const timingsSchema = z
  .object({
    hard: z.number().nonnegative().default(2.0),
    regular: z.number().nonnegative().default(0.15),
    soft: z.number().nonnegative().default(0.025),
  })
  .refine((t) => t.hard > t.regular && t.regular > t.soft, {
    message: 'must be strictly descending (hard > regular > soft)',
  });

const pitchSchema = z
  .object({
    enabled: z.boolean().default(true),
    from: z.number().positive().default(0.98),
    to: z.number().positive().default(1.02),
    step: z.number().positive().default(0.0005),
  })
  .refine((p) => p.from <= p.to, { message: '"from" must not exceed "to"' })
  .refine((p) => Math.ceil(p.from / p.step - 1e-9) <= Math.floor(p.to / p.step + 1e-9), {
    message: 'range must contain at least one multiple of "step"',
  });

const volumeSchema = z.object({
  spamEnabled: z.boolean().default(true),
  /** Seconds; actions closer than this to the previous one are dampened */
  spamTime: z.number().nonnegative().default(0.3),
  spamVolOffsetFactor: z.number().nonnegative().default(0.9),
  maxSpamVolOffset: z.number().nonnegative().default(0.3),
  changeReleasesVolume: z.boolean().default(false),
  globalVolume: z.number().nonnegative().default(1.0),
  /** Random volume jitter range, ± */
  volumeVar: z.number().nonnegative().default(0.2),
});

const noiseSchema = z.object({
  enabled: z.boolean().default(false),
  volume: z.number().nonnegative().default(1.0),
});

export const expressionVariableSchema = z.enum(['none', 'value', 'variation', 'time-offset']);
export type ExpressionTarget = z.infer<typeof expressionVariableSchema>;

const expressionSchema = z.object({
  source: z.string().max(MAX_EXPRESSION_LENGTH).default(''),
  variable: expressionVariableSchema.default('none'),
  /** Variation mode draws from [-r, r] instead of [0, r] */
  negative: z.boolean().default(true),
});

const fallbackOrderSchema = z.object({
  hard: fallbackListSchema,
  regular: fallbackListSchema,
  soft: fallbackListSchema,
  micro: fallbackListSchema,
});

export const renderConfigSchema = z.object({
  timings: timingsSchema.default({}),
  pitch: pitchSchema.default({}),
  volume: volumeSchema.default({}),
  sampleRate: z.number().int().positive().default(44100),
  cutSounds: z.boolean().default(false),
  noise: noiseSchema.default({}),
  normalize: z.boolean().default(false),
  expression: expressionSchema.default({}),
  fallbackOrder: fallbackOrderSchema.default({
    hard: [...DEFAULT_FALLBACK_ORDER.hard],
    regular: [...DEFAULT_FALLBACK_ORDER.regular],
    soft: [...DEFAULT_FALLBACK_ORDER.soft],
    micro: [...DEFAULT_FALLBACK_ORDER.micro],
  }),
  seed: z.string().optional(),
});

export type RenderConfig = z.infer<typeof renderConfigSchema>;
export type RenderConfigInput = z.input<typeof renderConfigSchema>;

/**
 * Validate a render configuration, filling in defaults.
 * @throws ConfigValidationError naming the first invalid field
 */
export function parseRenderConfig(input: unknown = {}): RenderConfig {
  const result = renderConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigValidationError(field, issue?.message ?? 'invalid value');
  }

  const config = result.data;
  if (config.expression.variable !== 'none' && config.expression.source.trim() === '') {
    throw new ConfigValidationError('expression.source', `required when the expression drives "${config.expression.variable}"`);
  }
  if (config.expression.variable !== 'none') {
    compileVolumeExpression(config.expression.source);
  }

  for (const timing of TIMING_CLASSES) {
    if (!config.fallbackOrder[timing].includes(timing)) {
      throw new ConfigValidationError(`fallbackOrder.${timing}`, `must include "${timing}" itself`);
    }
  }

  return config;
}
