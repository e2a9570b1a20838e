/**
 * Persisted CLI defaults
 */

import { z } from 'zod';
import { join } from 'node:path';
import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { ConfigValidationError } from '@clicksynth/core';

// Config file schema
export const configFileSchema = z.object({
  sampleRate: z.number().int().positive().default(44100),
  bitDepth: z.union([z.literal(16), z.literal(32)]).default(32),
  ffmpegPath: z.string().optional(),
  defaultClickpack: z.string().optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export const CONFIG_KEYS = ['sampleRate', 'bitDepth', 'ffmpegPath', 'defaultClickpack'] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

export function configPaths(home: string, override?: string): { dir: string; file: string } {
  const dir = override ?? join(home, '.clicksynth');
  return { dir, file: join(dir, 'config.json') };
}

/**
 * Read the persisted defaults. A missing file yields the defaults, a broken
 * one is an error.
 */
export function loadConfigFile(file: string): ConfigFile {
  if (!existsSync(file)) {
    return configFileSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigValidationError(file, error instanceof Error ? error.message : String(error));
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigValidationError(issue?.path.join('.') || file, issue?.message ?? 'invalid value');
  }
  return parsed.data;
}

export function saveConfigFile(dir: string, file: string, values: Partial<ConfigFile>): ConfigFile {
  const merged = configFileSchema.parse(values);
  mkdirSync(dir, { recursive: true });
  writeFileSync(file, JSON.stringify(merged, null, 2));
  return merged;
}

/**
 * Convert a `config set` value to the type its key stores
 */
export function coerceConfigValue(key: ConfigKey, value: string): Partial<ConfigFile> {
  switch (key) {
    case 'sampleRate':
      return { sampleRate: parseField(key, configFileSchema.shape.sampleRate, Number(value)) };
    case 'bitDepth':
      return { bitDepth: parseField(key, configFileSchema.shape.bitDepth, Number(value)) };
    case 'ffmpegPath':
      return { ffmpegPath: value };
    case 'defaultClickpack':
      return { defaultClickpack: value };
  }
}

function parseField<T extends z.ZodTypeAny>(key: ConfigKey, schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigValidationError(key, result.error.issues[0]?.message ?? 'invalid value');
  }
  return result.data;
}
