/**
 * Helpers shared by the text and JSON decoders
 */

import type { z } from 'zod';
import { FormatError } from '@clicksynth/core';
import { isObject } from '@clicksynth/utils';
import type { ReplayFormat } from '../types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function decodeText(format: ReplayFormat, bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw new FormatError(format, 'UTF-8 text', 'invalid byte sequence');
  }
}

export function parseJson(format: ReplayFormat, bytes: Uint8Array): unknown {
  const text = decodeText(format, bytes);
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    throw new FormatError(format, 'a JSON document', error instanceof Error ? error.message : String(error));
  }
}

/**
 * Validate a decoded document against its schema, reporting the first
 * offending field path.
 */
export function parseWithSchema<T extends z.ZodTypeAny>(
  format: ReplayFormat,
  schema: T,
  value: unknown
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : 'document';
    throw new FormatError(format, `valid field '${path}'`, issue?.message ?? 'invalid value');
  }
  return result.data;
}

/** Split text into trimmed lines, dropping a trailing empty line */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/).map((line) => line.trim());
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/** Cheap top-level key probe used by format sniffing */
export function jsonHasKeys(bytes: Uint8Array, keys: readonly string[]): boolean {
  try {
    const value: unknown = JSON.parse(utf8.decode(bytes));
    return isObject(value) && keys.every((key) => key in value);
  } catch {
    return false;
  }
}
