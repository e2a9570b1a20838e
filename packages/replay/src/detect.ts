/**
 * Format Detection
 */

import { basename } from 'node:path';
import { FormatError } from '@clicksynth/core';
import { FORMATS } from './formats/index.js';
import type { FormatDescriptor, ReplayFormat } from './types.js';

const descriptors: readonly FormatDescriptor[] = Object.values(FORMATS);

/** Length of the longest registered extension the file name ends with, or 0 */
function matchLength(fileName: string, descriptor: FormatDescriptor): number {
  let best = 0;
  for (const extension of descriptor.extensions) {
    if (fileName.endsWith(`.${extension}`) && extension.length > best) {
      best = extension.length;
    }
  }
  return best;
}

/**
 * Pick the replay format for a file.
 *
 * The longest matching extension wins ("x.mhr.json" is Mega Hack, not
 * TASbot). When several formats share it, the first whose sniff accepts the
 * bytes is used, then the one without a sniff. Files with an unknown
 * extension are identified by magic bytes alone.
 */
export function detectFormat(fileName: string, bytes: Uint8Array): ReplayFormat {
  const name = basename(fileName).toLowerCase();

  let candidates: FormatDescriptor[] = [];
  let longest = 0;
  for (const descriptor of descriptors) {
    const length = matchLength(name, descriptor);
    if (length === 0 || length < longest) {
      continue;
    }
    if (length > longest) {
      longest = length;
      candidates = [];
    }
    candidates.push(descriptor);
  }

  const [only] = candidates;
  if (only && candidates.length === 1) {
    return only.tag;
  }

  if (candidates.length > 1) {
    const sniffed = candidates.find((descriptor) => descriptor.sniff?.(bytes) === true);
    const fallback = candidates.find((descriptor) => descriptor.sniff === undefined);
    const chosen = sniffed ?? fallback ?? candidates[0];
    if (chosen) {
      return chosen.tag;
    }
  }

  const byMagic = descriptors.find((descriptor) => descriptor.sniff?.(bytes) === true);
  if (byMagic) {
    return byMagic.tag;
  }

  throw new FormatError('unknown', 'a known replay extension or magic bytes', JSON.stringify(name));
}
