/**
 * Formats Command
 */

import { FORMATS } from '@clicksynth/replay';
import { printHeader, printTable } from '../lib/output.js';

export function formatsCommand(): void {
  printHeader('Supported Replay Formats');
  printTable(
    Object.values(FORMATS).map((format) => ({
      tag: format.tag,
      name: format.name,
      extensions: format.extensions.map((ext) => `.${ext}`).join(' '),
    }))
  );
}
