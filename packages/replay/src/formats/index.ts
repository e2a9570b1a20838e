/**
 * Format Registry
 *
 * One descriptor per supported replay format. Formats that share an
 * extension are told apart by their `sniff` check; the candidate without a
 * sniff is the fallback for that extension.
 */

import { hasMagic } from '../binary/reader.js';
import type { FormatDescriptor, ReplayFormat } from '../types.js';
import { decodeAmethyst } from './amethyst.js';
import { decodeEcho } from './echo.js';
import { decodeGdr } from './gdr.js';
import { decodeGdr2 } from './gdr2.js';
import { decodeDdhor, decodeKdbot, decodeRush, decodeSilicate, isDdhor } from './legacy.js';
import { decodeMhrBinary, decodeMhrJson } from './megahack.js';
import { decodeOsu } from './osu.js';
import { decodePlaintext } from './plaintext.js';
import { decodeObot2, decodeReplayBot, isReplayBot } from './replay.js';
import { jsonHasKeys } from './shared.js';
import { decodeTasbot } from './tasbot.js';
import { decodeXbot } from './xbot.js';
import { decodeYbot2, decodeYbotFrame, isYbot2 } from './ybot.js';
import { decodeZbot } from './zbot.js';

export const FORMATS: Readonly<Record<ReplayFormat, FormatDescriptor>> = {
  'mhr-json': {
    tag: 'mhr-json',
    name: 'Mega Hack (JSON)',
    extensions: ['mhr.json', 'json'],
    decode: decodeMhrJson,
    sniff: (bytes) => jsonHasKeys(bytes, ['meta', 'events']),
  },
  mhr: {
    tag: 'mhr',
    name: 'Mega Hack (binary)',
    extensions: ['mhr'],
    decode: decodeMhrBinary,
    sniff: (bytes) => hasMagic(bytes, 'HACK'),
  },
  tasbot: {
    tag: 'tasbot',
    name: 'TASbot',
    extensions: ['json'],
    decode: decodeTasbot,
    sniff: (bytes) => jsonHasKeys(bytes, ['fps', 'macro']),
  },
  zbot: {
    tag: 'zbot',
    name: 'zBot frame',
    extensions: ['zbf'],
    decode: decodeZbot,
  },
  obot2: {
    tag: 'obot2',
    name: 'OmegaBot 2',
    extensions: ['replay'],
    decode: decodeObot2,
  },
  replaybot: {
    tag: 'replaybot',
    name: 'ReplayBot',
    extensions: ['replay'],
    decode: decodeReplayBot,
    sniff: isReplayBot,
  },
  'ybot-frame': {
    tag: 'ybot-frame',
    name: 'yBot frame',
    extensions: ['ybf'],
    decode: decodeYbotFrame,
  },
  ybot2: {
    tag: 'ybot2',
    name: 'yBot 2',
    extensions: ['ybot'],
    decode: decodeYbot2,
    sniff: isYbot2,
  },
  echo: {
    tag: 'echo',
    name: 'Echo',
    extensions: ['echo'],
    decode: decodeEcho,
    sniff: (bytes) => hasMagic(bytes, 'META'),
  },
  amethyst: {
    tag: 'amethyst',
    name: 'Amethyst',
    extensions: ['thyst'],
    decode: decodeAmethyst,
  },
  osu: {
    tag: 'osu',
    name: 'osu! replay',
    extensions: ['osr'],
    decode: decodeOsu,
  },
  gdr: {
    tag: 'gdr',
    name: 'GDReplayFormat',
    extensions: ['gdr'],
    decode: decodeGdr,
  },
  gdr2: {
    tag: 'gdr2',
    name: 'GDReplayFormat 2',
    extensions: ['gdr2', 'gdr'],
    decode: decodeGdr2,
    sniff: (bytes) => hasMagic(bytes, 'GDR'),
  },
  xbot: {
    tag: 'xbot',
    name: 'xBot',
    extensions: ['xbot'],
    decode: decodeXbot,
  },
  kdbot: {
    tag: 'kdbot',
    name: 'KDBot',
    extensions: ['kd'],
    decode: decodeKdbot,
  },
  rush: {
    tag: 'rush',
    name: 'Rush',
    extensions: ['rsh'],
    decode: decodeRush,
  },
  silicate: {
    tag: 'silicate',
    name: 'Silicate',
    extensions: ['slc'],
    decode: decodeSilicate,
  },
  ddhor: {
    tag: 'ddhor',
    name: 'DDHOR',
    extensions: ['ddhor'],
    decode: decodeDdhor,
    sniff: isDdhor,
  },
  plaintext: {
    tag: 'plaintext',
    name: 'Plain text',
    extensions: ['txt'],
    decode: decodePlaintext,
  },
};

export const FORMAT_TAGS = Object.keys(FORMATS).filter(isReplayFormat);

export function isReplayFormat(value: string): value is ReplayFormat {
  return Object.prototype.hasOwnProperty.call(FORMATS, value);
}

export { formatPlaintext } from './plaintext.js';
export { parseOsuFrames, speedForMods } from './osu.js';
