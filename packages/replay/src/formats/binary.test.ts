import { describe, it, expect } from 'vitest';
import { FormatError } from '@clicksynth/core';
import { ascii, concat, f32, f64, i16, i32, padTo, u32, u64, u8, zeros } from '../testing/bytes.js';
import { decodeEcho } from './echo.js';
import { decodeGdr2 } from './gdr2.js';
import { decodeDdhor, decodeKdbot, decodeRush, decodeSilicate } from './legacy.js';
import { decodeMhrBinary } from './megahack.js';
import { decodeObot2, decodeReplayBot } from './replay.js';
import { decodeYbot2, decodeYbotFrame } from './ybot.js';
import { decodeZbot } from './zbot.js';

describe('mhr', () => {
  const header = (count: number) =>
    concat(padTo(concat(padTo(ascii('HACK'), 12), u32(240)), 28), u32(count));
  const record = (down: number, player: number, frame: number) =>
    concat(u8(0, 0, down, player), u32(frame), zeros(24));

  it('decodes 32-byte action records', () => {
    const replay = decodeMhrBinary(concat(header(2), record(1, 0, 120), record(0, 1, 150)));

    expect(replay.fps).toBe(240);
    expect(replay.events).toEqual([
      { kind: 'press', player: 'p1', frame: 120 },
      { kind: 'release', player: 'p2', frame: 150 },
    ]);
  });

  it('rejects a wrong magic', () => {
    const bytes = concat(ascii('HACX'), zeros(28));
    expect(() => decodeMhrBinary(bytes)).toThrow(FormatError);
  });

  it('rejects a count larger than the data', () => {
    expect(() => decodeMhrBinary(concat(header(3), record(1, 0, 1)))).toThrow(FormatError);
  });
});

describe('zbot', () => {
  it('derives fps from the frame delta and speedhack', () => {
    const replay = decodeZbot(
      concat(f32(0.0078125), f32(1), i32(10), u8(0x31, 0x31), i32(20), u8(0x30, 0x30))
    );

    expect(replay.fps).toBe(128);
    expect(replay.events).toEqual([
      { kind: 'press', player: 'p1', frame: 10 },
      { kind: 'release', player: 'p2', frame: 20 },
    ]);
  });

  it('treats a zero speedhack as 1', () => {
    const replay = decodeZbot(concat(f32(0.0078125), f32(0)));
    expect(replay.fps).toBe(128);
  });
});

describe('obot2', () => {
  const header = (type: number, count: number) =>
    concat(f32(240), f32(240), u32(type), u64(0), u64(count));

  it('applies fps changes to the actions after them', () => {
    const replay = decodeObot2(
      concat(
        header(1, 3),
        u32(1), u32(100), u32(2),
        u32(1), u32(110), u32(1), f32(120),
        u32(1), u32(200), u32(5)
      )
    );

    expect(replay.fps).toBe(240);
    expect(replay.events).toEqual([
      { kind: 'press', player: 'p1', frame: 100, time: 100 / 240 },
      { kind: 'release', player: 'p2', frame: 200, time: 200 / 120 },
    ]);
  });

  it('rejects x-position replays', () => {
    expect(() => decodeObot2(header(0, 0))).toThrow('x-position replay');
  });
});

describe('replaybot', () => {
  it('decodes version 2 frame replays', () => {
    const replay = decodeReplayBot(
      concat(ascii('RPLY'), u8(2, 1), f32(60), u32(30), u8(1), u32(45), u8(2))
    );

    expect(replay.fps).toBe(60);
    expect(replay.events).toEqual([
      { kind: 'press', player: 'p1', frame: 30 },
      { kind: 'release', player: 'p2', frame: 45 },
    ]);
  });

  it('rejects version 1', () => {
    expect(() => decodeReplayBot(concat(ascii('RPLY'), u8(1)))).toThrow(FormatError);
  });
});

describe('ybot', () => {
  it('decodes frame records', () => {
    const replay = decodeYbotFrame(
      concat(f32(240), i32(2), u32(12), u32(0b10), u32(15), u32(0b01))
    );

    expect(replay.events).toEqual([
      { kind: 'press', player: 'p1', frame: 12 },
      { kind: 'release', player: 'p2', frame: 15 },
    ]);
  });

  it('decodes ybot2 delta actions with fps changes', () => {
    const meta = concat(zeros(24), f32(120));
    const bytes = concat(
      ascii('ybot'), u32(1), u32(meta.length), u32(1),
      meta,
      u32(3), zeros(3),
      u8(0xc7, 0x07), // delta 60, p1 push jump
      u8(0x0f), f32(240), // fps change
      u8(0x88, 0x03) // delta 24, p2 release left
    );

    const replay = decodeYbot2(bytes);

    expect(replay.fps).toBe(120);
    expect(replay.events).toHaveLength(2);
    expect(replay.events[0]).toEqual({ kind: 'press', player: 'p1', button: 'jump', frame: 60, time: 0.5 });
    expect(replay.events[1]).toMatchObject({ kind: 'release', player: 'p2', button: 'left', frame: 84 });
    expect(replay.events[1]?.time).toBeCloseTo(0.6, 10);
  });

  it('falls back to 240 fps when the metadata has no fps', () => {
    const meta = Buffer.alloc(28, 0xff);
    const replay = decodeYbot2(concat(ascii('ybot'), u32(1), u32(meta.length), u32(0), meta));

    expect(replay.fps).toBe(240);
    expect(replay.events).toEqual([]);
  });
});

describe('echo binary', () => {
  const header = (type: Buffer) => padTo(concat(padTo(concat(ascii('META'), type), 24), f32(240)), 48);

  it('decodes 6-byte records', () => {
    const replay = decodeEcho(concat(header(u32(0)), u32(5), u8(1, 0), u32(9), u8(0, 1)));

    expect(replay.fps).toBe(240);
    expect(replay.events).toEqual([
      { kind: 'press', player: 'p1', frame: 5 },
      { kind: 'release', player: 'p2', frame: 9 },
    ]);
  });

  it('steps over the padding of debug records', () => {
    const replay = decodeEcho(
      concat(header(ascii('DBG\0')), u32(5), u8(1, 0), zeros(18), u32(7), u8(0, 0), zeros(18))
    );

    expect(replay.events).toEqual([
      { kind: 'press', player: 'p1', frame: 5 },
      { kind: 'release', player: 'p1', frame: 7 },
    ]);
  });
});

describe('fixed-record formats', () => {
  it('decodes kdbot', () => {
    expect(decodeKdbot(concat(f32(240), i32(7), u8(1, 0))).events).toEqual([
      { kind: 'press', player: 'p1', frame: 7 },
    ]);
  });

  it('decodes rush', () => {
    const replay = decodeRush(concat(i16(60), i32(3), u8(3), i32(4), u8(0)));

    expect(replay.fps).toBe(60);
    expect(replay.events).toEqual([
      { kind: 'press', player: 'p2', frame: 3 },
      { kind: 'release', player: 'p1', frame: 4 },
    ]);
  });

  it('decodes silicate packed records', () => {
    const replay = decodeSilicate(concat(f64(240), u32(2), u32((100 << 4) | 1), u32((120 << 4) | 2)));

    expect(replay.events).toEqual([
      { kind: 'press', player: 'p1', frame: 100 },
      { kind: 'release', player: 'p2', frame: 120 },
    ]);
  });

  it('decodes ddhor player blocks', () => {
    const replay = decodeDdhor(
      concat(ascii('DDHR'), i16(240), i32(1), i32(1), f32(10), u8(1), f32(12.5), u8(0))
    );

    expect(replay.fps).toBe(240);
    expect(replay.events).toEqual([
      { kind: 'press', player: 'p1', frame: 10 },
      { kind: 'release', player: 'p2', frame: 12.5 },
    ]);
  });

  it('reports truncated records', () => {
    expect(() => decodeKdbot(concat(f32(240), i32(7), u8(1)))).toThrow(FormatError);
  });
});

describe('gdr2', () => {
  const str = (text: string) => concat(u8(text.length), ascii(text));
  const header = (inputTag: string, platformer: number) =>
    concat(
      ascii('GDR'), u8(2),
      str(inputTag), str('tester'), str(''),
      f32(1.5, 'be'), u8(1), f64(240, 'be'),
      u8(0), u8(0), u8(0), u8(platformer),
      str('bot'), u8(1), u8(0), str(''),
      u8(0), // extension size
      u8(1), u8(5) // one death
    );

  it('decodes per-player delta inputs with physics', () => {
    const physics = concat(f32(1.5, 'be'), f32(2.5, 'be'), f32(90, 'be'), f64(0, 'be'), f64(-3.5, 'be'));
    const replay = decodeGdr2(
      concat(
        header('Phys', 0),
        u8(2), u8(1),
        u8((10 << 1) | 1), u8(physics.length), physics,
        u8(20 << 1), u8(0)
      )
    );

    expect(replay.fps).toBe(240);
    expect(replay.events).toEqual([
      {
        kind: 'press',
        player: 'p1',
        button: 'jump',
        frame: 10,
        physics: { x: 1.5, y: 2.5, rotation: 90, yAccel: -3.5 },
      },
      { kind: 'release', player: 'p2', button: 'jump', frame: 20 },
    ]);
  });

  it('unpacks platformer buttons', () => {
    const replay = decodeGdr2(concat(header('', 1), u8(1), u8(1), u8((10 << 3) | (2 << 1) | 1)));

    expect(replay.events).toEqual([{ kind: 'press', player: 'p1', button: 'left', frame: 10 }]);
  });

  it('rejects other versions', () => {
    expect(() => decodeGdr2(concat(ascii('GDR'), u8(1)))).toThrow('expected version 2, found version 1');
  });
});
