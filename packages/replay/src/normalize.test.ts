import { describe, it, expect } from 'vitest';
import { createRandom, TimelineError } from '@clicksynth/core';
import { normalizeReplay } from './normalize.js';
import type { RawEvent, RawReplay } from './types.js';

function raw(events: RawEvent[], fps: number | null = 240, implicitPlayer = false): RawReplay {
  return { format: 'plaintext', fps, events, implicitPlayer };
}

describe('normalizeReplay', () => {
  it('converts frames to seconds and fills in the jump button', () => {
    const timeline = normalizeReplay(raw([{ kind: 'press', player: 'p1', frame: 120 }]));

    expect(timeline.fps).toBe(240);
    expect(timeline.actions).toEqual([
      { player: 'p1', kind: 'press', time: 0.5, button: 'jump', frame: 120 },
    ]);
    expect(timeline.duration).toBe(0.5);
  });

  it('uses the default fps when the replay has none', () => {
    const events: RawEvent[] = [{ kind: 'press', player: 'p1', frame: 60 }];

    expect(normalizeReplay(raw(events, null)).actions[0]?.time).toBe(0.25);
    expect(normalizeReplay(raw(events, null), { defaultFps: 60 }).actions[0]?.time).toBe(1);
  });

  it('derives frames for time-based events', () => {
    const timeline = normalizeReplay(raw([{ kind: 'press', player: 'p2', time: 0.5 }], null));
    expect(timeline.actions[0]?.frame).toBe(120);
  });

  it('assigns implicit events to the configured player', () => {
    const events: RawEvent[] = [{ kind: 'press', frame: 1 }];

    expect(normalizeReplay(raw(events, 240, true)).actions[0]?.player).toBe('p1');
    expect(normalizeReplay(raw(events, 240, true), { implicitPlayer: 'p2' }).actions[0]?.player).toBe('p2');
  });

  it('sorts by time and keeps input order for ties', () => {
    const timeline = normalizeReplay(
      raw([
        { kind: 'press', player: 'p1', time: 1 },
        { kind: 'release', player: 'p2', time: 0.5 },
        { kind: 'press', player: 'p2', time: 0.5 },
      ]),
      { dedupe: false }
    );

    expect(timeline.actions.map((a) => `${a.player}:${a.kind}`)).toEqual([
      'p2:release',
      'p2:press',
      'p1:press',
    ]);
  });

  it('drops repeated button states per player and button', () => {
    const timeline = normalizeReplay(
      raw([
        { kind: 'press', player: 'p1', frame: 0 },
        { kind: 'press', player: 'p1', frame: 1 },
        { kind: 'release', player: 'p1', frame: 2 },
        { kind: 'release', player: 'p1', frame: 3 },
        { kind: 'release', player: 'p2', frame: 4 },
        { kind: 'press', player: 'p1', button: 'left', frame: 5 },
      ])
    );

    expect(timeline.actions.map((a) => a.frame)).toEqual([0, 2, 5]);
  });

  it('keeps every event when dedupe is off', () => {
    const events: RawEvent[] = [
      { kind: 'press', player: 'p1', frame: 0 },
      { kind: 'press', player: 'p1', frame: 1 },
    ];
    expect(normalizeReplay(raw(events), { dedupe: false }).actions).toHaveLength(2);
  });

  it('produces non-decreasing times', () => {
    const random = createRandom('timeline-order');
    const events: RawEvent[] = Array.from({ length: 200 }, (_, i): RawEvent => ({
      kind: i % 2 === 0 ? 'press' : 'release',
      player: random.next() < 0.5 ? 'p1' : 'p2',
      frame: random.int(0, 5000),
    }));

    const { actions } = normalizeReplay(raw(events), { dedupe: false });

    for (let i = 1; i < actions.length; i++) {
      expect(actions[i].time).toBeGreaterThanOrEqual(actions[i - 1].time);
    }
  });

  it('freezes the timeline', () => {
    const timeline = normalizeReplay(raw([{ kind: 'press', player: 'p1', frame: 1 }]));

    expect(Object.isFrozen(timeline)).toBe(true);
    expect(Object.isFrozen(timeline.actions)).toBe(true);
  });

  it('reports an empty replay with zero duration', () => {
    const timeline = normalizeReplay(raw([]));
    expect(timeline.actions).toEqual([]);
    expect(timeline.duration).toBe(0);
  });

  it.each([
    ['a negative frame', [{ kind: 'press', player: 'p1', frame: -1 }]],
    ['a non-finite time', [{ kind: 'press', player: 'p1', time: Number.NaN }]],
    ['an event without frame or time', [{ kind: 'press', player: 'p1' }]],
  ] satisfies Array<[string, RawEvent[]]>)('rejects %s', (_label, events) => {
    expect(() => normalizeReplay(raw(events))).toThrow(TimelineError);
  });

  it('rejects a non-positive fps', () => {
    expect(() => normalizeReplay(raw([{ kind: 'press', player: 'p1', frame: 1 }], 0))).toThrow(TimelineError);
  });

  it('rejects actions beyond the maximum duration', () => {
    const events: RawEvent[] = [{ kind: 'press', player: 'p1', time: 11 }];

    expect(() => normalizeReplay(raw(events), { maxDuration: 10 })).toThrow(TimelineError);
    expect(normalizeReplay(raw(events)).duration).toBe(11);
  });
});
