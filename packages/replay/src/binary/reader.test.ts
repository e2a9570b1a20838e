import { describe, it, expect } from 'vitest';
import { FormatError } from '@clicksynth/core';
import { BinaryReader, hasMagic } from './reader.js';

describe('BinaryReader', () => {
  it('reads little and big endian integers', () => {
    const reader = new BinaryReader(Uint8Array.of(0x01, 0x02, 0x03, 0x04, 0x01, 0x02, 0x03, 0x04), 'mhr');

    expect(reader.u32()).toBe(0x04030201);
    expect(reader.u32('be')).toBe(0x01020304);
    expect(reader.remaining).toBe(0);
  });

  it('reads views into a larger buffer at their own offset', () => {
    const backing = Uint8Array.of(0xff, 0xff, 0x2a, 0x00);
    const reader = new BinaryReader(backing.subarray(2), 'rush');

    expect(reader.i16()).toBe(42);
  });

  it('rejects reads past the end of the buffer', () => {
    const reader = new BinaryReader(Uint8Array.of(1, 2), 'mhr');

    expect(() => reader.u32()).toThrow(FormatError);
    expect(() => reader.u32()).toThrow(
      'Invalid mhr replay: expected u32 (4 bytes) at offset 0, found 2 bytes remaining'
    );
  });

  it('rejects seeks outside the buffer', () => {
    const reader = new BinaryReader(Uint8Array.of(1, 2), 'echo');

    expect(() => reader.seek(3)).toThrow(FormatError);
    reader.seek(2);
    expect(reader.remaining).toBe(0);
  });

  it('decodes unsigned LEB128', () => {
    const reader = new BinaryReader(Uint8Array.of(0xe5, 0x8e, 0x26, 0x00), 'ybot2');

    expect(reader.uleb128()).toBe(624485);
    expect(reader.uleb128()).toBe(0);
  });

  it('rejects LEB128 values beyond the safe integer range', () => {
    const largest = new BinaryReader(Uint8Array.of(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x0f), 'ybot2');
    const tooLarge = new BinaryReader(Uint8Array.of(0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x10), 'ybot2');

    expect(largest.uleb128()).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => tooLarge.uleb128()).toThrow(
      'Invalid ybot2 replay: expected LEB128 integer below 2^53 at offset 0, found too large'
    );
  });

  it('decodes 32-bit varints', () => {
    const reader = new BinaryReader(Uint8Array.of(0xac, 0x02, 0x7f), 'gdr2');

    expect(reader.varint32()).toBe(300);
    expect(reader.varint32()).toBe(127);
  });

  it('rejects invalid UTF-8 strings', () => {
    const reader = new BinaryReader(Uint8Array.of(0xc3, 0x28), 'gdr2');

    expect(() => reader.utf8(2)).toThrow('expected valid UTF-8 at offset 0');
  });
});

describe('hasMagic', () => {
  it('matches an ASCII prefix', () => {
    expect(hasMagic(Uint8Array.of(0x52, 0x50, 0x4c, 0x59, 0x02), 'RPLY')).toBe(true);
    expect(hasMagic(Uint8Array.of(0x52, 0x50), 'RPLY')).toBe(false);
    expect(hasMagic(Uint8Array.of(0x52, 0x50, 0x4c, 0x58), 'RPLY')).toBe(false);
  });
});
