/**
 * Binary Reader
 * 
 * Cursor over a replay buffer. Every read is bounds-checked and a short
 * buffer raises a FormatError naming the field and offset.
 */

import { FormatError } from '@clicksynth/core';

export type Endian = 'le' | 'be';

const utf8 = new TextDecoder('utf-8', { fatal: true });

export class BinaryReader {
  private readonly view: DataView;
  private pos = 0;

  constructor(
    private readonly data: Uint8Array,
    private readonly format: string
  ) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.data.length;
  }

  get remaining(): number {
    return this.data.length - this.pos;
  }

  seek(position: number): void {
    if (position < 0 || position > this.data.length) {
      throw new FormatError(
        this.format,
        `offset ${position} inside the file`,
        `${this.data.length} bytes`
      );
    }
    this.pos = position;
  }

  skip(count: number): void {
    this.require(count, 'padding');
    this.pos += count;
  }

  u8(): number {
    this.require(1, 'u8');
    return this.view.getUint8(this.pos++);
  }

  i16(endian: Endian = 'le'): number {
    this.require(2, 'i16');
    const value = this.view.getInt16(this.pos, endian === 'le');
    this.pos += 2;
    return value;
  }

  u16(endian: Endian = 'le'): number {
    this.require(2, 'u16');
    const value = this.view.getUint16(this.pos, endian === 'le');
    this.pos += 2;
    return value;
  }

  i32(endian: Endian = 'le'): number {
    this.require(4, 'i32');
    const value = this.view.getInt32(this.pos, endian === 'le');
    this.pos += 4;
    return value;
  }

  u32(endian: Endian = 'le'): number {
    this.require(4, 'u32');
    const value = this.view.getUint32(this.pos, endian === 'le');
    this.pos += 4;
    return value;
  }

  /** Unsigned 64-bit integer; values past 2^53 are rejected */
  u64(endian: Endian = 'le'): number {
    this.require(8, 'u64');
    const value = this.view.getBigUint64(this.pos, endian === 'le');
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new FormatError(this.format, `u64 below 2^53 at offset ${this.pos}`, value.toString());
    }
    this.pos += 8;
    return Number(value);
  }

  f32(endian: Endian = 'le'): number {
    this.require(4, 'f32');
    const value = this.view.getFloat32(this.pos, endian === 'le');
    this.pos += 4;
    return value;
  }

  f64(endian: Endian = 'le'): number {
    this.require(8, 'f64');
    const value = this.view.getFloat64(this.pos, endian === 'le');
    this.pos += 8;
    return value;
  }

  bytes(count: number): Uint8Array {
    this.require(count, `${count}-byte block`);
    const slice = this.data.subarray(this.pos, this.pos + count);
    this.pos += count;
    return slice;
  }

  ascii(count: number): string {
    return String.fromCharCode(...this.bytes(count));
  }

  utf8(count: number): string {
    const start = this.pos;
    const bytes = this.bytes(count);
    try {
      return utf8.decode(bytes);
    } catch {
      throw new FormatError(this.format, `valid UTF-8 at offset ${start}`, 'invalid byte sequence');
    }
  }

  /** Unsigned LEB128 of at most 8 bytes, below 2^53 */
  uleb128(): number {
    const start = this.pos;
    let result = 0;
    let scale = 1;

    for (let i = 0; i < 8; i++) {
      const byte = this.u8();
      result += (byte & 0x7f) * scale;
      if (result > Number.MAX_SAFE_INTEGER) {
        throw new FormatError(this.format, `LEB128 integer below 2^53 at offset ${start}`, 'too large');
      }
      if ((byte & 0x80) === 0) {
        return result;
      }
      scale *= 128;
    }
    throw new FormatError(this.format, 'LEB128 integer of at most 8 bytes', `longer varint before offset ${this.pos}`);
  }

  /** 32-bit varint as written by GDReplayFormat 2 (wraps into a signed int) */
  varint32(): number {
    let result = 0;
    let shift = 0;

    for (;;) {
      const byte = this.u8();
      result |= (byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) {
        return result;
      }
      shift += 7;
      if (shift >= 32) {
        throw new FormatError(this.format, '32-bit varint', `overlong varint before offset ${this.pos}`);
      }
    }
  }

  private require(count: number, what: string): void {
    if (count < 0 || this.pos + count > this.data.length) {
      throw new FormatError(
        this.format,
        `${what} (${count} bytes) at offset ${this.pos}`,
        `${this.remaining} bytes remaining`
      );
    }
  }
}

/** True when the buffer starts with the given ASCII magic */
export function hasMagic(bytes: Uint8Array, magic: string): boolean {
  if (bytes.length < magic.length) {
    return false;
  }
  for (let i = 0; i < magic.length; i++) {
    if (bytes[i] !== magic.charCodeAt(i)) {
      return false;
    }
  }
  return true;
}
