/**
 * @file bytecursor.ts
 * @description Sequential reader over an immutable byte buffer.
 *
 * Multi-byte values are little-endian, the native layout shared with the serializer.
 */

import { CorruptStreamError, IncompleteConsumptionError } from './error.js';
import { signExtend } from './types.js';
import type { int1, int2, int4, uint1, uint2, uint4 } from './types.js';

/**
 * A forward-only cursor over a byte buffer.
 *
 * Every read checks against the end of the buffer and throws CorruptStreamError instead of
 * returning garbage. The cursor never moves backward.
 */
export class ByteCursor {
  private buf: Uint8Array;
  private pos: number = 0;

  constructor(data: Uint8Array) {
    this.buf = data;
  }

  /** Current read position */
  getPosition(): number { return this.pos; }

  /** Has every byte been read */
  isAtEnd(): boolean { return this.pos === this.buf.length; }

  /** Get the byte at the current position and advance */
  private getNextByte(): number {
    if (this.pos >= this.buf.length) {
      throw new CorruptStreamError('Unexpected end of stream', this.pos);
    }
    return this.buf[this.pos++];
  }

  /**
   * Advance the position by the given number of bytes.
   * Returns the position before the skip.
   */
  skip(count: number): number {
    const start = this.pos;
    const newPos = this.pos + count;
    if (newPos > this.buf.length) {
      throw new CorruptStreamError('Unexpected end of stream', this.pos);
    }
    this.pos = newPos;
    return start;
  }

  readU8(): uint1 {
    return this.getNextByte();
  }

  readS8(): int1 {
    return signExtend(this.getNextByte(), 8);
  }

  readU16(): uint2 {
    const lo = this.getNextByte();
    const hi = this.getNextByte();
    return lo | (hi << 8);
  }

  readS16(): int2 {
    return signExtend(this.readU16(), 16);
  }

  readS32(): int4 {
    const b0 = this.getNextByte();
    const b1 = this.getNextByte();
    const b2 = this.getNextByte();
    const b3 = this.getNextByte();
    return b0 | (b1 << 8) | (b2 << 16) | (b3 << 24);
  }

  readU32(): uint4 {
    return this.readS32() >>> 0;
  }

  /** View of `length` bytes starting at `start`, without moving the cursor */
  slice(start: number, length: number): Uint8Array {
    if (start < 0 || start + length > this.buf.length) {
      throw new CorruptStreamError('Byte range outside of stream', start);
    }
    return this.buf.subarray(start, start + length);
  }

  /**
   * Check the full consumption postcondition.
   * Anything left over, or a position past the end, means the serializer and this decoder disagree.
   */
  verifyConsumed(): void {
    if (this.pos !== this.buf.length) {
      throw new IncompleteConsumptionError(this.pos, this.buf.length);
    }
  }
}
