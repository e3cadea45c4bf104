/**
 * @file stringtable.ts
 * @description The string blob at the head of a dehydrated stream.
 */

import { CorruptStreamError } from './error.js';
import type { ByteCursor } from './bytecursor.js';

const utf8 = new TextDecoder('utf-8');

/**
 * Strings referenced by offset from the rest of the stream.
 *
 * The blob is laid out as `u16 length` followed by the data, which is skipped when the table
 * is constructed. Each entry inside the blob is a `u8` byte count followed by that many bytes.
 * Decoded strings are cached by offset, since identifiers repeat heavily.
 */
export class StringTable {
  private data: Uint8Array;
  private start: number;
  private cache: Map<number, string> = new Map();

  /** Consume the blob header and data from the cursor */
  constructor(cursor: ByteCursor) {
    const length = cursor.readU16();
    this.start = cursor.skip(length);
    this.data = cursor.slice(this.start, length);
  }

  /** Size of the blob in bytes */
  getSize(): number { return this.data.length; }

  /** Get the string whose entry begins at the given blob offset */
  get(offset: number): string {
    const cached = this.cache.get(offset);
    if (cached !== undefined) return cached;
    if (offset >= this.data.length) {
      throw new CorruptStreamError('String offset ' + offset + ' is outside the string table',
        this.start + offset);
    }
    const length = this.data[offset];
    const end = offset + 1 + length;
    if (end > this.data.length) {
      throw new CorruptStreamError('String at offset ' + offset + ' overruns the string table',
        this.start + offset);
    }
    const result = utf8.decode(this.data.subarray(offset + 1, end));
    this.cache.set(offset, result);
    return result;
  }
}
