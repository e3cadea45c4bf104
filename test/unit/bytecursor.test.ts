/**
 * @file bytecursor.test.ts
 * @description Tests for the byte cursor and the string blob reader.
 */

import { describe, it, expect } from 'vitest';
import { ByteCursor } from '../../src/core/bytecursor.js';
import { CorruptStreamError, IncompleteConsumptionError } from '../../src/core/error.js';
import { StringTable } from '../../src/core/stringtable.js';

function cursorOf(...bytes: number[]): ByteCursor {
  return new ByteCursor(Uint8Array.from(bytes));
}

describe('ByteCursor', () => {
  it('reads unsigned and signed bytes', () => {
    const c = cursorOf(0xFF, 0xFF, 0x7F);
    expect(c.readU8()).toBe(255);
    expect(c.readS8()).toBe(-1);
    expect(c.readS8()).toBe(127);
    expect(c.isAtEnd()).toBe(true);
  });

  it('reads 16-bit values little-endian', () => {
    const c = cursorOf(0x34, 0x12, 0xFE, 0xFF);
    expect(c.readU16()).toBe(0x1234);
    expect(c.readS16()).toBe(-2);
  });

  it('reads 32-bit values little-endian', () => {
    const c = cursorOf(0x78, 0x56, 0x34, 0x12, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF, 0xFF);
    expect(c.readS32()).toBe(0x12345678);
    expect(c.readS32()).toBe(-1);
    expect(c.readU32()).toBe(4294967295);
  });

  it('reports the offset of a read past the end', () => {
    const c = cursorOf(1);
    expect(() => c.readU16()).toThrow(CorruptStreamError);
    try {
      cursorOf(1, 2).readS32();
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CorruptStreamError);
      if (e instanceof CorruptStreamError) {
        expect(e.offset).toBe(2);
        expect(e.message).toBe('Unexpected end of stream (at offset 2)');
      }
    }
  });

  it('skips bytes and returns the starting position', () => {
    const c = cursorOf(1, 2, 3, 4);
    c.readU8();
    expect(c.skip(2)).toBe(1);
    expect(c.getPosition()).toBe(3);
    expect(() => c.skip(2)).toThrow(CorruptStreamError);
    expect(c.getPosition()).toBe(3);
  });

  it('verifies full consumption', () => {
    const c = cursorOf(1, 2, 3);
    c.readU8();
    try {
      c.verifyConsumed();
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(IncompleteConsumptionError);
      if (e instanceof IncompleteConsumptionError) {
        expect(e.position).toBe(1);
        expect(e.end).toBe(3);
      }
    }
    c.skip(2);
    expect(() => c.verifyConsumed()).not.toThrow();
  });
});

describe('StringTable', () => {
  // blob: "hi" at offset 0, "x" at offset 3
  const blob = [2, 0x68, 0x69, 1, 0x78];

  it('skips the blob and reads entries by offset', () => {
    const c = cursorOf(blob.length, 0, ...blob, 0xAA);
    const table = new StringTable(c);
    expect(c.getPosition()).toBe(7);
    expect(table.getSize()).toBe(5);
    expect(table.get(0)).toBe('hi');
    expect(table.get(3)).toBe('x');
    expect(table.get(0)).toBe('hi');
    expect(c.readU8()).toBe(0xAA);
  });

  it('decodes UTF-8', () => {
    const c = cursorOf(3, 0, 2, 0xC3, 0xA9);
    expect(new StringTable(c).get(0)).toBe('é');
  });

  it('rejects offsets outside the blob', () => {
    const table = new StringTable(cursorOf(blob.length, 0, ...blob));
    try {
      table.get(5);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(CorruptStreamError);
      if (e instanceof CorruptStreamError) expect(e.offset).toBe(7);
    }
  });

  it('rejects an entry that overruns the blob', () => {
    const table = new StringTable(cursorOf(2, 0, 5, 0x61));
    expect(() => table.get(0)).toThrow(CorruptStreamError);
  });

  it('rejects a blob longer than the stream', () => {
    expect(() => new StringTable(cursorOf(9, 0, 1, 0x61))).toThrow(CorruptStreamError);
  });
});
