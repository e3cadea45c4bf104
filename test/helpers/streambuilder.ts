/**
 * @file streambuilder.ts
 * @description Writes dehydrated streams for tests: header, string blob and command bytes.
 */

import { bitsFromFloat } from '../../src/core/types.js';
import { BUILTIN_SYMBOL, Command, FORMAT_VERSION } from '../../src/rehydrate/format.js';

const utf8 = new TextEncoder();

export class StreamBuilder {
  private body: number[] = [];
  private blob: number[] = [];
  private offsets: Map<string, number> = new Map();

  u8(v: number): this {
    this.body.push(v & 0xFF);
    return this;
  }

  s8(v: number): this {
    return this.u8(v);
  }

  u16(v: number): this {
    this.body.push(v & 0xFF, (v >> 8) & 0xFF);
    return this;
  }

  s16(v: number): this {
    return this.u16(v);
  }

  s32(v: number): this {
    this.body.push(v & 0xFF, (v >> 8) & 0xFF, (v >> 16) & 0xFF, (v >>> 24) & 0xFF);
    return this;
  }

  u32(v: number): this {
    return this.s32(v);
  }

  /** Raw bit pattern of a single precision float */
  f32(value: number): this {
    return this.s32(bitsFromFloat(value));
  }

  cmd(c: Command): this {
    return this.u8(c);
  }

  /** Offset of `s` in the string blob, adding it on first use */
  intern(s: string): number {
    const existing = this.offsets.get(s);
    if (existing !== undefined) return existing;
    const offset = this.blob.length;
    const bytes = utf8.encode(s);
    this.blob.push(bytes.length, ...bytes);
    this.offsets.set(s, offset);
    return offset;
  }

  /** A string reference */
  str(s: string): this {
    return this.u16(this.intern(s));
  }

  /** The builtin sentinel followed by a name */
  builtinRef(name: string): this {
    return this.u16(BUILTIN_SYMBOL).str(name);
  }

  /** A symbol command naming a type visible from the current scope */
  typeRef(name: string): this {
    return this.cmd(Command.SymbolRef).builtinRef(name);
  }

  /** Current length of the command bytes */
  get length(): number { return this.body.length; }

  /** Header (version, blob length, blob) followed by the command bytes */
  bytes(version: number = FORMAT_VERSION): Uint8Array {
    const out: number[] = [version & 0xFF, (version >> 8) & 0xFF,
      this.blob.length & 0xFF, (this.blob.length >> 8) & 0xFF];
    return Uint8Array.from(out.concat(this.blob, this.body));
  }

  /** Size of everything before the command bytes */
  headerSize(): number {
    return 4 + this.blob.length;
  }
}
