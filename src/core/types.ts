/**
 * @file types.ts
 * @description Fixed-width integer aliases, bit reinterpretation helpers and debug switches.
 *
 * Integer widths in the dehydrated format are mapped as follows:
 *   int1/uint1, int2/uint2, int4/uint4 → number (every value is exactly representable)
 */

// ---- Small integer types (fit in JS number) ----

/** Signed 8-bit integer */
export type int1 = number;
/** Unsigned 8-bit integer */
export type uint1 = number;
/** Signed 16-bit integer */
export type int2 = number;
/** Unsigned 16-bit integer */
export type uint2 = number;
/** Signed 32-bit integer */
export type int4 = number;
/** Unsigned 32-bit integer */
export type uint4 = number;

// ---- Debug flags ----

/** Master trace switch for the rehydrator: dumps every scope's symbols while decoding */
export let REHYDRATE_DEBUG = process.env.REHYDRATE_TRACE === '1';

/** Enable all debug flags */
export function enableDebug(): void {
  REHYDRATE_DEBUG = true;
}

/** Disable all debug flags */
export function disableDebug(): void {
  REHYDRATE_DEBUG = false;
}

// ---- Bit reinterpretation ----

const scratch = new DataView(new ArrayBuffer(4));

/** Reinterpret the low 32 bits of `bits` as an IEEE-754 single precision value */
export function floatFromBits(bits: int4): number {
  scratch.setInt32(0, bits | 0, true);
  return scratch.getFloat32(0, true);
}

/** Raw 32-bit pattern (signed) of a single precision value */
export function bitsFromFloat(value: number): int4 {
  scratch.setFloat32(0, value, true);
  return scratch.getInt32(0, true);
}

/** Sign-extend the low `bits` bits of an integer */
export function signExtend(val: number, bits: number): number {
  const shift = 32 - bits;
  return (val << shift) >> shift;
}
