/**
 * @file settings.ts
 * @description The capability settings (`sk_Caps.<name>`) a program may read.
 */

import type { BuiltinTypes } from './builtintypes.js';
import type { ShaderCaps } from './program.js';
import type { Type } from './type.js';

const BOOL_CAPS = [
  'mustDoOpBetweenFloorAndAbs',
  'mustGuardDivisionEvenAfterExplicitZeroCheck',
  'atan2ImplementedAsAtanYOverX',
  'floatIs32Bits',
  'integerSupport',
  'builtinFMASupport',
  'builtinDeterminantSupport',
  'rewriteMatrixVectorMultiply',
  'rewriteMatrixComparisons',
  'mustForceNegatedAtanParamToFloat',
  'mustForceNegatedLdexpParamToMultiply',
  'inBlendModesFailRandomlyForAllZeroVec',
  'removePowWithConstantExponent',
  'emulateAbsIntFunction',
] as const;

/** Type of the named setting, or null if there is no such capability */
export function settingType(types: BuiltinTypes, name: string): Type | null {
  return (BOOL_CAPS as readonly string[]).includes(name) ? types.bool : null;
}

/** Value of the named setting in `caps`, or null if `caps` does not provide it */
export function settingValue(caps: ShaderCaps, name: string): boolean | number | null {
  return Object.prototype.hasOwnProperty.call(caps, name) ? caps[name] : null;
}
