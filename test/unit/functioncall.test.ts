/**
 * @file functioncall.test.ts
 * @description Tests for overload resolution.
 */

import { describe, it, expect } from 'vitest';
import { BuiltinTypes } from '../../src/ir/builtintypes.js';
import { ExpressionKind, VariableRefKind } from '../../src/ir/expression.js';
import {
  callCost, determineFinalTypes, findBestFunctionForCall, overloadCandidates,
} from '../../src/ir/functioncall.js';
import { DEFAULT_MODIFIERS } from '../../src/ir/modifiers.js';
import { FunctionDeclaration, Variable, VariableStorage } from '../../src/ir/symbol.js';
import type { Expression } from '../../src/ir/expression.js';
import type { Type } from '../../src/ir/type.js';

const types = new BuiltinTypes();

function req(name: string): Type {
  const t = types.find(name);
  if (t === null) throw new Error('missing type ' + name);
  return t;
}

function fn(name: string, paramTypes: Type[], returnType: Type): FunctionDeclaration {
  const params = paramTypes.map((t, i) =>
    new Variable(DEFAULT_MODIFIERS, 'p' + i, t, true, VariableStorage.Parameter));
  return new FunctionDeclaration(DEFAULT_MODIFIERS, name, params, returnType, true);
}

function ref(type: Type): Expression {
  const v = new Variable(DEFAULT_MODIFIERS, 'v', type, false, VariableStorage.Local);
  return { kind: ExpressionKind.VariableReference, type, variable: v, refKind: VariableRefKind.Read };
}

describe('determineFinalTypes', () => {
  it('binds a generic parameter and return type to the argument', () => {
    const abs = fn('abs', [req('$genType')], req('$genType'));
    const final = determineFinalTypes(abs, [ref(req('float3'))]);
    expect(final).not.toBeNull();
    expect(final?.parameterTypes).toEqual([req('float3')]);
    expect(final?.returnType).toBe(req('float3'));
  });

  it('shares one binding between generic parameters', () => {
    const mix = fn('mix', [req('$genType'), req('$genType'), types.float], req('$genType'));
    const final = determineFinalTypes(mix, [ref(req('float2')), ref(req('float4')), ref(types.float)]);
    expect(final?.parameterTypes).toEqual([req('float2'), req('float2'), types.float]);
    expect(callCost(mix, [ref(req('float2')), ref(req('float4')), ref(types.float)]).impossible)
      .toBe(true);
  });

  it('fails when the counts differ', () => {
    expect(determineFinalTypes(fn('f', [types.float], types.float), [])).toBeNull();
    expect(callCost(fn('f', [types.float], types.float), []).impossible).toBe(true);
  });
});

describe('findBestFunctionForCall', () => {
  const fFloat = fn('f', [types.float], types.float);
  const fHalf = fn('f', [types.half], types.half);

  it('prefers the exact match', () => {
    expect(findBestFunctionForCall([fHalf, fFloat], [ref(types.float)])).toBe(fFloat);
    expect(findBestFunctionForCall([fFloat, fHalf], [ref(types.half)])).toBe(fHalf);
  });

  it('prefers widening over narrowing', () => {
    const gFloat = fn('g', [types.float], types.float);
    const gShort = fn('g', [types.short], types.short);
    // int → float is impossible; int → short narrows
    expect(findBestFunctionForCall([gFloat, gShort], [ref(types.int)])).toBe(gShort);
    const hFloat = fn('h', [types.float], types.float);
    const hShort = fn('h', [types.short], types.short);
    // half → float widens; half → short is impossible
    expect(findBestFunctionForCall([hShort, hFloat], [ref(types.half)])).toBe(hFloat);
  });

  it('breaks ties with the expected return type', () => {
    const asFloat = fn('k', [types.float], types.float);
    const asHalf = fn('k', [types.float], types.half);
    expect(findBestFunctionForCall([asFloat, asHalf], [ref(types.float)], types.half)).toBe(asHalf);
    expect(findBestFunctionForCall([asFloat, asHalf], [ref(types.float)], types.float)).toBe(asFloat);
    expect(findBestFunctionForCall([asFloat, asHalf], [ref(types.float)])).toBe(asFloat);
  });

  it('returns null when nothing takes the arguments', () => {
    expect(findBestFunctionForCall([fFloat, fHalf], [ref(types.bool)])).toBeNull();
    expect(findBestFunctionForCall([], [ref(types.float)])).toBeNull();
  });
});

describe('overloadCandidates', () => {
  it('puts the referenced declaration first without repeating it', () => {
    const a = fn('f', [types.float], types.float);
    const b = fn('f', [types.half], types.half);
    expect(overloadCandidates(b, [a, b])).toEqual([b, a]);
  });
});
