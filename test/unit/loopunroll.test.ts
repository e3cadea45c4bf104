/**
 * @file loopunroll.test.ts
 * @description Tests for the for-loop trip count analysis.
 */

import { describe, it, expect } from 'vitest';
import {
  LOOP_TERMINATION_LIMIT, getConstantValue, getLoopUnrollInfo,
} from '../../src/analysis/loopunroll.js';
import { BuiltinTypes } from '../../src/ir/builtintypes.js';
import { ExpressionKind, VariableRefKind } from '../../src/ir/expression.js';
import { DEFAULT_MODIFIERS } from '../../src/ir/modifiers.js';
import { OperatorKind } from '../../src/ir/operator.js';
import { StatementKind } from '../../src/ir/statement.js';
import { Variable, VariableStorage } from '../../src/ir/symbol.js';
import { bitsFromFloat } from '../../src/core/types.js';
import type { Expression } from '../../src/ir/expression.js';
import type { Statement } from '../../src/ir/statement.js';
import type { Type } from '../../src/ir/type.js';

const types = new BuiltinTypes();

function local(name: string, type: Type): Variable {
  return new Variable(DEFAULT_MODIFIERS, name, type, false, VariableStorage.Local);
}

function int(value: number): Expression {
  return { kind: ExpressionKind.IntLiteral, type: types.int, value };
}

function float(value: number): Expression {
  return { kind: ExpressionKind.FloatLiteral, type: types.float, value, bits: bitsFromFloat(value) };
}

function ref(v: Variable, refKind: VariableRefKind = VariableRefKind.Read): Expression {
  return { kind: ExpressionKind.VariableReference, type: v.type, variable: v, refKind };
}

function decl(v: Variable, value: Expression | null): Statement {
  return { kind: StatementKind.VarDeclaration, variable: v, baseType: v.type, arraySize: 0, value };
}

function binary(left: Expression, op: OperatorKind, right: Expression, type: Type): Expression {
  return { kind: ExpressionKind.Binary, type, left, op, right };
}

function compare(v: Variable, op: OperatorKind, end: Expression): Expression {
  return binary(ref(v), op, end, types.bool);
}

function step(v: Variable, op: OperatorKind.PLUSEQ | OperatorKind.MINUSEQ, by: Expression): Expression {
  return binary(ref(v, VariableRefKind.ReadWrite), op, by, v.type);
}

function increment(v: Variable, op: OperatorKind.PLUSPLUS | OperatorKind.MINUSMINUS): Expression {
  return { kind: ExpressionKind.Postfix, type: v.type, op, operand: ref(v, VariableRefKind.ReadWrite) };
}

describe('getConstantValue', () => {
  it('evaluates literals, negation and scalar casts', () => {
    expect(getConstantValue(int(3))).toBe(3);
    expect(getConstantValue({ kind: ExpressionKind.BoolLiteral, type: types.bool, value: true }))
      .toBe(1);
    expect(getConstantValue({
      kind: ExpressionKind.Prefix, type: types.int, op: OperatorKind.MINUS, operand: int(3),
    })).toBe(-3);
    expect(getConstantValue({
      kind: ExpressionKind.ConstructorScalarCast, type: types.int, args: [float(2.75)],
    })).toBe(2);
  });

  it('gives null for anything that is not constant', () => {
    expect(getConstantValue(ref(local('x', types.int)))).toBeNull();
    expect(getConstantValue(null)).toBeNull();
  });
});

describe('getLoopUnrollInfo', () => {
  it('counts a simple ascending loop', () => {
    const i = local('i', types.int);
    const info = getLoopUnrollInfo(decl(i, int(0)), compare(i, OperatorKind.LT, int(10)),
      increment(i, OperatorKind.PLUSPLUS), null);
    expect(info).toEqual({ index: i, start: 0, delta: 1, count: 10 });
  });

  it('counts one more for an inclusive bound', () => {
    const i = local('i', types.int);
    const info = getLoopUnrollInfo(decl(i, int(0)), compare(i, OperatorKind.LTEQ, int(10)),
      increment(i, OperatorKind.PLUSPLUS), null);
    expect(info?.count).toBe(11);
  });

  it('rounds a partial last step up', () => {
    const i = local('i', types.int);
    const info = getLoopUnrollInfo(decl(i, int(0)), compare(i, OperatorKind.LT, int(9)),
      step(i, OperatorKind.PLUSEQ, int(2)), null);
    expect(info?.count).toBe(5);
    expect(info?.delta).toBe(2);
  });

  it('counts a descending loop', () => {
    const i = local('i', types.int);
    const info = getLoopUnrollInfo(decl(i, int(10)), compare(i, OperatorKind.GT, int(0)),
      increment(i, OperatorKind.MINUSMINUS), null);
    expect(info).toEqual({ index: i, start: 10, delta: -1, count: 10 });
  });

  it('counts float loops', () => {
    const f = local('f', types.float);
    const info = getLoopUnrollInfo(decl(f, float(0)), compare(f, OperatorKind.LT, float(1)),
      step(f, OperatorKind.PLUSEQ, float(0.25)), null);
    expect(info?.count).toBe(4);
  });

  it('requires != loops to land exactly on the end', () => {
    const i = local('i', types.int);
    const exact = getLoopUnrollInfo(decl(i, int(0)), compare(i, OperatorKind.NEQ, int(10)),
      step(i, OperatorKind.PLUSEQ, int(2)), null);
    expect(exact?.count).toBe(5);
    const reasons: string[] = [];
    const missed = getLoopUnrollInfo(decl(i, int(0)), compare(i, OperatorKind.NEQ, int(9)),
      step(i, OperatorKind.PLUSEQ, int(2)), null, reasons);
    expect(missed).toBeNull();
    expect(reasons).toEqual(['loop does not terminate']);
  });

  it('rejects loops that move away from the end', () => {
    const i = local('i', types.int);
    const reasons: string[] = [];
    const info = getLoopUnrollInfo(decl(i, int(0)), compare(i, OperatorKind.LT, int(10)),
      increment(i, OperatorKind.MINUSMINUS), null, reasons);
    expect(info).toBeNull();
    expect(reasons).toEqual(['loop must guarantee termination in fewer iterations']);
    expect(LOOP_TERMINATION_LIMIT).toBe(100000);
  });

  it('rejects a body that writes the index', () => {
    const i = local('i', types.int);
    const body: Statement = {
      kind: StatementKind.Expression,
      expression: binary(ref(i, VariableRefKind.Write), OperatorKind.EQ, int(5), types.int),
    };
    const reasons: string[] = [];
    const info = getLoopUnrollInfo(decl(i, int(0)), compare(i, OperatorKind.LT, int(10)),
      increment(i, OperatorKind.PLUSPLUS), body, reasons);
    expect(info).toBeNull();
    expect(reasons).toEqual(['loop index must not be modified within body of the loop']);
  });

  it('rejects a non-constant start', () => {
    const i = local('i', types.int);
    const n = local('n', types.int);
    const reasons: string[] = [];
    expect(getLoopUnrollInfo(decl(i, ref(n)), compare(i, OperatorKind.LT, int(10)),
      increment(i, OperatorKind.PLUSPLUS), null, reasons)).toBeNull();
    expect(reasons).toEqual(['loop index initializer must be a constant expression']);
  });

  it('rejects a missing initializer without throwing', () => {
    const reasons: string[] = [];
    expect(getLoopUnrollInfo(null, null, null, null, reasons)).toBeNull();
    expect(reasons).toEqual(['missing index initializer']);
  });
});
