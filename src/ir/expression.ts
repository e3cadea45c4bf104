/**
 * @file expression.ts
 * @description Expression nodes of a rehydrated program, and the rules that give each node its type.
 *
 * Expressions are an immutable tree of tagged records; `kind` selects the variant. A missing
 * expression (an omitted loop test, a bare `return;`) is represented as `null`.
 */

import { OperatorKind, isAssignment, isLogical, isRelational, operatorText } from './operator.js';
import type { BuiltinTypes } from './builtintypes.js';
import type { FunctionDeclaration, Variable } from './symbol.js';
import type { Type } from './type.js';

export enum ExpressionKind {
  Binary,
  BoolLiteral,
  IntLiteral,
  FloatLiteral,
  ConstructorArray,
  ConstructorArrayCast,
  ConstructorCompound,
  ConstructorCompoundCast,
  ConstructorDiagonalMatrix,
  ConstructorMatrixResize,
  ConstructorScalarCast,
  ConstructorSplat,
  ConstructorStruct,
  FieldAccess,
  FunctionCall,
  Index,
  Postfix,
  Prefix,
  Setting,
  Swizzle,
  Ternary,
  VariableReference,
}

/** How a field access reaches its field. The numeric values are part of the dehydrated format. */
export enum FieldAccessOwnerKind {
  Default = 0,
  AnonymousInterfaceBlock = 1,
}

/** How a variable reference uses the variable. The numeric values are part of the dehydrated format. */
export enum VariableRefKind {
  Read = 0,
  Write = 1,
  ReadWrite = 2,
  Pointer = 3,
}

/** Swizzle component values for the constant lanes */
export const SWIZZLE_ZERO = 16;
export const SWIZZLE_ONE = 17;

export interface BinaryExpression {
  readonly kind: ExpressionKind.Binary;
  readonly type: Type;
  readonly left: Expression;
  readonly op: OperatorKind;
  readonly right: Expression;
}

export interface BoolLiteral {
  readonly kind: ExpressionKind.BoolLiteral;
  readonly type: Type;
  readonly value: boolean;
}

export interface IntLiteral {
  readonly kind: ExpressionKind.IntLiteral;
  readonly type: Type;
  readonly value: number;
}

export interface FloatLiteral {
  readonly kind: ExpressionKind.FloatLiteral;
  readonly type: Type;
  readonly value: number;
  /** The IEEE-754 single precision bit pattern `value` was decoded from */
  readonly bits: number;
}

export type ConstructorKind =
  | ExpressionKind.ConstructorArray
  | ExpressionKind.ConstructorArrayCast
  | ExpressionKind.ConstructorCompound
  | ExpressionKind.ConstructorCompoundCast
  | ExpressionKind.ConstructorDiagonalMatrix
  | ExpressionKind.ConstructorMatrixResize
  | ExpressionKind.ConstructorScalarCast
  | ExpressionKind.ConstructorSplat
  | ExpressionKind.ConstructorStruct;

export interface ConstructorExpression {
  readonly kind: ConstructorKind;
  readonly type: Type;
  readonly args: readonly Expression[];
}

export interface FieldAccess {
  readonly kind: ExpressionKind.FieldAccess;
  readonly type: Type;
  readonly base: Expression;
  readonly fieldIndex: number;
  readonly ownerKind: FieldAccessOwnerKind;
}

export interface FunctionCall {
  readonly kind: ExpressionKind.FunctionCall;
  readonly type: Type;
  readonly function: FunctionDeclaration;
  readonly args: readonly Expression[];
}

export interface IndexExpression {
  readonly kind: ExpressionKind.Index;
  readonly type: Type;
  readonly base: Expression;
  readonly index: Expression;
}

export interface PostfixExpression {
  readonly kind: ExpressionKind.Postfix;
  readonly type: Type;
  readonly op: OperatorKind;
  readonly operand: Expression;
}

export interface PrefixExpression {
  readonly kind: ExpressionKind.Prefix;
  readonly type: Type;
  readonly op: OperatorKind;
  readonly operand: Expression;
}

/** A compile-time capability (`sk_Caps.<name>`) left for the code generator to resolve */
export interface SettingExpression {
  readonly kind: ExpressionKind.Setting;
  readonly type: Type;
  readonly name: string;
}

export interface Swizzle {
  readonly kind: ExpressionKind.Swizzle;
  readonly type: Type;
  readonly base: Expression;
  readonly components: readonly number[];
}

export interface TernaryExpression {
  readonly kind: ExpressionKind.Ternary;
  readonly type: Type;
  readonly test: Expression;
  readonly ifTrue: Expression;
  readonly ifFalse: Expression;
}

export interface VariableReference {
  readonly kind: ExpressionKind.VariableReference;
  readonly type: Type;
  readonly variable: Variable;
  readonly refKind: VariableRefKind;
}

export type Expression =
  | BinaryExpression
  | BoolLiteral
  | IntLiteral
  | FloatLiteral
  | ConstructorExpression
  | FieldAccess
  | FunctionCall
  | IndexExpression
  | PostfixExpression
  | PrefixExpression
  | SettingExpression
  | Swizzle
  | TernaryExpression
  | VariableReference;

/** Constructor kinds that take exactly one argument */
export function isSingleArgumentConstructor(kind: ConstructorKind): boolean {
  return kind !== ExpressionKind.ConstructorArray &&
    kind !== ExpressionKind.ConstructorCompound &&
    kind !== ExpressionKind.ConstructorStruct;
}

// =========================================================================
// Result types
// =========================================================================

function isScalarLike(t: Type): boolean {
  return t.isScalar() || t.isLiteral();
}

/**
 * The type both operands meet at: the side that converts to the other without narrowing, and at
 * the lower cost when both can. Null if neither converts.
 */
function commonType(left: Type, right: Type): Type | null {
  if (left.matches(right)) return left.resolve();
  const rightToLeft = right.coercionCost(left);
  const leftToRight = left.coercionCost(right);
  if (rightToLeft.isPossible(false) &&
      (!leftToRight.isPossible(false) || !leftToRight.lessThan(rightToLeft))) {
    return left.resolve();
  }
  if (leftToRight.isPossible(false)) return right.resolve();
  return null;
}

/**
 * Type produced by `left op right`, or null if the operand types do not combine.
 *
 * A scalar combined with a vector or matrix widens the component type first, so `half3 * float`
 * is a `float3`.
 */
export function binaryResultType(types: BuiltinTypes, left: Type, op: OperatorKind,
                                 right: Type): Type | null {
  if (op === OperatorKind.COMMA) return right;
  if (isAssignment(op)) return left;
  if (isLogical(op) || isRelational(op)) return types.bool;

  const leftScalar = isScalarLike(left);
  const rightScalar = isScalarLike(right);
  if (leftScalar && rightScalar) return commonType(left, right);
  if (leftScalar || rightScalar) {
    const compound = leftScalar ? right : left;
    if (!compound.isVector() && !compound.isMatrix()) return null;
    const comp = leftScalar ? commonType(left, compound.componentType) :
      commonType(compound.componentType, right);
    return comp === null ? null : types.toCompound(comp, compound.columns, compound.rows);
  }

  if (op === OperatorKind.STAR && (left.isMatrix() || right.isMatrix())) {
    if (!(left.isMatrix() || left.isVector()) || !(right.isMatrix() || right.isVector())) {
      return null;
    }
    const comp = commonType(left.componentType, right.componentType);
    if (comp === null) return null;
    if (left.isMatrix() && right.isMatrix()) {
      return left.columns === right.rows ? types.toCompound(comp, right.columns, left.rows) : null;
    }
    if (left.isMatrix()) {
      return left.columns === right.columns ? types.toCompound(comp, left.rows, 1) : null;
    }
    return left.columns === right.rows ? types.toCompound(comp, right.columns, 1) : null;
  }
  return commonType(left, right);
}

/** Type of `base[index]`, or null if the base is not indexable */
export function indexResultType(types: BuiltinTypes, base: Type): Type | null {
  if (base.isArray() || base.isVector()) return base.componentType;
  if (base.isMatrix()) return types.toCompound(base.componentType, base.rows, 1);
  return null;
}

/** Type of a swizzle of `count` components, or null if the base cannot be swizzled */
export function swizzleResultType(types: BuiltinTypes, base: Type, count: number): Type | null {
  if (!isScalarLike(base) && !base.isVector()) return null;
  if (count < 1 || count > 4) return null;
  return types.toCompound(base.componentType, count, 1);
}

/** Type of field `index` of a struct, or null if there is no such field */
export function fieldAccessType(base: Type, index: number): Type | null {
  if (!base.isStruct() || index >= base.fields.length) return null;
  return base.fields[index].type;
}

// =========================================================================
// Description
// =========================================================================

/**
 * Shortest decimal text that reads back as the same single precision value.
 * Integral values keep a trailing `.0` so they still read as floats.
 */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (Number.isInteger(value)) return value.toFixed(1);
  for (let p = 1; p <= 9; ++p) {
    const candidate = Number(value.toPrecision(p));
    if (Math.fround(candidate) === value) return String(candidate);
  }
  return String(value);
}

const SWIZZLE_LETTERS = 'xyzw';

function swizzleText(components: readonly number[]): string {
  let res = '';
  for (const c of components) {
    if (c === SWIZZLE_ZERO) res += '0';
    else if (c === SWIZZLE_ONE) res += '1';
    else res += SWIZZLE_LETTERS[c] ?? '?';
  }
  return res;
}

function describeArgs(args: readonly Expression[]): string {
  return args.map(describeExpression).join(', ');
}

/** Render an expression as source text */
export function describeExpression(expr: Expression): string {
  switch (expr.kind) {
    case ExpressionKind.Binary:
      return '(' + describeExpression(expr.left) + ' ' + operatorText(expr.op) + ' ' +
        describeExpression(expr.right) + ')';
    case ExpressionKind.BoolLiteral:
      return expr.value ? 'true' : 'false';
    case ExpressionKind.IntLiteral:
      return String(expr.value);
    case ExpressionKind.FloatLiteral:
      return formatFloat(expr.value);
    case ExpressionKind.ConstructorArray:
    case ExpressionKind.ConstructorArrayCast:
    case ExpressionKind.ConstructorCompound:
    case ExpressionKind.ConstructorCompoundCast:
    case ExpressionKind.ConstructorDiagonalMatrix:
    case ExpressionKind.ConstructorMatrixResize:
    case ExpressionKind.ConstructorScalarCast:
    case ExpressionKind.ConstructorSplat:
    case ExpressionKind.ConstructorStruct:
      return expr.type.name + '(' + describeArgs(expr.args) + ')';
    case ExpressionKind.FieldAccess: {
      const field = expr.base.type.fields[expr.fieldIndex].name;
      if (expr.ownerKind === FieldAccessOwnerKind.AnonymousInterfaceBlock) return field;
      return describeExpression(expr.base) + '.' + field;
    }
    case ExpressionKind.FunctionCall:
      return expr.function.name + '(' + describeArgs(expr.args) + ')';
    case ExpressionKind.Index:
      return describeExpression(expr.base) + '[' + describeExpression(expr.index) + ']';
    case ExpressionKind.Postfix:
      return describeExpression(expr.operand) + operatorText(expr.op);
    case ExpressionKind.Prefix:
      return operatorText(expr.op) + describeExpression(expr.operand);
    case ExpressionKind.Setting:
      return 'sk_Caps.' + expr.name;
    case ExpressionKind.Swizzle:
      return describeExpression(expr.base) + '.' + swizzleText(expr.components);
    case ExpressionKind.Ternary:
      return '(' + describeExpression(expr.test) + ' ? ' + describeExpression(expr.ifTrue) +
        ' : ' + describeExpression(expr.ifFalse) + ')';
    case ExpressionKind.VariableReference:
      return expr.variable.name;
  }
}
