/**
 * @file loopunroll.ts
 * @description Static analysis deciding whether a for-loop has a known, bounded trip count.
 *
 * A loop qualifies when it has the form
 *   for (T i = <const>; i <relop> <const>; i += <const> | i -= <const> | ++i | i++ | --i | i--)
 * where T is a scalar int or float, and the body never writes to `i`.
 */

import { ExpressionKind, VariableRefKind } from '../ir/expression.js';
import { OperatorKind, isRelational } from '../ir/operator.js';
import { StatementKind } from '../ir/statement.js';
import { visitStatement } from './visitor.js';
import type { Expression } from '../ir/expression.js';
import type { Statement } from '../ir/statement.js';
import type { Variable } from '../ir/symbol.js';

/** Loops that would run this many iterations or more are never unrolled */
export const LOOP_TERMINATION_LIMIT = 100000;

export interface LoopUnrollInfo {
  readonly index: Variable;
  readonly start: number;
  readonly delta: number;
  readonly count: number;
}

/**
 * The numeric value of a constant expression, or null if it is not one.
 * Booleans evaluate to 1 or 0.
 */
export function getConstantValue(expr: Expression | null): number | null {
  if (expr === null) return null;
  switch (expr.kind) {
    case ExpressionKind.IntLiteral:
    case ExpressionKind.FloatLiteral:
      return expr.value;
    case ExpressionKind.BoolLiteral:
      return expr.value ? 1 : 0;
    case ExpressionKind.Prefix: {
      const v = getConstantValue(expr.operand);
      if (v === null) return null;
      if (expr.op === OperatorKind.MINUS) return -v;
      if (expr.op === OperatorKind.PLUS) return v;
      return null;
    }
    case ExpressionKind.ConstructorScalarCast: {
      const v = getConstantValue(expr.args[0]);
      if (v === null) return null;
      if (expr.type.isBoolean()) return v !== 0 ? 1 : 0;
      if (expr.type.isInteger()) return Math.trunc(v);
      return Math.fround(v);
    }
    default:
      return null;
  }
}

function isIndexReference(expr: Expression, index: Variable): boolean {
  return expr.kind === ExpressionKind.VariableReference && expr.variable === index;
}

/** Does anything in `stmt` assign to, or take the address of, `variable` */
export function statementWritesToVariable(stmt: Statement | null, variable: Variable): boolean {
  return visitStatement(stmt, expr =>
    expr.kind === ExpressionKind.VariableReference && expr.variable === variable &&
    expr.refKind !== VariableRefKind.Read);
}

function calculateCount(start: number, end: number, delta: number, forwards: boolean,
                        inclusive: boolean): number {
  if (forwards !== (start < end)) {
    // The loop condition is already false
    return 0;
  }
  if (delta === 0 || forwards !== (delta > 0)) {
    // Moving away from the end, or not moving at all
    return LOOP_TERMINATION_LIMIT;
  }
  const iterations = (end - start) / delta;
  let count = Math.ceil(iterations);
  if (inclusive && count === iterations) count += 1;
  if (count > LOOP_TERMINATION_LIMIT || !Number.isFinite(count)) {
    return LOOP_TERMINATION_LIMIT;
  }
  return count;
}

/**
 * Work out the unroll info of a for-loop from its four parts.
 * Returns null when the loop does not qualify; the reason is appended to `reasons` if given.
 */
export function getLoopUnrollInfo(initializer: Statement | null, test: Expression | null,
                                  next: Expression | null, body: Statement | null,
                                  reasons: string[] | null = null): LoopUnrollInfo | null {
  const fail = (msg: string): null => {
    if (reasons !== null) reasons.push(msg);
    return null;
  };

  if (initializer === null) return fail('missing index initializer');
  if (initializer.kind !== StatementKind.VarDeclaration) {
    return fail('index initializer must be a declaration');
  }
  const index = initializer.variable;
  const indexType = index.type;
  if (!indexType.isScalar() || !(indexType.isFloat() || indexType.isInteger())) {
    return fail('invalid type for loop index');
  }
  const start = getConstantValue(initializer.value);
  if (start === null) return fail('loop index initializer must be a constant expression');

  if (test === null) return fail('missing condition');
  if (test.kind !== ExpressionKind.Binary || !isIndexReference(test.left, index) ||
      !isRelational(test.op)) {
    return fail('invalid loop condition');
  }
  const end = getConstantValue(test.right);
  if (end === null) return fail('loop condition must compare the index against a constant');

  if (next === null) return fail('missing loop expression');
  let delta: number | null = null;
  if (next.kind === ExpressionKind.Binary && isIndexReference(next.left, index)) {
    const amount = getConstantValue(next.right);
    if (next.op === OperatorKind.PLUSEQ && amount !== null) delta = amount;
    if (next.op === OperatorKind.MINUSEQ && amount !== null) delta = -amount;
  } else if ((next.kind === ExpressionKind.Prefix || next.kind === ExpressionKind.Postfix) &&
             isIndexReference(next.operand, index)) {
    if (next.op === OperatorKind.PLUSPLUS) delta = 1;
    if (next.op === OperatorKind.MINUSMINUS) delta = -1;
  }
  if (delta === null) return fail('invalid loop expression');

  if (statementWritesToVariable(body, index)) {
    return fail('loop index must not be modified within body of the loop');
  }

  let count: number;
  switch (test.op) {
    case OperatorKind.GT:
      count = calculateCount(start, end, delta, false, false);
      break;
    case OperatorKind.GTEQ:
      count = calculateCount(start, end, delta, false, true);
      break;
    case OperatorKind.LT:
      count = calculateCount(start, end, delta, true, false);
      break;
    case OperatorKind.LTEQ:
      count = calculateCount(start, end, delta, true, true);
      break;
    case OperatorKind.NEQ: {
      const iterations = (end - start) / delta;
      count = Math.ceil(iterations);
      if (count < 0 || count !== iterations || !Number.isFinite(iterations)) {
        return fail('loop does not terminate');
      }
      break;
    }
    default:
      // EQEQ: one iteration at most, and only if the index moves away afterwards
      if (start === end) {
        count = delta !== 0 ? 1 : LOOP_TERMINATION_LIMIT;
      } else {
        count = 0;
      }
      break;
  }
  if (count >= LOOP_TERMINATION_LIMIT) {
    return fail('loop must guarantee termination in fewer iterations');
  }
  return { index, start, delta, count };
}
