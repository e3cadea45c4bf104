/**
 * @file visitor.ts
 * @description Pre-order walks over expression and statement trees.
 */

import { ExpressionKind } from '../ir/expression.js';
import { StatementKind } from '../ir/statement.js';
import type { Expression } from '../ir/expression.js';
import type { Statement } from '../ir/statement.js';

/** Called for every expression; returning true stops the walk */
export type ExpressionVisitor = (expr: Expression) => boolean;

/**
 * Visit `expr` and its subexpressions in pre-order.
 * Returns true if the visitor stopped the walk.
 */
export function visitExpression(expr: Expression | null, fn: ExpressionVisitor): boolean {
  if (expr === null) return false;
  if (fn(expr)) return true;
  switch (expr.kind) {
    case ExpressionKind.Binary:
      return visitExpression(expr.left, fn) || visitExpression(expr.right, fn);
    case ExpressionKind.FieldAccess:
    case ExpressionKind.Swizzle:
      return visitExpression(expr.base, fn);
    case ExpressionKind.Index:
      return visitExpression(expr.base, fn) || visitExpression(expr.index, fn);
    case ExpressionKind.Postfix:
    case ExpressionKind.Prefix:
      return visitExpression(expr.operand, fn);
    case ExpressionKind.Ternary:
      return visitExpression(expr.test, fn) || visitExpression(expr.ifTrue, fn) ||
        visitExpression(expr.ifFalse, fn);
    case ExpressionKind.FunctionCall:
    case ExpressionKind.ConstructorArray:
    case ExpressionKind.ConstructorArrayCast:
    case ExpressionKind.ConstructorCompound:
    case ExpressionKind.ConstructorCompoundCast:
    case ExpressionKind.ConstructorDiagonalMatrix:
    case ExpressionKind.ConstructorMatrixResize:
    case ExpressionKind.ConstructorScalarCast:
    case ExpressionKind.ConstructorSplat:
    case ExpressionKind.ConstructorStruct:
      return expr.args.some(arg => visitExpression(arg, fn));
    case ExpressionKind.BoolLiteral:
    case ExpressionKind.IntLiteral:
    case ExpressionKind.FloatLiteral:
    case ExpressionKind.Setting:
    case ExpressionKind.VariableReference:
      return false;
  }
}

/**
 * Visit every expression reachable from `stmt`, including those of nested statements.
 * Returns true if the visitor stopped the walk.
 */
export function visitStatement(stmt: Statement | null, fn: ExpressionVisitor): boolean {
  if (stmt === null) return false;
  switch (stmt.kind) {
    case StatementKind.Block:
      return stmt.statements.some(s => visitStatement(s, fn));
    case StatementKind.Do:
      return visitStatement(stmt.body, fn) || visitExpression(stmt.test, fn);
    case StatementKind.Expression:
      return visitExpression(stmt.expression, fn);
    case StatementKind.For:
      return visitStatement(stmt.initializer, fn) || visitExpression(stmt.test, fn) ||
        visitExpression(stmt.next, fn) || visitStatement(stmt.body, fn);
    case StatementKind.If:
      return visitExpression(stmt.test, fn) || visitStatement(stmt.ifTrue, fn) ||
        visitStatement(stmt.ifFalse, fn);
    case StatementKind.Return:
      return visitExpression(stmt.expression, fn);
    case StatementKind.Switch:
      return visitExpression(stmt.value, fn) || stmt.cases.some(c => visitStatement(c, fn));
    case StatementKind.SwitchCase:
      return visitStatement(stmt.statement, fn);
    case StatementKind.VarDeclaration:
      return visitExpression(stmt.value, fn);
    case StatementKind.Break:
    case StatementKind.Continue:
    case StatementKind.Discard:
    case StatementKind.Nop:
      return false;
  }
}
