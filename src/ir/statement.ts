/**
 * @file statement.ts
 * @description Statement nodes of a rehydrated program.
 *
 * `null` stands for "no statement" (an omitted for-loop initializer, a missing else branch).
 */

import { describeExpression } from './expression.js';
import { describeModifiers } from './modifiers.js';
import type { LoopUnrollInfo } from '../analysis/loopunroll.js';
import type { Expression } from './expression.js';
import type { Variable } from './symbol.js';
import type { SymbolTable } from './symboltable.js';
import type { Type } from './type.js';

export enum StatementKind {
  Block,
  Break,
  Continue,
  Discard,
  Do,
  Expression,
  For,
  If,
  Nop,
  Return,
  Switch,
  SwitchCase,
  VarDeclaration,
}

/** The numeric values are part of the dehydrated format */
export enum BlockKind {
  Unbraced = 0,
  Braced = 1,
  CompoundStatement = 2,
}

export interface Block {
  readonly kind: StatementKind.Block;
  readonly statements: readonly Statement[];
  readonly blockKind: BlockKind;
  /** Scope of the block; the enclosing scope when the block declares nothing */
  readonly symbols: SymbolTable;
}

export interface BreakStatement { readonly kind: StatementKind.Break; }
export interface ContinueStatement { readonly kind: StatementKind.Continue; }
export interface DiscardStatement { readonly kind: StatementKind.Discard; }
export interface Nop { readonly kind: StatementKind.Nop; }

export interface DoStatement {
  readonly kind: StatementKind.Do;
  readonly body: Statement | null;
  readonly test: Expression;
}

export interface ExpressionStatement {
  readonly kind: StatementKind.Expression;
  readonly expression: Expression;
}

export interface ForStatement {
  readonly kind: StatementKind.For;
  readonly initializer: Statement | null;
  readonly test: Expression | null;
  readonly next: Expression | null;
  readonly body: Statement | null;
  /** Derived from the other parts; null when the loop cannot be unrolled */
  readonly unrollInfo: LoopUnrollInfo | null;
  readonly symbols: SymbolTable;
}

export interface IfStatement {
  readonly kind: StatementKind.If;
  readonly isStatic: boolean;
  readonly test: Expression;
  readonly ifTrue: Statement | null;
  readonly ifFalse: Statement | null;
}

export interface ReturnStatement {
  readonly kind: StatementKind.Return;
  readonly expression: Expression | null;
}

export interface SwitchCase {
  readonly kind: StatementKind.SwitchCase;
  readonly isDefault: boolean;
  /** Selector value; 0 for the default case */
  readonly value: number;
  readonly statement: Statement | null;
}

export interface SwitchStatement {
  readonly kind: StatementKind.Switch;
  readonly isStatic: boolean;
  readonly value: Expression;
  readonly cases: readonly SwitchCase[];
  readonly symbols: SymbolTable;
}

export interface VarDeclaration {
  readonly kind: StatementKind.VarDeclaration;
  readonly variable: Variable;
  readonly baseType: Type;
  readonly arraySize: number;
  readonly value: Expression | null;
}

export type Statement =
  | Block
  | BreakStatement
  | ContinueStatement
  | DiscardStatement
  | DoStatement
  | ExpressionStatement
  | ForStatement
  | IfStatement
  | Nop
  | ReturnStatement
  | SwitchStatement
  | SwitchCase
  | VarDeclaration;

function describeOptional(stmt: Statement | null): string {
  return stmt === null ? ';' : describeStatement(stmt);
}

/** Render a statement as single-line source text */
export function describeStatement(stmt: Statement): string {
  switch (stmt.kind) {
    case StatementKind.Block: {
      const inner = stmt.statements.map(s => ' ' + describeStatement(s)).join('');
      if (stmt.blockKind === BlockKind.Unbraced) return inner.trimStart();
      return '{' + inner + ' }';
    }
    case StatementKind.Break:
      return 'break;';
    case StatementKind.Continue:
      return 'continue;';
    case StatementKind.Discard:
      return 'discard;';
    case StatementKind.Do:
      return 'do ' + describeOptional(stmt.body) + ' while (' + describeExpression(stmt.test) + ');';
    case StatementKind.Expression:
      return describeExpression(stmt.expression) + ';';
    case StatementKind.For:
      return 'for (' + describeOptional(stmt.initializer) + ' ' +
        (stmt.test === null ? '' : describeExpression(stmt.test)) + '; ' +
        (stmt.next === null ? '' : describeExpression(stmt.next)) + ') ' +
        describeOptional(stmt.body);
    case StatementKind.If: {
      let res = (stmt.isStatic ? '@if (' : 'if (') + describeExpression(stmt.test) + ') ' +
        describeOptional(stmt.ifTrue);
      if (stmt.ifFalse !== null) res += ' else ' + describeStatement(stmt.ifFalse);
      return res;
    }
    case StatementKind.Nop:
      return ';';
    case StatementKind.Return:
      return stmt.expression === null ? 'return;' :
        'return ' + describeExpression(stmt.expression) + ';';
    case StatementKind.Switch: {
      const cases = stmt.cases.map(c => ' ' + describeStatement(c)).join('');
      return (stmt.isStatic ? '@switch (' : 'switch (') + describeExpression(stmt.value) + ') {' +
        cases + ' }';
    }
    case StatementKind.SwitchCase: {
      const label = stmt.isDefault ? 'default:' : 'case ' + stmt.value + ':';
      return stmt.statement === null ? label : label + ' ' + describeStatement(stmt.statement);
    }
    case StatementKind.VarDeclaration: {
      let res = describeModifiers(stmt.variable.modifiers) + stmt.baseType.name + ' ' +
        stmt.variable.name;
      if (stmt.arraySize > 0) res += '[' + stmt.arraySize + ']';
      if (stmt.value !== null) res += ' = ' + describeExpression(stmt.value);
      return res + ';';
    }
  }
}
