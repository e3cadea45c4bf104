/**
 * @file element.ts
 * @description Top-level program elements.
 */

import { describeModifiers } from './modifiers.js';
import { describeStatement } from './statement.js';
import type { Statement, VarDeclaration } from './statement.js';
import type { FunctionDeclaration, Variable } from './symbol.js';
import type { Type } from './type.js';

export enum ProgramElementKind {
  FunctionDefinition,
  FunctionPrototype,
  GlobalVar,
  InterfaceBlock,
  StructDefinition,
}

/**
 * A function body bound to its declaration. The declaration itself is never modified;
 * the program keeps the declaration → definition index.
 */
export interface FunctionDefinition {
  readonly kind: ProgramElementKind.FunctionDefinition;
  readonly declaration: FunctionDeclaration;
  readonly body: Statement;
  readonly builtin: boolean;
}

export interface FunctionPrototype {
  readonly kind: ProgramElementKind.FunctionPrototype;
  readonly declaration: FunctionDeclaration;
  readonly builtin: boolean;
}

export interface GlobalVarDeclaration {
  readonly kind: ProgramElementKind.GlobalVar;
  readonly declaration: VarDeclaration;
}

export interface InterfaceBlock {
  readonly kind: ProgramElementKind.InterfaceBlock;
  readonly variable: Variable;
  readonly typeName: string;
  readonly instanceName: string;
  readonly arraySize: number;
}

export interface StructDefinition {
  readonly kind: ProgramElementKind.StructDefinition;
  readonly type: Type;
}

export type ProgramElement =
  | FunctionDefinition
  | FunctionPrototype
  | GlobalVarDeclaration
  | InterfaceBlock
  | StructDefinition;

function describeFields(type: Type): string {
  return type.fields.map(f => ' ' + describeModifiers(f.modifiers) + f.type.name + ' ' + f.name + ';')
    .join('');
}

export function describeElement(elem: ProgramElement): string {
  switch (elem.kind) {
    case ProgramElementKind.FunctionDefinition:
      return elem.declaration.description() + ' ' + describeStatement(elem.body);
    case ProgramElementKind.FunctionPrototype:
      return elem.declaration.description() + ';';
    case ProgramElementKind.GlobalVar:
      return describeStatement(elem.declaration);
    case ProgramElementKind.InterfaceBlock: {
      const structType = elem.variable.type.isArray() ?
        elem.variable.type.componentType : elem.variable.type;
      let res = describeModifiers(elem.variable.modifiers) + elem.typeName + ' {' +
        describeFields(structType) + ' }';
      if (elem.instanceName.length > 0) {
        res += ' ' + elem.instanceName;
        if (elem.arraySize > 0) res += '[' + elem.arraySize + ']';
      }
      return res + ';';
    }
    case ProgramElementKind.StructDefinition:
      return 'struct ' + elem.type.name + ' {' + describeFields(elem.type) + ' };';
  }
}
