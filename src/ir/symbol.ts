/**
 * @file symbol.ts
 * @description Named entities held by symbol tables: variables, fields and function declarations.
 * Types are symbols too; they live in type.ts.
 */

import { describeModifiers } from './modifiers.js';
import type { Modifiers } from './modifiers.js';
import type { Type } from './type.js';

export enum SymbolKind {
  Type = 0,
  Variable = 1,
  Field = 2,
  FunctionDeclaration = 3,
}

/**
 * Base class for everything a symbol table can hold.
 */
export abstract class ShaderSymbol {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  abstract get kind(): SymbolKind;

  /** Text of the declaration, as it would read in source */
  abstract description(): string;
}

/** Where a variable lives. The numeric values are part of the dehydrated format. */
export enum VariableStorage {
  Global = 0,
  InterfaceBlock = 1,
  Local = 2,
  Parameter = 3,
}

export function isVariableStorage(value: number): value is VariableStorage {
  return Number.isInteger(value) && value >= VariableStorage.Global &&
    value <= VariableStorage.Parameter;
}

export class Variable extends ShaderSymbol {
  readonly modifiers: Modifiers;
  readonly type: Type;
  readonly builtin: boolean;
  readonly storage: VariableStorage;

  constructor(modifiers: Modifiers, name: string, type: Type, builtin: boolean,
              storage: VariableStorage) {
    super(name);
    this.modifiers = modifiers;
    this.type = type;
    this.builtin = builtin;
    this.storage = storage;
  }

  get kind(): SymbolKind { return SymbolKind.Variable; }

  description(): string {
    return describeModifiers(this.modifiers) + this.type.name + ' ' + this.name;
  }
}

/**
 * A field of an anonymous interface block, visible as a bare name.
 * The owner's type must be a struct with at least `fieldIndex + 1` fields.
 */
export class Field extends ShaderSymbol {
  readonly owner: Variable;
  readonly fieldIndex: number;

  constructor(owner: Variable, fieldIndex: number) {
    super(owner.type.fields[fieldIndex].name);
    this.owner = owner;
    this.fieldIndex = fieldIndex;
  }

  get kind(): SymbolKind { return SymbolKind.Field; }

  get type(): Type { return this.owner.type.fields[this.fieldIndex].type; }

  description(): string {
    return this.owner.name + '.' + this.name;
  }
}

/**
 * A function signature. Declarations are immutable; a body, when the program has one,
 * is attached through a separate FunctionDefinition element.
 */
export class FunctionDeclaration extends ShaderSymbol {
  readonly modifiers: Modifiers;
  readonly parameters: readonly Variable[];
  readonly returnType: Type;
  readonly builtin: boolean;

  constructor(modifiers: Modifiers, name: string, parameters: readonly Variable[],
              returnType: Type, builtin: boolean) {
    super(name);
    this.modifiers = modifiers;
    this.parameters = parameters;
    this.returnType = returnType;
    this.builtin = builtin;
  }

  get kind(): SymbolKind { return SymbolKind.FunctionDeclaration; }

  description(): string {
    const params = this.parameters.map(p => p.description()).join(', ');
    return describeModifiers(this.modifiers) + this.returnType.name + ' ' + this.name +
      '(' + params + ')';
  }
}
