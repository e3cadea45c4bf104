/**
 * @file symboltable.test.ts
 * @description Tests for scope ownership, lookup and publishing.
 */

import { describe, it, expect } from 'vitest';
import { LowlevelError } from '../../src/core/error.js';
import { BuiltinTypes } from '../../src/ir/builtintypes.js';
import { DEFAULT_MODIFIERS } from '../../src/ir/modifiers.js';
import { FunctionDeclaration, Variable, VariableStorage } from '../../src/ir/symbol.js';
import { SymbolTable } from '../../src/ir/symboltable.js';
import type { Type } from '../../src/ir/type.js';

const types = new BuiltinTypes();

function variable(name: string, type: Type = types.float): Variable {
  return new Variable(DEFAULT_MODIFIERS, name, type, false, VariableStorage.Global);
}

function fn(name: string, paramType: Type, returnType: Type): FunctionDeclaration {
  const param = new Variable(DEFAULT_MODIFIERS, 'p', paramType, true, VariableStorage.Parameter);
  return new FunctionDeclaration(DEFAULT_MODIFIERS, name, [param], returnType, true);
}

describe('SymbolTable', () => {
  it('finds symbols through the parent chain but not below', () => {
    const root = new SymbolTable(null, true);
    const child = new SymbolTable(root, false);
    const a = root.add(variable('a'));
    const b = child.add(variable('b'));
    expect(child.find('a')).toBe(a);
    expect(child.find('b')).toBe(b);
    expect(child.findLocal('a')).toBeNull();
    expect(root.find('b')).toBeNull();
    expect(child.getRoot()).toBe(root);
    expect(child.isWithin(root)).toBe(true);
    expect(root.isWithin(child)).toBe(false);
  });

  it('lets an inner symbol shadow an outer one', () => {
    const root = new SymbolTable(null, true);
    const child = new SymbolTable(root, false);
    root.add(variable('x'));
    const inner = child.add(variable('x', types.half));
    expect(child.find('x')).toBe(inner);
  });

  it('separates ownership from visibility', () => {
    const table = new SymbolTable(null, false);
    const owned = table.takeOwnershipOfSymbol(variable('hidden'));
    expect(table.getOwnedSymbols()).toEqual([owned]);
    expect(table.find('hidden')).toBeNull();
    const shared = variable('shared');
    expect(table.addWithoutOwnership(shared)).toBe(true);
    expect(table.getOwnedSymbols()).toHaveLength(1);
    expect(table.find('shared')).toBe(shared);
  });

  it('rejects a second symbol with the same name', () => {
    const table = new SymbolTable(null, false);
    const x = table.add(variable('x'));
    expect(table.addWithoutOwnership(x)).toBe(true);
    expect(table.addWithoutOwnership(variable('x'))).toBe(false);
    expect(() => table.add(variable('x'))).toThrow(LowlevelError);
  });

  it('collects function overloads innermost first', () => {
    const root = new SymbolTable(null, true);
    const child = new SymbolTable(root, true);
    const outer = root.add(fn('mix', types.float, types.float));
    const innerA = child.add(fn('mix', types.half, types.half));
    const innerB = child.add(fn('mix', types.int, types.int));
    expect(child.findOverloads('mix')).toEqual([innerA, innerB, outer]);
    expect(child.find('mix')).toBe(innerA);
    expect(root.findOverloads('mix')).toEqual([outer]);
  });

  it('does not overload a function onto a variable', () => {
    const table = new SymbolTable(null, true);
    table.add(variable('clamp'));
    expect(table.addWithoutOwnership(fn('clamp', types.float, types.float))).toBe(false);
  });

  it('is read-only once published', () => {
    const table = new SymbolTable(null, true);
    table.add(variable('a'));
    table.publish();
    expect(table.isPublished()).toBe(true);
    expect(() => table.add(variable('b'))).toThrow(LowlevelError);
    expect(() => table.addWithoutOwnership(variable('c'))).toThrow(LowlevelError);
    expect(table.find('b')).toBeNull();
    const child = new SymbolTable(table, false);
    expect(() => child.add(variable('b'))).not.toThrow();
  });

  it('iterates visible names in insertion order', () => {
    const table = new SymbolTable(null, false);
    table.add(variable('b'));
    table.add(variable('a'));
    expect([...table].map(([name]) => name)).toEqual(['b', 'a']);
  });
});
