/**
 * @file symboltable.ts
 * @description Lexical scopes: each table owns the symbols created inside it and maps names to
 * every symbol visible at that level, chaining to its parent for lookup.
 */

import { LowlevelError } from '../core/error.js';
import { FunctionDeclaration, ShaderSymbol } from './symbol.js';

export class SymbolTable {
  private parent: SymbolTable | null;
  readonly isBuiltin: boolean;
  private owned: ShaderSymbol[] = [];
  private symbols: Map<string, ShaderSymbol> = new Map();
  private functions: Map<string, FunctionDeclaration[]> = new Map();
  private published: boolean = false;

  constructor(parent: SymbolTable | null, builtin: boolean) {
    this.parent = parent;
    this.isBuiltin = builtin;
  }

  getParent(): SymbolTable | null { return this.parent; }

  /** The outermost ancestor of this table */
  getRoot(): SymbolTable {
    let res: SymbolTable = this;
    while (res.parent !== null) res = res.parent;
    return res;
  }

  /** Symbols created in this scope, in creation order */
  getOwnedSymbols(): readonly ShaderSymbol[] { return this.owned; }

  isPublished(): boolean { return this.published; }

  /**
   * Mark the table as shared. A published table can no longer take or expose new symbols;
   * decoders only ever read from it.
   */
  publish(): void {
    this.published = true;
  }

  private checkWritable(): void {
    if (this.published) {
      throw new LowlevelError('Cannot modify a published symbol table');
    }
  }

  /** Make this table the owner of a newly created symbol */
  takeOwnershipOfSymbol<T extends ShaderSymbol>(sym: T): T {
    this.checkWritable();
    this.owned.push(sym);
    return sym;
  }

  /**
   * Make a symbol visible by name in this table without owning it.
   * Function declarations sharing a name accumulate as overloads. Returns false if the name is
   * already bound to a symbol that cannot be overloaded.
   */
  addWithoutOwnership(sym: ShaderSymbol): boolean {
    this.checkWritable();
    const existing = this.symbols.get(sym.name);
    if (sym instanceof FunctionDeclaration) {
      if (existing !== undefined && !(existing instanceof FunctionDeclaration)) return false;
      const overloads = this.functions.get(sym.name);
      if (overloads === undefined) {
        this.functions.set(sym.name, [sym]);
      } else if (!overloads.includes(sym)) {
        overloads.push(sym);
      }
      if (existing === undefined) this.symbols.set(sym.name, sym);
      return true;
    }
    if (existing !== undefined) return existing === sym;
    this.symbols.set(sym.name, sym);
    return true;
  }

  /** Take ownership of a symbol and make it visible. Throws on a name clash. */
  add<T extends ShaderSymbol>(sym: T): T {
    this.takeOwnershipOfSymbol(sym);
    if (!this.addWithoutOwnership(sym)) {
      throw new LowlevelError("Duplicate symbol name '" + sym.name + "'");
    }
    return sym;
  }

  /** Find a symbol visible in this table only */
  findLocal(nm: string): ShaderSymbol | null {
    return this.symbols.get(nm) ?? null;
  }

  /** Find a symbol by name in this table or the nearest ancestor that has it */
  find(nm: string): ShaderSymbol | null {
    let scope: SymbolTable | null = this;
    while (scope !== null) {
      const res = scope.symbols.get(nm);
      if (res !== undefined) return res;
      scope = scope.parent;
    }
    return null;
  }

  /**
   * Every function declaration named `nm` visible from this table, innermost scope first.
   */
  findOverloads(nm: string): FunctionDeclaration[] {
    const result: FunctionDeclaration[] = [];
    let scope: SymbolTable | null = this;
    while (scope !== null) {
      const list = scope.functions.get(nm);
      if (list !== undefined) {
        for (const f of list) {
          if (!result.includes(f)) result.push(f);
        }
      }
      scope = scope.parent;
    }
    return result;
  }

  /** Is `ancestor` this table or one of its ancestors */
  isWithin(ancestor: SymbolTable): boolean {
    let scope: SymbolTable | null = this;
    while (scope !== null) {
      if (scope === ancestor) return true;
      scope = scope.parent;
    }
    return false;
  }

  /** Visible names in insertion order */
  [Symbol.iterator](): IterableIterator<[string, ShaderSymbol]> {
    return this.symbols.entries();
  }
}
