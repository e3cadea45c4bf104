/**
 * @file moduleregistry.ts
 * @description The shared builtin symbol tables programs are rehydrated against.
 *
 * One registry holds one root table, which exposes every builtin type, and the published builtin
 * module tables hanging off it. Published tables are read-only, so any number of decode sessions
 * can resolve against them.
 */

import { LowlevelError } from '../core/error.js';
import { BuiltinTypes } from '../ir/builtintypes.js';
import { SymbolTable } from '../ir/symboltable.js';
import { rehydrateModule } from '../rehydrate/rehydrator.js';
import type { ProgramKind } from '../ir/program.js';
import type { ModuleSource, RehydrateOptions, RehydratedModule } from '../rehydrate/rehydrator.js';

/** A builtin table that sees every builtin type by name */
export function makeRootSymbolTable(types: BuiltinTypes): SymbolTable {
  const root = new SymbolTable(null, true);
  for (const type of types.all()) {
    root.addWithoutOwnership(type);
  }
  return root;
}

export class ModuleRegistry implements ModuleSource {
  readonly types: BuiltinTypes;
  private root: SymbolTable;
  private modules: Map<ProgramKind, SymbolTable> = new Map();

  constructor(types: BuiltinTypes = new BuiltinTypes()) {
    this.types = types;
    this.root = makeRootSymbolTable(types);
    this.root.publish();
  }

  getRoot(): SymbolTable { return this.root; }

  /**
   * Publish a builtin table and make it the module for the given program kinds.
   * The table must be builtin and descend from this registry's root.
   */
  installModule(kinds: ProgramKind | readonly ProgramKind[], symbols: SymbolTable): void {
    if (!symbols.isBuiltin) {
      throw new LowlevelError('Module symbol tables must be builtin');
    }
    if (!symbols.isWithin(this.root)) {
      throw new LowlevelError('Module symbol table does not descend from the registry root');
    }
    symbols.publish();
    const list = typeof kinds === 'number' ? [kinds] : kinds;
    for (const kind of list) {
      this.modules.set(kind, symbols);
    }
  }

  /**
   * Rehydrate a module stream as a child of `parent` (the root by default) and install it.
   */
  loadModule(kinds: ProgramKind | readonly ProgramKind[], data: Uint8Array,
             parent: SymbolTable = this.root, options: RehydrateOptions = {}): RehydratedModule {
    if (!parent.isBuiltin) {
      throw new LowlevelError('A module can only extend a builtin symbol table');
    }
    const result = rehydrateModule(data, this.types, parent, options);
    this.installModule(kinds, result.symbols);
    return result;
  }

  /** The module table a program of `kind` decodes against; the root when none is installed */
  moduleForProgramKind(kind: ProgramKind): SymbolTable {
    return this.modules.get(kind) ?? this.root;
  }
}
