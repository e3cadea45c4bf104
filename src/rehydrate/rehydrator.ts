/**
 * @file rehydrator.ts
 * @description Rebuilds a type-checked program (syntax tree plus symbol tables) from its
 * dehydrated byte stream.
 *
 * The decoders for symbols, types, expressions, statements and elements are mutually recursive
 * methods over one cursor and one current symbol table. Symbols are created once, owned by the
 * table that was current when they were decoded, and referenced afterwards by the u16 id the
 * stream gives them.
 */

import { ByteCursor } from '../core/bytecursor.js';
import { CorruptStreamError, IncompatibleVersionError, LowlevelError } from '../core/error.js';
import { StringTable } from '../core/stringtable.js';
import { REHYDRATE_DEBUG, floatFromBits } from '../core/types.js';
import { getLoopUnrollInfo } from '../analysis/loopunroll.js';
import { ProgramElementKind } from '../ir/element.js';
import {
  ExpressionKind, FieldAccessOwnerKind, SWIZZLE_ONE, SWIZZLE_ZERO, VariableRefKind,
  binaryResultType, fieldAccessType, indexResultType, isSingleArgumentConstructor,
  swizzleResultType,
} from '../ir/expression.js';
import { findBestFunctionForCall, overloadCandidates } from '../ir/functioncall.js';
import { DEFAULT_LAYOUT, DEFAULT_MODIFIERS, builtinLayout } from '../ir/modifiers.js';
import { OperatorKind, isOperatorKind } from '../ir/operator.js';
import {
  DEFAULT_SETTINGS, LanguageVersion, ProgramInputFlag, ProgramUnit, isLanguageVersion,
  isProgramKind,
} from '../ir/program.js';
import { settingType, settingValue } from '../ir/settings.js';
import { BlockKind, StatementKind } from '../ir/statement.js';
import { Field, FunctionDeclaration, Variable, isVariableStorage } from '../ir/symbol.js';
import { SymbolTable } from '../ir/symboltable.js';
import { Type } from '../ir/type.js';
import { ConsoleWriter } from '../util/writer.js';
import { BUILTIN_SYMBOL, Command, FORMAT_VERSION } from './format.js';
import type { BuiltinTypes } from '../ir/builtintypes.js';
import type { ProgramElement } from '../ir/element.js';
import type { ConstructorKind, Expression } from '../ir/expression.js';
import type { Layout, Modifiers } from '../ir/modifiers.js';
import type { ProgramConfig, ProgramKind, ProgramSettings } from '../ir/program.js';
import type { Statement, SwitchCase } from '../ir/statement.js';
import type { ShaderSymbol } from '../ir/symbol.js';
import type { StructField } from '../ir/type.js';
import type { Writer } from '../util/writer.js';

export interface RehydrateOptions {
  /** Receives one line per symbol of every decoded symbol table */
  trace?: Writer | null;
  /** Require the decode to end exactly at the end of the buffer (default true) */
  verifyConsumption?: boolean;
  /** Overrides merged into the settings of the decoded program */
  settings?: Partial<Pick<ProgramSettings, 'replaceSettings' | 'caps'>>;
}

/** Where a program decode finds the builtin module for its kind */
export interface ModuleSource {
  readonly types: BuiltinTypes;
  getRoot(): SymbolTable;
  moduleForProgramKind(kind: ProgramKind): SymbolTable;
}

export interface RehydratedModule {
  readonly symbols: SymbolTable;
  readonly elements: readonly ProgramElement[];
}

const CONSTRUCTOR_COMMANDS: ReadonlyMap<number, ConstructorKind> = new Map<number, ConstructorKind>([
  [Command.ConstructorArray, ExpressionKind.ConstructorArray],
  [Command.ConstructorArrayCast, ExpressionKind.ConstructorArrayCast],
  [Command.ConstructorCompound, ExpressionKind.ConstructorCompound],
  [Command.ConstructorCompoundCast, ExpressionKind.ConstructorCompoundCast],
  [Command.ConstructorDiagonalMatrix, ExpressionKind.ConstructorDiagonalMatrix],
  [Command.ConstructorMatrixResize, ExpressionKind.ConstructorMatrixResize],
  [Command.ConstructorScalarCast, ExpressionKind.ConstructorScalarCast],
  [Command.ConstructorSplat, ExpressionKind.ConstructorSplat],
  [Command.ConstructorStruct, ExpressionKind.ConstructorStruct],
]);

function isBlockKind(value: number): value is BlockKind {
  return value === BlockKind.Unbraced || value === BlockKind.Braced ||
    value === BlockKind.CompoundStatement;
}

function isFieldAccessOwnerKind(value: number): value is FieldAccessOwnerKind {
  return value === FieldAccessOwnerKind.Default ||
    value === FieldAccessOwnerKind.AnonymousInterfaceBlock;
}

function isVariableRefKind(value: number): value is VariableRefKind {
  return Number.isInteger(value) && value >= VariableRefKind.Read &&
    value <= VariableRefKind.Pointer;
}

/**
 * One decode session over one buffer.
 *
 * A session is single-use: construct it over the bytes, call program() or module(), then
 * finish() to check the buffer was consumed exactly.
 */
export class Rehydrator {
  private types: BuiltinTypes;
  private cursor: ByteCursor;
  private strings: StringTable;
  private symbolsById: Map<number, ShaderSymbol> = new Map();
  /** Ids registered since the innermost scope opened by withSymbolTable */
  private scopeIds: number[] = [];
  /** Table new symbols are owned by and names are looked up from */
  private current: SymbolTable;
  private settings: ProgramSettings;
  private trace: Writer | null;
  private verifyConsumption: boolean;

  /**
   * Read the stream header.
   * @param symbols is the builtin table the decode starts from
   * @throws IncompatibleVersionError if the stream has a different format version
   */
  constructor(types: BuiltinTypes, data: Uint8Array, symbols: SymbolTable,
              options: RehydrateOptions = {}) {
    if (!symbols.isBuiltin) {
      throw new LowlevelError('Rehydration must start from a builtin symbol table');
    }
    this.types = types;
    this.current = symbols;
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.trace = options.trace ?? (REHYDRATE_DEBUG ? new ConsoleWriter() : null);
    this.verifyConsumption = options.verifyConsumption ?? true;
    this.cursor = new ByteCursor(data);
    const version = this.cursor.readU16();
    if (version !== FORMAT_VERSION) {
      throw new IncompatibleVersionError(FORMAT_VERSION, version);
    }
    this.strings = new StringTable(this.cursor);
  }

  /** The table symbols are currently decoded into */
  getCurrentSymbolTable(): SymbolTable { return this.current; }

  /** Check the full consumption postcondition, unless it was turned off */
  finish(): void {
    if (this.verifyConsumption) this.cursor.verifyConsumed();
  }

  private corrupt(msg: string, offset: number): CorruptStreamError {
    return new CorruptStreamError(msg, offset);
  }

  private traceLine(s: string): void {
    if (this.trace !== null) this.trace.write(s + '\n');
  }

  private readBool(): boolean {
    return this.cursor.readU8() !== 0;
  }

  private readString(): string {
    return this.strings.get(this.cursor.readU16());
  }

  private addSymbol(id: number, sym: ShaderSymbol, offset: number): void {
    if (id === BUILTIN_SYMBOL || this.symbolsById.has(id)) {
      throw this.corrupt('Symbol id ' + id + ' is already in use', offset);
    }
    this.symbolsById.set(id, sym);
    this.scopeIds.push(id);
  }

  // =========================================================================
  // Layout and modifiers
  // =========================================================================

  layout(): Layout {
    const offset = this.cursor.getPosition();
    const command = this.cursor.readU8();
    switch (command) {
      case Command.BuiltinLayout:
        return builtinLayout(this.cursor.readS16());
      case Command.DefaultLayout:
        return DEFAULT_LAYOUT;
      case Command.Layout: {
        const flags = this.cursor.readU32();
        const location = this.cursor.readS8();
        const layoutOffset = this.cursor.readS16();
        const binding = this.cursor.readS16();
        const index = this.cursor.readS8();
        const set = this.cursor.readS8();
        const builtin = this.cursor.readS16();
        const inputAttachmentIndex = this.cursor.readS8();
        return {
          flags, location, offset: layoutOffset, binding, index, set, builtin, inputAttachmentIndex,
        };
      }
      default:
        throw this.corrupt('Unsupported layout command ' + command, offset);
    }
  }

  modifiers(): Modifiers {
    const offset = this.cursor.getPosition();
    const command = this.cursor.readU8();
    switch (command) {
      case Command.DefaultModifiers:
        return DEFAULT_MODIFIERS;
      case Command.Modifiers8Bit: {
        const layout = this.layout();
        return { layout, flags: this.cursor.readU8() };
      }
      case Command.Modifiers: {
        const layout = this.layout();
        return { layout, flags: this.cursor.readS32() };
      }
      default:
        throw this.corrupt('Unsupported modifiers command ' + command, offset);
    }
  }

  // =========================================================================
  // Symbols
  // =========================================================================

  /** Decode one symbol, creating it in the current table unless it is a reference */
  symbol(): ShaderSymbol {
    const offset = this.cursor.getPosition();
    const command = this.cursor.readU8();
    switch (command) {
      case Command.ArrayType: {
        const id = this.cursor.readU16();
        const componentType = this.type();
        const count = this.cursor.readS8();
        const result = this.current.takeOwnershipOfSymbol(Type.makeArray(componentType, count));
        this.addSymbol(id, result, offset);
        return result;
      }
      case Command.FunctionDeclaration: {
        const id = this.cursor.readU16();
        const modifiers = this.modifiers();
        const name = this.readString();
        const parameterCount = this.cursor.readU8();
        const parameters: Variable[] = [];
        for (let i = 0; i < parameterCount; ++i) {
          const paramOffset = this.cursor.getPosition();
          const param = this.symbol();
          if (!(param instanceof Variable)) {
            throw this.corrupt('Parameter ' + i + " of '" + name + "' is not a variable", paramOffset);
          }
          parameters.push(param);
        }
        const returnType = this.type();
        const result = this.current.takeOwnershipOfSymbol(new FunctionDeclaration(modifiers, name,
          parameters, returnType, this.current.isBuiltin));
        this.addSymbol(id, result, offset);
        return result;
      }
      case Command.Field: {
        const owner = this.variableRef();
        const index = this.cursor.readU8();
        if (index >= owner.type.fields.length) {
          throw this.corrupt("Variable '" + owner.name + "' has no field " + index, offset);
        }
        return this.current.takeOwnershipOfSymbol(new Field(owner, index));
      }
      case Command.StructType: {
        const id = this.cursor.readU16();
        const name = this.readString();
        const fieldCount = this.cursor.readU8();
        const fields: StructField[] = [];
        for (let i = 0; i < fieldCount; ++i) {
          const modifiers = this.modifiers();
          const fieldName = this.readString();
          const type = this.type();
          fields.push({ modifiers, name: fieldName, type });
        }
        const interfaceBlock = this.readBool();
        const result = this.current.takeOwnershipOfSymbol(Type.makeStruct(name, fields,
          interfaceBlock));
        this.addSymbol(id, result, offset);
        return result;
      }
      case Command.SymbolRef:
        return this.possiblyBuiltinSymbolRef();
      case Command.Variable: {
        const id = this.cursor.readU16();
        const modifiers = this.modifiers();
        const name = this.readString();
        const type = this.type();
        const storageOffset = this.cursor.getPosition();
        const storage = this.cursor.readU8();
        if (!isVariableStorage(storage)) {
          throw this.corrupt('Unsupported variable storage ' + storage, storageOffset);
        }
        const result = this.current.takeOwnershipOfSymbol(new Variable(modifiers, name, type,
          this.current.isBuiltin, storage));
        this.addSymbol(id, result, offset);
        return result;
      }
      default:
        throw this.corrupt('Unsupported symbol command ' + command, offset);
    }
  }

  /** Decode a symbol that must be a type */
  type(): Type {
    const offset = this.cursor.getPosition();
    const sym = this.symbol();
    if (!(sym instanceof Type)) {
      throw this.corrupt("Symbol '" + sym.name + "' is not a type", offset);
    }
    return sym;
  }

  /** A symbol already decoded in this session, by id */
  symbolRef(): ShaderSymbol {
    const offset = this.cursor.getPosition();
    const id = this.cursor.readU16();
    const sym = this.symbolsById.get(id);
    if (sym === undefined) {
      throw this.corrupt('Reference to unknown symbol id ' + id, offset);
    }
    return sym;
  }

  /** A symbol by id, or by name through the current scope chain when the id is the sentinel */
  possiblyBuiltinSymbolRef(): ShaderSymbol {
    const offset = this.cursor.getPosition();
    const id = this.cursor.readU16();
    if (id !== BUILTIN_SYMBOL) {
      const sym = this.symbolsById.get(id);
      if (sym === undefined) {
        throw this.corrupt('Reference to unknown symbol id ' + id, offset);
      }
      return sym;
    }
    const name = this.readString();
    const sym = this.current.find(name);
    if (sym === null) {
      throw this.corrupt("Symbol '" + name + "' is missing", offset);
    }
    return sym;
  }

  private variableRef(): Variable {
    const offset = this.cursor.getPosition();
    const sym = this.symbolRef();
    if (!(sym instanceof Variable)) {
      throw this.corrupt("Symbol '" + sym.name + "' is not a variable", offset);
    }
    return sym;
  }

  private functionRef(): FunctionDeclaration {
    const offset = this.cursor.getPosition();
    const sym = this.symbolRef();
    if (!(sym instanceof FunctionDeclaration)) {
      throw this.corrupt("Symbol '" + sym.name + "' is not a function", offset);
    }
    return sym;
  }

  // =========================================================================
  // Symbol tables
  // =========================================================================

  /**
   * Decode a symbol table command. A new table becomes the current table and is returned;
   * a Void command leaves the current table alone and returns null.
   */
  symbolTable(): SymbolTable | null {
    const offset = this.cursor.getPosition();
    const command = this.cursor.readU8();
    if (command === Command.Void) return null;
    if (command !== Command.SymbolTable) {
      throw this.corrupt('Unsupported symbol table command ' + command, offset);
    }
    const builtin = this.readBool();
    const ownedCount = this.cursor.readU16();
    const table = new SymbolTable(this.current, builtin);
    this.current = table;
    const owned: ShaderSymbol[] = [];
    for (let i = 0; i < ownedCount; ++i) {
      const sym = this.symbol();
      owned.push(sym);
      this.traceLine(sym.description());
    }
    const symbolCount = this.cursor.readU16();
    for (let i = 0; i < symbolCount; ++i) {
      const entryOffset = this.cursor.getPosition();
      const index = this.cursor.readU16();
      let sym: ShaderSymbol;
      if (index !== BUILTIN_SYMBOL) {
        if (index >= owned.length) {
          throw this.corrupt('Symbol table entry ' + index + ' is out of range', entryOffset);
        }
        sym = owned[index];
        this.traceLine(sym.description());
      } else {
        const name = this.readString();
        const found = table.getRoot().find(name);
        if (found === null) {
          throw this.corrupt("Builtin symbol '" + name + "' is missing", entryOffset);
        }
        sym = found;
        this.traceLine('(builtin symbol) ' + sym.description());
      }
      if (!table.addWithoutOwnership(sym)) {
        throw this.corrupt("Symbol name '" + sym.name + "' is already in use", entryOffset);
      }
    }
    return table;
  }

  /**
   * Decode a symbol table command, run `fn` with the resulting table current, then restore the
   * table that was current before, whether `fn` (or the table decode) succeeds or not.
   * Ids registered while a new table is current are dropped when it closes.
   */
  withSymbolTable<T>(fn: () => T): T {
    const saved = this.current;
    const outerIds = this.scopeIds;
    const ids: number[] = [];
    this.scopeIds = ids;
    try {
      // No new table: symbols decoded here belong to the enclosing scope
      if (this.symbolTable() === null) this.scopeIds = outerIds;
      return fn();
    } finally {
      for (const id of ids) this.symbolsById.delete(id);
      this.scopeIds = outerIds;
      this.current = saved;
    }
  }

  // =========================================================================
  // Expressions
  // =========================================================================

  private requiredExpression(what: string): Expression {
    const offset = this.cursor.getPosition();
    const expr = this.expression();
    if (expr === null) throw this.corrupt('Missing ' + what, offset);
    return expr;
  }

  /** A u8 count followed by that many expressions, none of them absent */
  expressionArray(): Expression[] {
    const count = this.cursor.readU8();
    const result: Expression[] = [];
    for (let i = 0; i < count; ++i) {
      result.push(this.requiredExpression('argument ' + i));
    }
    return result;
  }

  private operator(): OperatorKind {
    const offset = this.cursor.getPosition();
    const op = this.cursor.readU8();
    if (!isOperatorKind(op)) throw this.corrupt('Unsupported operator ' + op, offset);
    return op;
  }

  /** Decode one expression; the Void command gives null */
  expression(): Expression | null {
    const offset = this.cursor.getPosition();
    const command = this.cursor.readU8();
    const constructorKind = CONSTRUCTOR_COMMANDS.get(command);
    if (constructorKind !== undefined) {
      const type = this.type();
      const args = this.expressionArray();
      if (isSingleArgumentConstructor(constructorKind) && args.length !== 1) {
        throw this.corrupt(type.name + ' constructor takes exactly one argument, found ' +
          args.length, offset);
      }
      return { kind: constructorKind, type, args };
    }
    switch (command) {
      case Command.Binary: {
        const left = this.requiredExpression('left operand');
        const op = this.operator();
        const right = this.requiredExpression('right operand');
        const type = binaryResultType(this.types, left.type, op, right.type);
        if (type === null) {
          throw this.corrupt("Operands '" + left.type.name + "' and '" + right.type.name +
            "' do not combine", offset);
        }
        return { kind: ExpressionKind.Binary, type, left, op, right };
      }
      case Command.BoolLiteral:
        return { kind: ExpressionKind.BoolLiteral, type: this.types.bool, value: this.readBool() };
      case Command.FieldAccess: {
        const base = this.requiredExpression('field owner');
        const fieldIndex = this.cursor.readU8();
        const ownerKind = this.cursor.readU8();
        const type = fieldAccessType(base.type, fieldIndex);
        if (type === null) {
          throw this.corrupt("Type '" + base.type.name + "' has no field " + fieldIndex, offset);
        }
        if (!isFieldAccessOwnerKind(ownerKind)) {
          throw this.corrupt('Unsupported field access kind ' + ownerKind, offset);
        }
        return { kind: ExpressionKind.FieldAccess, type, base, fieldIndex, ownerKind };
      }
      case Command.FloatLiteral: {
        const type = this.type();
        const bits = this.cursor.readS32();
        return { kind: ExpressionKind.FloatLiteral, type, value: floatFromBits(bits), bits };
      }
      case Command.FunctionCall: {
        const type = this.type();
        const refOffset = this.cursor.getPosition();
        const sym = this.possiblyBuiltinSymbolRef();
        if (!(sym instanceof FunctionDeclaration)) {
          throw this.corrupt("Symbol '" + sym.name + "' is not a function", refOffset);
        }
        const args = this.expressionArray();
        const candidates = overloadCandidates(sym, this.current.findOverloads(sym.name));
        const best = findBestFunctionForCall(candidates, args, type);
        if (best === null) {
          throw this.corrupt("No overload of '" + sym.name + "' takes (" +
            args.map(a => a.type.name).join(', ') + ')', offset);
        }
        return { kind: ExpressionKind.FunctionCall, type, function: best, args };
      }
      case Command.Index: {
        const base = this.requiredExpression('indexed value');
        const index = this.requiredExpression('index');
        const type = indexResultType(this.types, base.type);
        if (type === null) {
          throw this.corrupt("Type '" + base.type.name + "' cannot be indexed", offset);
        }
        return { kind: ExpressionKind.Index, type, base, index };
      }
      case Command.IntLiteral: {
        const type = this.type();
        const value = type.isUnsigned() ? this.cursor.readU32() : this.cursor.readS32();
        return { kind: ExpressionKind.IntLiteral, type, value };
      }
      case Command.Postfix: {
        const op = this.operator();
        const operand = this.requiredExpression('operand');
        return { kind: ExpressionKind.Postfix, type: operand.type, op, operand };
      }
      case Command.Prefix: {
        const op = this.operator();
        const operand = this.requiredExpression('operand');
        const type = op === OperatorKind.LOGICALNOT ? this.types.bool : operand.type;
        return { kind: ExpressionKind.Prefix, type, op, operand };
      }
      case Command.Setting:
        return this.setting(offset);
      case Command.Swizzle: {
        const base = this.requiredExpression('swizzle base');
        const count = this.cursor.readU8();
        const components: number[] = [];
        for (let i = 0; i < count; ++i) {
          const c = this.cursor.readU8();
          if (c > 3 && c !== SWIZZLE_ZERO && c !== SWIZZLE_ONE) {
            throw this.corrupt('Unsupported swizzle component ' + c, offset);
          }
          components.push(c);
        }
        const type = swizzleResultType(this.types, base.type, count);
        if (type === null) {
          throw this.corrupt("Type '" + base.type.name + "' cannot be swizzled", offset);
        }
        return { kind: ExpressionKind.Swizzle, type, base, components };
      }
      case Command.Ternary: {
        const test = this.requiredExpression('ternary test');
        const ifTrue = this.requiredExpression('ternary true value');
        const ifFalse = this.requiredExpression('ternary false value');
        return { kind: ExpressionKind.Ternary, type: ifTrue.type, test, ifTrue, ifFalse };
      }
      case Command.VariableReference: {
        const sym = this.possiblyBuiltinSymbolRef();
        if (!(sym instanceof Variable)) {
          throw this.corrupt("Symbol '" + sym.name + "' is not a variable", offset);
        }
        const refKind = this.cursor.readU8();
        if (!isVariableRefKind(refKind)) {
          throw this.corrupt('Unsupported variable reference kind ' + refKind, offset);
        }
        return { kind: ExpressionKind.VariableReference, type: sym.type, variable: sym, refKind };
      }
      case Command.Void:
        return null;
      default:
        throw this.corrupt('Unsupported expression command ' + command, offset);
    }
  }

  /** A capability setting, folded into a literal when the settings ask for it */
  private setting(offset: number): Expression {
    const name = this.readString();
    const type = settingType(this.types, name);
    if (type === null) {
      throw this.corrupt("Unknown setting 'sk_Caps." + name + "'", offset);
    }
    const caps = this.settings.caps;
    if (this.settings.replaceSettings && caps !== null) {
      const value = settingValue(caps, name);
      if (value !== null) {
        // The folded literal keeps the setting's type
        if (type.isBoolean()) {
          return {
            kind: ExpressionKind.BoolLiteral, type,
            value: typeof value === 'boolean' ? value : value !== 0,
          };
        }
        return { kind: ExpressionKind.IntLiteral, type, value: Number(value) };
      }
    }
    return { kind: ExpressionKind.Setting, type, name };
  }

  // =========================================================================
  // Statements
  // =========================================================================

  private requiredStatement(what: string): Statement {
    const offset = this.cursor.getPosition();
    const stmt = this.statement();
    if (stmt === null) throw this.corrupt('Missing ' + what, offset);
    return stmt;
  }

  /** Decode one statement; the Void command gives null */
  statement(): Statement | null {
    const offset = this.cursor.getPosition();
    const command = this.cursor.readU8();
    switch (command) {
      case Command.Block:
        return this.withSymbolTable((): Statement => {
          const count = this.cursor.readU8();
          const statements: Statement[] = [];
          for (let i = 0; i < count; ++i) {
            const stmt = this.statement();
            if (stmt !== null) statements.push(stmt);
          }
          const blockKind = this.cursor.readU8();
          if (!isBlockKind(blockKind)) {
            throw this.corrupt('Unsupported block kind ' + blockKind, offset);
          }
          return { kind: StatementKind.Block, statements, blockKind, symbols: this.current };
        });
      case Command.Break:
        return { kind: StatementKind.Break };
      case Command.Continue:
        return { kind: StatementKind.Continue };
      case Command.Discard:
        return { kind: StatementKind.Discard };
      case Command.Do: {
        const body = this.statement();
        const test = this.requiredExpression('loop test');
        return { kind: StatementKind.Do, body, test };
      }
      case Command.ExpressionStatement:
        return { kind: StatementKind.Expression, expression: this.requiredExpression('expression') };
      case Command.For:
        return this.withSymbolTable((): Statement => {
          const initializer = this.statement();
          const test = this.expression();
          const next = this.expression();
          const body = this.statement();
          const unrollInfo = getLoopUnrollInfo(initializer, test, next, body);
          return {
            kind: StatementKind.For, initializer, test, next, body, unrollInfo,
            symbols: this.current,
          };
        });
      case Command.If: {
        const isStatic = this.readBool();
        const test = this.requiredExpression('if test');
        const ifTrue = this.statement();
        const ifFalse = this.statement();
        return { kind: StatementKind.If, isStatic, test, ifTrue, ifFalse };
      }
      case Command.Nop:
        return { kind: StatementKind.Nop };
      case Command.Return:
        return { kind: StatementKind.Return, expression: this.expression() };
      case Command.Switch: {
        const isStatic = this.readBool();
        return this.withSymbolTable((): Statement => {
          const value = this.requiredExpression('switch value');
          const caseCount = this.cursor.readU8();
          const cases: SwitchCase[] = [];
          for (let i = 0; i < caseCount; ++i) {
            const isDefault = this.readBool();
            const caseValue = isDefault ? 0 : this.cursor.readS32();
            const statement = this.statement();
            cases.push({ kind: StatementKind.SwitchCase, isDefault, value: caseValue, statement });
          }
          return { kind: StatementKind.Switch, isStatic, value, cases, symbols: this.current };
        });
      }
      case Command.VarDeclaration: {
        const variable = this.variableRef();
        const baseType = this.type();
        const arraySize = this.cursor.readU8();
        const value = this.expression();
        return { kind: StatementKind.VarDeclaration, variable, baseType, arraySize, value };
      }
      case Command.Void:
        return null;
      default:
        throw this.corrupt('Unsupported statement command ' + command, offset);
    }
  }

  // =========================================================================
  // Elements
  // =========================================================================

  /** Decode one program element; ElementsComplete gives null */
  element(): ProgramElement | null {
    const offset = this.cursor.getPosition();
    const command = this.cursor.readU8();
    switch (command) {
      case Command.FunctionDefinition: {
        const declaration = this.functionRef();
        const body = this.requiredStatement('function body');
        return {
          kind: ProgramElementKind.FunctionDefinition, declaration, body,
          builtin: this.current.isBuiltin,
        };
      }
      case Command.FunctionPrototype:
        // Builtin prototypes are never written
        return { kind: ProgramElementKind.FunctionPrototype, declaration: this.functionRef(),
          builtin: false };
      case Command.GlobalVar: {
        const declaration = this.requiredStatement('global variable declaration');
        if (declaration.kind !== StatementKind.VarDeclaration) {
          throw this.corrupt('Global variable element does not hold a declaration', offset);
        }
        return { kind: ProgramElementKind.GlobalVar, declaration };
      }
      case Command.InterfaceBlock: {
        const variable = this.symbol();
        if (!(variable instanceof Variable)) {
          throw this.corrupt("Interface block symbol '" + variable.name + "' is not a variable",
            offset);
        }
        const typeName = this.readString();
        const instanceName = this.readString();
        const arraySize = this.cursor.readU8();
        return { kind: ProgramElementKind.InterfaceBlock, variable, typeName, instanceName,
          arraySize };
      }
      case Command.StructDefinition: {
        const type = this.symbol();
        if (!(type instanceof Type)) {
          throw this.corrupt("Struct definition symbol '" + type.name + "' is not a type", offset);
        }
        return { kind: ProgramElementKind.StructDefinition, type };
      }
      case Command.SharedFunction: {
        const count = this.cursor.readU8();
        for (let i = 0; i < count; ++i) {
          if (!(this.symbol() instanceof Variable)) {
            throw this.corrupt('Shared function parameter ' + i + ' is not a variable', offset);
          }
        }
        if (!(this.symbol() instanceof FunctionDeclaration)) {
          throw this.corrupt('Shared function does not declare a function', offset);
        }
        const result = this.element();
        if (result === null || result.kind !== ProgramElementKind.FunctionDefinition) {
          throw this.corrupt('Shared function is not followed by its definition', offset);
        }
        return result;
      }
      case Command.ElementsComplete:
        return null;
      default:
        throw this.corrupt('Unsupported element command ' + command, offset);
    }
  }

  /** The Elements command, then every element up to ElementsComplete */
  elements(): ProgramElement[] {
    const offset = this.cursor.getPosition();
    const command = this.cursor.readU8();
    if (command !== Command.Elements) {
      throw this.corrupt('Expected element list, found command ' + command, offset);
    }
    const result: ProgramElement[] = [];
    for (let elem = this.element(); elem !== null; elem = this.element()) {
      result.push(elem);
    }
    return result;
  }

  // =========================================================================
  // Programs and modules
  // =========================================================================

  /**
   * Decode a complete program against the builtin module for its kind.
   */
  program(modules: ModuleSource): ProgramUnit {
    const offset = this.cursor.getPosition();
    const command = this.cursor.readU8();
    if (command !== Command.Program) {
      throw this.corrupt('Expected program, found command ' + command, offset);
    }
    const kindOffset = this.cursor.getPosition();
    const kind = this.cursor.readU8();
    if (!isProgramKind(kind)) throw this.corrupt('Unsupported program kind ' + kind, kindOffset);
    const versionOffset = this.cursor.getPosition();
    const requiredVersion = this.cursor.readU8();
    if (!isLanguageVersion(requiredVersion)) {
      throw this.corrupt('Unsupported language version ' + requiredVersion, versionOffset);
    }
    // Decoded programs are never held to a version limit
    const config: ProgramConfig = {
      kind, requiredVersion,
      settings: { ...this.settings, maxVersionAllowed: LanguageVersion.k300 },
    };
    this.settings = config.settings;

    const module = modules.moduleForProgramKind(kind);
    this.current = module;
    const symbols = this.symbolTable() ?? new SymbolTable(module, false);
    this.current = symbols;
    const elements = this.elements();
    const flags = this.cursor.readU8();
    this.current = module;
    return new ProgramUnit(config, symbols, elements, {
      useFlipRTUniform: (flags & ProgramInputFlag.useFlipRTUniform) !== 0,
    });
  }

  /**
   * Decode a builtin module: its symbol table, then its element list.
   * The new table's parent is the table this session started from.
   */
  module(): RehydratedModule {
    const parent = this.current;
    const symbols = this.symbolTable() ?? new SymbolTable(parent, true);
    this.current = symbols;
    const elements = this.elements();
    this.current = parent;
    return { symbols, elements };
  }
}

/**
 * Rehydrate a program stream against the builtin modules of `modules`.
 * @throws IncompatibleVersionError, CorruptStreamError or IncompleteConsumptionError
 */
export function rehydrateProgram(data: Uint8Array, modules: ModuleSource,
                                 options: RehydrateOptions = {}): ProgramUnit {
  const rehydrator = new Rehydrator(modules.types, data, modules.getRoot(), options);
  const program = rehydrator.program(modules);
  rehydrator.finish();
  return program;
}

/**
 * Rehydrate a builtin module stream whose table becomes a child of `parent`.
 * @throws IncompatibleVersionError, CorruptStreamError or IncompleteConsumptionError
 */
export function rehydrateModule(data: Uint8Array, types: BuiltinTypes, parent: SymbolTable,
                                options: RehydrateOptions = {}): RehydratedModule {
  const rehydrator = new Rehydrator(types, data, parent, options);
  const result = rehydrator.module();
  rehydrator.finish();
  return result;
}
