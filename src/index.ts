/**
 * @file index.ts
 * @description Public entry point.
 */

export {
  LowlevelError, IncompatibleVersionError, CorruptStreamError, IncompleteConsumptionError,
} from './core/error.js';
export { enableDebug, disableDebug } from './core/types.js';
export { getLoopUnrollInfo, LOOP_TERMINATION_LIMIT } from './analysis/loopunroll.js';
export type { LoopUnrollInfo } from './analysis/loopunroll.js';
export { visitExpression, visitStatement } from './analysis/visitor.js';
export { ModuleRegistry, makeRootSymbolTable } from './builtins/moduleregistry.js';
export { BuiltinTypes } from './ir/builtintypes.js';
export * from './ir/element.js';
export * from './ir/expression.js';
export { findBestFunctionForCall, callCost, determineFinalTypes } from './ir/functioncall.js';
export * from './ir/modifiers.js';
export * from './ir/operator.js';
export * from './ir/program.js';
export * from './ir/statement.js';
export * from './ir/symbol.js';
export { SymbolTable } from './ir/symboltable.js';
export * from './ir/type.js';
export { BUILTIN_SYMBOL, Command, FORMAT_VERSION } from './rehydrate/format.js';
export { Rehydrator, rehydrateModule, rehydrateProgram } from './rehydrate/rehydrator.js';
export type {
  ModuleSource, RehydrateOptions, RehydratedModule,
} from './rehydrate/rehydrator.js';
export { ConsoleWriter } from './util/writer.js';
export type { Writer } from './util/writer.js';
