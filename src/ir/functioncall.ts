/**
 * @file functioncall.ts
 * @description Overload resolution for function calls.
 */

import { CoercionCost } from './type.js';
import type { Expression } from './expression.js';
import type { FunctionDeclaration } from './symbol.js';
import type { Type } from './type.js';

/** Parameter and return types of a declaration once its generic types are bound */
export interface FinalTypes {
  readonly parameterTypes: readonly Type[];
  readonly returnType: Type;
}

/**
 * Bind the generic types of `decl` against the argument list.
 *
 * All generic parameters share one binding: the first generic parameter picks the first of its
 * coercible types the argument can coerce to (narrowing allowed), and every later generic
 * parameter and a generic return type take the type at the same position.
 * Returns null when the arguments cannot bind the generics, or the counts differ.
 */
export function determineFinalTypes(decl: FunctionDeclaration,
                                    args: readonly Expression[]): FinalTypes | null {
  if (decl.parameters.length !== args.length) return null;
  const parameterTypes: Type[] = [];
  let genericIndex = -1;
  for (let i = 0; i < args.length; ++i) {
    const paramType = decl.parameters[i].type;
    if (!paramType.isGeneric()) {
      parameterTypes.push(paramType);
      continue;
    }
    const candidates = paramType.coercibleTypes;
    if (genericIndex === -1) {
      genericIndex = candidates.findIndex(t => args[i].type.coercionCost(t).isPossible(true));
      if (genericIndex === -1) return null;
    }
    if (genericIndex >= candidates.length) return null;
    parameterTypes.push(candidates[genericIndex]);
  }
  let returnType = decl.returnType;
  if (returnType.isGeneric()) {
    if (genericIndex === -1 || genericIndex >= returnType.coercibleTypes.length) return null;
    returnType = returnType.coercibleTypes[genericIndex];
  }
  return { parameterTypes, returnType };
}

/** Total cost of passing `args` to `decl`; impossible if the call cannot be made */
export function callCost(decl: FunctionDeclaration, args: readonly Expression[]): CoercionCost {
  const types = determineFinalTypes(decl, args);
  if (types === null) return CoercionCost.impossible();
  let total = CoercionCost.free();
  for (let i = 0; i < args.length; ++i) {
    total = total.add(args[i].type.coercionCost(types.parameterTypes[i]));
  }
  return total;
}

/**
 * Pick the overload with the lowest call cost. Between overloads of equal cost, the one whose
 * return type matches `expectedType` wins; otherwise the earliest candidate is kept.
 * Returns null when no candidate can take the arguments.
 */
export function findBestFunctionForCall(candidates: readonly FunctionDeclaration[],
                                        args: readonly Expression[],
                                        expectedType: Type | null = null): FunctionDeclaration | null {
  let best: FunctionDeclaration | null = null;
  let bestCost = CoercionCost.impossible();
  let bestMatchesType = false;
  for (const decl of candidates) {
    const cost = callCost(decl, args);
    if (cost.impossible) continue;
    const types = determineFinalTypes(decl, args);
    const matchesType = expectedType !== null && types !== null &&
      types.returnType.matches(expectedType);
    if (best === null || cost.lessThan(bestCost) ||
        (!bestCost.lessThan(cost) && matchesType && !bestMatchesType)) {
      best = decl;
      bestCost = cost;
      bestMatchesType = matchesType;
    }
  }
  return best;
}

/** The declaration itself first, then every other visible overload */
export function overloadCandidates(decl: FunctionDeclaration,
                                   visible: readonly FunctionDeclaration[]): FunctionDeclaration[] {
  const result = [decl];
  for (const f of visible) {
    if (f !== decl) result.push(f);
  }
  return result;
}
