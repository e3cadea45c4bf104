/**
 * @file type.ts
 * @description Shader types and the implicit-coercion cost rule used by overload resolution.
 *
 * Builtin types (scalars, vectors, matrices, generics, literal and opaque types) are created once
 * in BuiltinTypes and shared by reference. Array and struct types are created while decoding and
 * are owned by the symbol table that was current at the time.
 */

import { ShaderSymbol, SymbolKind } from './symbol.js';
import type { Modifiers } from './modifiers.js';

export enum TypeKind {
  Void,
  Scalar,
  Vector,
  Matrix,
  Array,
  Struct,
  Generic,
  Literal,
  Sampler,
  Texture,
  Other,
}

export enum NumberKind {
  Float,
  Signed,
  Unsigned,
  Boolean,
  Nonnumeric,
}

/** Array size meaning "no fixed length" */
export const UNSIZED_ARRAY = -1;

export interface StructField {
  readonly modifiers: Modifiers;
  readonly name: string;
  readonly type: Type;
}

// =========================================================================
// CoercionCost
// =========================================================================

/**
 * Cost of converting a value of one type to another.
 *
 * Ordering: free < normal(n) (by n) < any narrowing < impossible. Costs add up over the
 * arguments of a call.
 */
export class CoercionCost {
  readonly normalCost: number;
  readonly narrowingCost: number;
  readonly impossible: boolean;

  private constructor(normalCost: number, narrowingCost: number, impossible: boolean) {
    this.normalCost = normalCost;
    this.narrowingCost = narrowingCost;
    this.impossible = impossible;
  }

  static free(): CoercionCost { return new CoercionCost(0, 0, false); }
  static normal(cost: number): CoercionCost { return new CoercionCost(cost, 0, false); }
  static narrowing(): CoercionCost { return new CoercionCost(0, 1, false); }
  static impossible(): CoercionCost { return new CoercionCost(0, 0, true); }

  isPossible(allowNarrowing: boolean): boolean {
    return !this.impossible && (allowNarrowing || this.narrowingCost === 0);
  }

  add(other: CoercionCost): CoercionCost {
    return new CoercionCost(this.normalCost + other.normalCost,
      this.narrowingCost + other.narrowingCost,
      this.impossible || other.impossible);
  }

  lessThan(other: CoercionCost): boolean {
    if (this.impossible !== other.impossible) return other.impossible;
    if (this.narrowingCost !== other.narrowingCost) return this.narrowingCost < other.narrowingCost;
    return this.normalCost < other.normalCost;
  }
}

// =========================================================================
// Type
// =========================================================================

interface TypeInit {
  typeKind: TypeKind;
  numberKind?: NumberKind;
  priority?: number;
  componentType?: Type | null;
  columns?: number;
  rows?: number;
  fields?: readonly StructField[];
  interfaceBlock?: boolean;
  coercibleTypes?: readonly Type[];
}

export class Type extends ShaderSymbol {
  readonly typeKind: TypeKind;
  readonly numberKind: NumberKind;
  readonly priority: number;
  /** Vector/matrix/array element type, or the underlying scalar of a literal type */
  private readonly component: Type | null;
  /** Vector size, matrix column count, or array size */
  readonly columns: number;
  readonly rows: number;
  readonly fields: readonly StructField[];
  readonly isInterfaceBlock: boolean;
  /** For generic types, the concrete types the generic stands for, in order */
  readonly coercibleTypes: readonly Type[];

  private constructor(name: string, init: TypeInit) {
    super(name);
    this.typeKind = init.typeKind;
    this.numberKind = init.numberKind ?? NumberKind.Nonnumeric;
    this.priority = init.priority ?? -1;
    this.component = init.componentType ?? null;
    this.columns = init.columns ?? 1;
    this.rows = init.rows ?? 1;
    this.fields = init.fields ?? [];
    this.isInterfaceBlock = init.interfaceBlock ?? false;
    this.coercibleTypes = init.coercibleTypes ?? [];
  }

  static makeSpecial(name: string, typeKind: TypeKind.Void | TypeKind.Sampler |
                     TypeKind.Texture | TypeKind.Other): Type {
    return new Type(name, { typeKind });
  }

  static makeScalar(name: string, numberKind: NumberKind, priority: number): Type {
    return new Type(name, { typeKind: TypeKind.Scalar, numberKind, priority });
  }

  /** A type for untyped literals; it resolves to `scalar` wherever a concrete type is needed */
  static makeLiteral(name: string, scalar: Type, priority: number): Type {
    return new Type(name, {
      typeKind: TypeKind.Literal, numberKind: scalar.numberKind, priority, componentType: scalar,
    });
  }

  static makeVector(name: string, componentType: Type, columns: number): Type {
    return new Type(name, {
      typeKind: TypeKind.Vector, numberKind: componentType.numberKind, componentType, columns,
    });
  }

  static makeMatrix(name: string, componentType: Type, columns: number, rows: number): Type {
    return new Type(name, {
      typeKind: TypeKind.Matrix, numberKind: componentType.numberKind, componentType, columns, rows,
    });
  }

  static makeGeneric(name: string, coercibleTypes: readonly Type[]): Type {
    return new Type(name, { typeKind: TypeKind.Generic, coercibleTypes });
  }

  static makeArray(componentType: Type, count: number): Type {
    return new Type(componentType.arrayName(count), {
      typeKind: TypeKind.Array, componentType, columns: count,
    });
  }

  static makeStruct(name: string, fields: readonly StructField[], interfaceBlock: boolean): Type {
    return new Type(name, { typeKind: TypeKind.Struct, fields, interfaceBlock });
  }

  get kind(): SymbolKind { return SymbolKind.Type; }

  description(): string { return this.name; }

  /**
   * Element type of a vector, matrix or array. Scalars are their own component type.
   */
  get componentType(): Type {
    return this.component ?? this;
  }

  /** Number of elements of an array type, or UNSIZED_ARRAY */
  get arraySize(): number { return this.isArray() ? this.columns : 0; }

  isVoid(): boolean { return this.typeKind === TypeKind.Void; }
  isScalar(): boolean { return this.typeKind === TypeKind.Scalar; }
  isLiteral(): boolean { return this.typeKind === TypeKind.Literal; }
  isVector(): boolean { return this.typeKind === TypeKind.Vector; }
  isMatrix(): boolean { return this.typeKind === TypeKind.Matrix; }
  isArray(): boolean { return this.typeKind === TypeKind.Array; }
  isUnsizedArray(): boolean { return this.isArray() && this.columns === UNSIZED_ARRAY; }
  isStruct(): boolean { return this.typeKind === TypeKind.Struct; }
  isGeneric(): boolean { return this.typeKind === TypeKind.Generic; }

  /** Scalar or literal with a numeric kind */
  isNumber(): boolean {
    return (this.isScalar() || this.isLiteral()) &&
      (this.numberKind === NumberKind.Float || this.numberKind === NumberKind.Signed ||
       this.numberKind === NumberKind.Unsigned);
  }

  isFloat(): boolean { return this.numberKind === NumberKind.Float; }
  isSigned(): boolean { return this.numberKind === NumberKind.Signed; }
  isUnsigned(): boolean { return this.numberKind === NumberKind.Unsigned; }
  isInteger(): boolean { return this.isSigned() || this.isUnsigned(); }
  isBoolean(): boolean { return this.numberKind === NumberKind.Boolean; }

  /** The type a literal type stands for; every other type resolves to itself */
  resolve(): Type {
    return this.isLiteral() ? this.componentType : this;
  }

  /** Name of an array of this type with the given count */
  arrayName(count: number): string {
    return count === UNSIZED_ARRAY ? this.name + '[]' : this.name + '[' + count + ']';
  }

  /** Do the two types denote the same type */
  matches(other: Type): boolean {
    return this.resolve().name === other.resolve().name;
  }

  /**
   * Cost of implicitly converting a value of this type to `other`.
   */
  coercionCost(other: Type): CoercionCost {
    if (this.matches(other)) {
      return CoercionCost.free();
    }
    if (this.typeKind === other.typeKind &&
        (this.isVector() || this.isMatrix() || this.isArray())) {
      if (this.isMatrix() && this.rows !== other.rows) return CoercionCost.impossible();
      if (this.columns !== other.columns) return CoercionCost.impossible();
      return this.componentType.coercionCost(other.componentType);
    }
    if (this.isNumber() && other.isNumber()) {
      if (this.isLiteral() && this.isInteger()) {
        return CoercionCost.free();
      }
      if (this.numberKind !== other.numberKind) {
        return CoercionCost.impossible();
      }
      if (other.priority >= this.priority) {
        return CoercionCost.normal(other.priority - this.priority);
      }
      return CoercionCost.narrowing();
    }
    if (this.isGeneric()) {
      for (let i = 0; i < this.coercibleTypes.length; ++i) {
        if (this.coercibleTypes[i].matches(other)) return CoercionCost.normal(i + 1);
      }
    }
    return CoercionCost.impossible();
  }
}
