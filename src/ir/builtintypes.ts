/**
 * @file builtintypes.ts
 * @description The catalogue of builtin types shared by every decoded program.
 */

import { LowlevelError } from '../core/error.js';
import { NumberKind, Type, TypeKind } from './type.js';

const SCALAR_NAMES = ['float', 'half', 'int', 'uint', 'short', 'ushort', 'bool'] as const;
const MATRIX_COMPONENTS = ['float', 'half'] as const;

/**
 * Every builtin type, constructed once per instance.
 *
 * Types are looked up by name; vector and matrix types are named `<scalar><n>` and
 * `<scalar><columns>x<rows>`.
 */
export class BuiltinTypes {
  private byName: Map<string, Type> = new Map();

  readonly void: Type;
  readonly float: Type;
  readonly half: Type;
  readonly int: Type;
  readonly uint: Type;
  readonly short: Type;
  readonly ushort: Type;
  readonly bool: Type;
  readonly floatLiteral: Type;
  readonly intLiteral: Type;

  constructor() {
    this.void = this.add(Type.makeSpecial('void', TypeKind.Void));
    this.float = this.add(Type.makeScalar('float', NumberKind.Float, 10));
    this.half = this.add(Type.makeScalar('half', NumberKind.Float, 9));
    this.int = this.add(Type.makeScalar('int', NumberKind.Signed, 7));
    this.uint = this.add(Type.makeScalar('uint', NumberKind.Unsigned, 7));
    this.short = this.add(Type.makeScalar('short', NumberKind.Signed, 6));
    this.ushort = this.add(Type.makeScalar('ushort', NumberKind.Unsigned, 6));
    this.bool = this.add(Type.makeScalar('bool', NumberKind.Boolean, 0));
    this.floatLiteral = this.add(Type.makeLiteral('$floatLiteral', this.float, 8));
    this.intLiteral = this.add(Type.makeLiteral('$intLiteral', this.int, 5));

    for (const scalarName of SCALAR_NAMES) {
      const scalar = this.require(scalarName);
      for (let n = 2; n <= 4; ++n) {
        this.add(Type.makeVector(scalarName + n, scalar, n));
      }
    }
    for (const scalarName of MATRIX_COMPONENTS) {
      const scalar = this.require(scalarName);
      for (let c = 2; c <= 4; ++c) {
        for (let r = 2; r <= 4; ++r) {
          this.add(Type.makeMatrix(scalarName + c + 'x' + r, scalar, c, r));
        }
      }
    }

    this.addGeneric('$genType', 'float');
    this.addGeneric('$genHType', 'half');
    this.addGeneric('$genIType', 'int');
    this.addGeneric('$genUType', 'uint');
    this.addGeneric('$genBType', 'bool');
    this.add(Type.makeGeneric('$mat', this.squareMatrices('float')));
    this.add(Type.makeGeneric('$hmat', this.squareMatrices('half')));

    for (const name of ['sampler2D', 'samplerExternalOES', 'sampler2DRect', 'sampler']) {
      this.add(Type.makeSpecial(name, TypeKind.Sampler));
    }
    for (const name of ['texture2D', 'readonlyTexture2D', 'writeonlyTexture2D']) {
      this.add(Type.makeSpecial(name, TypeKind.Texture));
    }
    for (const name of ['shader', 'colorFilter', 'blender']) {
      this.add(Type.makeSpecial(name, TypeKind.Other));
    }
  }

  private add(type: Type): Type {
    this.byName.set(type.name, type);
    return type;
  }

  private require(name: string): Type {
    const type = this.byName.get(name);
    if (type === undefined) throw new LowlevelError('Missing builtin type ' + name);
    return type;
  }

  private addGeneric(name: string, scalarName: string): void {
    const types = [scalarName, scalarName + 2, scalarName + 3, scalarName + 4]
      .map(n => this.require(n));
    this.add(Type.makeGeneric(name, types));
  }

  private squareMatrices(scalarName: string): Type[] {
    return [2, 3, 4].map(n => this.require(scalarName + n + 'x' + n));
  }

  /** Look up a builtin type by name */
  find(name: string): Type | null {
    return this.byName.get(name) ?? null;
  }

  /** All builtin types, in construction order */
  all(): IterableIterator<Type> {
    return this.byName.values();
  }

  /**
   * The vector (columns > 1, rows == 1), matrix (rows > 1) or scalar type with the given
   * component type. Returns null when no such builtin exists.
   */
  toCompound(component: Type, columns: number, rows: number): Type | null {
    const scalar = component.resolve();
    if (columns === 1 && rows === 1) return scalar;
    if (rows === 1) return this.find(scalar.name + columns);
    return this.find(scalar.name + columns + 'x' + rows);
  }
}
