/**
 * @file program.ts
 * @description A fully rehydrated program and the configuration it was compiled under.
 */

import { ProgramElementKind, describeElement } from './element.js';
import type { FunctionDefinition, ProgramElement } from './element.js';
import type { FunctionDeclaration } from './symbol.js';
import type { SymbolTable } from './symboltable.js';

/** Kinds of program. The numeric values are part of the dehydrated format. */
export enum ProgramKind {
  Fragment = 0,
  Vertex = 1,
  Compute = 2,
  RuntimeColorFilter = 3,
  RuntimeShader = 4,
  RuntimeBlender = 5,
  Generic = 6,
}

export function isProgramKind(value: number): value is ProgramKind {
  return Number.isInteger(value) && value >= ProgramKind.Fragment && value <= ProgramKind.Generic;
}

/** Shading language versions. The numeric values are part of the dehydrated format. */
export enum LanguageVersion {
  k100 = 0,
  k300 = 1,
}

export function isLanguageVersion(value: number): value is LanguageVersion {
  return value === LanguageVersion.k100 || value === LanguageVersion.k300;
}

/** Capability values keyed by setting name (the part after `sk_Caps.`) */
export type ShaderCaps = Readonly<Record<string, boolean | number>>;

export interface ProgramSettings {
  /** Highest language version the program may use */
  readonly maxVersionAllowed: LanguageVersion;
  /** Fold `sk_Caps.*` settings into literals using `caps` while decoding */
  readonly replaceSettings: boolean;
  readonly caps: ShaderCaps | null;
}

export const DEFAULT_SETTINGS: ProgramSettings = Object.freeze({
  maxVersionAllowed: LanguageVersion.k300,
  replaceSettings: false,
  caps: null,
});

export interface ProgramConfig {
  readonly kind: ProgramKind;
  readonly requiredVersion: LanguageVersion;
  readonly settings: ProgramSettings;
}

export interface ProgramInputs {
  readonly useFlipRTUniform: boolean;
}

/** Bits of the program trailer's flags byte */
export const ProgramInputFlag = {
  useFlipRTUniform: 1 << 0,
} as const;

/**
 * The result of rehydrating a program stream. Immutable once built.
 */
export class ProgramUnit {
  readonly config: ProgramConfig;
  /** The program's own scope; its ancestors are the builtin module scopes */
  readonly symbols: SymbolTable;
  readonly elements: readonly ProgramElement[];
  readonly inputs: ProgramInputs;
  private definitions: Map<FunctionDeclaration, FunctionDefinition> = new Map();

  constructor(config: ProgramConfig, symbols: SymbolTable, elements: readonly ProgramElement[],
              inputs: ProgramInputs) {
    this.config = config;
    this.symbols = symbols;
    this.elements = elements;
    this.inputs = inputs;
    for (const elem of elements) {
      if (elem.kind === ProgramElementKind.FunctionDefinition) {
        this.definitions.set(elem.declaration, elem);
      }
    }
  }

  /** The definition bound to a declaration, if this program defines it */
  getDefinition(decl: FunctionDeclaration): FunctionDefinition | null {
    return this.definitions.get(decl) ?? null;
  }

  /** Every element, one per line */
  description(): string {
    return this.elements.map(describeElement).join('\n');
  }
}
