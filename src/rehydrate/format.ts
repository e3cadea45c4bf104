/**
 * @file format.ts
 * @description Constants of the dehydrated stream format.
 */

/** Version written at the head of every stream this decoder understands */
export const FORMAT_VERSION = 9;

/** Symbol id meaning "look the symbol up by name"; a string follows */
export const BUILTIN_SYMBOL = 0xFFFF;

/**
 * Command tags. Every structural decision point in a stream starts with one of these as a `u8`.
 * Tags are shared across layout, modifiers, symbol, statement, expression and element positions;
 * each position accepts only its own subset.
 */
export enum Command {
  ArrayType = 0,
  Binary = 1,
  Block = 2,
  BoolLiteral = 3,
  Break = 4,
  BuiltinLayout = 5,
  ConstructorArray = 6,
  ConstructorArrayCast = 7,
  ConstructorCompound = 8,
  ConstructorCompoundCast = 9,
  ConstructorDiagonalMatrix = 10,
  ConstructorMatrixResize = 11,
  ConstructorScalarCast = 12,
  ConstructorSplat = 13,
  ConstructorStruct = 14,
  Continue = 15,
  DefaultLayout = 16,
  DefaultModifiers = 17,
  Discard = 18,
  Do = 19,
  Elements = 20,
  ElementsComplete = 21,
  ExpressionStatement = 22,
  Field = 23,
  FieldAccess = 24,
  FloatLiteral = 25,
  For = 26,
  FunctionCall = 27,
  FunctionDeclaration = 28,
  FunctionDefinition = 29,
  FunctionPrototype = 30,
  GlobalVar = 31,
  If = 32,
  Index = 33,
  InterfaceBlock = 34,
  IntLiteral = 35,
  Layout = 36,
  Modifiers8Bit = 37,
  Modifiers = 38,
  Nop = 39,
  Postfix = 40,
  Prefix = 41,
  Program = 42,
  Return = 43,
  Setting = 44,
  SharedFunction = 45,
  StructDefinition = 46,
  StructType = 47,
  Switch = 48,
  Swizzle = 49,
  SymbolRef = 50,
  SymbolTable = 51,
  Ternary = 52,
  VarDeclaration = 53,
  Variable = 54,
  VariableReference = 55,
  Void = 56,
}
