/**
 * @file operator.ts
 * @description Operator kinds used by binary, prefix and postfix expressions.
 *
 * The numeric values are part of the dehydrated format.
 */

export enum OperatorKind {
  PLUS = 0,
  MINUS = 1,
  STAR = 2,
  SLASH = 3,
  PERCENT = 4,
  SHL = 5,
  SHR = 6,
  LOGICALNOT = 7,
  LOGICALAND = 8,
  LOGICALOR = 9,
  LOGICALXOR = 10,
  BITWISENOT = 11,
  BITWISEAND = 12,
  BITWISEOR = 13,
  BITWISEXOR = 14,
  EQ = 15,
  EQEQ = 16,
  NEQ = 17,
  LT = 18,
  GT = 19,
  LTEQ = 20,
  GTEQ = 21,
  PLUSEQ = 22,
  MINUSEQ = 23,
  STAREQ = 24,
  SLASHEQ = 25,
  PERCENTEQ = 26,
  SHLEQ = 27,
  SHREQ = 28,
  BITWISEANDEQ = 29,
  BITWISEOREQ = 30,
  BITWISEXOREQ = 31,
  PLUSPLUS = 32,
  MINUSMINUS = 33,
  COMMA = 34,
}

const OPERATOR_TEXT: readonly string[] = [
  '+', '-', '*', '/', '%', '<<', '>>', '!', '&&', '||', '^^', '~', '&', '|', '^',
  '=', '==', '!=', '<', '>', '<=', '>=', '+=', '-=', '*=', '/=', '%=', '<<=', '>>=',
  '&=', '|=', '^=', '++', '--', ',',
];

/** Is the raw value a known operator kind */
export function isOperatorKind(value: number): value is OperatorKind {
  return Number.isInteger(value) && value >= 0 && value < OPERATOR_TEXT.length;
}

export function operatorText(op: OperatorKind): string {
  return OPERATOR_TEXT[op];
}

/** True for `=` and every compound assignment */
export function isAssignment(op: OperatorKind): boolean {
  return op === OperatorKind.EQ || (op >= OperatorKind.PLUSEQ && op <= OperatorKind.BITWISEXOREQ);
}

/** Relational and equality operators, which always produce bool */
export function isRelational(op: OperatorKind): boolean {
  return op >= OperatorKind.EQEQ && op <= OperatorKind.GTEQ;
}

export function isLogical(op: OperatorKind): boolean {
  return op === OperatorKind.LOGICALAND || op === OperatorKind.LOGICALOR ||
    op === OperatorKind.LOGICALXOR;
}
