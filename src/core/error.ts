/**
 * @file error.ts
 * @description Error classes thrown while rehydrating a dehydrated program.
 *
 * Every failure in this package is fatal for the decode that raised it: the stream is an
 * internal cache paired with its serializer, so any inconsistency means the build is broken.
 */

/**
 * The lowest level error generated by the rehydrator.
 *
 * The `explain` field holds the diagnostic text; it duplicates `message` so callers that
 * catch any LowlevelError have one place to read from.
 */
export class LowlevelError extends Error {
  readonly explain: string;

  constructor(s: string) {
    super(s);
    this.name = 'LowlevelError';
    this.explain = s;
  }
}

/** The stream was written by a serializer of a different format version */
export class IncompatibleVersionError extends LowlevelError {
  readonly expected: number;
  readonly found: number;

  constructor(expected: number, found: number) {
    super('Dehydrated data is an unsupported version (current version is ' + expected +
      ', found version ' + found + ')');
    this.name = 'IncompatibleVersionError';
    this.expected = expected;
    this.found = found;
  }
}

/**
 * The stream does not decode: a read ran past the end, a command tag is unknown,
 * a symbol reference resolved to the wrong kind of symbol, or an overload could not be found.
 */
export class CorruptStreamError extends LowlevelError {
  /** Byte offset of the command (or read) that failed */
  readonly offset: number;

  constructor(s: string, offset: number) {
    super(s + ' (at offset ' + offset + ')');
    this.name = 'CorruptStreamError';
    this.offset = offset;
  }
}

/** Decoding finished but the cursor did not land exactly on the end of the buffer */
export class IncompleteConsumptionError extends LowlevelError {
  readonly position: number;
  readonly end: number;

  constructor(position: number, end: number) {
    super('Dehydrated data was not fully consumed: stopped at offset ' + position +
      ' of ' + end);
    this.name = 'IncompleteConsumptionError';
    this.position = position;
    this.end = end;
  }
}
