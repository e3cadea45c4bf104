/**
 * @file writer.ts
 * @description Sinks for the symbol trace.
 */

/** Receives trace text; each call carries one or more complete lines */
export interface Writer {
  write(s: string): void;
}

/** The default trace sink when REHYDRATE_DEBUG is on */
export class ConsoleWriter implements Writer {
  write(s: string): void {
    process.stdout.write(s);
  }
}
