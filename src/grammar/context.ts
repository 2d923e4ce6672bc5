import type { ParseResult } from "../parser/parseResult.js";

/** Where the scanner and grammar report diagnostics. */
export interface ErrorSink {
  /** Display name of the input, used in every location. */
  readonly filename: string;
  pushError(message: string): void;
}

/** What the grammar driver sees of the parse helper driving it. */
export interface GrammarContext extends ErrorSink {
  /** Set once the error limit is hit; the driver should stop. */
  readonly aborted: boolean;
  readonly result: ParseResult;
}
