import { CharStream } from "antlr4ng";

import { isWellFormed } from "../ast/walk.js";
import type { GrammarContext } from "../grammar/context.js";
import { parseProgram, type GrammarDriver } from "../grammar/grammar.js";
import { CqasmScanner } from "../grammar/scanner.js";
import { describeError } from "./errors.js";
import type { ResolvedParseOptions } from "./options.js";
import { createParseResult, type ParseResult } from "./parseResult.js";

export const UNKNOWN_FILENAME = "<unknown>";

/** The one input a helper scans. */
export type ParseInput =
  | { readonly kind: "path"; readonly filename: string }
  | { readonly kind: "descriptor"; readonly fd: number; readonly filename: string }
  | { readonly kind: "string"; readonly data: string; readonly filename: string };

/**
 * Drives one parse: binds the input, owns the scanner while the grammar runs
 * and collects diagnostics. Helpers are not reused; call `destroy()` when
 * done, whatever happened before.
 */
export class ParseHelper implements GrammarContext {
  readonly input: ParseInput;
  readonly filename: string;
  readonly result: ParseResult = createParseResult();

  private readonly options: ResolvedParseOptions;
  private readonly driver: GrammarDriver;
  private scanner: CqasmScanner | undefined;
  /** Descriptor this helper opened itself and therefore has to close. */
  private ownedFd: number | undefined;
  private dropped = 0;
  private limitReached = false;

  constructor(
    input: ParseInput,
    options: ResolvedParseOptions,
    driver: GrammarDriver = parseProgram
  ) {
    this.input = input;
    this.filename = input.filename;
    this.options = options;
    this.driver = driver;
  }

  get aborted(): boolean {
    return this.limitReached;
  }

  /** Number of diagnostics dropped after the error limit was reached. */
  get droppedErrors(): number {
    return this.dropped;
  }

  get hasScanner(): boolean {
    return this.scanner !== undefined;
  }

  /**
   * Binds the input and builds the scanner. On failure one error has been
   * pushed and `parse()` must not be called.
   */
  construct(): boolean {
    const text = this.readInput();
    if (text === undefined) {
      return false;
    }
    try {
      this.scanner = new CqasmScanner(CharStream.fromString(text), this);
    } catch (error) {
      this.pushError(`Failed to construct scanner for ${this.filename}: ${describeError(error)}`);
      return false;
    }
    return true;
  }

  parse(): void {
    const scanner = this.scanner;
    if (!scanner) {
      this.pushError(`Failed to parse ${this.filename}: scanner was not constructed`);
      return;
    }
    const { logger } = this.options;
    logger.debug("Parsing input", { filename: this.filename, mode: this.input.kind });
    try {
      this.driver(scanner, this);
    } catch (error) {
      this.pushError(`Failed to parse ${this.filename}: ${describeError(error)}`);
      return;
    }

    const { root } = this.result;
    if (this.result.errors.length === 0 && (!root || !isWellFormed(root))) {
      logger.error("Grammar reported no errors but left the AST incomplete", {
        filename: this.filename,
        hasRoot: root !== undefined,
      });
      this.pushError("no parse errors returned, but AST is incomplete");
    }
    logger.debug("Parsed input", {
      filename: this.filename,
      errors: this.result.errors.length,
      dropped: this.dropped,
    });
  }

  pushError(message: string): void {
    if (this.limitReached) {
      this.dropped += 1;
      return;
    }
    const { maxErrors, logger } = this.options;
    if (this.result.errors.length >= maxErrors) {
      this.limitReached = true;
      this.dropped += 1;
      this.result.errors.push(`too many errors, giving up after ${maxErrors}`);
      logger.warn("Error limit reached", { filename: this.filename, maxErrors });
      return;
    }
    this.result.errors.push(message);
  }

  finish(): ParseResult {
    return this.result;
  }

  /**
   * Releases the scanner and closes a descriptor opened by `construct()`.
   * Safe to call more than once.
   */
  destroy(): void {
    if (this.scanner) {
      this.scanner.dispose();
      this.scanner = undefined;
    }
    const fd = this.ownedFd;
    if (fd === undefined) {
      return;
    }
    this.ownedFd = undefined;
    try {
      this.options.fileSystem.closeSync(fd);
    } catch (error) {
      this.options.logger.warn("Failed to close input file", {
        filename: this.filename,
        reason: describeError(error),
      });
    }
  }

  private readInput(): string | undefined {
    const { fileSystem } = this.options;
    switch (this.input.kind) {
      case "string":
        return this.input.data;
      case "descriptor":
        return this.readDescriptor(this.input.fd);
      case "path": {
        let fd: number;
        try {
          fd = fileSystem.openSync(this.input.filename, "r");
        } catch (error) {
          this.pushError(`Failed to open input file ${this.filename}: ${describeError(error)}`);
          return undefined;
        }
        this.ownedFd = fd;
        return this.readDescriptor(fd);
      }
    }
  }

  private readDescriptor(fd: number): string | undefined {
    try {
      return this.options.fileSystem.readFileSync(fd, "utf8");
    } catch (error) {
      this.pushError(`Failed to read input file ${this.filename}: ${describeError(error)}`);
      return undefined;
    }
  }
}
