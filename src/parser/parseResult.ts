import type { Root } from "../ast/types.js";
import { CqasmParseError } from "./errors.js";

export interface ParseResult {
  /**
   * Root of the AST, if parsing got far enough to build one. It may be set
   * even when errors were reported, in which case it contains erroneous
   * placeholder nodes.
   */
  root?: Root;
  /** Diagnostics in the order they were detected. */
  readonly errors: string[];
}

export function createParseResult(): ParseResult {
  return { root: undefined, errors: [] };
}

/** A parse succeeded if and only if it reported no errors. */
export function isSuccess(result: ParseResult): boolean {
  return result.errors.length === 0;
}

export function requireRoot(result: ParseResult): Root {
  if (!isSuccess(result)) {
    const [first] = result.errors;
    const more = result.errors.length > 1 ? ` (and ${result.errors.length - 1} more)` : "";
    throw new CqasmParseError(`${first}${more}`, [...result.errors]);
  }
  if (!result.root) {
    throw new CqasmParseError("parse produced no AST", []);
  }
  return result.root;
}
