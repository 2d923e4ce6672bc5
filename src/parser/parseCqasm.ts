import { resolveParseOptions, type ParseOptions } from "./options.js";
import { ParseHelper, UNKNOWN_FILENAME, type ParseInput } from "./parseHelper.js";
import type { ParseResult } from "./parseResult.js";

/**
 * Parses the file at `filename`. A file that cannot be opened yields a result
 * with exactly one error and no root.
 */
export function parseFile(filename: string, options?: ParseOptions): ParseResult;
/**
 * Parses from a descriptor the caller opened. The descriptor is read to its
 * end but not closed.
 */
export function parseFile(fd: number, filename?: string, options?: ParseOptions): ParseResult;
export function parseFile(
  source: string | number,
  filenameOrOptions?: string | ParseOptions,
  options?: ParseOptions
): ParseResult {
  if (typeof source === "number") {
    const filename = typeof filenameOrOptions === "string" ? filenameOrOptions : UNKNOWN_FILENAME;
    return runParse({ kind: "descriptor", fd: source, filename }, options);
  }
  const resolved = typeof filenameOrOptions === "object" ? filenameOrOptions : options;
  return runParse({ kind: "path", filename: source }, resolved);
}

/**
 * Parses in-memory text. `filename` only shows up in diagnostics and source
 * locations.
 */
export function parseString(
  data: string,
  filename: string = UNKNOWN_FILENAME,
  options?: ParseOptions
): ParseResult {
  return runParse({ kind: "string", data, filename }, options);
}

function runParse(input: ParseInput, options: ParseOptions | undefined): ParseResult {
  const helper = new ParseHelper(input, resolveParseOptions(options));
  try {
    if (helper.construct()) {
      helper.parse();
    }
    return helper.finish();
  } finally {
    helper.destroy();
  }
}
