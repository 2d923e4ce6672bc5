import { describe, expect, it, vi } from "vitest";

import type { CqasmScanner } from "../../src/grammar/scanner.js";
import { CqasmScannerError } from "../../src/parser/errors.js";
import {
  DEFAULT_MAX_ERRORS,
  resolveParseOptions,
  type ParseOptions,
} from "../../src/parser/options.js";
import { ParseHelper } from "../../src/parser/parseHelper.js";
import { SilentLogger } from "../../src/logging/logger.js";
import type { Logger } from "../../src/logging/logger.js";
import { SourceLocation } from "../../src/parser/sourceLocation.js";

function stringHelper(
  data: string,
  driver?: ConstructorParameters<typeof ParseHelper>[2],
  options: ParseOptions = {}
): ParseHelper {
  return new ParseHelper(
    { kind: "string", data, filename: "s.cq" },
    resolveParseOptions(options),
    driver
  );
}

function mockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe("ParseHelper", () => {
  it("accumulates errors in the order they are pushed", () => {
    const helper = stringHelper("version 1.0\n");

    helper.pushError("first");
    helper.pushError("second");
    helper.pushError("first");

    expect(helper.finish().errors).toEqual(["first", "second", "first"]);
    expect(helper.aborted).toBe(false);
  });

  it("replaces errors past the limit with one notice", () => {
    const logger = mockLogger();
    const helper = stringHelper("", undefined, { maxErrors: 2, logger });

    for (const message of ["a", "b", "c", "d"]) {
      helper.pushError(message);
    }

    expect(helper.finish().errors).toEqual(["a", "b", "too many errors, giving up after 2"]);
    expect(helper.aborted).toBe(true);
    expect(helper.droppedErrors).toBe(2);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("reports a driver that throws as a parse failure", () => {
    const helper = stringHelper("version 1.0\n", () => {
      throw new Error("boom");
    });

    expect(helper.construct()).toBe(true);
    helper.parse();
    helper.destroy();

    expect(helper.finish().errors).toEqual(["Failed to parse s.cq: boom"]);
    expect(helper.finish().root).toBeUndefined();
  });

  it("flags a driver that reports nothing but builds no tree", () => {
    const logger = mockLogger();
    const helper = stringHelper("version 1.0\n", () => undefined, { logger });

    helper.construct();
    helper.parse();
    helper.destroy();

    expect(helper.finish().errors).toEqual(["no parse errors returned, but AST is incomplete"]);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("flags a tree with placeholders when no error was reported", () => {
    const helper = stringHelper("version 1.0\n", (_scanner, context) => {
      const location = new SourceLocation(context.filename, 1, 1);
      context.result.root = {
        kind: "Root",
        program: { kind: "ErroneousProgram", location },
        location,
      };
    });

    helper.construct();
    helper.parse();

    expect(helper.finish().errors).toEqual(["no parse errors returned, but AST is incomplete"]);
    expect(helper.finish().root?.program.kind).toBe("ErroneousProgram");
  });

  it("leaves errors reported by the driver untouched", () => {
    const helper = stringHelper("version 1.0\n", (_scanner, context) => {
      context.pushError("s.cq:1:1: custom");
    });

    helper.construct();
    helper.parse();

    expect(helper.finish().errors).toEqual(["s.cq:1:1: custom"]);
  });

  it("refuses to parse before the scanner exists", () => {
    const helper = stringHelper("version 1.0\n");

    helper.parse();

    expect(helper.finish().errors).toEqual([
      "Failed to parse s.cq: scanner was not constructed",
    ]);
  });

  it("releases the scanner on destroy and tolerates repeated calls", () => {
    const captured: { scanner?: CqasmScanner } = {};
    const helper = stringHelper("version 1.0\n", (scanner, context) => {
      captured.scanner = scanner;
      context.pushError("stop");
    });

    helper.construct();
    expect(helper.hasScanner).toBe(true);
    helper.parse();
    helper.destroy();
    helper.destroy();

    expect(helper.hasScanner).toBe(false);
    expect(captured.scanner?.disposed).toBe(true);
    expect(() => captured.scanner?.nextToken()).toThrow(CqasmScannerError);
  });

  it("can be destroyed without ever being constructed", () => {
    const helper = stringHelper("version 1.0\n");

    expect(() => helper.destroy()).not.toThrow();
    expect(helper.finish()).toEqual({ root: undefined, errors: [] });
  });
});

describe("resolveParseOptions", () => {
  it("applies defaults", () => {
    const resolved = resolveParseOptions();

    expect(resolved.maxErrors).toBe(DEFAULT_MAX_ERRORS);
    expect(resolved.logger).toBeInstanceOf(SilentLogger);
  });

  it("ignores limits that are not positive integers", () => {
    expect(resolveParseOptions({ maxErrors: 0 }).maxErrors).toBe(DEFAULT_MAX_ERRORS);
    expect(resolveParseOptions({ maxErrors: 2.5 }).maxErrors).toBe(DEFAULT_MAX_ERRORS);
    expect(resolveParseOptions({ maxErrors: 7 }).maxErrors).toBe(7);
  });
});
