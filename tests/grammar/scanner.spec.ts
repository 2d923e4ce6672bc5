import { describe, expect, it } from "vitest";
import { CharStream, type Token } from "antlr4ng";

import type { ErrorSink } from "../../src/grammar/context.js";
import { CqasmScanner } from "../../src/grammar/scanner.js";
import { TokenType, tokenDisplayName, unescapeString } from "../../src/grammar/tokens.js";

interface ScanResult {
  readonly tokens: Token[];
  readonly errors: string[];
}

function scan(source: string): ScanResult {
  const errors: string[] = [];
  const sink: ErrorSink = {
    filename: "s.cq",
    pushError: (message) => {
      errors.push(message);
    },
  };
  const scanner = new CqasmScanner(CharStream.fromString(source), sink);
  const tokens: Token[] = [];
  for (;;) {
    const token = scanner.nextToken();
    tokens.push(token);
    if (token.type === TokenType.EOF) {
      break;
    }
  }
  scanner.dispose();
  return { tokens, errors };
}

function types(result: ScanResult): string[] {
  return result.tokens.map((token) => tokenDisplayName(token.type));
}

function texts(result: ScanResult): Array<string | undefined> {
  return result.tokens.map((token) => token.text);
}

describe("CqasmScanner", () => {
  it("scans a version header as a version number", () => {
    const result = scan("version 1.0; qubits 2;");

    expect(types(result)).toEqual([
      "'version'",
      "version number",
      "';'",
      "'qubits'",
      "integer literal",
      "';'",
      "end of file",
    ]);
    expect(texts(result).slice(0, 2)).toEqual(["version", "1.0"]);
    expect(result.errors).toEqual([]);
  });

  it("keeps dotted versions with more than two parts", () => {
    expect(texts(scan("version 1.0.2"))).toEqual(["version", "1.0.2", "<EOF>"]);
  });

  it("tracks lines and columns across newlines and comments", () => {
    const result = scan("h q # hadamard\n  x q");

    const x = result.tokens[3];
    expect(tokenDisplayName(result.tokens[2].type)).toBe("newline");
    expect(x.text).toBe("x");
    expect(x.line).toBe(2);
    expect(x.column).toBe(2);
  });

  it("separates the condition prefix from subtraction", () => {
    expect(types(scan("c-x"))).toEqual(["'c-'", "identifier", "end of file"]);
    expect(types(scan("c-1"))).toEqual([
      "identifier",
      "'-'",
      "integer literal",
      "end of file",
    ]);
  });

  it("distinguishes integers, floats and exponents", () => {
    const result = scan("12 1.5e-3 2e 3.25");

    expect(types(result)).toEqual([
      "integer literal",
      "float literal",
      "integer literal",
      "identifier",
      "float literal",
      "end of file",
    ]);
    expect(texts(result)).toEqual(["12", "1.5e-3", "2", "e", "3.25", "<EOF>"]);
  });

  it("prefers the longest operator spelling", () => {
    expect(texts(scan("** <= || | ="))).toEqual(["**", "<=", "||", "|", "=", "<EOF>"]);
  });

  it("scans string and JSON literals whole", () => {
    const result = scan('"a\\"b" {|{"k": 1}|}');

    expect(types(result)).toEqual(["string literal", "JSON literal", "end of file"]);
    expect(texts(result).slice(0, 2)).toEqual(['"a\\"b"', '{|{"k": 1}|}']);
  });

  it("reports and skips stray characters", () => {
    const result = scan("x $ y");

    expect(texts(result)).toEqual(["x", "y", "<EOF>"]);
    expect(result.errors).toEqual(["s.cq:1:3: unexpected character '$'"]);
  });

  it("reports unterminated literals at their start", () => {
    expect(scan('x "abc').errors).toEqual(["s.cq:1:3: unterminated string literal"]);
    expect(scan("x\n  {|open").errors).toEqual(["s.cq:2:3: unterminated JSON literal"]);
  });

  it("keeps returning end of file", () => {
    const sink: ErrorSink = { filename: "s.cq", pushError: () => undefined };
    const scanner = new CqasmScanner(CharStream.fromString(""), sink);

    expect(scanner.nextToken().type).toBe(TokenType.EOF);
    expect(scanner.nextToken().type).toBe(TokenType.EOF);
  });
});

describe("unescapeString", () => {
  it("resolves escapes and drops the quotes", () => {
    expect(unescapeString('"a\\"b\\n\\\\"')).toBe('a"b\n\\');
  });

  it("accepts a literal that ran into the end of input", () => {
    expect(unescapeString('"abc')).toBe("abc");
  });
});
