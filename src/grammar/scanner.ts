import { CommonTokenFactory, Token, type CharStream } from "antlr4ng";

import { CqasmScannerError } from "../parser/errors.js";
import { SourceLocation } from "../parser/sourceLocation.js";
import type { ErrorSink } from "./context.js";
import { KEYWORDS, OPERATORS, TokenType } from "./tokens.js";

const NEWLINE = 0x0a;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const HASH = 0x23;

function isDigit(ch: number): boolean {
  return ch >= 0x30 && ch <= 0x39;
}

function isIdentifierStart(ch: number): boolean {
  return (ch >= 0x41 && ch <= 0x5a) || (ch >= 0x61 && ch <= 0x7a) || ch === 0x5f;
}

function isIdentifierPart(ch: number): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

function isBlank(ch: number): boolean {
  return ch === 0x20 || ch === 0x09 || ch === 0x0d;
}

/**
 * Hand-rolled cQASM lexer over an antlr4ng character stream. One instance
 * scans one input; it keeps all of its state to itself so that independent
 * parses never share a scanner.
 */
export class CqasmScanner {
  private input: CharStream | undefined;
  private readonly sink: ErrorSink;
  private line = 1;
  private column = 0;
  private tokenStart = 0;
  private tokenLine = 1;
  private tokenColumn = 0;
  private expectVersionNumber = false;

  constructor(input: CharStream, sink: ErrorSink) {
    this.input = input;
    this.sink = sink;
  }

  get disposed(): boolean {
    return this.input === undefined;
  }

  dispose(): void {
    this.input = undefined;
  }

  nextToken(): Token {
    const input = this.stream();
    for (;;) {
      const token = this.scanToken(input);
      if (token) {
        return token;
      }
    }
  }

  /** Scans one token, or reports and skips a stray character. */
  private scanToken(input: CharStream): Token | undefined {
    this.skipBlanksAndComments(input);

    this.tokenStart = input.index;
    this.tokenLine = this.line;
    this.tokenColumn = this.column;

    const ch = input.LA(1);
    if (ch === Token.EOF) {
      return this.emit(input, TokenType.EOF, "<EOF>");
    }

    if (ch === NEWLINE) {
      this.advance(input);
      return this.emit(input, TokenType.NEWLINE, "\n");
    }

    if (this.expectVersionNumber && isDigit(ch)) {
      return this.emit(input, TokenType.VERSION_NUMBER, this.scanVersionNumber(input));
    }

    if (isDigit(ch)) {
      return this.scanNumber(input);
    }

    if (isIdentifierStart(ch)) {
      return this.scanWord(input);
    }

    if (ch === QUOTE) {
      return this.emit(input, TokenType.STRING_LITERAL, this.scanString(input));
    }

    if (ch === 0x7b && input.LA(2) === 0x7c) {
      return this.emit(input, TokenType.JSON_LITERAL, this.scanJson(input));
    }

    for (const [spelling, type] of OPERATORS) {
      if (this.lookingAt(input, spelling)) {
        for (let i = 0; i < spelling.length; i += 1) {
          this.advance(input);
        }
        return this.emit(input, type, spelling);
      }
    }

    this.report(
      new SourceLocation(this.sink.filename, this.line, this.column + 1),
      `unexpected character '${String.fromCodePoint(ch)}'`
    );
    this.advance(input);
    return undefined;
  }

  private stream(): CharStream {
    if (!this.input) {
      throw new CqasmScannerError("scanner used after it was disposed");
    }
    return this.input;
  }

  private advance(input: CharStream): string {
    const ch = input.LA(1);
    input.consume();
    if (ch === NEWLINE) {
      this.line += 1;
      this.column = 0;
    } else {
      this.column += 1;
    }
    return String.fromCodePoint(ch);
  }

  private lookingAt(input: CharStream, spelling: string): boolean {
    for (let i = 0; i < spelling.length; i += 1) {
      if (input.LA(i + 1) !== spelling.charCodeAt(i)) {
        return false;
      }
    }
    return true;
  }

  private skipBlanksAndComments(input: CharStream): void {
    for (;;) {
      const ch = input.LA(1);
      if (isBlank(ch)) {
        this.advance(input);
      } else if (ch === HASH) {
        while (input.LA(1) !== NEWLINE && input.LA(1) !== Token.EOF) {
          this.advance(input);
        }
      } else {
        return;
      }
    }
  }

  private scanVersionNumber(input: CharStream): string {
    let text = "";
    while (isDigit(input.LA(1))) {
      text += this.advance(input);
      if (input.LA(1) === 0x2e && isDigit(input.LA(2))) {
        text += this.advance(input);
      }
    }
    return text;
  }

  private scanNumber(input: CharStream): Token {
    let text = "";
    let isFloat = false;
    while (isDigit(input.LA(1))) {
      text += this.advance(input);
    }
    if (input.LA(1) === 0x2e && isDigit(input.LA(2))) {
      isFloat = true;
      text += this.advance(input);
      while (isDigit(input.LA(1))) {
        text += this.advance(input);
      }
    }
    const exponent = input.LA(1);
    if (exponent === 0x65 || exponent === 0x45) {
      const sign = input.LA(2);
      const hasSign = sign === 0x2b || sign === 0x2d;
      if (isDigit(input.LA(hasSign ? 3 : 2))) {
        isFloat = true;
        text += this.advance(input);
        if (hasSign) {
          text += this.advance(input);
        }
        while (isDigit(input.LA(1))) {
          text += this.advance(input);
        }
      }
    }
    return this.emit(input, isFloat ? TokenType.FLOAT_LITERAL : TokenType.INT_LITERAL, text);
  }

  private scanWord(input: CharStream): Token {
    let text = "";
    while (isIdentifierPart(input.LA(1))) {
      text += this.advance(input);
    }
    if (text === "c" && input.LA(1) === 0x2d && isIdentifierStart(input.LA(2))) {
      text += this.advance(input);
      return this.emit(input, TokenType.CONDITION_PREFIX, text);
    }
    const keyword = KEYWORDS.get(text);
    const token = this.emit(input, keyword ?? TokenType.IDENTIFIER, text);
    this.expectVersionNumber = keyword === TokenType.VERSION;
    return token;
  }

  private scanString(input: CharStream): string {
    const start = new SourceLocation(this.sink.filename, this.line, this.column + 1);
    let text = this.advance(input);
    for (;;) {
      const ch = input.LA(1);
      if (ch === Token.EOF) {
        this.report(start, "unterminated string literal");
        return text;
      }
      text += this.advance(input);
      if (ch === QUOTE) {
        return text;
      }
      if (ch === BACKSLASH && input.LA(1) !== Token.EOF) {
        text += this.advance(input);
      }
    }
  }

  private scanJson(input: CharStream): string {
    const start = new SourceLocation(this.sink.filename, this.line, this.column + 1);
    let text = this.advance(input) + this.advance(input);
    for (;;) {
      if (input.LA(1) === Token.EOF) {
        this.report(start, "unterminated JSON literal");
        return text;
      }
      if (this.lookingAt(input, "|}")) {
        return text + this.advance(input) + this.advance(input);
      }
      text += this.advance(input);
    }
  }

  private emit(input: CharStream, type: TokenType, text: string): Token {
    this.expectVersionNumber = false;
    return CommonTokenFactory.DEFAULT.create(
      [null, input],
      type,
      text,
      Token.DEFAULT_CHANNEL,
      this.tokenStart,
      input.index - 1,
      this.tokenLine,
      this.tokenColumn
    );
  }

  private report(location: SourceLocation, message: string): void {
    this.sink.pushError(`${location.toString()}: ${message}`);
  }
}
