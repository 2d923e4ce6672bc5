import type { Token } from "antlr4ng";

import type {
  Annotation,
  BinaryOperator,
  Bundle,
  ErroneousProgram,
  ErrorModel,
  Expression,
  Identifier,
  IndexEntry,
  Instruction,
  Mapping,
  Program,
  Root,
  Statement,
  Subcircuit,
  UnaryOperator,
  Variables,
  Version,
} from "../ast/types.js";
import { SourceLocation } from "../parser/sourceLocation.js";
import type { GrammarContext } from "./context.js";
import type { CqasmScanner } from "./scanner.js";
import { TokenType, jsonContents, tokenDisplayName, unescapeString } from "./tokens.js";

/**
 * Drives a scanner to the end of its input, reporting diagnostics to the
 * context and storing the tree it built in `context.result.root`.
 */
export type GrammarDriver = (scanner: CqasmScanner, context: GrammarContext) => void;

export const parseProgram: GrammarDriver = (scanner, context) => {
  new CqasmGrammar(scanner, context).run();
};

/** Unwinds the current statement after a syntax error has been reported. */
class SyntaxFailure extends Error {
  constructor() {
    super("syntax error");
    this.name = "SyntaxFailure";
  }
}

interface BinaryLevel {
  readonly operators: ReadonlyMap<number, BinaryOperator>;
  readonly rightAssociative?: boolean;
}

const BINARY_LEVELS: readonly BinaryLevel[] = [
  { operators: new Map<number, BinaryOperator>([[TokenType.OR, "||"]]) },
  { operators: new Map<number, BinaryOperator>([[TokenType.AND, "&&"]]) },
  {
    operators: new Map<number, BinaryOperator>([
      [TokenType.EQ, "=="],
      [TokenType.NE, "!="],
    ]),
  },
  {
    operators: new Map<number, BinaryOperator>([
      [TokenType.LT, "<"],
      [TokenType.LE, "<="],
      [TokenType.GT, ">"],
      [TokenType.GE, ">="],
    ]),
  },
  {
    operators: new Map<number, BinaryOperator>([
      [TokenType.PLUS, "+"],
      [TokenType.MINUS, "-"],
    ]),
  },
  {
    operators: new Map<number, BinaryOperator>([
      [TokenType.STAR, "*"],
      [TokenType.SLASH, "/"],
      [TokenType.PERCENT, "%"],
    ]),
  },
  {
    operators: new Map<number, BinaryOperator>([[TokenType.POWER, "**"]]),
    rightAssociative: true,
  },
];

const UNARY_OPERATORS = new Map<number, UnaryOperator>([
  [TokenType.MINUS, "-"],
  [TokenType.NOT, "!"],
  [TokenType.TILDE, "~"],
]);

const EXPRESSION_START = new Set<number>([
  TokenType.INT_LITERAL,
  TokenType.FLOAT_LITERAL,
  TokenType.STRING_LITERAL,
  TokenType.JSON_LITERAL,
  TokenType.IDENTIFIER,
  TokenType.LPAREN,
  TokenType.LBRACKET,
  ...UNARY_OPERATORS.keys(),
]);

/** Deepest expression nesting accepted before the statement is abandoned. */
export const MAX_EXPRESSION_DEPTH = 256;

const MAX_INTEGER = 2n ** 63n - 1n;

const DESCRIBED_BY_TEXT = new Set<number>([
  TokenType.INT_LITERAL,
  TokenType.FLOAT_LITERAL,
  TokenType.STRING_LITERAL,
  TokenType.JSON_LITERAL,
  TokenType.IDENTIFIER,
  TokenType.VERSION_NUMBER,
]);

class CqasmGrammar {
  private readonly scanner: CqasmScanner;
  private readonly context: GrammarContext;
  private current: Token;
  private previous: Token | undefined;
  private braceDepth = 0;
  private expressionDepth = 0;

  constructor(scanner: CqasmScanner, context: GrammarContext) {
    this.scanner = scanner;
    this.context = context;
    this.current = scanner.nextToken();
  }

  run(): void {
    this.skipSeparators();
    const start = this.location(this.current);

    let version: Version;
    try {
      version = this.parseVersion();
    } catch (error) {
      if (!(error instanceof SyntaxFailure)) {
        throw error;
      }
      this.context.result.root = this.erroneousRoot(start);
      return;
    }

    const statements: Statement[] = [];
    let numQubits: Expression | undefined;

    if (!this.atSeparator()) {
      const trailing = this.location(this.current);
      statements.push(this.recoverStatement(trailing, () => this.fail("newline or ';'")));
    }
    this.skipSeparators();
    if (this.check(TokenType.QUBITS)) {
      numQubits = this.parseQubits();
    }

    for (;;) {
      this.skipSeparators();
      if (this.check(TokenType.EOF) || this.context.aborted) {
        break;
      }
      statements.push(this.parseStatementWithRecovery());
    }

    const location = this.spanFrom(start);
    const program: Program = {
      kind: "Program",
      version,
      numQubits,
      statements,
      location,
    };
    this.context.result.root = {
      kind: "Root",
      program,
      location: SourceLocation.span(location, location),
    };
  }

  // Header

  private parseVersion(): Version {
    const start = this.location(this.current);
    this.expect(TokenType.VERSION, "'version'");
    const number = this.expect(TokenType.VERSION_NUMBER, "version number");
    const items = this.text(number)
      .split(".")
      .map((item) => Number.parseInt(item, 10));
    return { kind: "Version", items, location: this.spanFrom(start) };
  }

  private parseQubits(): Expression {
    const start = this.location(this.current);
    try {
      this.advance();
      const expr = this.parseExpression();
      this.requireSeparator();
      return expr;
    } catch (error) {
      if (!(error instanceof SyntaxFailure)) {
        throw error;
      }
      this.skipToSeparator();
      return { kind: "ErroneousExpression", location: this.spanFrom(start) };
    }
  }

  private erroneousRoot(start: SourceLocation): Root {
    const location = SourceLocation.span(start, this.location(this.current));
    const program: ErroneousProgram = { kind: "ErroneousProgram", location };
    if (!this.context.aborted) {
      while (!this.check(TokenType.EOF)) {
        this.advance();
      }
    }
    return { kind: "Root", program, location: SourceLocation.span(location, location) };
  }

  // Statements

  private parseStatementWithRecovery(): Statement {
    const start = this.location(this.current);
    return this.recoverStatement(start, () => {
      const statement = this.parseStatement();
      this.requireSeparator();
      return statement;
    });
  }

  /**
   * Runs `parse`; after a syntax error skips to the end of the statement and
   * returns a placeholder covering what was skipped.
   */
  private recoverStatement(start: SourceLocation, parse: () => Statement): Statement {
    try {
      return parse();
    } catch (error) {
      if (!(error instanceof SyntaxFailure)) {
        throw error;
      }
      this.skipToSeparator();
      return { kind: "ErroneousStatement", location: this.spanFrom(start) };
    }
  }

  private parseStatement(): Statement {
    switch (this.current.type) {
      case TokenType.MAP:
        return this.parseMapping();
      case TokenType.VAR:
        return this.parseVariables();
      case TokenType.DOT:
        return this.parseSubcircuit();
      case TokenType.ERROR_MODEL:
        return this.parseErrorModel();
      case TokenType.LBRACE:
        return this.parseBracedBundle();
      case TokenType.IDENTIFIER:
      case TokenType.CONDITION_PREFIX:
        return this.parseBundle();
      default:
        return this.fail("statement");
    }
  }

  private parseMapping(): Mapping {
    const start = this.location(this.advance());
    let alias: Identifier;
    let expr: Expression;
    const first = this.parseExpression();
    if (first.kind === "Identifier" && this.accept(TokenType.ASSIGN)) {
      alias = first;
      expr = this.parseExpression();
    } else {
      this.expect(TokenType.COMMA, "',' or '='");
      expr = first;
      alias = this.parseIdentifier();
    }
    const annotations = this.parseAnnotations();
    return { kind: "Mapping", alias, expr, annotations, location: this.spanFrom(start) };
  }

  private parseVariables(): Variables {
    const start = this.location(this.advance());
    const names = [this.parseIdentifier()];
    while (this.accept(TokenType.COMMA)) {
      names.push(this.parseIdentifier());
    }
    this.expect(TokenType.COLON, "',' or ':'");
    const typ = this.parseIdentifier();
    const annotations = this.parseAnnotations();
    return { kind: "Variables", names, typ, annotations, location: this.spanFrom(start) };
  }

  private parseSubcircuit(): Subcircuit {
    const start = this.location(this.advance());
    const name = this.parseIdentifier();
    let iterations: Expression | undefined;
    if (this.accept(TokenType.LPAREN)) {
      iterations = this.parseExpression();
      this.expect(TokenType.RPAREN, "')'");
    }
    const annotations = this.parseAnnotations();
    return { kind: "Subcircuit", name, iterations, annotations, location: this.spanFrom(start) };
  }

  private parseErrorModel(): ErrorModel {
    const start = this.location(this.advance());
    const name = this.parseIdentifier();
    const args: Expression[] = [];
    while (this.accept(TokenType.COMMA)) {
      args.push(this.parseExpression());
    }
    const annotations = this.parseAnnotations();
    return { kind: "ErrorModel", name, args, annotations, location: this.spanFrom(start) };
  }

  private parseBundle(): Bundle {
    const start = this.location(this.current);
    const items = [this.parseInstruction()];
    while (this.accept(TokenType.PIPE)) {
      items.push(this.parseInstruction());
    }
    return { kind: "Bundle", items, location: this.spanFrom(start) };
  }

  private parseBracedBundle(): Bundle {
    const start = this.location(this.advance());
    this.braceDepth += 1;
    this.skipSeparators();
    const items = [this.parseInstruction()];
    for (;;) {
      if (this.accept(TokenType.PIPE)) {
        this.skipSeparators();
        items.push(this.parseInstruction());
        continue;
      }
      if (!this.atSeparator()) {
        break;
      }
      this.skipSeparators();
      if (this.check(TokenType.RBRACE)) {
        break;
      }
      items.push(this.parseInstruction());
    }
    this.expect(TokenType.RBRACE, "'}'");
    this.braceDepth -= 1;
    return { kind: "Bundle", items, location: this.spanFrom(start) };
  }

  private parseInstruction(): Instruction {
    const start = this.location(this.current);
    let condition: Expression | undefined;
    let name: Identifier;
    const operands: Expression[] = [];
    if (this.accept(TokenType.CONDITION_PREFIX)) {
      name = this.parseIdentifier();
      condition = this.parseExpression();
      if (this.accept(TokenType.COMMA)) {
        operands.push(...this.parseExpressionList());
      }
    } else {
      name = this.parseIdentifier();
      if (EXPRESSION_START.has(this.current.type)) {
        operands.push(...this.parseExpressionList());
      }
    }
    const annotations = this.parseAnnotations();
    return {
      kind: "Instruction",
      name,
      condition,
      operands,
      annotations,
      location: this.spanFrom(start),
    };
  }

  private parseAnnotations(): Annotation[] {
    const annotations: Annotation[] = [];
    while (this.check(TokenType.AT)) {
      const start = this.location(this.advance());
      const iface = this.parseIdentifier();
      this.expect(TokenType.DOT, "'.'");
      const operation = this.parseIdentifier();
      const operands: Expression[] = [];
      if (this.accept(TokenType.LPAREN)) {
        if (!this.check(TokenType.RPAREN)) {
          operands.push(...this.parseExpressionList());
        }
        this.expect(TokenType.RPAREN, "')'");
      }
      annotations.push({
        kind: "Annotation",
        interface: iface,
        operation,
        operands,
        location: this.spanFrom(start),
      });
    }
    return annotations;
  }

  // Expressions

  private parseExpressionList(): Expression[] {
    const list = [this.parseExpression()];
    while (this.accept(TokenType.COMMA)) {
      list.push(this.parseExpression());
    }
    return list;
  }

  private parseExpression(): Expression {
    if (this.expressionDepth >= MAX_EXPRESSION_DEPTH) {
      this.report(
        this.current,
        `syntax error, expression nested deeper than ${MAX_EXPRESSION_DEPTH} levels`
      );
    }
    this.expressionDepth += 1;
    try {
      return this.parseBinary(0);
    } finally {
      this.expressionDepth -= 1;
    }
  }

  private parseBinary(level: number): Expression {
    const spec = BINARY_LEVELS[level];
    if (!spec) {
      return this.parseUnary();
    }
    const lhs = this.parseBinary(level + 1);
    const operator = spec.operators.get(this.current.type);
    if (operator === undefined) {
      return lhs;
    }
    this.advance();
    if (spec.rightAssociative) {
      const rhs = this.parseBinary(level);
      return this.binary(operator, lhs, rhs);
    }
    let result = this.binary(operator, lhs, this.parseBinary(level + 1));
    for (;;) {
      const next = spec.operators.get(this.current.type);
      if (next === undefined) {
        return result;
      }
      this.advance();
      result = this.binary(next, result, this.parseBinary(level + 1));
    }
  }

  private binary(operator: BinaryOperator, lhs: Expression, rhs: Expression): Expression {
    return {
      kind: "BinaryOp",
      operator,
      lhs,
      rhs,
      location: SourceLocation.span(lhs.location, rhs.location),
    };
  }

  private parseUnary(): Expression {
    const prefixes: Array<{ operator: UnaryOperator; start: SourceLocation }> = [];
    for (;;) {
      const operator = UNARY_OPERATORS.get(this.current.type);
      if (operator === undefined) {
        break;
      }
      prefixes.push({ operator, start: this.location(this.advance()) });
    }
    let expr = this.parsePostfix();
    for (const { operator, start } of prefixes.reverse()) {
      expr = {
        kind: "UnaryOp",
        operator,
        operand: expr,
        location: SourceLocation.span(start, expr.location),
      };
    }
    return expr;
  }

  private parsePostfix(): Expression {
    let expr = this.parsePrimary();
    while (this.check(TokenType.LBRACKET)) {
      this.advance();
      const indices = [this.parseIndexEntry()];
      while (this.accept(TokenType.COMMA)) {
        indices.push(this.parseIndexEntry());
      }
      this.expect(TokenType.RBRACKET, "',' or ']'");
      expr = { kind: "Index", expr, indices, location: this.spanFrom(expr.location) };
    }
    return expr;
  }

  private parseIndexEntry(): IndexEntry {
    const first = this.parseExpression();
    if (!this.accept(TokenType.COLON)) {
      return {
        kind: "IndexItem",
        index: first,
        location: SourceLocation.span(first.location, first.location),
      };
    }
    const last = this.parseExpression();
    return {
      kind: "IndexRange",
      first,
      last,
      location: SourceLocation.span(first.location, last.location),
    };
  }

  private parsePrimary(): Expression {
    const token = this.current;
    const location = this.location(token);
    switch (token.type) {
      case TokenType.INT_LITERAL: {
        const value = BigInt(this.text(token));
        if (value > MAX_INTEGER) {
          this.report(token, "integer literal out of range");
        }
        this.advance();
        return { kind: "IntegerLiteral", value, location };
      }
      case TokenType.FLOAT_LITERAL:
        this.advance();
        return { kind: "FloatLiteral", value: Number.parseFloat(this.text(token)), location };
      case TokenType.STRING_LITERAL:
        this.advance();
        return { kind: "StringLiteral", value: unescapeString(this.text(token)), location };
      case TokenType.JSON_LITERAL:
        this.advance();
        return { kind: "JsonLiteral", value: jsonContents(this.text(token)), location };
      case TokenType.IDENTIFIER: {
        const name = this.parseIdentifier();
        if (!this.accept(TokenType.LPAREN)) {
          return name;
        }
        const args = this.check(TokenType.RPAREN) ? [] : this.parseExpressionList();
        this.expect(TokenType.RPAREN, "',' or ')'");
        return { kind: "FunctionCall", name, args, location: this.spanFrom(location) };
      }
      case TokenType.LPAREN: {
        this.advance();
        const inner = this.parseExpression();
        this.expect(TokenType.RPAREN, "')'");
        return { ...inner, location: this.spanFrom(location) };
      }
      case TokenType.LBRACKET:
        return this.parseMatrix();
      default:
        return this.fail("expression");
    }
  }

  private parseMatrix(): Expression {
    const start = this.location(this.advance());
    const rows: Expression[][] = [];
    let row: Expression[] = [];
    this.skipNewlines();
    for (;;) {
      row.push(this.parseExpression());
      this.skipNewlines();
      if (this.accept(TokenType.COMMA)) {
        this.skipNewlines();
        continue;
      }
      if (this.accept(TokenType.SEMICOLON)) {
        rows.push(row);
        row = [];
        this.skipNewlines();
        continue;
      }
      break;
    }
    rows.push(row);
    this.expect(TokenType.RBRACKET, "',', ';' or ']'");
    return { kind: "MatrixLiteral", rows, location: this.spanFrom(start) };
  }

  private parseIdentifier(): Identifier {
    const token = this.expect(TokenType.IDENTIFIER, "identifier");
    return { kind: "Identifier", name: this.text(token), location: this.location(token) };
  }

  // Token plumbing

  private check(type: number): boolean {
    return this.current.type === type;
  }

  private accept(type: number): Token | undefined {
    return this.check(type) ? this.advance() : undefined;
  }

  private expect(type: number, expecting: string): Token {
    const token = this.accept(type);
    if (!token) {
      return this.fail(expecting);
    }
    return token;
  }

  private advance(): Token {
    const token = this.current;
    if (token.type === TokenType.EOF) {
      return token;
    }
    // Separators never end a node's location.
    if (token.type !== TokenType.NEWLINE && token.type !== TokenType.SEMICOLON) {
      this.previous = token;
    }
    this.current = this.scanner.nextToken();
    return token;
  }

  private atSeparator(): boolean {
    return (
      this.check(TokenType.NEWLINE) ||
      this.check(TokenType.SEMICOLON) ||
      this.check(TokenType.EOF)
    );
  }

  private requireSeparator(): void {
    if (!this.atSeparator()) {
      this.fail("newline or ';'");
    }
  }

  private skipSeparators(): void {
    while (this.check(TokenType.NEWLINE) || this.check(TokenType.SEMICOLON)) {
      this.advance();
    }
  }

  private skipNewlines(): void {
    while (this.check(TokenType.NEWLINE)) {
      this.advance();
    }
  }

  /**
   * Discards tokens up to the next separator outside of any braces left open
   * by the failed statement.
   */
  private skipToSeparator(): void {
    let depth = this.braceDepth;
    this.braceDepth = 0;
    while (!this.check(TokenType.EOF)) {
      if (depth === 0 && this.atSeparator()) {
        return;
      }
      if (this.check(TokenType.LBRACE)) {
        depth += 1;
      } else if (this.check(TokenType.RBRACE) && depth > 0) {
        depth -= 1;
      }
      this.advance();
    }
  }

  private fail(expecting: string): never {
    const token = this.current;
    return this.report(
      token,
      `syntax error, unexpected ${this.describe(token)}, expecting ${expecting}`
    );
  }

  private report(token: Token, message: string): never {
    this.context.pushError(`${this.location(token).toString()}: ${message}`);
    throw new SyntaxFailure();
  }

  private describe(token: Token): string {
    const name = tokenDisplayName(token.type);
    return DESCRIBED_BY_TEXT.has(token.type) ? `${name} '${this.text(token)}'` : name;
  }

  private text(token: Token): string {
    return token.text ?? "";
  }

  /** Location of everything from `start` up to the last consumed token. */
  private spanFrom(start: SourceLocation): SourceLocation {
    if (!this.previous) {
      return SourceLocation.span(start, start);
    }
    return SourceLocation.span(start, this.location(this.previous));
  }

  private location(token: Token): SourceLocation {
    const filename = this.context.filename;
    const firstColumn = token.column + 1;
    if (token.type === TokenType.EOF || token.type === TokenType.NEWLINE) {
      return new SourceLocation(filename, token.line, firstColumn);
    }
    const lines = this.text(token).split("\n");
    const lastLine = token.line + lines.length - 1;
    // Columns count code points, like the scanner.
    const tail = Array.from(lines[lines.length - 1] ?? "").length;
    const lastColumn = lines.length === 1 ? token.column + tail : tail;
    return new SourceLocation(filename, token.line, firstColumn, lastLine, lastColumn);
  }
}
