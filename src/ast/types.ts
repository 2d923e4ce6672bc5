import type { SourceLocation } from "../parser/sourceLocation.js";

interface NodeBase {
  /** Source range covered by the node. */
  readonly location: SourceLocation;
}

export interface Root extends NodeBase {
  readonly kind: "Root";
  readonly program: Program | ErroneousProgram;
}

export interface Program extends NodeBase {
  readonly kind: "Program";
  readonly version: Version;
  /** Expression following the `qubits` keyword, when present. */
  readonly numQubits?: Expression;
  readonly statements: Statement[];
}

/** Placeholder for a program whose header could not be parsed. */
export interface ErroneousProgram extends NodeBase {
  readonly kind: "ErroneousProgram";
}

export interface Version extends NodeBase {
  readonly kind: "Version";
  /** Dotted version components, e.g. `[1, 0]` for `1.0`. */
  readonly items: number[];
}

export type Statement =
  | Mapping
  | Variables
  | Subcircuit
  | ErrorModel
  | Bundle
  | ErroneousStatement;

export interface Mapping extends NodeBase {
  readonly kind: "Mapping";
  readonly alias: Identifier;
  readonly expr: Expression;
  readonly annotations: Annotation[];
}

export interface Variables extends NodeBase {
  readonly kind: "Variables";
  readonly names: Identifier[];
  readonly typ: Identifier;
  readonly annotations: Annotation[];
}

export interface Subcircuit extends NodeBase {
  readonly kind: "Subcircuit";
  readonly name: Identifier;
  readonly iterations?: Expression;
  readonly annotations: Annotation[];
}

export interface ErrorModel extends NodeBase {
  readonly kind: "ErrorModel";
  readonly name: Identifier;
  readonly args: Expression[];
  readonly annotations: Annotation[];
}

/** One or more instructions issued in parallel. */
export interface Bundle extends NodeBase {
  readonly kind: "Bundle";
  readonly items: Instruction[];
}

/** Statement skipped during error recovery. */
export interface ErroneousStatement extends NodeBase {
  readonly kind: "ErroneousStatement";
}

export interface Instruction extends NodeBase {
  readonly kind: "Instruction";
  readonly name: Identifier;
  /** Classical condition of a `c-` prefixed instruction. */
  readonly condition?: Expression;
  readonly operands: Expression[];
  readonly annotations: Annotation[];
}

export interface Annotation extends NodeBase {
  readonly kind: "Annotation";
  readonly interface: Identifier;
  readonly operation: Identifier;
  readonly operands: Expression[];
}

export type Expression =
  | IntegerLiteral
  | FloatLiteral
  | StringLiteral
  | JsonLiteral
  | MatrixLiteral
  | Identifier
  | FunctionCall
  | Index
  | UnaryOp
  | BinaryOp
  | ErroneousExpression;

export interface IntegerLiteral extends NodeBase {
  readonly kind: "IntegerLiteral";
  readonly value: bigint;
}

export interface FloatLiteral extends NodeBase {
  readonly kind: "FloatLiteral";
  readonly value: number;
}

export interface StringLiteral extends NodeBase {
  readonly kind: "StringLiteral";
  /** Unescaped contents. */
  readonly value: string;
}

export interface JsonLiteral extends NodeBase {
  readonly kind: "JsonLiteral";
  /** Raw JSON text between the `{|` and `|}` delimiters. */
  readonly value: string;
}

export interface MatrixLiteral extends NodeBase {
  readonly kind: "MatrixLiteral";
  readonly rows: Expression[][];
}

export interface Identifier extends NodeBase {
  readonly kind: "Identifier";
  readonly name: string;
}

export interface FunctionCall extends NodeBase {
  readonly kind: "FunctionCall";
  readonly name: Identifier;
  readonly args: Expression[];
}

export type IndexEntry = IndexItem | IndexRange;

export interface IndexItem extends NodeBase {
  readonly kind: "IndexItem";
  readonly index: Expression;
}

export interface IndexRange extends NodeBase {
  readonly kind: "IndexRange";
  readonly first: Expression;
  readonly last: Expression;
}

export interface Index extends NodeBase {
  readonly kind: "Index";
  readonly expr: Expression;
  readonly indices: IndexEntry[];
}

export type UnaryOperator = "-" | "!" | "~";

export type BinaryOperator =
  | "**"
  | "*"
  | "/"
  | "%"
  | "+"
  | "-"
  | "<"
  | "<="
  | ">"
  | ">="
  | "=="
  | "!="
  | "&&"
  | "||";

export interface UnaryOp extends NodeBase {
  readonly kind: "UnaryOp";
  readonly operator: UnaryOperator;
  readonly operand: Expression;
}

export interface BinaryOp extends NodeBase {
  readonly kind: "BinaryOp";
  readonly operator: BinaryOperator;
  readonly lhs: Expression;
  readonly rhs: Expression;
}

export interface ErroneousExpression extends NodeBase {
  readonly kind: "ErroneousExpression";
}

export type AstNode =
  | Root
  | Program
  | ErroneousProgram
  | Version
  | Statement
  | Instruction
  | Annotation
  | Expression
  | IndexEntry;
