import type { AstNode } from "./types.js";

const ERRONEOUS_KINDS = new Set<AstNode["kind"]>([
  "ErroneousProgram",
  "ErroneousStatement",
  "ErroneousExpression",
]);

export function childrenOf(node: AstNode): AstNode[] {
  switch (node.kind) {
    case "Root":
      return [node.program];
    case "Program": {
      const children: AstNode[] = [node.version];
      if (node.numQubits) {
        children.push(node.numQubits);
      }
      return children.concat(node.statements);
    }
    case "Mapping":
      return [node.alias, node.expr, ...node.annotations];
    case "Variables":
      return [...node.names, node.typ, ...node.annotations];
    case "Subcircuit":
      return node.iterations
        ? [node.name, node.iterations, ...node.annotations]
        : [node.name, ...node.annotations];
    case "ErrorModel":
      return [node.name, ...node.args, ...node.annotations];
    case "Bundle":
      return [...node.items];
    case "Instruction": {
      const children: AstNode[] = [node.name];
      if (node.condition) {
        children.push(node.condition);
      }
      return children.concat(node.operands, node.annotations);
    }
    case "Annotation":
      return [node.interface, node.operation, ...node.operands];
    case "MatrixLiteral":
      return node.rows.flat();
    case "FunctionCall":
      return [node.name, ...node.args];
    case "Index":
      return [node.expr, ...node.indices];
    case "IndexItem":
      return [node.index];
    case "IndexRange":
      return [node.first, node.last];
    case "UnaryOp":
      return [node.operand];
    case "BinaryOp":
      return [node.lhs, node.rhs];
    case "ErroneousProgram":
    case "Version":
    case "ErroneousStatement":
    case "IntegerLiteral":
    case "FloatLiteral":
    case "StringLiteral":
    case "JsonLiteral":
    case "Identifier":
    case "ErroneousExpression":
      return [];
  }
}

/**
 * Depth-first, pre-order traversal. Returning `false` from the callback
 * skips the children of that node.
 */
export function forEachNode(
  node: AstNode,
  visit: (node: AstNode) => boolean | void
): void {
  if (visit(node) === false) {
    return;
  }
  for (const child of childrenOf(node)) {
    forEachNode(child, visit);
  }
}

export function isErroneous(node: AstNode): boolean {
  return ERRONEOUS_KINDS.has(node.kind);
}

/** True when the tree contains no placeholder nodes left by error recovery. */
export function isWellFormed(node: AstNode): boolean {
  let wellFormed = true;
  forEachNode(node, (current) => {
    if (isErroneous(current)) {
      wellFormed = false;
    }
    return wellFormed;
  });
  return wellFormed;
}

export function collectErroneous(node: AstNode): AstNode[] {
  const found: AstNode[] = [];
  forEachNode(node, (current) => {
    if (isErroneous(current)) {
      found.push(current);
    }
  });
  return found;
}
