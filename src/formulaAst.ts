// formulaAst.ts
// Expression tree and value types for the formula language.
//
// A tree is built once per distinct formula text and shared read-only by
// every evaluation of that formula, so builders hand back frozen nodes.

/* --------------------------------------------------------------------------
 * VALUES
 * -------------------------------------------------------------------------- */

export type Vector = readonly number[];

/** `null` marks a value that is not applicable (e.g. `sqrt` of a negative). */
export type Scalar = number | boolean | string | null;

export type FormulaValue = Scalar | Vector;

export type Row = Record<string, FormulaValue>;

export type AggregateContext = Record<string, FormulaValue>;

export function isVector(value: FormulaValue): value is Vector {
  return Array.isArray(value);
}

export function describeShape(value: FormulaValue): string {
  if (isVector(value)) return `vector of length ${value.length}`;
  if (value === null) return "null";
  return `scalar ${typeof value}`;
}

/* --------------------------------------------------------------------------
 * EXPRESSION TREE
 * -------------------------------------------------------------------------- */

export type ArithmeticOp = "+" | "-" | "*" | "/" | "**";

export type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=";

export type FormulaNode =
  | { readonly kind: "Literal"; readonly value: number | string | boolean }
  | { readonly kind: "Var"; readonly name: string }
  | {
      readonly kind: "Binary";
      readonly op: ArithmeticOp;
      readonly left: FormulaNode;
      readonly right: FormulaNode;
    }
  | { readonly kind: "Negate"; readonly operand: FormulaNode }
  | {
      // `operands.length === ops.length + 1`; `a < b < c` is
      // operands [a, b, c] with ops ["<", "<"].
      readonly kind: "Compare";
      readonly operands: readonly FormulaNode[];
      readonly ops: readonly CompareOp[];
    }
  | { readonly kind: "Call"; readonly fn: string; readonly args: readonly FormulaNode[] };

export type FormulaNodeKind = FormulaNode["kind"];

function freeze<T extends FormulaNode>(node: T): T {
  return Object.freeze(node);
}

export const Expr = {
  lit(value: number | string | boolean): FormulaNode {
    return freeze({ kind: "Literal", value });
  },

  variable(name: string): FormulaNode {
    return freeze({ kind: "Var", name });
  },

  binary(op: ArithmeticOp, left: FormulaNode, right: FormulaNode): FormulaNode {
    return freeze({ kind: "Binary", op, left, right });
  },

  negate(operand: FormulaNode): FormulaNode {
    return freeze({ kind: "Negate", operand });
  },

  compare(operands: FormulaNode[], ops: CompareOp[]): FormulaNode {
    return freeze({
      kind: "Compare",
      operands: Object.freeze([...operands]),
      ops: Object.freeze([...ops]),
    });
  },

  call(fn: string, ...args: FormulaNode[]): FormulaNode {
    return freeze({ kind: "Call", fn, args: Object.freeze([...args]) });
  },
};

/**
 * Depth-first walk over every node of a tree, parents before children.
 */
export function walkFormula(node: FormulaNode, visit: (node: FormulaNode) => void): void {
  visit(node);
  switch (node.kind) {
    case "Literal":
    case "Var":
      return;
    case "Binary":
      walkFormula(node.left, visit);
      walkFormula(node.right, visit);
      return;
    case "Negate":
      walkFormula(node.operand, visit);
      return;
    case "Compare":
      node.operands.forEach((operand) => walkFormula(operand, visit));
      return;
    case "Call":
      node.args.forEach((arg) => walkFormula(arg, visit));
      return;
  }
}
