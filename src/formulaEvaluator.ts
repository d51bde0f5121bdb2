import {
  AggregateContext,
  CompareOp,
  FormulaNode,
  FormulaValue,
  Row,
  isVector,
} from "./formulaAst";
import {
  applyArithmetic,
  applyNegate,
  callFormulaFunction,
  isFormulaFunction,
} from "./formulaFunctions";
import {
  OperandTypeError,
  UnknownFunctionError,
  UnknownVariableError,
  UnsupportedExpressionError,
} from "./errors";
import { FormulaCompiler, defaultCompiler } from "./formulaCompiler";

/* --------------------------------------------------------------------------
 * LOOKUP
 * -------------------------------------------------------------------------- */

function hasOwn(record: Record<string, FormulaValue>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, name);
}

/**
 * Row values shadow aggregate values of the same name.
 */
export function lookupVariable(
  name: string,
  row: Row,
  aggregates?: AggregateContext
): FormulaValue {
  if (hasOwn(row, name)) return row[name];
  if (aggregates && hasOwn(aggregates, name)) return aggregates[name];
  throw new UnknownVariableError(name);
}

/* --------------------------------------------------------------------------
 * COMPARISON
 * -------------------------------------------------------------------------- */

function comparable(value: number | boolean | string): number | string {
  return typeof value === "boolean" ? (value ? 1 : 0) : value;
}

function compareOnce(op: CompareOp, left: FormulaValue, right: FormulaValue): boolean | null {
  if (left === null || right === null) return null;
  if (isVector(left) || isVector(right)) {
    throw new OperandTypeError(op, isVector(left) ? "vector" : typeof left, isVector(right) ? "vector" : typeof right);
  }

  const l = comparable(left);
  const r = comparable(right);

  if (op === "==") return l === r;
  if (op === "!=") return l !== r;

  if (typeof l === "number" && typeof r === "number") {
    return holds(op, l < r ? -1 : l > r ? 1 : l === r ? 0 : NaN);
  }
  if (typeof l === "string" && typeof r === "string") {
    return holds(op, l < r ? -1 : l > r ? 1 : 0);
  }
  throw new OperandTypeError(op, typeof left, typeof right);
}

// `ordering` is NaN when the operands are unordered (a NaN operand), which
// makes every relation false.
function holds(op: "<" | "<=" | ">" | ">=", ordering: number): boolean {
  switch (op) {
    case "<":
      return ordering < 0;
    case "<=":
      return ordering <= 0;
    case ">":
      return ordering > 0;
    case ">=":
      return ordering >= 0;
  }
}

/* --------------------------------------------------------------------------
 * EVALUATION
 * -------------------------------------------------------------------------- */

function unsupported(node: never): never {
  const value: unknown = node;
  const kind =
    typeof value === "object" && value !== null && "kind" in value ? String(value.kind) : typeof value;
  throw new UnsupportedExpressionError(kind);
}

/**
 * Evaluate a compiled formula against one row, with an optional aggregate
 * context consulted for names the row does not carry.
 */
export function evaluate(
  node: FormulaNode,
  row: Row,
  aggregates?: AggregateContext
): FormulaValue {
  switch (node.kind) {
    case "Literal":
      return node.value;
    case "Var":
      return lookupVariable(node.name, row, aggregates);
    case "Binary":
      return applyArithmetic(
        node.op,
        evaluate(node.left, row, aggregates),
        evaluate(node.right, row, aggregates)
      );
    case "Negate":
      return applyNegate(evaluate(node.operand, row, aggregates));
    case "Compare": {
      // a < b < c holds iff every adjacent pair holds; each operand is
      // evaluated at most once and evaluation stops at the first false pair.
      let left = evaluate(node.operands[0], row, aggregates);
      for (let i = 0; i < node.ops.length; i++) {
        const right = evaluate(node.operands[i + 1], row, aggregates);
        const pair = compareOnce(node.ops[i], left, right);
        if (pair !== true) return pair;
        left = right;
      }
      return true;
    }
    case "Call": {
      if (!isFormulaFunction(node.fn)) {
        throw new UnknownFunctionError(node.fn);
      }
      const args = node.args.map((arg) => evaluate(arg, row, aggregates));
      return callFormulaFunction(node.fn, args);
    }
    default:
      return unsupported(node);
  }
}

/* --------------------------------------------------------------------------
 * TEXT ENTRY POINTS
 * -------------------------------------------------------------------------- */

export function runFormula(
  text: string,
  row: Row,
  compiler: FormulaCompiler = defaultCompiler()
): FormulaValue {
  return evaluate(compiler.compile(text), row);
}

/**
 * Evaluate with precomputed column aggregates (e.g. `SUM_sales`) visible as
 * plain identifiers, so a per-row formula never rescans the column.
 */
export function runFormulaWithAggregates(
  text: string,
  row: Row,
  aggregates: AggregateContext,
  compiler: FormulaCompiler = defaultCompiler()
): FormulaValue {
  return evaluate(compiler.compile(text), row, aggregates);
}
