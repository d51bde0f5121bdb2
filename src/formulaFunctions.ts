// formulaFunctions.ts
// Closed library of callable functions plus the operator semantics they share
// with the evaluator.
//
// - The registry is keyed by the `FormulaFunctionName` union, so a function
//   can only be added by extending that union and giving it an implementation.
// - Vector aggregates skip NaN entries (except COUNT); `null` arguments to the
//   scalar functions propagate `null`.

import Enumerable from "linq";
import {
  ArithmeticOp,
  FormulaValue,
  Vector,
  describeShape,
  isVector,
} from "./formulaAst";
import { ArityError, OperandTypeError, ShapeError } from "./errors";

/* --------------------------------------------------------------------------
 * OPERATOR SEMANTICS
 * -------------------------------------------------------------------------- */

function typeName(value: FormulaValue): string {
  if (isVector(value)) return "vector";
  if (value === null) return "null";
  return typeof value;
}

function asNumber(value: FormulaValue): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  return undefined;
}

function computeArithmetic(op: ArithmeticOp, left: number, right: number): number {
  switch (op) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      return left / right;
    case "**":
      return left ** right;
  }
}

/**
 * Binary arithmetic over scalars and vectors. Vectors combine elementwise
 * with a scalar or with a vector of the same length; two strings concatenate
 * under `+`. A `null` operand yields `null`.
 */
export function applyArithmetic(
  op: ArithmeticOp,
  left: FormulaValue,
  right: FormulaValue
): FormulaValue {
  if (left === null || right === null) return null;

  if (typeof left === "string" && typeof right === "string" && op === "+") {
    return left + right;
  }

  if (isVector(left) || isVector(right)) {
    if (isVector(left) && isVector(right)) {
      const other = right;
      if (left.length !== other.length) {
        throw new ShapeError(
          `Operands could not be combined with ${op}: ${describeShape(left)} and ${describeShape(other)}`,
          { op, left: left.length, right: other.length }
        );
      }
      return left.map((value, i) => computeArithmetic(op, value, other[i]));
    }
    if (isVector(left)) {
      const scalar = asNumber(right);
      if (scalar === undefined) throw new OperandTypeError(op, "vector", typeName(right));
      return left.map((value) => computeArithmetic(op, value, scalar));
    }
    const scalar = asNumber(left);
    if (scalar === undefined || !isVector(right)) {
      throw new OperandTypeError(op, typeName(left), typeName(right));
    }
    return right.map((value) => computeArithmetic(op, scalar, value));
  }

  const l = asNumber(left);
  const r = asNumber(right);
  if (l === undefined || r === undefined) {
    throw new OperandTypeError(op, typeName(left), typeName(right));
  }
  return computeArithmetic(op, l, r);
}

export function applyNegate(value: FormulaValue): FormulaValue {
  if (value === null) return null;
  if (isVector(value)) return value.map((entry) => -entry);
  const n = asNumber(value);
  if (n === undefined) throw new OperandTypeError("unary -", typeName(value));
  return -n;
}

/* --------------------------------------------------------------------------
 * ARGUMENT HELPERS
 * -------------------------------------------------------------------------- */

function expectArity(fn: string, args: FormulaValue[], count: number): void {
  if (args.length !== count) {
    throw new ArityError(fn, count === 1 ? "1 argument" : `${count} arguments`, args.length);
  }
}

function requireVector(fn: string, index: number, value: FormulaValue): Vector {
  if (!isVector(value) || !value.every((entry) => typeof entry === "number")) {
    throw new ShapeError(
      `${fn}() argument ${index + 1} must be a one-dimensional vector, got ${describeShape(value)}`,
      { fn, argument: index + 1, shape: describeShape(value) }
    );
  }
  return value;
}

function requireScalar(fn: string, value: FormulaValue): number {
  if (isVector(value)) {
    throw new ShapeError(`${fn}() expects a scalar argument, got ${describeShape(value)}`, { fn });
  }
  const n = asNumber(value);
  if (n === undefined) throw new OperandTypeError(fn, typeName(value));
  return n;
}

/** Aggregates treat a lone scalar as a one-element vector. */
function aggregateInput(fn: string, value: FormulaValue): Vector | null {
  if (value === null) return null;
  if (isVector(value)) return requireVector(fn, 0, value);
  return [requireScalar(fn, value)];
}

function withoutNaN(values: Vector): number[] {
  return Enumerable.from(values)
    .where((value: number) => !Number.isNaN(value))
    .toArray();
}

function total(values: number[]): number {
  return values.reduce((a, b) => a + b, 0);
}

function extreme(fn: "min" | "max", args: FormulaValue[]): FormulaValue {
  const pick = fn === "min" ? Math.min : Math.max;
  if (args.length === 0) throw new ArityError(fn, "at least 1 argument", 0);

  if (args.length === 1) {
    const [arg] = args;
    if (arg === null) return null;
    const values = requireVector(fn, 0, arg);
    if (values.length === 0) {
      throw new ShapeError(`${fn}() arg is an empty vector`, { fn });
    }
    return values.reduce((a, b) => pick(a, b));
  }

  if (args.some((arg) => arg === null)) return null;
  return args.map((arg) => requireScalar(fn, arg)).reduce((a, b) => pick(a, b));
}

/* --------------------------------------------------------------------------
 * REGISTRY
 * -------------------------------------------------------------------------- */

export const FORMULA_FUNCTION_NAMES = [
  "pow",
  "sqrt",
  "abs",
  "min",
  "max",
  "SUM",
  "AVG",
  "COUNT",
  "DOT",
  "NORM",
] as const;

export type FormulaFunctionName = (typeof FORMULA_FUNCTION_NAMES)[number];

export type FormulaFunction = (args: FormulaValue[]) => FormulaValue;

const FUNCTIONS: { readonly [K in FormulaFunctionName]: FormulaFunction } = Object.freeze({
  pow(args: FormulaValue[]): FormulaValue {
    if (args.length === 1) return applyArithmetic("**", args[0], 2);
    if (args.length === 2) return applyArithmetic("**", args[0], args[1]);
    throw new ArityError("pow", "1 or 2 arguments", args.length);
  },

  // Negative input is "not applicable here", not an error.
  sqrt(args: FormulaValue[]): FormulaValue {
    expectArity("sqrt", args, 1);
    if (args[0] === null) return null;
    const n = requireScalar("sqrt", args[0]);
    return n < 0 ? null : Math.sqrt(n);
  },

  abs(args: FormulaValue[]): FormulaValue {
    expectArity("abs", args, 1);
    const [arg] = args;
    if (arg === null) return null;
    if (isVector(arg)) return requireVector("abs", 0, arg).map((value) => Math.abs(value));
    return Math.abs(requireScalar("abs", arg));
  },

  min(args: FormulaValue[]): FormulaValue {
    return extreme("min", args);
  },

  max(args: FormulaValue[]): FormulaValue {
    return extreme("max", args);
  },

  SUM(args: FormulaValue[]): FormulaValue {
    expectArity("SUM", args, 1);
    const values = aggregateInput("SUM", args[0]);
    return values === null ? null : total(withoutNaN(values));
  },

  AVG(args: FormulaValue[]): FormulaValue {
    expectArity("AVG", args, 1);
    const values = aggregateInput("AVG", args[0]);
    if (values === null) return null;
    if (values.length === 0) return 0;
    const present = withoutNaN(values);
    return present.length === 0 ? NaN : total(present) / present.length;
  },

  COUNT(args: FormulaValue[]): FormulaValue {
    expectArity("COUNT", args, 1);
    const values = aggregateInput("COUNT", args[0]);
    return values === null ? null : values.length;
  },

  DOT(args: FormulaValue[]): FormulaValue {
    expectArity("DOT", args, 2);
    const left = requireVector("DOT", 0, args[0]);
    const right = requireVector("DOT", 1, args[1]);
    if (left.length !== right.length) {
      throw new ShapeError(
        `DOT() expects vectors of equal length, got ${left.length} and ${right.length}`,
        { left: left.length, right: right.length }
      );
    }
    return total(withoutNaN(left.map((value, i) => value * right[i])));
  },

  NORM(args: FormulaValue[]): FormulaValue {
    expectArity("NORM", args, 1);
    const values = requireVector("NORM", 0, args[0]);
    return Math.sqrt(total(withoutNaN(values.map((value) => value * value))));
  },
});

const FUNCTION_NAME_SET: ReadonlySet<string> = new Set(FORMULA_FUNCTION_NAMES);

export function isFormulaFunction(name: string): name is FormulaFunctionName {
  return FUNCTION_NAME_SET.has(name);
}

export function callFormulaFunction(
  name: FormulaFunctionName,
  args: FormulaValue[]
): FormulaValue {
  return FUNCTIONS[name](args);
}
