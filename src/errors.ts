// errors.ts
// Error taxonomy for formula compilation and evaluation.
//
// Every error is terminal for the single formula (and row) that raised it.
// The scenario executor decides whether a failure stays local to its cell or
// aborts the batch.

export type FormulaErrorCode =
  | "SYNTAX_ERROR"
  | "UNKNOWN_VARIABLE"
  | "UNKNOWN_FUNCTION"
  | "INVALID_CALL_TARGET"
  | "UNSUPPORTED_EXPRESSION"
  | "SHAPE_ERROR"
  | "ARITY_ERROR"
  | "OPERAND_TYPE_ERROR";

export class FormulaError extends Error {
  readonly code: FormulaErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: FormulaErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "FormulaError";
    this.code = code;
    this.context = context;
  }
}

export class FormulaSyntaxError extends FormulaError {
  readonly formula: string;
  readonly position: number;

  constructor(formula: string, position: number, detail: string) {
    super("SYNTAX_ERROR", `${detail} at position ${position} in formula: ${formula}`, {
      formula,
      position,
    });
    this.name = "FormulaSyntaxError";
    this.formula = formula;
    this.position = position;
  }
}

export class UnknownVariableError extends FormulaError {
  readonly variable: string;

  constructor(variable: string) {
    super("UNKNOWN_VARIABLE", `Unknown variable '${variable}'`, { variable });
    this.name = "UnknownVariableError";
    this.variable = variable;
  }
}

export class UnknownFunctionError extends FormulaError {
  readonly functionName: string;

  constructor(functionName: string) {
    super("UNKNOWN_FUNCTION", `Function '${functionName}' is not allowed`, { functionName });
    this.name = "UnknownFunctionError";
    this.functionName = functionName;
  }
}

export class InvalidCallTargetError extends FormulaError {
  constructor(formula: string, position: number) {
    super(
      "INVALID_CALL_TARGET",
      `Only simple function calls allowed (call at position ${position} in formula: ${formula})`,
      { formula, position }
    );
    this.name = "InvalidCallTargetError";
  }
}

export class UnsupportedExpressionError extends FormulaError {
  constructor(kind: string) {
    super("UNSUPPORTED_EXPRESSION", `Unsupported expression: ${kind}`, { kind });
    this.name = "UnsupportedExpressionError";
  }
}

export class ShapeError extends FormulaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("SHAPE_ERROR", message, context);
    this.name = "ShapeError";
  }
}

export class ArityError extends FormulaError {
  readonly functionName: string;
  readonly received: number;

  constructor(functionName: string, expected: string, received: number) {
    super("ARITY_ERROR", `${functionName}() expects ${expected}, got ${received}`, {
      functionName,
      expected,
      received,
    });
    this.name = "ArityError";
    this.functionName = functionName;
    this.received = received;
  }
}

export class OperandTypeError extends FormulaError {
  constructor(op: string, left: string, right?: string) {
    const operands = right === undefined ? left : `${left} and ${right}`;
    super("OPERAND_TYPE_ERROR", `Unsupported operand type(s) for ${op}: ${operands}`, {
      op,
      left,
      right,
    });
    this.name = "OperandTypeError";
  }
}
