import {
  ArithmeticOp,
  CompareOp,
  Expr,
  FormulaNode,
} from "./formulaAst";
import { FormulaSyntaxError, InvalidCallTargetError } from "./errors";

export type ParseResult<T> = { value: T; nextPos: number };
export type Parser<T> = (input: string, pos: number) => ParseResult<T> | null;

/* --------------------------------------------------------------------------
 * COMBINATORS
 * -------------------------------------------------------------------------- */

function skipWs(input: string, pos: number): number {
  const match = /^\s*/.exec(input.slice(pos));
  return pos + (match ? match[0].length : 0);
}

function map<A, B>(parser: Parser<A>, fn: (value: A) => B): Parser<B> {
  return (input, pos) => {
    const result = parser(input, pos);
    if (!result) return null;
    return { value: fn(result.value), nextPos: result.nextPos };
  };
}

function choice<T>(...parsers: Parser<T>[]): Parser<T> {
  return (input, pos) => {
    for (const p of parsers) {
      const result = p(input, pos);
      if (result) return result;
    }
    return null;
  };
}

function regex(re: RegExp): Parser<string> {
  const anchored = new RegExp("^(?:" + re.source + ")", re.flags);
  return (input, pos) => {
    const start = skipWs(input, pos);
    const slice = input.slice(start);
    const match = anchored.exec(slice);
    if (!match) return null;
    const nextPos = skipWs(input, start + match[0].length);
    return { value: match[0], nextPos };
  };
}

function token(text: string): Parser<string> {
  return (input, pos) => {
    const start = skipWs(input, pos);
    if (input.slice(start).startsWith(text)) {
      const nextPos = skipWs(input, start + text.length);
      return { value: text, nextPos };
    }
    return null;
  };
}

function symbol(text: string): Parser<string> {
  return token(text);
}

/**
 * Operator token typed by its own text. `pattern` overrides the match when
 * the text is a prefix of a longer operator (`*` vs `**`).
 */
function operator<Op extends string>(text: Op, pattern?: RegExp): Parser<Op> {
  return map(pattern ? regex(pattern) : token(text), () => text);
}

function sepBy<T>(parser: Parser<T>, separator: Parser<string>): Parser<T[]> {
  return (input, pos) => {
    const first = parser(input, pos);
    if (!first) return { value: [], nextPos: pos };
    const values: T[] = [first.value];
    let nextPos = first.nextPos;
    // eslint-disable-next-line no-constant-condition
    while (true) {
      const sep = separator(input, nextPos);
      if (!sep) break;
      const next = parser(input, sep.nextPos);
      if (!next) return null;
      values.push(next.value);
      nextPos = next.nextPos;
    }
    return { value: values, nextPos };
  };
}

function lazy<T>(fn: () => Parser<T>): Parser<T> {
  return (input, pos) => fn()(input, pos);
}

function chainLeft<T, Op extends string>(
  parser: Parser<T>,
  opParser: Parser<Op>,
  combine: (left: T, op: Op, right: T) => T
): Parser<T> {
  return (input, pos) => {
    const result = parser(input, pos);
    if (!result) return null;
    let value = result.value;
    let nextPos = result.nextPos;
    // eslint-disable-next-line no-constant-condition
    while (true) {
      const op = opParser(input, nextPos);
      if (!op) break;
      const right = parser(input, op.nextPos);
      if (!right) break;
      value = combine(value, op.value, right.value);
      nextPos = right.nextPos;
    }
    return { value, nextPos };
  };
}

function parens<T>(parser: Parser<T>): Parser<T> {
  return (input, pos) => {
    const lp = symbol("(")(input, pos);
    if (!lp) return null;
    const inner = parser(input, lp.nextPos);
    if (!inner) return null;
    const rp = symbol(")")(input, inner.nextPos);
    if (!rp) return null;
    return { value: inner.value, nextPos: rp.nextPos };
  };
}

/* --------------------------------------------------------------------------
 * LEXER HELPERS
 * -------------------------------------------------------------------------- */

const identifier: Parser<string> = regex(/[A-Za-z_][A-Za-z0-9_]*/);

const numberLiteral: Parser<number> = map(
  regex(/(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/),
  (v) => Number(v)
);

const STRING_ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r", "0": "\0" };

const stringLiteral: Parser<string> = map(
  regex(/"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'/),
  (raw) => raw.slice(1, -1).replace(/\\(.)/g, (_, ch: string) => STRING_ESCAPES[ch] ?? ch)
);

const BOOLEAN_WORDS = new Map<string, boolean>([
  ["true", true],
  ["True", true],
  ["false", false],
  ["False", false],
]);

/* --------------------------------------------------------------------------
 * EXPRESSION PARSER
 * -------------------------------------------------------------------------- */

const expr: Parser<FormulaNode> = lazy(() => comparison);

const argList: Parser<FormulaNode[]> = sepBy(expr, symbol(","));

const functionCall: Parser<FormulaNode> = (input, pos) => {
  const nameRes = identifier(input, pos);
  if (!nameRes) return null;
  const lp = symbol("(")(input, nameRes.nextPos);
  if (!lp) return null;

  const argsRes = argList(input, lp.nextPos);
  if (!argsRes) return null;

  const rp = symbol(")")(input, argsRes.nextPos);
  if (!rp) return null;

  return { value: Expr.call(nameRes.value, ...argsRes.value), nextPos: rp.nextPos };
};

const primary: Parser<FormulaNode> = choice(
  parens(expr),
  functionCall,
  map(numberLiteral, (n) => Expr.lit(n)),
  map(stringLiteral, (s) => Expr.lit(s)),
  map(identifier, (name) => {
    const word = BOOLEAN_WORDS.get(name);
    return word === undefined ? Expr.variable(name) : Expr.lit(word);
  })
);

const attributeCall = regex(/\.\s*[A-Za-z_][A-Za-z0-9_]*\s*\(/);

// Only a bare name may be called; `(f)(x)`, `SUM(x)(y)` or `a.b(x)` are
// rejected here rather than at evaluation time. A bare name still followed
// by `(` is a call whose argument list failed to parse: a syntax error.
const postfix: Parser<FormulaNode> = (input, pos) => {
  const result = primary(input, pos);
  if (!result) return null;
  const callAt = skipWs(input, result.nextPos);
  if (attributeCall(input, result.nextPos)) {
    throw new InvalidCallTargetError(input, callAt);
  }
  if (symbol("(")(input, result.nextPos)) {
    const bareName = identifier(input, pos);
    if (!bareName || bareName.nextPos !== result.nextPos) {
      throw new InvalidCallTargetError(input, callAt);
    }
  }
  return result;
};

const unary: Parser<FormulaNode> = lazy(() => choice(negation, power));

const negation: Parser<FormulaNode> = (input, pos) => {
  const minus = symbol("-")(input, pos);
  if (!minus) return null;
  const operand = unary(input, minus.nextPos);
  if (!operand) return null;
  return { value: Expr.negate(operand.value), nextPos: operand.nextPos };
};

const powerOp = choice(operator("**"), map(symbol("^"), () => "**" as const));

// Right-associative, and tighter than a unary minus on its left:
// `-2 ** 2` is `-(2 ** 2)`, `2 ** -1` is `2 ** (-1)`.
const power: Parser<FormulaNode> = (input, pos) => {
  const base = postfix(input, pos);
  if (!base) return null;
  const op = powerOp(input, base.nextPos);
  if (!op) return base;
  const exponent = unary(input, op.nextPos);
  if (!exponent) return base;
  return { value: Expr.binary("**", base.value, exponent.value), nextPos: exponent.nextPos };
};

const multiplicative: Parser<FormulaNode> = chainLeft(
  unary,
  choice<ArithmeticOp>(operator("*", /\*(?!\*)/), operator("/")),
  (left, op, right) => Expr.binary(op, left, right)
);

const additive: Parser<FormulaNode> = chainLeft(
  multiplicative,
  choice<ArithmeticOp>(operator("+"), operator("-")),
  (left, op, right) => Expr.binary(op, left, right)
);

const comparator: Parser<CompareOp> = choice<CompareOp>(
  operator(">="),
  operator("<="),
  operator("=="),
  operator("!="),
  operator(">"),
  operator("<")
);

const comparison: Parser<FormulaNode> = (input, pos) => {
  const first = additive(input, pos);
  if (!first) return null;
  const operands: FormulaNode[] = [first.value];
  const ops: CompareOp[] = [];
  let nextPos = first.nextPos;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    const op = comparator(input, nextPos);
    if (!op) break;
    const right = additive(input, op.nextPos);
    if (!right) break;
    ops.push(op.value);
    operands.push(right.value);
    nextPos = right.nextPos;
  }
  if (ops.length === 0) return first;
  return { value: Expr.compare(operands, ops), nextPos };
};

/* --------------------------------------------------------------------------
 * ENTRY POINT
 * -------------------------------------------------------------------------- */

/**
 * Parse a single formula expression. The whole input must be consumed.
 */
export function parseFormula(text: string): FormulaNode {
  const result = expr(text, 0);
  if (!result) {
    const at = skipWs(text, 0);
    throw new FormulaSyntaxError(
      text,
      at,
      at >= text.length ? "Empty expression" : `Unexpected '${text[at]}'`
    );
  }
  const end = skipWs(text, result.nextPos);
  if (end !== text.length) {
    throw new FormulaSyntaxError(text, end, `Unexpected '${text[end]}'`);
  }
  return result.value;
}
