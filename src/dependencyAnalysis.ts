// dependencyAnalysis.ts
// Static passes over a compiled tree. Nothing here evaluates a formula.

import { FormulaNode, walkFormula } from "./formulaAst";
import { FormulaCompiler, defaultCompiler } from "./formulaCompiler";
import { isFormulaFunction } from "./formulaFunctions";

export const AGGREGATE_FUNCTIONS = ["SUM", "AVG", "COUNT", "MIN", "MAX"] as const;

export type AggregateFunction = (typeof AGGREGATE_FUNCTIONS)[number];

/** Whole-column functions whose presence makes a formula scenario-level. */
export const SCENARIO_FUNCTIONS = ["DOT", "NORM"] as const;

export interface AggregateDependency {
  fn: AggregateFunction;
  column: string;
  /** `${fn}_${column}`, the name a precomputed value is published under. */
  key: string;
}

function asAggregateFunction(name: string): AggregateFunction | undefined {
  const upper = name.toUpperCase();
  return AGGREGATE_FUNCTIONS.find((fn) => fn === upper);
}

export function aggregateKey(fn: AggregateFunction, column: string): string {
  return `${fn}_${column}`;
}

/**
 * Every variable the formula reads, excluding names that belong to the
 * function library.
 */
export function freeIdentifiers(tree: FormulaNode): Set<string> {
  const names = new Set<string>();
  walkFormula(tree, (node) => {
    if (node.kind === "Var" && !isFormulaFunction(node.name)) {
      names.add(node.name);
    }
  });
  return names;
}

/**
 * `SUM|AVG|COUNT|MIN|MAX` calls (any case) whose only argument is a bare
 * column name. `SUM(x * 2)` contributes nothing.
 */
export function aggregateDependencies(tree: FormulaNode): AggregateDependency[] {
  const found = new Map<string, AggregateDependency>();
  walkFormula(tree, (node) => {
    if (node.kind !== "Call" || node.args.length !== 1) return;
    const fn = asAggregateFunction(node.fn);
    const [arg] = node.args;
    if (!fn || arg.kind !== "Var") return;
    const key = aggregateKey(fn, arg.name);
    if (!found.has(key)) found.set(key, { fn, column: arg.name, key });
  });
  return Array.from(found.values());
}

export function usesScenarioFunction(tree: FormulaNode): boolean {
  let uses = false;
  walkFormula(tree, (node) => {
    if (node.kind === "Call") {
      const upper = node.fn.toUpperCase();
      if (SCENARIO_FUNCTIONS.some((fn) => fn === upper)) uses = true;
    }
  });
  return uses;
}

export function extractIdentifiers(
  text: string,
  compiler: FormulaCompiler = defaultCompiler()
): Set<string> {
  return freeIdentifiers(compiler.compile(text));
}

export function extractAggregateDependencies(
  text: string,
  compiler: FormulaCompiler = defaultCompiler()
): AggregateDependency[] {
  return aggregateDependencies(compiler.compile(text));
}
