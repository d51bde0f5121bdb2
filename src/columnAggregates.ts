// columnAggregates.ts
// Precompute the column aggregates a batch asks for, once per batch instead
// of once per row.
//
// - `aggregateDependencies` names the (function, column) pairs.
// - Each pair is folded over the rows a single time and published under
//   `${FUNC}_${column}`, the same key a database collaborator would use.

import Enumerable from "linq";
import { AggregateContext, FormulaValue, Row, isVector } from "./formulaAst";
import {
  AggregateDependency,
  AggregateFunction,
  aggregateDependencies,
} from "./dependencyAnalysis";
import { FormulaBatch, batchEntries } from "./formulaClassifier";
import { FormulaCompiler, defaultCompiler } from "./formulaCompiler";

export function rowsToEnumerable(rows: Row[] = []) {
  return Enumerable.from(rows);
}

/** NaN for cells that hold no usable number. */
export function numericCell(value: FormulaValue | undefined): number {
  if (value === undefined || value === null || isVector(value)) return NaN;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number") return value;
  return NaN;
}

/**
 * Fold one column. Non-numeric, null and NaN cells are skipped by every
 * operator except COUNT, which counts rows.
 */
export function aggregateColumn(rows: Row[], column: string, fn: AggregateFunction): FormulaValue {
  if (fn === "COUNT") return rows.length;

  const values = rowsToEnumerable(rows)
    .select((r: Row) => numericCell(r[column]))
    .where((num: number) => !Number.isNaN(num))
    .toArray();

  switch (fn) {
    case "SUM":
      return values.reduce((a, b) => a + b, 0);
    case "AVG":
      return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
    case "MIN":
      return values.length === 0 ? null : values.reduce((a, b) => Math.min(a, b));
    case "MAX":
      return values.length === 0 ? null : values.reduce((a, b) => Math.max(a, b));
  }
}

export function collectAggregateDependencies(
  formulas: FormulaBatch,
  compiler: FormulaCompiler = defaultCompiler()
): AggregateDependency[] {
  const found = new Map<string, AggregateDependency>();
  for (const [, formula] of batchEntries(formulas)) {
    for (const dep of aggregateDependencies(compiler.compile(formula))) {
      if (!found.has(dep.key)) found.set(dep.key, dep);
    }
  }
  return Array.from(found.values());
}

export function precomputeColumnAggregates(
  rows: Row[],
  formulas: FormulaBatch,
  compiler: FormulaCompiler = defaultCompiler()
): AggregateContext {
  const aggregates: AggregateContext = {};
  for (const dep of collectAggregateDependencies(formulas, compiler)) {
    aggregates[dep.key] = aggregateColumn(rows, dep.column, dep.fn);
  }
  return aggregates;
}
