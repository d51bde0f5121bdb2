import { FormulaNode } from "./formulaAst";
import { FormulaCompiler, defaultCompiler } from "./formulaCompiler";
import { usesScenarioFunction } from "./dependencyAnalysis";

/**
 * Target column -> formula text. Order is the evaluation order. Plain
 * objects iterate integer-like keys first, so targets named like `"1"` need a
 * `Map` to keep their declared position.
 */
export type FormulaBatch = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

export type FormulaEntry = readonly [target: string, formula: string];

export interface CompiledFormula {
  target: string;
  formula: string;
  tree: FormulaNode;
}

export interface Classification {
  rowFormulas: CompiledFormula[];
  scenarioFormulas: CompiledFormula[];
}

function isMap(batch: FormulaBatch): batch is ReadonlyMap<string, string> {
  return batch instanceof Map;
}

export function batchEntries(batch: FormulaBatch): FormulaEntry[] {
  return isMap(batch) ? Array.from(batch.entries()) : Object.entries(batch);
}

/**
 * Split a batch into per-row formulas and scenario formulas (those calling
 * DOT or NORM), keeping batch order inside each group. SUM/AVG/COUNT alone
 * keep a formula row-level.
 */
export function classifyFormulas(
  batch: FormulaBatch,
  compiler: FormulaCompiler = defaultCompiler()
): Classification {
  const rowFormulas: CompiledFormula[] = [];
  const scenarioFormulas: CompiledFormula[] = [];

  for (const [target, formula] of batchEntries(batch)) {
    const compiled: CompiledFormula = { target, formula, tree: compiler.compile(formula) };
    if (usesScenarioFunction(compiled.tree)) {
      scenarioFormulas.push(compiled);
    } else {
      rowFormulas.push(compiled);
    }
  }

  return { rowFormulas, scenarioFormulas };
}
