// scenarioExecutor.ts
// Three-phase execution of a formula batch over in-memory rows.
//
// 1. Row phase: row formulas run per row, in batch order, each result
//    written into a copy of the row.
// 2. Scenario phase: columns read by DOT/NORM formulas become vectors, and
//    the scenario formulas run once, in batch order, each seeing the results
//    of the ones before it.
// 3. Back-propagation: scenario results are written into every row and the
//    row formulas that read them are evaluated again, once.

import {
  AggregateContext,
  FormulaValue,
  Row,
} from "./formulaAst";
import { evaluate } from "./formulaEvaluator";
import { FormulaCompiler, defaultCompiler } from "./formulaCompiler";
import {
  CompiledFormula,
  FormulaBatch,
  batchEntries,
  classifyFormulas,
} from "./formulaClassifier";
import { freeIdentifiers } from "./dependencyAnalysis";
import { numericCell, rowsToEnumerable } from "./columnAggregates";
import { FormulaError } from "./errors";
import type { RowErrorPolicy } from "./config";
import type { Logger } from "./logger";

/* --------------------------------------------------------------------------
 * TYPES
 * -------------------------------------------------------------------------- */

export type ExecutionPhase = "row" | "scenario" | "backPropagation";

export interface FormulaFailure {
  target: string;
  formula: string;
  /** `null` for scenario formulas, which run once per batch. */
  rowIndex: number | null;
  phase: ExecutionPhase;
  error: FormulaError;
}

export interface BatchResult {
  /** One value per input row for every target, in batch order. */
  columns: Record<string, FormulaValue[]>;
  scenarioResults: Record<string, FormulaValue>;
  failures: FormulaFailure[];
}

export interface ExecuteOptions {
  compiler?: FormulaCompiler;
  logger?: Logger;
  /** Overlaid under every row and under the scenario context. */
  aggregates?: AggregateContext;
  rowErrorPolicy?: RowErrorPolicy;
}

type ExecutionState = "pending" | ExecutionPhase | "done";

function hasOwn(record: Row, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, name);
}

function intersects(names: Set<string>, targets: Set<string>): boolean {
  for (const name of names) {
    if (targets.has(name)) return true;
  }
  return false;
}

/* --------------------------------------------------------------------------
 * EXECUTION
 * -------------------------------------------------------------------------- */

class ScenarioExecution {
  private state: ExecutionState = "pending";
  private readonly rows: Row[];
  private readonly rowFormulas: CompiledFormula[];
  private readonly scenarioFormulas: CompiledFormula[];
  private readonly scenarioTargets: Set<string>;
  private readonly scenarioDependents: Set<string>;
  private readonly aggregates?: AggregateContext;
  private readonly policy: RowErrorPolicy;
  private readonly logger?: Logger;

  private computed: Row[] = [];
  private readonly scenarioResults: Record<string, FormulaValue> = {};
  private readonly failures: FormulaFailure[] = [];

  constructor(
    rows: Row[],
    formulas: { rowFormulas: CompiledFormula[]; scenarioFormulas: CompiledFormula[] },
    options: ExecuteOptions
  ) {
    this.rows = rows;
    this.rowFormulas = formulas.rowFormulas;
    this.scenarioFormulas = formulas.scenarioFormulas;
    this.scenarioTargets = new Set(this.scenarioFormulas.map((f) => f.target));
    this.scenarioDependents = new Set(
      this.rowFormulas
        .filter((f) => intersects(freeIdentifiers(f.tree), this.scenarioTargets))
        .map((f) => f.target)
    );
    this.aggregates = options.aggregates;
    this.policy = options.rowErrorPolicy ?? "isolate";
    this.logger = options.logger;
  }

  private advance(from: ExecutionState, to: ExecutionState): void {
    if (this.state !== from) {
      throw new Error(`Cannot enter ${to} phase from ${this.state}`);
    }
    this.state = to;
    this.logger?.debug({ phase: to, rows: this.rows.length }, "formula batch phase");
  }

  private fail(
    formula: CompiledFormula,
    rowIndex: number | null,
    phase: ExecutionPhase,
    error: FormulaError
  ): FormulaValue {
    if (this.policy === "throw") throw error;
    this.failures.push({ target: formula.target, formula: formula.formula, rowIndex, phase, error });
    this.logger?.warn(
      { target: formula.target, rowIndex, phase, code: error.code, err: error },
      "formula evaluation failed"
    );
    return null;
  }

  private evaluateCell(
    formula: CompiledFormula,
    env: Row,
    rowIndex: number | null,
    phase: ExecutionPhase
  ): FormulaValue {
    try {
      return evaluate(formula.tree, env, this.aggregates);
    } catch (error) {
      if (!(error instanceof FormulaError)) throw error;
      // Row formulas that read scenario results are evaluated again in the
      // back-propagation phase; their failures are reported from there.
      if (phase === "row" && this.scenarioDependents.has(formula.target)) return null;
      return this.fail(formula, rowIndex, phase, error);
    }
  }

  runRowPhase(): void {
    this.advance("pending", "row");
    this.computed = this.rows.map((row, rowIndex) => {
      const computed: Row = { ...row };
      for (const formula of this.rowFormulas) {
        computed[formula.target] = this.evaluateCell(formula, computed, rowIndex, "row");
      }
      return computed;
    });
  }

  /**
   * A name present on the first computed row is read from every row as a
   * vector; any other name is taken as a scalar from the first input row
   * when it has one. Names found in neither are left to the aggregate
   * context or to earlier scenario results.
   */
  private buildScenarioContext(): Row {
    const context: Row = {};
    const [firstComputed] = this.computed;
    const [firstRaw] = this.rows;
    const names = new Set<string>();
    this.scenarioFormulas.forEach((f) => freeIdentifiers(f.tree).forEach((n) => names.add(n)));

    for (const name of names) {
      if (hasOwn(firstComputed, name)) {
        context[name] = rowsToEnumerable(this.computed)
          .select((r: Row) => numericCell(r[name]))
          .toArray();
      } else if (hasOwn(firstRaw, name)) {
        context[name] = firstRaw[name];
      }
    }
    return context;
  }

  runScenarioPhase(): void {
    this.advance("row", "scenario");
    const context = this.buildScenarioContext();
    for (const formula of this.scenarioFormulas) {
      const value = this.evaluateCell(formula, context, null, "scenario");
      context[formula.target] = value;
      this.scenarioResults[formula.target] = value;
    }
  }

  /**
   * Single pass, no fixed point: a row formula that reads a scenario result
   * only through another row formula keeps its row-phase value.
   */
  runBackPropagation(): void {
    this.advance("scenario", "backPropagation");
    const dependents = this.rowFormulas.filter((f) => this.scenarioDependents.has(f.target));
    this.computed = this.computed.map((row, rowIndex) => {
      const next: Row = { ...row, ...this.scenarioResults };
      for (const formula of dependents) {
        next[formula.target] = this.evaluateCell(formula, next, rowIndex, "backPropagation");
      }
      return next;
    });
  }

  finish(targets: string[]): BatchResult {
    if (this.state === "done") throw new Error("Formula batch already finished");
    this.state = "done";
    const columns: Record<string, FormulaValue[]> = {};
    for (const target of targets) {
      columns[target] = this.computed.map((row) =>
        hasOwn(row, target) ? row[target] : null
      );
    }
    return { columns, scenarioResults: { ...this.scenarioResults }, failures: this.failures };
  }

  get hasScenarioWork(): boolean {
    return this.scenarioFormulas.length > 0 && this.rows.length > 0;
  }
}

/**
 * Evaluate every formula of `batch` against `rows`.
 *
 * Formula text that does not parse fails the whole call before any row is
 * touched. Evaluation failures follow `rowErrorPolicy`: `isolate` records the
 * failure and leaves `null` in that cell, `throw` rethrows it.
 */
export function executeBatch(
  rows: Row[],
  batch: FormulaBatch,
  options: ExecuteOptions = {}
): BatchResult {
  const compiler = options.compiler ?? defaultCompiler();
  const targets = batchEntries(batch).map(([target]) => target);
  const execution = new ScenarioExecution(rows, classifyFormulas(batch, compiler), options);

  execution.runRowPhase();
  if (execution.hasScenarioWork) {
    execution.runScenarioPhase();
    execution.runBackPropagation();
  }
  return execution.finish(targets);
}
