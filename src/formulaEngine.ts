import { AggregateContext, FormulaNode, FormulaValue, Row } from "./formulaAst";
import { CompilerStats, FormulaCompiler } from "./formulaCompiler";
import { evaluate } from "./formulaEvaluator";
import { Classification, FormulaBatch, classifyFormulas } from "./formulaClassifier";
import { precomputeColumnAggregates } from "./columnAggregates";
import { BatchResult, executeBatch } from "./scenarioExecutor";
import { EngineConfig, loadEngineConfig } from "./config";
import { Logger, createLogger } from "./logger";

export interface EngineExecuteOptions {
  /** Precomputed values such as `SUM_sales`, see `precomputeAggregates`. */
  aggregates?: AggregateContext;
}

/**
 * Compiler, logger and failure policy bundled from one configuration.
 */
export class FormulaEngine {
  private readonly config: EngineConfig;
  private readonly compiler: FormulaCompiler;
  private readonly logger: Logger;

  private constructor(config: EngineConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
    this.compiler = new FormulaCompiler({ capacity: config.cacheCapacity, logger });
  }

  static create(overrides: Partial<EngineConfig> = {}, logger?: Logger): FormulaEngine {
    const config = loadEngineConfig(overrides);
    return new FormulaEngine(config, logger ?? createLogger(config.logLevel));
  }

  getConfig(): EngineConfig {
    return { ...this.config };
  }

  compile(text: string): FormulaNode {
    return this.compiler.compile(text);
  }

  evaluate(text: string, row: Row, aggregates?: AggregateContext): FormulaValue {
    return evaluate(this.compiler.compile(text), row, aggregates);
  }

  classify(batch: FormulaBatch): Classification {
    return classifyFormulas(batch, this.compiler);
  }

  /**
   * Fold every `SUM|AVG|COUNT|MIN|MAX(column)` call in `batch` over `rows`,
   * keyed `${FUNC}_${column}`.
   */
  precomputeAggregates(rows: Row[], batch: FormulaBatch): AggregateContext {
    return precomputeColumnAggregates(rows, batch, this.compiler);
  }

  execute(rows: Row[], batch: FormulaBatch, options: EngineExecuteOptions = {}): BatchResult {
    const result = executeBatch(rows, batch, {
      compiler: this.compiler,
      logger: this.logger,
      aggregates: options.aggregates,
      rowErrorPolicy: this.config.rowErrorPolicy,
    });

    this.logger.info(
      { rows: rows.length, targets: Object.keys(result.columns).length, failures: result.failures.length },
      "formula batch executed"
    );
    return result;
  }

  cacheStats(): CompilerStats {
    return this.compiler.stats();
  }
}
