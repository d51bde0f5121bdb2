export * from "./formulaAst";
export * from "./errors";
export { parseFormula } from "./formulaParser";
export type { Parser, ParseResult } from "./formulaParser";
export * from "./lruCache";
export * from "./formulaCompiler";
export * from "./formulaFunctions";
export * from "./formulaEvaluator";
export * from "./dependencyAnalysis";
export * from "./formulaClassifier";
export * from "./columnAggregates";
export * from "./scenarioExecutor";
export * from "./formulaEngine";
export * from "./config";
export * from "./logger";
