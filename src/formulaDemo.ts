import { pathToFileURL } from "node:url";
import { Row } from "./formulaAst";
import { FormulaEngine } from "./formulaEngine";
import { BatchResult } from "./scenarioExecutor";

export interface FormulaDemoOutput {
  sales: BatchResult;
  quadratic: BatchResult;
}

function runFormulaDemo(engine: FormulaEngine = FormulaEngine.create()): FormulaDemoOutput {
  const salesRows: Row[] = [
    { product: "A", price: 100, quantity: 10, cost: 50 },
    { product: "B", price: 200, quantity: 5, cost: 100 },
    { product: "C", price: 150, quantity: 8, cost: 75 },
    { product: "D", price: 300, quantity: 3, cost: 150 },
  ];

  // Scenario formulas (DOT/NORM) run once over whole columns; `share` reads
  // the scenario result back on every row.
  const salesFormulas = new Map([
    ["revenue", "price * quantity"],
    ["margin", "(price - cost) / price * 100"],
    ["share", "revenue / total_revenue * 100"],
    ["avg_price_ratio", "price / AVG_price * 100"],
    ["total_revenue", "DOT(price, quantity)"],
    ["total_profit", "DOT(price - cost, quantity)"],
  ]);

  const aggregates = engine.precomputeAggregates(salesRows, { avg_price: "AVG(price)" });
  const sales = engine.execute(salesRows, salesFormulas, { aggregates });

  // Roots of X*x^2 + Y*x + Z with the discriminant computed first; rows with
  // no real roots get null from sqrt and null roots downstream.
  const quadraticRows: Row[] = [
    { X: 1, Y: -5, Z: 6 },
    { X: 2, Y: -8, Z: 6 },
    { X: 1, Y: 2, Z: 5 },
  ];
  const quadraticFormulas = new Map([
    ["DISCRIMINANT", "sqrt(pow(Y, 2) - 4 * X * Z)"],
    ["X1", "(-Y - DISCRIMINANT) / (2 * X)"],
    ["X2", "(-Y + DISCRIMINANT) / (2 * X)"],
  ]);

  const quadratic = engine.execute(quadraticRows, quadraticFormulas);

  return { sales, quadratic };
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const { sales, quadratic } = runFormulaDemo();
  console.log("Sales scenario columns:", sales.columns);
  console.log("Quadratic roots:", quadratic.columns);
}

export { runFormulaDemo };
