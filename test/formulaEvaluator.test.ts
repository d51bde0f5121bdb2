import { expect } from "chai";
import { FormulaNode } from "../src/formulaAst";
import { FormulaCompiler } from "../src/formulaCompiler";
import {
  evaluate,
  lookupVariable,
  runFormula,
  runFormulaWithAggregates,
} from "../src/formulaEvaluator";
import {
  OperandTypeError,
  UnknownFunctionError,
  UnknownVariableError,
  UnsupportedExpressionError,
} from "../src/errors";

describe("formula evaluator", () => {
  const compiler = new FormulaCompiler();

  describe("variable lookup", () => {
    it("prefers row values over aggregates", () => {
      expect(lookupVariable("x", { x: 1 }, { x: 2 })).to.equal(1);
      expect(lookupVariable("x", {}, { x: 2 })).to.equal(2);
    });

    it("raises for names found in neither", () => {
      expect(() => runFormula("y + 1", { x: 1 }, compiler))
        .to.throw(UnknownVariableError, "Unknown variable 'y'")
        .with.property("variable", "y");
    });

    it("does not resolve inherited object properties", () => {
      expect(() => runFormula("constructor", {}, compiler)).to.throw(UnknownVariableError);
    });
  });

  describe("chained comparisons", () => {
    it("hold only when every adjacent pair holds", () => {
      expect(runFormula("1 < 2 < 3", {}, compiler)).to.equal(true);
      expect(runFormula("3 < 2 < 5", {}, compiler)).to.equal(false);
      expect(runFormula("1 < 3 > 2", {}, compiler)).to.equal(true);
      expect(runFormula("2 == 2 != 3", {}, compiler)).to.equal(true);
    });

    it("stop at the first false pair", () => {
      expect(runFormula("3 < 2 < missing", {}, compiler)).to.equal(false);
    });

    it("order strings and reject mixed operands", () => {
      expect(runFormula("'a' < 'b'", {}, compiler)).to.equal(true);
      expect(runFormula("1 == '1'", {}, compiler)).to.equal(false);
      expect(() => runFormula("'a' < 1", {}, compiler)).to.throw(OperandTypeError);
    });
  });

  describe("arithmetic", () => {
    it("follows IEEE division", () => {
      expect(runFormula("1 / 0", {}, compiler)).to.equal(Infinity);
      expect(runFormula("-1 / 0", {}, compiler)).to.equal(-Infinity);
      expect(runFormula("0 / 0", {}, compiler)).to.be.NaN;
    });

    it("propagates null", () => {
      const row = { d: null };
      expect(runFormula("d * 2", row, compiler)).to.equal(null);
      expect(runFormula("-d", row, compiler)).to.equal(null);
      expect(runFormula("d > 1", row, compiler)).to.equal(null);
    });

    it("counts booleans as 0 and 1", () => {
      expect(runFormula("True + 1", {}, compiler)).to.equal(2);
      expect(runFormula("flag * 10", { flag: false }, compiler)).to.equal(0);
    });

    it("evaluates unary minus after power", () => {
      expect(runFormula("-2 ** 2", {}, compiler)).to.equal(-4);
      expect(runFormula("2 ** -1", {}, compiler)).to.equal(0.5);
    });
  });

  it("rejects functions outside the library", () => {
    expect(() => runFormula("eval(1)", {}, compiler)).to.throw(
      UnknownFunctionError,
      "Function 'eval' is not allowed"
    );
    expect(() => runFormula("sum(x)", { x: [1] }, compiler)).to.throw(UnknownFunctionError);
  });

  it("rejects node kinds it does not know", () => {
    const node: FormulaNode = JSON.parse('{"kind":"Lambda"}');
    expect(() => evaluate(node, {})).to.throw(
      UnsupportedExpressionError,
      "Unsupported expression: Lambda"
    );
  });

  it("reads precomputed aggregates as identifiers", () => {
    expect(
      runFormulaWithAggregates("sales / SUM_sales * 100", { sales: 25 }, { SUM_sales: 200 }, compiler)
    ).to.equal(12.5);
  });

  it("gives the same result for the same tree and row", () => {
    const tree = compiler.compile("sqrt(pow(Y, 2) - 4 * X * Z)");
    const row = { X: 1, Y: -5, Z: 6 };
    expect(evaluate(tree, row)).to.equal(1);
    expect(evaluate(tree, row)).to.equal(evaluate(compiler.compile("sqrt(pow(Y, 2) - 4 * X * Z)"), row));
  });
});
