import { expect } from "chai";
import { FormulaCompiler } from "../src/formulaCompiler";
import { runFormula } from "../src/formulaEvaluator";
import { callFormulaFunction, isFormulaFunction } from "../src/formulaFunctions";
import { ArityError, OperandTypeError, ShapeError } from "../src/errors";

describe("formula function library", () => {
  const compiler = new FormulaCompiler();
  const run = (text: string, row: Record<string, number | null | readonly number[]> = {}) =>
    runFormula(text, row, compiler);

  describe("DOT and NORM", () => {
    it("computes the dot product of two columns", () => {
      expect(run("DOT(price, quantity)", { price: [100, 200, 300], quantity: [2, 3, 4] })).to.equal(2000);
    });

    it("skips NaN products", () => {
      expect(run("DOT(a, b)", { a: [1, NaN, 3], b: [1, 1, 1] })).to.equal(4);
    });

    it("rejects vectors of different lengths", () => {
      expect(() => run("DOT(a, b)", { a: [1, 2, 3], b: [1, 2] })).to.throw(
        ShapeError,
        "DOT() expects vectors of equal length, got 3 and 2"
      );
    });

    it("rejects scalar arguments", () => {
      expect(() => run("DOT(a, 5)", { a: [1, 2] })).to.throw(
        ShapeError,
        "DOT() argument 2 must be a one-dimensional vector, got scalar number"
      );
      expect(() => run("NORM(a)", { a: 3 })).to.throw(
        ShapeError,
        "NORM() argument 1 must be a one-dimensional vector, got scalar number"
      );
    });

    it("computes the euclidean norm", () => {
      expect(run("NORM(v)", { v: [3, 4] })).to.equal(5);
    });
  });

  describe("scalar functions", () => {
    it("returns null for the square root of a negative", () => {
      expect(run("sqrt(-1)")).to.equal(null);
      expect(run("sqrt(16)")).to.equal(4);
    });

    it("squares with one argument and raises with two", () => {
      expect(run("pow(3)")).to.equal(9);
      expect(run("pow(2, 10)")).to.equal(1024);
      expect(() => run("pow(1, 2, 3)")).to.throw(ArityError, "pow() expects 1 or 2 arguments, got 3");
    });

    it("refuses a vector where a scalar is expected", () => {
      expect(() => run("sqrt(v)", { v: [1, 4] })).to.throw(
        ShapeError,
        "sqrt() expects a scalar argument, got vector of length 2"
      );
    });

    it("applies abs elementwise", () => {
      expect(run("abs(-3)")).to.equal(3);
      expect(run("abs(v)", { v: [-1, 2] })).to.deep.equal([1, 2]);
    });

    it("propagates null arguments", () => {
      expect(run("abs(x)", { x: null })).to.equal(null);
      expect(run("max(x, 2)", { x: null })).to.equal(null);
    });
  });

  describe("min and max", () => {
    it("reduce a single vector", () => {
      expect(run("min(v)", { v: [4, 1, 7] })).to.equal(1);
      expect(run("max(v)", { v: [4, 1, 7] })).to.equal(7);
    });

    it("compare several scalars", () => {
      expect(run("min(3, 1, 2)")).to.equal(1);
      expect(run("max(4, 9)")).to.equal(9);
    });

    it("reject an empty vector, a lone scalar and no arguments", () => {
      expect(() => run("min(v)", { v: [] })).to.throw(ShapeError, "min() arg is an empty vector");
      expect(() => run("max(5)")).to.throw(ShapeError);
      expect(() => run("min()")).to.throw(ArityError, "min() expects at least 1 argument, got 0");
    });
  });

  describe("aggregates over vectors", () => {
    const row = { v: [1, NaN, 2] };

    it("skip NaN entries except in COUNT", () => {
      expect(run("SUM(v)", row)).to.equal(3);
      expect(run("AVG(v)", row)).to.equal(1.5);
      expect(run("COUNT(v)", row)).to.equal(3);
    });

    it("average an empty vector to 0 and an all-NaN vector to NaN", () => {
      expect(run("AVG(v)", { v: [] })).to.equal(0);
      expect(run("AVG(v)", { v: [NaN] })).to.be.NaN;
    });

    it("treat a scalar as a one-element vector", () => {
      expect(run("SUM(7)")).to.equal(7);
      expect(run("COUNT(7)")).to.equal(1);
    });
  });

  describe("operators", () => {
    it("combine vectors elementwise", () => {
      expect(run("a - b", { a: [5, 6], b: [1, 2] })).to.deep.equal([4, 4]);
      expect(run("a * 2", { a: [5, 6] })).to.deep.equal([10, 12]);
      expect(run("-a", { a: [5, -6] })).to.deep.equal([-5, 6]);
    });

    it("reject vectors of different lengths", () => {
      expect(() => run("a + b", { a: [1, 2], b: [1] })).to.throw(
        ShapeError,
        "Operands could not be combined with +: vector of length 2 and vector of length 1"
      );
    });

    it("concatenate strings but refuse other string arithmetic", () => {
      expect(run("'ab' + 'cd'")).to.equal("abcd");
      expect(() => run("'a' * 2")).to.throw(
        OperandTypeError,
        "Unsupported operand type(s) for *: string and number"
      );
    });
  });

  it("exposes only the registered names", () => {
    expect(isFormulaFunction("DOT")).to.equal(true);
    expect(isFormulaFunction("eval")).to.equal(false);
    expect(isFormulaFunction("toString")).to.equal(false);
    expect(callFormulaFunction("NORM", [[6, 8]])).to.equal(10);
  });
});
