import { expect } from "chai";
import { Expr } from "../src/formulaAst";
import { parseFormula } from "../src/formulaParser";
import { FormulaSyntaxError, InvalidCallTargetError } from "../src/errors";

describe("formula parser", () => {
  it("binds multiplication tighter than addition", () => {
    expect(parseFormula("1 + 2 * 3")).to.deep.equal(
      Expr.binary("+", Expr.lit(1), Expr.binary("*", Expr.lit(2), Expr.lit(3)))
    );
  });

  it("associates subtraction to the left", () => {
    expect(parseFormula("a - b - c")).to.deep.equal(
      Expr.binary(
        "-",
        Expr.binary("-", Expr.variable("a"), Expr.variable("b")),
        Expr.variable("c")
      )
    );
  });

  it("binds power tighter than unary minus and to the right", () => {
    expect(parseFormula("-2 ** 2")).to.deep.equal(
      Expr.negate(Expr.binary("**", Expr.lit(2), Expr.lit(2)))
    );
    expect(parseFormula("2 ** 3 ** 2")).to.deep.equal(
      Expr.binary("**", Expr.lit(2), Expr.binary("**", Expr.lit(3), Expr.lit(2)))
    );
  });

  it("reads caret as power", () => {
    expect(parseFormula("2 ^ 3")).to.deep.equal(Expr.binary("**", Expr.lit(2), Expr.lit(3)));
  });

  it("keeps chained comparisons as one node", () => {
    expect(parseFormula("1 < x <= 3")).to.deep.equal(
      Expr.compare([Expr.lit(1), Expr.variable("x"), Expr.lit(3)], ["<", "<="])
    );
  });

  it("parses calls, literals and booleans", () => {
    expect(parseFormula("DOT(price, qty)")).to.deep.equal(
      Expr.call("DOT", Expr.variable("price"), Expr.variable("qty"))
    );
    expect(parseFormula(".5 + 1e2")).to.deep.equal(
      Expr.binary("+", Expr.lit(0.5), Expr.lit(100))
    );
    expect(parseFormula('"say \\"hi\\""')).to.deep.equal(Expr.lit('say "hi"'));
    expect(parseFormula("True")).to.deep.equal(Expr.lit(true));
  });

  it("returns frozen trees", () => {
    const tree = parseFormula("a * (b + 1)");
    expect(Object.isFrozen(tree)).to.equal(true);
  });

  it("reports the position of unparsed input", () => {
    expect(() => parseFormula("1 +")).to.throw(FormulaSyntaxError, "Unexpected '+' at position 2");
    expect(() => parseFormula("a = 1")).to.throw(FormulaSyntaxError, "Unexpected '=' at position 2");
    expect(() => parseFormula("")).to.throw(FormulaSyntaxError, "Empty expression at position 0");
  });

  it("rejects calls on anything but a bare function name", () => {
    expect(() => parseFormula("(f)(x)")).to.throw(
      InvalidCallTargetError,
      "Only simple function calls allowed (call at position 3 in formula: (f)(x))"
    );
    expect(() => parseFormula("SUM(x)(y)")).to.throw(InvalidCallTargetError);
    expect(() => parseFormula("x.y(1)")).to.throw(InvalidCallTargetError);
  });

  it("treats an unclosed call as a syntax error", () => {
    expect(() => parseFormula("SUM(x")).to.throw(FormulaSyntaxError, "Unexpected '(' at position 3");
  });
});
