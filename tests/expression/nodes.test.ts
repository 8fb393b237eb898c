/**
 * Expression Node Tests
 */

import { describe, test, expect } from "vitest";
import {
  add,
  and,
  call,
  formatExpression,
  ge,
  gt,
  intConst,
  ite,
  le,
  negate,
  not,
  or,
  realConst,
  symbol,
  variable,
  Variable,
} from "../../src/expression";

const x = variable("x");
const n = variable("n");

describe("formatExpression", () => {
  test("comparisons", () => {
    expect(formatExpression(ge(x, intConst(3)))).toBe("x >= 3");
  });

  test("arithmetic is parenthesized", () => {
    expect(formatExpression(add(x, intConst(1)))).toBe("(x + 1)");
    expect(formatExpression(negate(x))).toBe("-x");
  });

  test("connectives", () => {
    expect(formatExpression(and(ge(x, intConst(0)), le(x, n)))).toBe("(x >= 0 && x <= n)");
    expect(formatExpression(or(gt(x, n), le(x, intConst(0))))).toBe("(x > n || x <= 0)");
    expect(formatExpression(not(variable("p", "bool")))).toBe("!p");
  });

  test("empty connectives are literals", () => {
    expect(formatExpression(and())).toBe("true");
    expect(formatExpression(or())).toBe("false");
  });

  test("conditionals", () => {
    const e = ite(gt(n, intConst(0)), ge(x, intConst(0)), le(x, intConst(0)));
    expect(formatExpression(e)).toBe("(if n > 0 then x >= 0 else x <= 0)");
  });

  test("reals keep a decimal point", () => {
    expect(formatExpression(realConst(2))).toBe("2.0");
    expect(formatExpression(realConst(2.5))).toBe("2.5");
  });

  test("uninterpreted calls", () => {
    expect(formatExpression(call("even", [x]))).toBe("even(x)");
    expect(call("even", [x]).type).toBe("bool");
  });

  test("toString matches formatExpression", () => {
    expect(ge(x, n).toString()).toBe("x >= n");
  });
});

describe("syntacticEq", () => {
  test("variables compare by name and type", () => {
    expect(variable("x").syntacticEq(variable("x"))).toBe(true);
    expect(variable("x").syntacticEq(variable("y"))).toBe(false);
    expect(variable("x").syntacticEq(variable("x", "real"))).toBe(false);
  });

  test("applications compare structurally", () => {
    expect(ge(x, intConst(3)).syntacticEq(ge(x, intConst(3)))).toBe(true);
    expect(ge(x, intConst(3)).syntacticEq(ge(x, intConst(4)))).toBe(false);
    expect(ge(x, intConst(3)).syntacticEq(le(x, intConst(3)))).toBe(false);
  });

  test("integer and real constants differ", () => {
    expect(intConst(2).syntacticEq(realConst(2))).toBe(false);
  });
});

describe("replace and set", () => {
  test("replace substitutes every occurrence", () => {
    const e = and(ge(x, intConst(0)), le(x, n));
    expect(formatExpression(e.replace(x, variable("i")))).toBe("(i >= 0 && i <= n)");
  });

  test("replace returns the same node when nothing matches", () => {
    const e = ge(x, intConst(3));
    expect(e.replace(variable("y"), n)).toBe(e);
  });

  test("replace of a node by itself is an identity", () => {
    const e = add(x, n);
    expect(e.replace(e, e).syntacticEq(e)).toBe(true);
    expect(e.replace(x, x).syntacticEq(e)).toBe(true);
  });

  test("replace matches whole subtrees", () => {
    const e = le(x, add(n, intConst(1)));
    expect(formatExpression(e.replace(add(n, intConst(1)), variable("m")))).toBe("x <= m");
  });

  test("set addresses the function at 0 and arguments from 1", () => {
    const e = ge(x, intConst(3));
    expect(formatExpression(e.set(2, intConst(4)))).toBe("x >= 4");
    expect(formatExpression(e.set(0, symbol("<")))).toBe("x < 3");
    expect(formatExpression(e)).toBe("x >= 3");
  });

  test("set out of range throws", () => {
    expect(() => ge(x, n).set(3, n)).toThrow(RangeError);
    expect(() => x.set(0, n)).toThrow(RangeError);
  });

  test("leaves have no subexpressions", () => {
    expect(x.subexpressions).toEqual([]);
    expect(x).toBeInstanceOf(Variable);
  });
});
