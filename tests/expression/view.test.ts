/**
 * Constraint View Tests
 */

import { describe, test, expect } from "vitest";
import {
  add,
  and,
  apply,
  conjuncts,
  formatExpression,
  ge,
  gt,
  intConst,
  ite,
  le,
  lt,
  mentions,
  negateConstraint,
  or,
  TRUE,
  variable,
  viewConstraint,
} from "../../src/expression";

const x = variable("x");
const n = variable("n");

describe("viewConstraint", () => {
  test("literals", () => {
    expect(viewConstraint(TRUE)).toEqual({ kind: "literal", value: true });
  });

  test("relations expose operator and operands", () => {
    const view = viewConstraint(ge(x, n));
    expect(view.kind).toBe("relation");
    if (view.kind === "relation") {
      expect(view.op).toBe(">=");
      expect(view.args).toHaveLength(2);
    }
  });

  test("conditionals", () => {
    const view = viewConstraint(ite(gt(n, intConst(0)), ge(x, n), le(x, n)));
    expect(view.kind).toBe("ite");
  });

  test("anything else is other", () => {
    expect(viewConstraint(x).kind).toBe("other");
    expect(viewConstraint(apply("not", [x, n], "bool")).kind).toBe("other");
  });
});

describe("conjuncts", () => {
  test("flattens nested conjunctions and drops true", () => {
    const a = ge(x, intConst(0));
    const b = le(x, n);
    const c = gt(n, intConst(1));
    expect(conjuncts(and(a, and(b, c), TRUE)).map(formatExpression)).toEqual(["x >= 0", "x <= n", "n > 1"]);
  });

  test("a non-conjunction is a single conjunct", () => {
    expect(conjuncts(or(ge(x, n), le(x, n)))).toHaveLength(1);
  });
});

describe("negateConstraint", () => {
  test("applies De Morgan", () => {
    expect(formatExpression(negateConstraint(and(ge(x, intConst(0)), lt(x, n))))).toBe("(x < 0 || x >= n)");
  });

  test("wraps predicates", () => {
    expect(formatExpression(negateConstraint(variable("p", "bool")))).toBe("!p");
  });

  test("pushes into conditional branches", () => {
    const e = ite(gt(n, intConst(0)), ge(x, n), le(x, intConst(0)));
    expect(formatExpression(negateConstraint(e))).toBe("(if n > 0 then x < n else x > 0)");
  });
});

describe("mentions", () => {
  test("finds nested occurrences", () => {
    expect(mentions(le(add(x, intConst(1)), n), x)).toBe(true);
    expect(mentions(le(n, intConst(3)), x)).toBe(false);
  });
});
