/**
 * Dotted Intervals Tests
 */

import { describe, test, expect } from "vitest";
import { SymbolicContext } from "../../src/context";
import { arithmetic, call, eq, ge, intConst, le, variable } from "../../src/expression";
import { ClosedInterval, DottedIntervals, NotEnumerableError } from "../../src/intervals";

const x = variable("x");
const n = variable("n");

const even = eq(arithmetic(x, "%", intConst(2)), intConst(0));

describe("DottedIntervals", () => {
  test("renders dots after the interval", () => {
    const d = new DottedIntervals(new ClosedInterval(intConst(0), intConst(9)), [even]);
    expect(d.toString()).toBe("[0, 9] where (x % 2) == 0");
  });

  test("without dots renders as the interval", () => {
    expect(new DottedIntervals(ClosedInterval.unbounded()).toString()).toBe("[?, ?]");
  });

  describe("enumerate", () => {
    test("filters the interval through the dots", () => {
      const d = new DottedIntervals(new ClosedInterval(intConst(0), intConst(9)), [even]);
      expect([...d.enumerate(x)]).toEqual([0n, 2n, 4n, 6n, 8n]);
    });

    test("binds the context before enumerating", () => {
      const d = new DottedIntervals(new ClosedInterval(intConst(0), n), [le(x, intConst(2))]);
      expect([...d.enumerate(x, SymbolicContext.withBindings({ n: 3 }))]).toEqual([0n, 1n, 2n]);
    });

    test("an undecidable dot is not enumerable", () => {
      const d = new DottedIntervals(new ClosedInterval(intConst(0), intConst(3)), [call("p", [x])]);
      expect(() => [...d.enumerate(x)]).toThrow(NotEnumerableError);
      expect(() => [...d.enumerate(x)]).toThrow("cannot decide p(x) for x = 0");
    });

    test("symbolic bounds are not enumerable", () => {
      const d = new DottedIntervals(new ClosedInterval(intConst(0), n));
      expect(() => [...d.enumerate(x)]).toThrow(NotEnumerableError);
    });
  });

  describe("expression interface", () => {
    test("subexpressions are the interval then the dots", () => {
      const i = new ClosedInterval(intConst(0), n);
      const d = new DottedIntervals(i, [even]);
      expect(d.subexpressions).toEqual([i, even]);
    });

    test("position 0 must stay an interval", () => {
      const d = new DottedIntervals(ClosedInterval.unbounded(), [even]);
      expect(() => d.set(0, x)).toThrow(TypeError);
      expect(d.set(0, ClosedInterval.empty()).isEmpty()).toBe(true);
    });

    test("set replaces a dot", () => {
      const d = new DottedIntervals(ClosedInterval.unbounded(), [even]);
      expect(d.set(1, ge(x, n)).toString()).toBe("[?, ?] where x >= n");
      expect(() => d.set(2, x)).toThrow(RangeError);
    });

    test("replacing the interval needs another interval", () => {
      const i = new ClosedInterval(intConst(0), n);
      const d = new DottedIntervals(i, [even]);
      expect(() => d.replace(i, x)).toThrow(TypeError);
      expect(d.replace(i, ClosedInterval.empty()).toString()).toBe("[0, -1] where (x % 2) == 0");
    });

    test("replace reaches bounds and dots", () => {
      const d = new DottedIntervals(new ClosedInterval(intConst(0), n), [le(x, n)]);
      expect(d.replace(n, intConst(4)).toString()).toBe("[0, 4] where x <= 4");
      expect(d.replace(variable("m"), intConst(4))).toBe(d);
      expect(d.replace(d, d).syntacticEq(d)).toBe(true);
    });

    test("dot order matters for equality", () => {
      const a = ge(x, n);
      const b = le(x, intConst(3));
      const i = ClosedInterval.unbounded();
      expect(new DottedIntervals(i, [a, b]).syntacticEq(new DottedIntervals(i, [a, b]))).toBe(true);
      expect(new DottedIntervals(i, [a, b]).syntacticEq(new DottedIntervals(i, [b, a]))).toBe(false);
    });
  });

  test("bind substitutes into bounds and dots", () => {
    const d = new DottedIntervals(new ClosedInterval(intConst(0), n), [le(x, n)]);
    expect(d.bind(SymbolicContext.withBindings({ n: 2 })).toString()).toBe("[0, 2] where x <= 2");
  });
});
