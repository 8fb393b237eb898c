/**
 * Dotted Intervals
 *
 * A closed interval together with the residual constraints ("dots") that
 * could not be folded into its bounds, kept verbatim in discovery order.
 */

import type { SymbolicContext } from "../context";
import {
  formatExpression,
  intConst,
  simplify,
  viewConstraint,
  type Bindings,
  type Expression,
  type ExpressionKind,
} from "../expression";
import { ClosedInterval } from "./closed-interval";
import { NotEnumerableError } from "./errors";

export class DottedIntervals implements Expression {
  readonly kind: ExpressionKind = "dotted-intervals";
  readonly type = "set";
  readonly interval: ClosedInterval;
  readonly dots: readonly Expression[];

  constructor(interval: ClosedInterval, dots: readonly Expression[] = []) {
    this.interval = interval;
    this.dots = dots;
  }

  // ---------------------------------------------------------------------------
  // Expression Interface
  // ---------------------------------------------------------------------------

  get subexpressions(): readonly Expression[] {
    return [this.interval, ...this.dots];
  }

  /**
   * Position 0 is the interval (and must stay one); dots follow from 1.
   */
  set(i: number, newExpression: Expression): DottedIntervals {
    if (i === 0) {
      if (!(newExpression instanceof ClosedInterval)) {
        throw new TypeError(`position 0 of dotted intervals must be a closed interval, got ${formatExpression(newExpression)}`);
      }
      return new DottedIntervals(newExpression, this.dots);
    }
    if (i > 0 && i <= this.dots.length) {
      const dots = [...this.dots];
      dots[i - 1] = newExpression;
      return new DottedIntervals(this.interval, dots);
    }
    throw new RangeError(`dotted intervals have no subexpression ${i}`);
  }

  replace(from: Expression, to: Expression): Expression {
    if (this.syntacticEq(from)) {
      return to;
    }

    let interval: ClosedInterval;
    if (this.interval.syntacticEq(from)) {
      if (!(to instanceof ClosedInterval)) {
        throw new TypeError(`the interval of dotted intervals can only be replaced by a closed interval, got ${formatExpression(to)}`);
      }
      interval = to;
    } else {
      interval = this.interval.replaceInBounds(from, to);
    }
    const dots = this.dots.map((d) => d.replace(from, to));

    if (interval === this.interval && dots.every((d, i) => d === this.dots[i])) {
      return this;
    }
    return new DottedIntervals(interval, dots);
  }

  /**
   * Interval first, then dots position by position: the same dots in a
   * different order are a different value.
   */
  syntacticEq(other: Expression): boolean {
    if (this === other) return true;
    if (!(other instanceof DottedIntervals)) return false;
    if (!this.interval.syntacticEq(other.interval)) return false;
    if (this.dots.length !== other.dots.length) return false;
    return this.dots.every((d, i) => d.syntacticEq(other.dots[i]));
  }

  // ---------------------------------------------------------------------------
  // Domain
  // ---------------------------------------------------------------------------

  isEmpty(): boolean {
    return this.interval.isEmpty();
  }

  bind(context: SymbolicContext): DottedIntervals {
    const bindings = context.dict;
    return new DottedIntervals(
      this.interval.bind(context),
      this.dots.map((d) => simplify(d, bindings))
    );
  }

  /**
   * The interval's values that satisfy every dot, each dot re-checked with
   * the index replaced by the value.
   *
   * @throws NotEnumerableError when the interval is not concrete, or a dot
   *   cannot be decided for some value
   */
  *enumerate(index: Expression, context?: SymbolicContext): Generator<bigint> {
    const bindings: Bindings = context ? context.dict : new Map();
    const interval = context ? this.interval.bind(context) : this.interval;

    for (const value of interval) {
      if (this.admits(index, value, bindings)) {
        yield value;
      }
    }
  }

  private admits(index: Expression, value: bigint, bindings: Bindings): boolean {
    for (const dot of this.dots) {
      const decided = viewConstraint(simplify(dot.replace(index, intConst(value)), bindings));
      if (decided.kind !== "literal") {
        throw new NotEnumerableError(
          `cannot decide ${formatExpression(dot)} for ${formatExpression(index)} = ${value}`
        );
      }
      if (!decided.value) return false;
    }
    return true;
  }

  toString(): string {
    if (this.dots.length === 0) {
      return this.interval.toString();
    }
    return `${this.interval.toString()} where ${this.dots.map(formatExpression).join(" && ")}`;
  }
}
