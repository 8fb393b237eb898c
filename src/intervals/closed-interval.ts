/**
 * Closed Interval
 *
 * `[lower, upper]`, inclusive, over expressions. Either bound may be unset
 * while constraints are still being folded in. Intervals are immutable
 * expression nodes: every update returns a new interval.
 */

import { SymbolicContext } from "../context";
import {
  add,
  Constant,
  intConst,
  le,
  simplify,
  sub,
  formatExpression,
  type Expression,
  type ExpressionKind,
} from "../expression";
import { DomainError, NotEnumerableError } from "./errors";

export type BoundPosition = "lower" | "upper";

export class ClosedInterval implements Expression {
  readonly kind: ExpressionKind = "closed-interval";
  readonly type = "set";
  readonly lowerBound: Expression | undefined;
  readonly upperBound: Expression | undefined;

  constructor(lowerBound?: Expression, upperBound?: Expression) {
    this.lowerBound = lowerBound;
    this.upperBound = upperBound;
  }

  /** Both bounds unset. */
  static unbounded(): ClosedInterval {
    return new ClosedInterval();
  }

  /** The canonical empty interval, `[0, -1]`. */
  static empty(): ClosedInterval {
    return new ClosedInterval(intConst(0), intConst(-1));
  }

  // ---------------------------------------------------------------------------
  // Expression Interface
  // ---------------------------------------------------------------------------

  /** The bounds that are set, lower first. */
  get subexpressions(): readonly Expression[] {
    return [this.lowerBound, this.upperBound].filter((b): b is Expression => b !== undefined);
  }

  /**
   * Position `i` addresses `subexpressions[i]`, so in `[?, 10]` position 0
   * is the upper bound. Use `replaceBound` to set a missing bound.
   */
  set(i: number, newExpression: Expression): ClosedInterval {
    const position = this.presentBounds()[i];
    if (position === undefined) {
      throw new RangeError(`interval has no subexpression ${i}`);
    }
    return this.replaceBound(position, newExpression);
  }

  private presentBounds(): BoundPosition[] {
    const positions: BoundPosition[] = [];
    if (this.lowerBound !== undefined) positions.push("lower");
    if (this.upperBound !== undefined) positions.push("upper");
    return positions;
  }

  replace(from: Expression, to: Expression): Expression {
    if (this.syntacticEq(from)) {
      return to;
    }
    return this.replaceInBounds(from, to);
  }

  /**
   * Substitute inside the bounds only, so the result stays an interval.
   */
  replaceInBounds(from: Expression, to: Expression): ClosedInterval {
    const lower = this.lowerBound?.replace(from, to);
    const upper = this.upperBound?.replace(from, to);
    if (lower === this.lowerBound && upper === this.upperBound) {
      return this;
    }
    return new ClosedInterval(lower, upper);
  }

  syntacticEq(other: Expression): boolean {
    if (this === other) return true;
    if (!(other instanceof ClosedInterval)) return false;
    return boundsEqual(this.lowerBound, other.lowerBound) && boundsEqual(this.upperBound, other.upperBound);
  }

  // ---------------------------------------------------------------------------
  // Bounds
  // ---------------------------------------------------------------------------

  replaceBound(position: BoundPosition, value: Expression): ClosedInterval {
    return position === "lower"
      ? new ClosedInterval(value, this.upperBound)
      : new ClosedInterval(this.lowerBound, value);
  }

  getBound(position: BoundPosition): Expression | undefined {
    return position === "lower" ? this.lowerBound : this.upperBound;
  }

  /**
   * `upper - lower + 1`, simplified. Undefined while a bound is unset.
   */
  size(): Expression | undefined {
    if (this.lowerBound === undefined || this.upperBound === undefined) {
      return undefined;
    }
    return simplify(add(sub(this.upperBound, this.lowerBound), intConst(1)));
  }

  /** Both bounds are integer constants. */
  isConcrete(): boolean {
    return concreteValue(this.lowerBound) !== undefined && concreteValue(this.upperBound) !== undefined;
  }

  /**
   * Statically empty: both bounds are integer constants and lower > upper.
   */
  isEmpty(): boolean {
    const lower = concreteValue(this.lowerBound);
    const upper = concreteValue(this.upperBound);
    return lower !== undefined && upper !== undefined && lower > upper;
  }

  /**
   * `lower <= index && index <= upper` as a context. An unset bound
   * contributes no fact.
   *
   * @throws DomainError when the bounds are statically inverted
   */
  toDomainConstraint(index: Expression): SymbolicContext {
    let ctx = SymbolicContext.empty();
    if (this.lowerBound !== undefined) {
      ctx = ctx.and(le(this.lowerBound, index), "lower bound");
    }
    if (this.upperBound !== undefined) {
      ctx = ctx.and(le(index, this.upperBound), "upper bound");
    }
    if (this.lowerBound !== undefined && this.upperBound !== undefined && ctx.isUnsatisfiable()) {
      throw new DomainError(this.lowerBound, this.upperBound);
    }
    return ctx;
  }

  /**
   * Substitute the context's known variable values into both bounds.
   */
  bind(context: SymbolicContext): ClosedInterval {
    const bindings = context.dict;
    return new ClosedInterval(
      this.lowerBound && simplify(this.lowerBound, bindings),
      this.upperBound && simplify(this.upperBound, bindings)
    );
  }

  // ---------------------------------------------------------------------------
  // Enumeration
  // ---------------------------------------------------------------------------

  /**
   * Every integer from lower to upper inclusive. Each call starts over.
   *
   * @throws NotEnumerableError unless both bounds are integer constants
   */
  [Symbol.iterator](): Iterator<bigint> {
    const lower = concreteValue(this.lowerBound);
    const upper = concreteValue(this.upperBound);
    if (lower === undefined || upper === undefined) {
      throw new NotEnumerableError(`cannot enumerate ${this.toString()}: bounds must both be integer constants`);
    }
    return range(lower, upper);
  }

  toString(): string {
    const lower = this.lowerBound ? formatExpression(this.lowerBound) : "?";
    const upper = this.upperBound ? formatExpression(this.upperBound) : "?";
    return `[${lower}, ${upper}]`;
  }
}

function boundsEqual(a: Expression | undefined, b: Expression | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.syntacticEq(b);
}

function concreteValue(bound: Expression | undefined): bigint | undefined {
  if (bound instanceof Constant && typeof bound.value === "bigint") {
    return bound.value;
  }
  return undefined;
}

function* range(lower: bigint, upper: bigint): Generator<bigint> {
  for (let value = lower; value <= upper; value++) {
    yield value;
  }
}
