/**
 * Interval Errors
 *
 * Each error carries the diagnostic code it is reported under.
 */

import { ErrorCode, type ErrorCodeType } from "../diagnostics/codes";
import { formatExpression, type Expression } from "../expression";

export abstract class IntervalError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A relation whose shape cannot be read as `index op bound` or
 * `bound op index`: wrong arity, or the index on neither side.
 */
export class UnsupportedConstraintError extends IntervalError {
  readonly code = ErrorCode.UnsupportedConstraint;
  readonly constraint: Expression;
  readonly index: Expression;

  constructor(constraint: Expression, index: Expression, reason: string) {
    super(`cannot read ${formatExpression(constraint)} as a bound on ${formatExpression(index)}: ${reason}`);
    this.constraint = constraint;
    this.index = index;
  }
}

/**
 * A well-formed relation on the index whose operator is not a bound
 * comparison. Collected alongside the residual dots, never thrown by
 * the extractor.
 */
export class UnsupportedOperatorError extends IntervalError {
  readonly code = ErrorCode.UnsupportedOperator;
  readonly operator: string;
  readonly constraint: Expression;

  constructor(operator: string, constraint: Expression) {
    super(`interval does not support ${operator} in ${formatExpression(constraint)}`);
    this.operator = operator;
    this.constraint = constraint;
  }
}

/**
 * The interval is statically empty: its lower bound exceeds its upper bound.
 */
export class DomainError extends IntervalError {
  readonly code = ErrorCode.EmptyDomain;
  readonly lower: Expression;
  readonly upper: Expression;

  constructor(lower: Expression, upper: Expression) {
    super(`empty domain: ${formatExpression(lower)} > ${formatExpression(upper)}`);
    this.lower = lower;
    this.upper = upper;
  }
}

/**
 * Enumeration requested where the values are not concrete.
 */
export class NotEnumerableError extends IntervalError {
  readonly code = ErrorCode.NotEnumerable;

  constructor(message: string) {
    super(message);
  }
}
