/**
 * Bound Extraction
 *
 * Folds a conjunction of atomic relations over an index variable into a
 * dotted interval: bound comparisons tighten the interval monotonically,
 * everything else is kept as a residual dot.
 */

import type { SymbolicContext } from "../context";
import { ErrorCode, type ErrorCodeType } from "../diagnostics/codes";
import {
  add,
  conjuncts,
  Constant,
  decideComparison,
  flipComparisonOp,
  formatExpression,
  intConst,
  isBoundOp,
  mentions,
  simplify,
  sub,
  viewConstraint,
  type BoundOp,
  type ComparisonOp,
  type Expression,
} from "../expression";
import { ClosedInterval, type BoundPosition } from "./closed-interval";
import { DottedIntervals } from "./dotted-intervals";
import { UnsupportedConstraintError, UnsupportedOperatorError } from "./errors";

// =============================================================================
// Options and Results
// =============================================================================

export interface ExtractOptions {
  /** Facts used to order symbolic bound candidates (e.g. n >= 0). */
  context?: SymbolicContext;
}

export type ExtractionIssueKind =
  | "unsupported-operator"
  | "undecidable-bound"
  | "strict-bound-on-non-integer"
  | "residual-constraint";

/**
 * Why a constraint was kept as a dot instead of tightening the interval.
 */
export interface ExtractionIssue {
  kind: ExtractionIssueKind;
  code: ErrorCodeType;
  message: string;
  constraint: Expression;
  error?: UnsupportedOperatorError | undefined;
}

export type ExtractionResult =
  | { ok: true; value: DottedIntervals; issues: ExtractionIssue[] }
  | { ok: false; error: UnsupportedConstraintError };

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Extract the dotted interval of `index` from a conjunctive constraint.
 * Nested conjunctions are flattened; a non-conjunction is a single conjunct.
 *
 * This only reads bounds directly off the conjuncts. Disjunctions and
 * conditionals end up as dots here; `buildCaseTree` splits on them.
 */
export function fromConstraints(
  index: Expression,
  constraint: Expression,
  options: ExtractOptions = {}
): ExtractionResult {
  return extractBounds(index, conjuncts(constraint), options);
}

/**
 * Fold the given conjuncts, in order, into a dotted interval.
 */
export function extractBounds(
  index: Expression,
  constraints: readonly Expression[],
  options: ExtractOptions = {}
): ExtractionResult {
  const extractor = new BoundExtractor(index, options.context?.constraints ?? []);
  for (const constraint of constraints) {
    const error = extractor.add(constraint);
    if (error) {
      return { ok: false, error };
    }
  }
  return { ok: true, value: extractor.result(), issues: extractor.issues };
}

// =============================================================================
// Extractor
// =============================================================================

interface BoundCandidate {
  position: BoundPosition;
  bound: Expression;
}

class BoundExtractor {
  private interval = ClosedInterval.unbounded();
  private dots: Expression[] = [];
  readonly issues: ExtractionIssue[] = [];

  constructor(
    private readonly index: Expression,
    private readonly facts: readonly Expression[]
  ) {}

  result(): DottedIntervals {
    return new DottedIntervals(this.interval, [...this.dots]);
  }

  /**
   * Fold one conjunct. Returns an error only for a malformed relation.
   */
  add(constraint: Expression): UnsupportedConstraintError | null {
    const view = viewConstraint(constraint);
    if (view.kind !== "relation") {
      this.keep(constraint, "residual-constraint", ErrorCode.ResidualConstraint, "not a comparison");
      return null;
    }

    if (view.args.length !== 2) {
      return new UnsupportedConstraintError(constraint, this.index, `expected 2 operands, got ${view.args.length}`);
    }

    // Orient the relation as `index op bound`
    const [left, right] = view.args;
    let op: ComparisonOp;
    let bound: Expression;
    if (left.syntacticEq(this.index)) {
      op = view.op;
      bound = right;
    } else if (right.syntacticEq(this.index)) {
      op = flipComparisonOp(view.op);
      bound = left;
    } else {
      return new UnsupportedConstraintError(constraint, this.index, "the index is on neither side");
    }

    if (mentions(bound, this.index)) {
      this.keep(constraint, "residual-constraint", ErrorCode.ResidualConstraint, "the bound depends on the index");
      return null;
    }

    if (!isBoundOp(op)) {
      const error = new UnsupportedOperatorError(view.op, constraint);
      this.keep(constraint, "unsupported-operator", ErrorCode.UnsupportedOperator, error.message, error);
      return null;
    }

    const candidate = this.candidate(op, bound, constraint);
    if (candidate) {
      this.tighten(candidate, constraint);
    }
    return null;
  }

  /**
   * `index >= b` and `index > b` give lower candidates, `<=` and `<` upper.
   * Strict comparisons become inclusive by one unit, which only holds for
   * an integer index.
   */
  private candidate(op: BoundOp, bound: Expression, constraint: Expression): BoundCandidate | null {
    const position: BoundPosition = op === ">=" || op === ">" ? "lower" : "upper";
    const strict = op === ">" || op === "<";

    if (this.index.type !== "int") {
      if (strict) {
        this.keep(
          constraint,
          "strict-bound-on-non-integer",
          ErrorCode.StrictBoundOnNonInteger,
          `${formatExpression(this.index)} is ${this.index.type}-valued`
        );
        return null;
      }
      return { position, bound };
    }

    if (bound instanceof Constant && typeof bound.value === "number" && !Number.isFinite(bound.value)) {
      this.keep(constraint, "undecidable-bound", ErrorCode.UndecidableBound, "the bound is not a finite number");
      return null;
    }

    const integral = integerBound(bound, position, strict);
    if (!integral) {
      this.keep(constraint, "undecidable-bound", ErrorCode.UndecidableBound, "the bound is not an integer expression");
      return null;
    }
    return { position, bound: integral };
  }

  /**
   * A lower candidate replaces the current lower bound when it is at least
   * as large (ties keep the newer bound); symmetric for upper bounds.
   */
  private tighten(candidate: BoundCandidate, constraint: Expression): void {
    const current = this.interval.getBound(candidate.position);
    if (current === undefined) {
      this.interval = this.interval.replaceBound(candidate.position, candidate.bound);
      return;
    }

    const op = candidate.position === "lower" ? ">=" : "<=";
    const tighter = decideComparison(candidate.bound, op, current, this.facts);
    if (tighter === true) {
      this.interval = this.interval.replaceBound(candidate.position, candidate.bound);
    } else if (tighter === null) {
      this.keep(
        constraint,
        "undecidable-bound",
        ErrorCode.UndecidableBound,
        `cannot order ${formatExpression(candidate.bound)} against ${candidate.position} bound ${formatExpression(current)}`
      );
    }
  }

  private keep(
    constraint: Expression,
    kind: ExtractionIssueKind,
    code: ErrorCodeType,
    reason: string,
    error?: UnsupportedOperatorError
  ): void {
    this.dots.push(constraint);
    this.issues.push({
      kind,
      code,
      message: `kept ${formatExpression(constraint)} as a dot: ${reason}`,
      constraint,
      error,
    });
  }
}

// =============================================================================
// Integer Bounds
// =============================================================================

/**
 * The inclusive integer bound equivalent to a (possibly strict) bound.
 * Real constants round toward the inside of the interval. Returns null
 * when the bound is neither an integer expression nor a real constant.
 */
function integerBound(bound: Expression, position: BoundPosition, strict: boolean): Expression | null {
  if (bound instanceof Constant && typeof bound.value === "number") {
    const v = bound.value;
    if (position === "lower") {
      return intConst(strict ? Math.floor(v) + 1 : Math.ceil(v));
    }
    return intConst(strict ? Math.ceil(v) - 1 : Math.floor(v));
  }

  if (bound.type !== "int") {
    return null;
  }
  if (!strict) {
    return bound;
  }
  // x > b ⇒ x >= b + 1;  x < b ⇒ x <= b - 1
  return simplify(position === "lower" ? add(bound, intConst(1)) : sub(bound, intConst(1)));
}
