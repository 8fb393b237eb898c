/**
 * Simplifier
 *
 * A small built-in simplifier for the expression algebra. Handles the cases
 * interval extraction needs without an external solver:
 * - Substitute variables with known constant values
 * - Fold integer and real arithmetic on constants
 * - Decide comparisons whose sides differ by a constant (n + 1 > n)
 * - Decide comparisons from known facts relating the two sides
 * - Fold boolean connectives and push negations through comparisons
 */

import type { Expression } from "./expression";
import {
  apply,
  Constant,
  FunctionApplication,
  FALSE,
  intConst,
  TRUE,
  Variable,
  boolConst,
  formatExpression,
} from "./nodes";
import { isArithmeticOp, isComparisonOp, negateComparisonOp, type ComparisonOp } from "./operators";
import { viewConstraint } from "./view";

export type Bindings = ReadonlyMap<string, Constant>;

const NO_BINDINGS: Bindings = new Map();

// =============================================================================
// Simplification
// =============================================================================

export function simplify(expr: Expression, bindings: Bindings = NO_BINDINGS): Expression {
  if (expr instanceof Variable) {
    return bindings.get(expr.name) ?? expr;
  }

  if (!(expr instanceof FunctionApplication)) {
    return expr;
  }

  const args = expr.args.map((a) => simplify(a, bindings));
  const op = expr.operator;
  const rebuilt = new FunctionApplication(expr.fn, args, expr.type);

  if (op === undefined) {
    return rebuilt;
  }

  if (isArithmeticOp(op)) {
    return simplifyArithmetic(rebuilt, op, args);
  }

  if (isComparisonOp(op) && args.length === 2) {
    const decided = decideComparison(args[0], op, args[1]);
    return decided === null ? rebuilt : boolConst(decided);
  }

  switch (op) {
    case "and":
      return simplifyConnective(args, "and");
    case "or":
      return simplifyConnective(args, "or");
    case "not":
      if (args.length === 1) return simplifyNot(args[0]);
      return rebuilt;
    case "ite": {
      if (args.length !== 3) return rebuilt;
      const condition = args[0];
      if (condition instanceof Constant && typeof condition.value === "boolean") {
        return condition.value ? args[1] : args[2];
      }
      return rebuilt;
    }
  }

  return rebuilt;
}

function simplifyArithmetic(
  rebuilt: FunctionApplication,
  op: string,
  args: readonly Expression[]
): Expression {
  if (op === "-" && args.length === 1) {
    const operand = args[0];
    if (operand instanceof Constant && typeof operand.value === "bigint") {
      return intConst(-operand.value);
    }
    if (operand instanceof Constant && typeof operand.value === "number") {
      return new Constant(-operand.value, "real");
    }
    return rebuilt;
  }

  if (args.length !== 2) return rebuilt;
  const [left, right] = args;

  // Both sides integer constants
  if (left instanceof Constant && right instanceof Constant) {
    if (typeof left.value === "bigint" && typeof right.value === "bigint") {
      const result = evaluateBinop(op, left.value, right.value);
      if (result !== null) return intConst(result);
      return rebuilt;
    }
    const l = numericValue(left);
    const r = numericValue(right);
    if (l !== null && r !== null) {
      const result = evaluateRealBinop(op, l, r);
      if (result !== null) return new Constant(result, "real");
    }
    return rebuilt;
  }

  // Integer expressions: normalize through the linear form so that
  // (n + 1) - 1 collapses to n and (x + a) + b to x + (a + b)
  if (rebuilt.type === "int" && (op === "+" || op === "-")) {
    const form = linearForm(rebuilt);
    if (form) return fromLinearForm(form);
  }

  if (op === "*" && isIntConstant(right, 1n)) return left;
  if (op === "*" && isIntConstant(left, 1n)) return right;

  return rebuilt;
}

function simplifyConnective(args: readonly Expression[], op: "and" | "or"): Expression {
  const absorbing = op === "or";
  const kept: Expression[] = [];

  for (const arg of args) {
    const view = viewConstraint(arg);
    if (view.kind === "literal") {
      if (view.value === absorbing) return boolConst(absorbing);
      continue;
    }
    if (view.kind === op) {
      kept.push(...view.children);
      continue;
    }
    kept.push(arg);
  }

  if (kept.length === 0) return boolConst(!absorbing);
  if (kept.length === 1) return kept[0];
  return apply(op, kept, "bool");
}

function simplifyNot(inner: Expression): Expression {
  const view = viewConstraint(inner);
  switch (view.kind) {
    case "literal":
      return view.value ? FALSE : TRUE;
    case "not":
      // Double negation elimination: !(!P) → P
      return view.inner;
    case "relation":
      // Negation of comparison: !(x > 0) → x <= 0
      if (view.args.length === 2) {
        return apply(negateComparisonOp(view.op), view.args, "bool");
      }
      break;
  }
  return apply("not", [inner], "bool");
}

// =============================================================================
// Constant Evaluation
// =============================================================================

/**
 * Evaluate a binary arithmetic operation.
 */
function evaluateBinop(op: string, left: bigint, right: bigint): bigint | null {
  switch (op) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      if (right === 0n) return null;
      return left / right;
    case "%":
      if (right === 0n) return null;
      return left % right;
    default:
      return null;
  }
}

function evaluateRealBinop(op: string, left: number, right: number): number | null {
  switch (op) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      if (right === 0) return null;
      return left / right;
    default:
      return null;
  }
}

function numericValue(c: Constant): number | null {
  if (typeof c.value === "bigint") return Number(c.value);
  if (typeof c.value === "number") return c.value;
  return null;
}

function isIntConstant(e: Expression, value: bigint): boolean {
  return e instanceof Constant && e.value === value;
}

// =============================================================================
// Linear Forms
// =============================================================================

/**
 * An integer expression as `sum(coefficient * atom) + constant`.
 * Atoms are keyed by their rendering; anything that is not `+`, `-`,
 * or multiplication by a constant is an atom.
 */
export interface LinearForm {
  terms: Map<string, { atom: Expression; coefficient: bigint }>;
  constant: bigint;
}

/**
 * Returns null for expressions that involve reals or non-numeric values.
 */
export function linearForm(expr: Expression): LinearForm | null {
  if (expr instanceof Constant) {
    if (typeof expr.value === "bigint") {
      return { terms: new Map(), constant: expr.value };
    }
    return null;
  }

  if (expr.type !== "int") {
    return null;
  }

  if (expr instanceof FunctionApplication) {
    const op = expr.operator;
    const args = expr.args;

    if (op === "-" && args.length === 1) {
      const inner = linearForm(args[0]);
      return inner && scaleForm(inner, -1n);
    }

    if ((op === "+" || op === "-") && args.length === 2) {
      const left = linearForm(args[0]);
      const right = linearForm(args[1]);
      if (!left || !right) return null;
      return combineForms(left, op === "+" ? right : scaleForm(right, -1n));
    }

    if (op === "*" && args.length === 2) {
      const left = linearForm(args[0]);
      const right = linearForm(args[1]);
      if (left && right && left.terms.size === 0) return scaleForm(right, left.constant);
      if (left && right && right.terms.size === 0) return scaleForm(left, right.constant);
    }
  }

  const terms = new Map<string, { atom: Expression; coefficient: bigint }>();
  terms.set(formatExpression(expr), { atom: expr, coefficient: 1n });
  return { terms, constant: 0n };
}

function scaleForm(form: LinearForm, factor: bigint): LinearForm {
  const terms = new Map<string, { atom: Expression; coefficient: bigint }>();
  if (factor !== 0n) {
    for (const [key, term] of form.terms) {
      terms.set(key, { atom: term.atom, coefficient: term.coefficient * factor });
    }
  }
  return { terms, constant: form.constant * factor };
}

function combineForms(a: LinearForm, b: LinearForm): LinearForm {
  const terms = new Map(a.terms);
  for (const [key, term] of b.terms) {
    const existing = terms.get(key);
    const coefficient = (existing?.coefficient ?? 0n) + term.coefficient;
    if (coefficient === 0n) {
      terms.delete(key);
    } else {
      terms.set(key, { atom: term.atom, coefficient });
    }
  }
  return { terms, constant: a.constant + b.constant };
}

/**
 * `a - b` as a linear form, or null when either side is not linear.
 */
export function linearDifference(a: Expression, b: Expression): LinearForm | null {
  const left = linearForm(a);
  const right = linearForm(b);
  if (!left || !right) return null;
  return combineForms(left, scaleForm(right, -1n));
}

/**
 * Rebuild an expression from a linear form, atoms first in discovery order.
 */
export function fromLinearForm(form: LinearForm): Expression {
  let result: Expression | null = null;

  for (const { atom, coefficient } of form.terms.values()) {
    const magnitude = coefficient < 0n ? -coefficient : coefficient;
    const term = magnitude === 1n ? atom : apply("*", [intConst(magnitude), atom], "int");
    if (result === null) {
      result = coefficient < 0n ? apply("-", [term], "int") : term;
    } else {
      result = apply(coefficient < 0n ? "-" : "+", [result, term], "int");
    }
  }

  if (result === null) {
    return intConst(form.constant);
  }
  if (form.constant > 0n) {
    return apply("+", [result, intConst(form.constant)], "int");
  }
  if (form.constant < 0n) {
    return apply("-", [result, intConst(-form.constant)], "int");
  }
  return result;
}

// =============================================================================
// Comparison Decisions
// =============================================================================

/**
 * Decide `left op right`. Returns null when it cannot be decided from the
 * expressions themselves and the given facts.
 */
export function decideComparison(
  left: Expression,
  op: ComparisonOp,
  right: Expression,
  facts: readonly Expression[] = []
): boolean | null {
  const constant = evaluateConstantCompare(op, left, right);
  if (constant !== null) return constant;

  // Same expression on both sides - identity comparisons
  if (left.syntacticEq(right)) {
    return op === "==" || op === "<=" || op === ">=";
  }

  const difference = linearDifference(left, right);
  if (!difference) return null;

  const range = differenceRange(difference, facts);
  return decideFromRange(op, range);
}

function evaluateConstantCompare(op: ComparisonOp, left: Expression, right: Expression): boolean | null {
  if (!(left instanceof Constant) || !(right instanceof Constant)) return null;

  if (typeof left.value === "bigint" && typeof right.value === "bigint") {
    return compareValues(op, left.value, right.value);
  }

  const l = numericValue(left);
  const r = numericValue(right);
  if (l !== null && r !== null) {
    return compareValues(op, l, r);
  }

  if (typeof left.value === "boolean" && typeof right.value === "boolean") {
    switch (op) {
      case "==":
        return left.value === right.value;
      case "!=":
        return left.value !== right.value;
    }
  }

  return null;
}

function compareValues(op: ComparisonOp, l: bigint | number, r: bigint | number): boolean {
  const sign = l < r ? -1 : l > r ? 1 : 0;
  switch (op) {
    case "==":
      return sign === 0;
    case "!=":
      return sign !== 0;
    case "<":
      return sign < 0;
    case "<=":
      return sign <= 0;
    case ">":
      return sign > 0;
    case ">=":
      return sign >= 0;
  }
}

interface Range {
  lower?: bigint;
  upper?: bigint;
}

/**
 * Bounds on the value of a linear difference. A constant difference is
 * exact; otherwise every fact `l op r` whose own difference matches ours up
 * to a constant (or its negation) contributes a bound.
 */
function differenceRange(difference: LinearForm, facts: readonly Expression[]): Range {
  if (difference.terms.size === 0) {
    return { lower: difference.constant, upper: difference.constant };
  }

  const range: Range = {};
  const tightenLower = (value: bigint) => {
    if (range.lower === undefined || value > range.lower) range.lower = value;
  };
  const tightenUpper = (value: bigint) => {
    if (range.upper === undefined || value < range.upper) range.upper = value;
  };

  for (const fact of facts) {
    const view = viewConstraint(fact);
    if (view.kind !== "relation" || view.args.length !== 2 || view.op === "!=") continue;

    const factDifference = linearDifference(view.args[0], view.args[1]);
    if (!factDifference) continue;

    // difference = factDifference + k  or  difference = -factDifference + k
    for (const sign of [1n, -1n]) {
      const offset = combineForms(difference, scaleForm(factDifference, -sign));
      if (offset.terms.size !== 0) continue;
      const k = offset.constant;
      const op = sign === 1n ? view.op : flipForNegation(view.op);

      // fact: factDifference op 0, so difference op' k
      switch (op) {
        case ">=":
          tightenLower(k);
          break;
        case ">":
          tightenLower(k + 1n);
          break;
        case "<=":
          tightenUpper(k);
          break;
        case "<":
          tightenUpper(k - 1n);
          break;
        case "==":
          tightenLower(k);
          tightenUpper(k);
          break;
      }
    }
  }

  return range;
}

/** `d op 0` is `-d op' 0`. */
function flipForNegation(op: ComparisonOp): ComparisonOp {
  switch (op) {
    case ">=":
      return "<=";
    case ">":
      return "<";
    case "<=":
      return ">=";
    case "<":
      return ">";
    default:
      return op;
  }
}

/**
 * Decide `d op 0` given bounds on d.
 */
function decideFromRange(op: ComparisonOp, range: Range): boolean | null {
  const { lower, upper } = range;
  switch (op) {
    case ">=":
      if (lower !== undefined && lower >= 0n) return true;
      if (upper !== undefined && upper < 0n) return false;
      return null;
    case ">":
      if (lower !== undefined && lower > 0n) return true;
      if (upper !== undefined && upper <= 0n) return false;
      return null;
    case "<=":
      if (upper !== undefined && upper <= 0n) return true;
      if (lower !== undefined && lower > 0n) return false;
      return null;
    case "<":
      if (upper !== undefined && upper < 0n) return true;
      if (lower !== undefined && lower >= 0n) return false;
      return null;
    case "==":
      if (lower === 0n && upper === 0n) return true;
      if ((lower !== undefined && lower > 0n) || (upper !== undefined && upper < 0n)) return false;
      return null;
    case "!=": {
      const equal = decideFromRange("==", range);
      return equal === null ? null : !equal;
    }
  }
}
