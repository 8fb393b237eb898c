/**
 * Constraint Views
 *
 * Classifies a boolean expression into a tagged variant so consumers can
 * match exhaustively instead of probing node shapes.
 */

import type { Expression } from "./expression";
import { apply, Constant, FunctionApplication, not } from "./nodes";
import { isComparisonOp, negateComparisonOp, type ComparisonOp } from "./operators";

export type ConstraintView =
  | { kind: "relation"; op: ComparisonOp; args: readonly Expression[]; expr: FunctionApplication }
  | { kind: "and"; children: readonly Expression[] }
  | { kind: "or"; children: readonly Expression[] }
  | { kind: "not"; inner: Expression }
  | { kind: "ite"; condition: Expression; then: Expression; else: Expression }
  | { kind: "literal"; value: boolean }
  | { kind: "other"; expr: Expression };

export function viewConstraint(expr: Expression): ConstraintView {
  if (expr instanceof Constant && typeof expr.value === "boolean") {
    return { kind: "literal", value: expr.value };
  }

  if (!(expr instanceof FunctionApplication)) {
    return { kind: "other", expr };
  }

  const op = expr.operator;
  if (op === undefined) {
    return { kind: "other", expr };
  }

  if (isComparisonOp(op)) {
    return { kind: "relation", op, args: expr.args, expr };
  }

  switch (op) {
    case "and":
      return { kind: "and", children: expr.args };
    case "or":
      return { kind: "or", children: expr.args };
    case "not":
      if (expr.args.length === 1) {
        return { kind: "not", inner: expr.args[0] };
      }
      break;
    case "ite":
      if (expr.args.length === 3) {
        return { kind: "ite", condition: expr.args[0], then: expr.args[1], else: expr.args[2] };
      }
      break;
  }

  return { kind: "other", expr };
}

/**
 * Flatten nested conjunctions into their atoms, in order.
 */
export function conjuncts(expr: Expression): Expression[] {
  const view = viewConstraint(expr);
  if (view.kind === "and") {
    return view.children.flatMap(conjuncts);
  }
  if (view.kind === "literal" && view.value) {
    return [];
  }
  return [expr];
}

/**
 * Push a negation one level inward: comparisons flip their operator,
 * De Morgan for connectives, double negation cancels.
 * Anything else stays wrapped in `not`.
 */
export function negateConstraint(expr: Expression): Expression {
  const view = viewConstraint(expr);
  switch (view.kind) {
    case "relation":
      if (view.args.length === 2) {
        return apply(negateComparisonOp(view.op), view.args, "bool");
      }
      return not(expr);
    case "and":
      return apply("or", view.children.map(negateConstraint), "bool");
    case "or":
      return apply("and", view.children.map(negateConstraint), "bool");
    case "not":
      return view.inner;
    case "ite":
      return apply("ite", [view.condition, negateConstraint(view.then), negateConstraint(view.else)], "bool");
    case "literal":
      return new Constant(!view.value, "bool");
    case "other":
      return not(expr);
  }
}

/**
 * Whether `target` occurs anywhere inside `expr`.
 */
export function mentions(expr: Expression, target: Expression): boolean {
  if (expr.syntacticEq(target)) return true;
  return expr.subexpressions.some((child) => mentions(child, target));
}
