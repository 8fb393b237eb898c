/**
 * Operator symbols understood by the expression algebra.
 */

export type ComparisonOp = "==" | "!=" | "<" | "<=" | ">" | ">=";
export type ArithmeticOp = "+" | "-" | "*" | "/" | "%";
export type LogicalOp = "and" | "or" | "not" | "ite";

/** Comparisons the bound extractor folds into an interval. */
export type BoundOp = "<" | "<=" | ">" | ">=";

const COMPARISON_OPS: readonly string[] = ["==", "!=", "<", "<=", ">", ">="];
const ARITHMETIC_OPS: readonly string[] = ["+", "-", "*", "/", "%"];
const LOGICAL_OPS: readonly string[] = ["and", "or", "not", "ite"];

export function isComparisonOp(op: string): op is ComparisonOp {
  return COMPARISON_OPS.includes(op);
}

export function isArithmeticOp(op: string): op is ArithmeticOp {
  return ARITHMETIC_OPS.includes(op);
}

export function isLogicalOp(op: string): op is LogicalOp {
  return LOGICAL_OPS.includes(op);
}

export function isBoundOp(op: ComparisonOp): op is BoundOp {
  return op !== "==" && op !== "!=";
}

/**
 * `!(a op b)` is `a negated(op) b`.
 */
export function negateComparisonOp(op: ComparisonOp): ComparisonOp {
  const negations: Record<ComparisonOp, ComparisonOp> = {
    "==": "!=",
    "!=": "==",
    "<": ">=",
    "<=": ">",
    ">": "<=",
    ">=": "<",
  };
  return negations[op];
}

/**
 * `a op b` is `b flipped(op) a`.
 */
export function flipComparisonOp(op: ComparisonOp): ComparisonOp {
  const flips: Record<ComparisonOp, ComparisonOp> = {
    "==": "==",
    "!=": "!=",
    "<": ">",
    "<=": ">=",
    ">": "<",
    ">=": "<=",
  };
  return flips[op];
}
