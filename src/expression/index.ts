/**
 * Expression Module
 *
 * The symbolic expression algebra intervals are built on: nodes, builders,
 * constraint views and the built-in simplifier.
 */

export { BasicExpression, type Expression, type ExpressionKind, type ExpressionType } from "./expression";
export {
  Variable,
  Constant,
  FunctionApplication,
  type ConstantValue,
  variable,
  intConst,
  realConst,
  boolConst,
  TRUE,
  FALSE,
  symbol,
  apply,
  compare,
  ge,
  le,
  gt,
  lt,
  eq,
  ne,
  and,
  or,
  not,
  ite,
  arithmetic,
  add,
  sub,
  mul,
  negate,
  call,
  formatExpression,
} from "./nodes";
export {
  type ComparisonOp,
  type ArithmeticOp,
  type LogicalOp,
  type BoundOp,
  isComparisonOp,
  isArithmeticOp,
  isLogicalOp,
  isBoundOp,
  negateComparisonOp,
  flipComparisonOp,
} from "./operators";
export { viewConstraint, conjuncts, negateConstraint, mentions, type ConstraintView } from "./view";
export {
  simplify,
  linearForm,
  linearDifference,
  fromLinearForm,
  decideComparison,
  type Bindings,
  type LinearForm,
} from "./simplify";
