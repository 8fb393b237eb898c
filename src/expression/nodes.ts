/**
 * Expression Nodes
 *
 * Variables, constants and function applications, the builders used to
 * assemble them, and their textual rendering.
 */

import { BasicExpression, type Expression, type ExpressionType } from "./expression";
import {
  isArithmeticOp,
  isComparisonOp,
  type ArithmeticOp,
  type ComparisonOp,
} from "./operators";

// =============================================================================
// Variables
// =============================================================================

export class Variable extends BasicExpression {
  readonly kind = "variable";
  readonly name: string;

  constructor(name: string, type: ExpressionType = "int") {
    super(type);
    this.name = name;
  }

  get subexpressions(): readonly Expression[] {
    return [];
  }

  set(i: number, _newExpression: Expression): Expression {
    throw new RangeError(`variable ${this.name} has no subexpression ${i}`);
  }

  protected sameNode(other: Expression): boolean {
    return other instanceof Variable && other.name === this.name && other.type === this.type;
  }

  toString(): string {
    return formatExpression(this);
  }
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Integers are bigint, reals number, booleans boolean. Operator and
 * uninterpreted function symbols are strings typed "function".
 */
export type ConstantValue = bigint | number | boolean | string;

export class Constant extends BasicExpression {
  readonly kind = "constant";
  readonly value: ConstantValue;

  constructor(value: ConstantValue, type: ExpressionType) {
    super(type);
    this.value = value;
  }

  get subexpressions(): readonly Expression[] {
    return [];
  }

  set(i: number, _newExpression: Expression): Expression {
    throw new RangeError(`constant ${String(this.value)} has no subexpression ${i}`);
  }

  protected sameNode(other: Expression): boolean {
    return other instanceof Constant && other.value === this.value && other.type === this.type;
  }

  toString(): string {
    return formatExpression(this);
  }
}

// =============================================================================
// Function Applications
// =============================================================================

/**
 * `fn(args...)`. The function is the first subexpression, so positional
 * updates address it as 0 and the arguments from 1.
 */
export class FunctionApplication extends BasicExpression {
  readonly kind = "application";
  readonly fn: Expression;
  readonly args: readonly Expression[];

  constructor(fn: Expression, args: readonly Expression[], type: ExpressionType) {
    super(type);
    this.fn = fn;
    this.args = args;
  }

  /** The operator or function symbol, when the function is a named constant. */
  get operator(): string | undefined {
    if (this.fn instanceof Constant && typeof this.fn.value === "string") {
      return this.fn.value;
    }
    return undefined;
  }

  get subexpressions(): readonly Expression[] {
    return [this.fn, ...this.args];
  }

  set(i: number, newExpression: Expression): Expression {
    if (i === 0) {
      return new FunctionApplication(newExpression, this.args, this.type);
    }
    if (i > 0 && i <= this.args.length) {
      const args = [...this.args];
      args[i - 1] = newExpression;
      return new FunctionApplication(this.fn, args, this.type);
    }
    throw new RangeError(`application has no subexpression ${i}`);
  }

  protected sameNode(other: Expression): boolean {
    return other instanceof FunctionApplication && other.type === this.type;
  }

  toString(): string {
    return formatExpression(this);
  }
}

// =============================================================================
// Builders
// =============================================================================

export function variable(name: string, type: ExpressionType = "int"): Variable {
  return new Variable(name, type);
}

export function intConst(value: bigint | number): Constant {
  return new Constant(BigInt(value), "int");
}

export function realConst(value: number): Constant {
  return new Constant(value, "real");
}

export function boolConst(value: boolean): Constant {
  return new Constant(value, "bool");
}

export const TRUE = boolConst(true);
export const FALSE = boolConst(false);

export function symbol(name: string): Constant {
  return new Constant(name, "function");
}

export function apply(
  op: string,
  args: readonly Expression[],
  type: ExpressionType
): FunctionApplication {
  return new FunctionApplication(symbol(op), args, type);
}

export function compare(left: Expression, op: ComparisonOp, right: Expression): FunctionApplication {
  return apply(op, [left, right], "bool");
}

export const ge = (left: Expression, right: Expression) => compare(left, ">=", right);
export const le = (left: Expression, right: Expression) => compare(left, "<=", right);
export const gt = (left: Expression, right: Expression) => compare(left, ">", right);
export const lt = (left: Expression, right: Expression) => compare(left, "<", right);
export const eq = (left: Expression, right: Expression) => compare(left, "==", right);
export const ne = (left: Expression, right: Expression) => compare(left, "!=", right);

export function and(...conjuncts: Expression[]): FunctionApplication {
  return apply("and", conjuncts, "bool");
}

export function or(...disjuncts: Expression[]): FunctionApplication {
  return apply("or", disjuncts, "bool");
}

export function not(inner: Expression): FunctionApplication {
  return apply("not", [inner], "bool");
}

export function ite(condition: Expression, then: Expression, otherwise: Expression): FunctionApplication {
  return apply("ite", [condition, then, otherwise], then.type);
}

export function arithmetic(left: Expression, op: ArithmeticOp, right: Expression): FunctionApplication {
  const type = left.type === "real" || right.type === "real" ? "real" : "int";
  return apply(op, [left, right], type);
}

export const add = (left: Expression, right: Expression) => arithmetic(left, "+", right);
export const sub = (left: Expression, right: Expression) => arithmetic(left, "-", right);
export const mul = (left: Expression, right: Expression) => arithmetic(left, "*", right);

export function negate(operand: Expression): FunctionApplication {
  return apply("-", [operand], operand.type);
}

/** Uninterpreted function or predicate call. */
export function call(name: string, args: readonly Expression[], type: ExpressionType = "bool"): FunctionApplication {
  return apply(name, args, type);
}

// =============================================================================
// Formatting
// =============================================================================

export function formatExpression(e: Expression): string {
  if (e instanceof Variable) {
    return e.name;
  }
  if (e instanceof Constant) {
    return formatConstant(e);
  }
  if (e instanceof FunctionApplication) {
    return formatApplication(e);
  }
  return e.toString();
}

function formatConstant(c: Constant): string {
  const value = c.value;
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (typeof value === "number") {
    return Number.isInteger(value) ? value.toFixed(1) : String(value);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return value;
}

function formatApplication(app: FunctionApplication): string {
  const op = app.operator;
  const args = app.args.map(formatExpression);

  if (op !== undefined) {
    if (isComparisonOp(op) && args.length === 2) {
      return `${args[0]} ${op} ${args[1]}`;
    }
    if (isArithmeticOp(op) && args.length === 2) {
      return `(${args[0]} ${op} ${args[1]})`;
    }
    if (op === "-" && args.length === 1) {
      return `-${args[0]}`;
    }
    switch (op) {
      case "and":
        return args.length === 0 ? "true" : `(${args.join(" && ")})`;
      case "or":
        return args.length === 0 ? "false" : `(${args.join(" || ")})`;
      case "not":
        if (args.length === 1) return `!${args[0]}`;
        break;
      case "ite":
        if (args.length === 3) return `(if ${args[0]} then ${args[1]} else ${args[2]})`;
        break;
    }
  }

  return `${formatExpression(app.fn)}(${args.join(", ")})`;
}
