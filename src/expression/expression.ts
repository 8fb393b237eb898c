/**
 * Expression Interface
 *
 * The capability set every symbolic node exposes: child access, positional
 * update, structural substitution and structural equality. Intervals are
 * built entirely on this interface and are themselves expression nodes.
 */

// =============================================================================
// Types
// =============================================================================

export type ExpressionType = "int" | "real" | "bool" | "set" | "function";

export type ExpressionKind =
  | "variable"
  | "constant"
  | "application"
  | "closed-interval"
  | "dotted-intervals";

export interface Expression {
  readonly kind: ExpressionKind;
  readonly type: ExpressionType;

  /** Ordered children */
  readonly subexpressions: readonly Expression[];

  /** Returns a copy with child `i` replaced. Never mutates. */
  set(i: number, newExpression: Expression): Expression;

  /** Structural substitution of every occurrence of `from` by `to`. */
  replace(from: Expression, to: Expression): Expression;

  /** Structural (not semantic) equality. */
  syntacticEq(other: Expression): boolean;

  toString(): string;
}

// =============================================================================
// Base Class
// =============================================================================

/**
 * Shared `replace`/`syntacticEq` in terms of `subexpressions` and `set`.
 * Subclasses only describe their own node; children are handled here.
 */
export abstract class BasicExpression implements Expression {
  abstract readonly kind: ExpressionKind;
  readonly type: ExpressionType;

  constructor(type: ExpressionType) {
    this.type = type;
  }

  abstract get subexpressions(): readonly Expression[];

  abstract set(i: number, newExpression: Expression): Expression;

  /**
   * Compare the node itself (class and local attributes), ignoring children.
   */
  protected abstract sameNode(other: Expression): boolean;

  replace(from: Expression, to: Expression): Expression {
    if (this.syntacticEq(from)) {
      return to;
    }
    let result: Expression = this;
    this.subexpressions.forEach((child, i) => {
      const replaced = child.replace(from, to);
      if (replaced !== child) {
        result = result.set(i, replaced);
      }
    });
    return result;
  }

  syntacticEq(other: Expression): boolean {
    if (this === other) return true;
    if (this.kind !== other.kind || !this.sameNode(other)) return false;

    const mine = this.subexpressions;
    const theirs = other.subexpressions;
    if (mine.length !== theirs.length) return false;
    return mine.every((child, i) => child.syntacticEq(theirs[i]));
  }
}
