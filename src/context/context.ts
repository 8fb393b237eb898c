/**
 * Symbolic Context
 *
 * Tracks known facts and the variable values they pin down. Contexts are
 * immutable: adding a fact yields a child context that shares its parent.
 */

import {
  and,
  conjuncts,
  Constant,
  decideComparison,
  eq,
  formatExpression,
  intConst,
  negateConstraint,
  simplify,
  TRUE,
  variable,
  Variable,
  viewConstraint,
  type Bindings,
  type Expression,
} from "../expression";

// =============================================================================
// Facts
// =============================================================================

/**
 * A known fact in the context.
 */
export interface Fact {
  constraint: Expression;
  source: string; // Where this fact came from (for diagnostics)
}

// =============================================================================
// Symbolic Context
// =============================================================================

export class SymbolicContext {
  private readonly facts: readonly Fact[];
  private readonly parent: SymbolicContext | null;

  private constructor(facts: readonly Fact[], parent: SymbolicContext | null) {
    this.facts = facts;
    this.parent = parent;
  }

  static empty(): SymbolicContext {
    return new SymbolicContext([], null);
  }

  static of(...constraints: Expression[]): SymbolicContext {
    return constraints.reduce((ctx, c) => ctx.and(c), SymbolicContext.empty());
  }

  /**
   * Context binding each named integer variable to a value.
   */
  static withBindings(values: Record<string, bigint | number>): SymbolicContext {
    let ctx = SymbolicContext.empty();
    for (const [name, value] of Object.entries(values)) {
      ctx = ctx.and(eq(variable(name), intConst(value)), "binding");
    }
    return ctx;
  }

  // ---------------------------------------------------------------------------
  // Fact Management
  // ---------------------------------------------------------------------------

  /**
   * Child context with the conjuncts of `constraint` added as facts.
   */
  and(constraint: Expression, source: string = "constraint"): SymbolicContext {
    const facts = conjuncts(constraint).map((c) => ({ constraint: c, source }));
    return new SymbolicContext(facts, this);
  }

  /**
   * Child context with the negation of `constraint`. Used for else branches.
   */
  andNot(constraint: Expression, source: string = "negated condition"): SymbolicContext {
    return this.and(negateConstraint(constraint), source);
  }

  /**
   * All facts, outermost context first.
   */
  getAllFacts(): Fact[] {
    const inherited = this.parent ? this.parent.getAllFacts() : [];
    return [...inherited, ...this.facts];
  }

  get constraints(): Expression[] {
    return this.getAllFacts().map((f) => f.constraint);
  }

  /**
   * The conjunction of every fact (`true` when there are none).
   */
  get constraint(): Expression {
    const all = this.constraints;
    if (all.length === 0) return TRUE;
    if (all.length === 1) return all[0];
    return and(...all);
  }

  // ---------------------------------------------------------------------------
  // Variable Values
  // ---------------------------------------------------------------------------

  /**
   * Concrete variable values established by `v == c` facts.
   */
  get dict(): Bindings {
    const values = new Map<string, Constant>();
    for (const { constraint } of this.getAllFacts()) {
      const view = viewConstraint(constraint);
      if (view.kind !== "relation" || view.op !== "==" || view.args.length !== 2) continue;
      const [left, right] = view.args;
      if (left instanceof Variable && right instanceof Constant) {
        values.set(left.name, right);
      } else if (right instanceof Variable && left instanceof Constant) {
        values.set(right.name, left);
      }
    }
    return values;
  }

  // ---------------------------------------------------------------------------
  // Satisfiability
  // ---------------------------------------------------------------------------

  /**
   * Decide `constraint` from the facts: true when implied, false when
   * refuted, null when neither follows.
   */
  decide(constraint: Expression): boolean | null {
    return this.decideAgainst(constraint, this.constraints);
  }

  /**
   * Sound for unsatisfiability only: true means the facts contradict each
   * other; false means no contradiction was found.
   */
  isUnsatisfiable(): boolean {
    const all = this.constraints;
    return all.some((fact, i) => {
      const others = all.filter((_, j) => j !== i);
      return this.decideAgainst(fact, others) === false;
    });
  }

  isSatisfiable(): boolean {
    return !this.isUnsatisfiable();
  }

  private decideAgainst(constraint: Expression, facts: readonly Expression[]): boolean | null {
    const bindings = this.dict;
    const simplified = simplify(constraint, bindings);
    const view = viewConstraint(simplified);

    switch (view.kind) {
      case "literal":
        return view.value;
      case "relation": {
        if (view.args.length !== 2) return null;
        const known = facts.map((f) => simplify(f, bindings));
        return decideComparison(view.args[0], view.op, view.args[1], known);
      }
      default:
        return null;
    }
  }

  // ---------------------------------------------------------------------------
  // Debug
  // ---------------------------------------------------------------------------

  toString(): string {
    const facts = this.getAllFacts();
    if (facts.length === 0) {
      return "SymbolicContext (no facts)";
    }
    return `SymbolicContext:\n${facts
      .map((f) => `  - ${formatExpression(f.constraint)} [${f.source}]`)
      .join("\n")}`;
  }
}
