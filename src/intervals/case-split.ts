/**
 * Case-Split Trees
 *
 * Reduces arbitrary boolean structure over an index variable to an
 * if/then/else tree whose leaves are dotted intervals. Disjunctions and
 * conditionals are split, negations are pushed inward, conditions that do
 * not mention the index become branch conditions, and each remaining pure
 * conjunction goes through bound extraction.
 */

import type { SymbolicContext } from "../context";
import {
  decideComparison,
  formatExpression,
  mentions,
  negateConstraint,
  or,
  simplify,
  viewConstraint,
  type Expression,
} from "../expression";
import { ClosedInterval } from "./closed-interval";
import { DottedIntervals } from "./dotted-intervals";
import { NotEnumerableError, type UnsupportedConstraintError } from "./errors";
import { extractBounds, type ExtractOptions, type ExtractionIssue } from "./extract";

// =============================================================================
// Types
// =============================================================================

export type CaseTree =
  | { kind: "leaf"; intervals: DottedIntervals }
  | { kind: "branch"; condition: Expression; then: CaseTree; else: CaseTree };

export type CaseTreeResult =
  | { ok: true; tree: CaseTree; issues: ExtractionIssue[] }
  | { ok: false; error: UnsupportedConstraintError };

/** A condition assumed along the current path. */
interface Assumption {
  condition: Expression;
  value: boolean;
}

export function leaf(intervals: DottedIntervals): CaseTree {
  return { kind: "leaf", intervals };
}

export function branch(condition: Expression, then: CaseTree, otherwise: CaseTree): CaseTree {
  return { kind: "branch", condition, then, else: otherwise };
}

function emptyLeaf(): CaseTree {
  return leaf(new DottedIntervals(ClosedInterval.empty()));
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Build the case-split tree of `index` under `constraint`.
 *
 * Fails only when some leaf conjunction holds a malformed relation; a
 * contradictory path yields a leaf whose interval is empty.
 */
export function buildCaseTree(
  index: Expression,
  constraint: Expression,
  options: ExtractOptions = {}
): CaseTreeResult {
  const splitter = new CaseSplitter(index, options);
  const tree = splitter.split([constraint], [], []);
  if (!("kind" in tree)) {
    return { ok: false, error: tree.error };
  }
  return { ok: true, tree, issues: splitter.issues };
}

type Built = CaseTree | { error: UnsupportedConstraintError };

class CaseSplitter {
  readonly issues: ExtractionIssue[] = [];

  constructor(
    private readonly index: Expression,
    private readonly options: ExtractOptions
  ) {}

  /**
   * @param pending constraints still to classify, all conjoined
   * @param atoms relations and residual predicates on the index, for the leaf
   * @param path index-free conditions decided on the way here
   */
  split(pending: readonly Expression[], atoms: readonly Expression[], path: readonly Assumption[]): Built {
    if (pending.length === 0) {
      return this.leafFor(atoms);
    }

    const [next, ...rest] = pending;
    const view = viewConstraint(next);

    switch (view.kind) {
      case "literal":
        return view.value ? this.split(rest, atoms, path) : emptyLeaf();

      case "and":
        return this.split([...view.children, ...rest], atoms, path);

      case "not":
        if (pushesInward(view.inner)) {
          return this.split([negateConstraint(view.inner), ...rest], atoms, path);
        }
        return this.atom(next, rest, atoms, path);

      case "or": {
        if (view.children.length === 0) return emptyLeaf();
        const [first, ...others] = view.children;
        if (others.length === 0) {
          return this.split([first, ...rest], atoms, path);
        }
        const remainder = others.length === 1 ? others[0] : or(...others);
        // A || B  ⇒  if A then A else (!A && B)
        return this.branchOn(first, [first, ...rest], [negateConstraint(first), remainder, ...rest], atoms, path);
      }

      case "ite":
        return this.branchOn(
          view.condition,
          [view.condition, view.then, ...rest],
          [negateConstraint(view.condition), view.else, ...rest],
          atoms,
          path
        );

      case "relation":
      case "other":
        return this.atom(next, rest, atoms, path);
    }
  }

  /**
   * Conditions on the index go to the leaf. Index-free conditions are
   * decided from the path when possible, otherwise they become a branch
   * whose else side is empty: the conjunction cannot hold without them.
   */
  private atom(
    atom: Expression,
    rest: readonly Expression[],
    atoms: readonly Expression[],
    path: readonly Assumption[]
  ): Built {
    if (mentions(atom, this.index)) {
      return this.split(rest, [...atoms, atom], path);
    }

    const decided = decideOnPath(atom, path);
    if (decided === true) return this.split(rest, atoms, path);
    if (decided === false) return emptyLeaf();

    const then = this.split(rest, atoms, [...path, { condition: atom, value: true }]);
    if (!("kind" in then)) return then;
    return branch(atom, then, emptyLeaf());
  }

  private branchOn(
    condition: Expression,
    thenPending: readonly Expression[],
    elsePending: readonly Expression[],
    atoms: readonly Expression[],
    path: readonly Assumption[]
  ): Built {
    const indexFree = !mentions(condition, this.index);
    if (indexFree) {
      const decided = decideOnPath(condition, path);
      if (decided === true) return this.split(thenPending, atoms, path);
      if (decided === false) return this.split(elsePending, atoms, path);
    }

    const thenPath = indexFree ? [...path, { condition, value: true }] : path;
    const elsePath = indexFree ? [...path, { condition, value: false }] : path;

    const then = this.split(thenPending, atoms, thenPath);
    if (!("kind" in then)) return then;
    const otherwise = this.split(elsePending, atoms, elsePath);
    if (!("kind" in otherwise)) return otherwise;
    return branch(condition, then, otherwise);
  }

  private leafFor(atoms: readonly Expression[]): Built {
    const result = extractBounds(this.index, atoms, this.options);
    if (!result.ok) {
      return { error: result.error };
    }
    this.issues.push(...result.issues);
    return leaf(result.value);
  }
}

/**
 * Negations of connectives and binary comparisons can be pushed inward;
 * a negated predicate stays as it is.
 */
function pushesInward(inner: Expression): boolean {
  const view = viewConstraint(inner);
  switch (view.kind) {
    case "and":
    case "or":
    case "not":
    case "ite":
    case "literal":
      return true;
    case "relation":
      return view.args.length === 2;
    case "other":
      return false;
  }
}

/**
 * Decide an index-free condition from the assumptions on the path.
 */
function decideOnPath(condition: Expression, path: readonly Assumption[]): boolean | null {
  const simplified = viewConstraint(simplify(condition));
  if (simplified.kind === "literal") return simplified.value;

  const negated = negateConstraint(condition);
  for (const { condition: assumed, value } of path) {
    if (assumed.syntacticEq(condition)) return value;
    if (assumed.syntacticEq(negated)) return !value;
  }

  const view = viewConstraint(condition);
  if (view.kind === "relation" && view.args.length === 2) {
    const facts = path.map(({ condition: c, value }) => (value ? c : negateConstraint(c)));
    return decideComparison(view.args[0], view.op, view.args[1], facts);
  }
  return null;
}

// =============================================================================
// Consuming Trees
// =============================================================================

/**
 * Leaves in then-before-else order.
 */
export function leaves(tree: CaseTree): DottedIntervals[] {
  if (tree.kind === "leaf") return [tree.intervals];
  return [...leaves(tree.then), ...leaves(tree.else)];
}

/**
 * Decide every branch condition the context settles, binding its variable
 * values into the remaining leaves.
 */
export function resolveCaseTree(tree: CaseTree, context: SymbolicContext): CaseTree {
  if (tree.kind === "leaf") {
    return leaf(tree.intervals.bind(context));
  }
  const decided = context.decide(tree.condition);
  if (decided === true) return resolveCaseTree(tree.then, context);
  if (decided === false) return resolveCaseTree(tree.else, context);
  return branch(tree.condition, resolveCaseTree(tree.then, context), resolveCaseTree(tree.else, context));
}

/**
 * Every admissible value of `index`, ascending. The leaves of a case-split
 * tree are disjoint, so no value is produced twice.
 *
 * @throws NotEnumerableError when a condition that does not mention the
 *   index remains undecided, or some leaf is not enumerable
 */
export function enumerateCaseTree(tree: CaseTree, index: Expression, context?: SymbolicContext): bigint[] {
  const resolved = context ? resolveCaseTree(tree, context) : tree;
  const values: bigint[] = [];

  const visit = (node: CaseTree): void => {
    if (node.kind === "leaf") {
      if (!node.intervals.isEmpty()) {
        for (const value of node.intervals.enumerate(index, context)) {
          values.push(value);
        }
      }
      return;
    }
    if (!mentions(node.condition, index)) {
      throw new NotEnumerableError(`condition ${formatExpression(node.condition)} is undecided`);
    }
    visit(node.then);
    visit(node.else);
  };

  visit(resolved);
  return values.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Indented rendering, one condition or leaf per line.
 */
export function formatCaseTree(tree: CaseTree, indent: string = ""): string {
  if (tree.kind === "leaf") {
    const empty = tree.intervals.isEmpty() ? " (empty)" : "";
    return `${indent}${tree.intervals.toString()}${empty}`;
  }
  const inner = `${indent}  `;
  return [
    `${indent}if ${formatExpression(tree.condition)}`,
    formatCaseTree(tree.then, inner),
    `${indent}else`,
    formatCaseTree(tree.else, inner),
  ].join("\n");
}
