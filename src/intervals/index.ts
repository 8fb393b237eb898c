/**
 * Intervals Module
 *
 * Closed and dotted intervals, bound extraction from constraints, and
 * case-split trees over an index variable.
 */

export { ClosedInterval, type BoundPosition } from "./closed-interval";
export { DottedIntervals } from "./dotted-intervals";
export {
  IntervalError,
  UnsupportedConstraintError,
  UnsupportedOperatorError,
  DomainError,
  NotEnumerableError,
} from "./errors";
export {
  fromConstraints,
  extractBounds,
  type ExtractOptions,
  type ExtractionIssue,
  type ExtractionIssueKind,
  type ExtractionResult,
} from "./extract";
export {
  buildCaseTree,
  leaf,
  branch,
  leaves,
  resolveCaseTree,
  enumerateCaseTree,
  formatCaseTree,
  type CaseTree,
  type CaseTreeResult,
} from "./case-split";
