/**
 * Error Code Registry
 *
 * Error codes follow the pattern:
 * - E0xxx: Syntax errors in constraint text
 * - E1xxx: Extraction errors
 * - E2xxx: Domain errors
 * - E3xxx: Command-line usage errors
 * - W1xxx: Constraints collected as residual dots
 * - I1xxx: Informational notes about extraction
 */

export const ErrorCode = {
  // ==========================================================================
  // E0xxx - Syntax errors (handled by lexer/parser)
  // ==========================================================================
  UnexpectedToken: "E0001",
  UnexpectedCharacter: "E0002",
  InvalidNumeric: "E0003",
  MismatchedParentheses: "E0004",
  ExpectedExpression: "E0005",

  // ==========================================================================
  // E1xxx - Extraction errors
  // ==========================================================================
  UnsupportedConstraint: "E1001",

  // ==========================================================================
  // E2xxx - Domain errors
  // ==========================================================================
  EmptyDomain: "E2001",
  NotEnumerable: "E2002",

  // ==========================================================================
  // E3xxx - Usage errors
  // ==========================================================================
  InvalidArgument: "E3001",

  // ==========================================================================
  // W1xxx - Collected extraction issues
  // ==========================================================================
  UnsupportedOperator: "W1001",
  UndecidableBound: "W1002",
  StrictBoundOnNonInteger: "W1003",

  // ==========================================================================
  // I1xxx - Notes
  // ==========================================================================
  ResidualConstraint: "I1001",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

const DESCRIPTIONS: ReadonlyMap<string, string> = new Map([
  // Syntax
  ["E0001", "Unexpected token in constraint"],
  ["E0002", "Character is not part of the constraint language"],
  ["E0003", "Invalid numeric literal"],
  ["E0004", "Mismatched parentheses"],
  ["E0005", "Expected an expression"],

  // Extraction
  ["E1001", "Relation does not compare the index variable with a bound"],

  // Domain
  ["E2001", "Interval is empty: lower bound exceeds upper bound"],
  ["E2002", "Interval bounds are not concrete integers"],

  // Usage
  ["E3001", "Invalid command-line argument"],

  // Collected
  ["W1001", "Operator cannot be folded into a bound"],
  ["W1002", "Bound cannot be ordered against the current bound"],
  ["W1003", "Strict bound on a non-integer index cannot be made inclusive"],

  // Notes
  ["I1001", "Constraint is not a bound and was kept as a residual dot"],
]);

export function isErrorCode(code: string): code is ErrorCodeType {
  return Object.values(ErrorCode).some((c) => c === code);
}

/**
 * Get a human-readable description for an error code.
 */
export function getErrorDescription(code: string): string {
  return DESCRIPTIONS.get(code) ?? "Unknown error";
}

/**
 * Get the severity for an error code.
 */
export function getCodeSeverity(code: string): "error" | "warning" | "info" {
  if (code.startsWith("W")) {
    return "warning";
  }
  if (code.startsWith("I")) {
    return "info";
  }
  return "error";
}
