/**
 * Parser Module
 *
 * Parses constraint text into expressions.
 */

export {
  Parser,
  parseConstraint,
  parseConstraintString,
  type ParseError,
  type ParseOptions,
  type SyntaxIssue,
} from "./parser";
