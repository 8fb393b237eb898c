/**
 * Token type definitions for the constraint lexer
 */

import type { SourceSpan } from "../utils/span";

export enum TokenKind {
  // Literals
  IntLit = "IntLit",
  RealLit = "RealLit",
  True = "True",
  False = "False",

  // Keywords
  If = "If",
  Then = "Then",
  Else = "Else",

  // Operators
  Plus = "Plus", // +
  Minus = "Minus", // -
  Star = "Star", // *
  Slash = "Slash", // /
  Percent = "Percent", // %
  EqEq = "EqEq", // ==
  NotEq = "NotEq", // ≠ or !=
  Lt = "Lt", // <
  Gt = "Gt", // >
  LtEq = "LtEq", // ≤ or <=
  GtEq = "GtEq", // ≥ or >=
  And = "And", // ∧ or &&
  Or = "Or", // ∨ or ||
  Not = "Not", // ¬ or !

  // Delimiters
  LParen = "LParen", // (
  RParen = "RParen", // )
  Comma = "Comma", // ,

  // Identifiers
  Ident = "Ident",

  // Special
  Eof = "Eof",
  Error = "Error",
}

export interface TokenValue {
  int?: bigint;
  real?: number;
  ident?: string;
  error?: string;
}

export interface Token {
  kind: TokenKind;
  span: SourceSpan;
  value?: TokenValue;
}

export function token(kind: TokenKind, span: SourceSpan, value?: TokenValue): Token {
  if (value !== undefined) {
    return { kind, span, value };
  }
  return { kind, span };
}

/**
 * Map of reserved keywords to their token kinds
 */
export const KEYWORDS: Map<string, TokenKind> = new Map([
  ["if", TokenKind.If],
  ["then", TokenKind.Then],
  ["else", TokenKind.Else],
  ["true", TokenKind.True],
  ["false", TokenKind.False],
  ["and", TokenKind.And],
  ["or", TokenKind.Or],
  ["not", TokenKind.Not],
]);

/**
 * Map of Unicode symbols to their token kinds
 */
export const UNICODE_SYMBOLS: Map<string, TokenKind> = new Map([
  ["≠", TokenKind.NotEq],
  ["≤", TokenKind.LtEq],
  ["≥", TokenKind.GtEq],
  ["∧", TokenKind.And],
  ["∨", TokenKind.Or],
  ["¬", TokenKind.Not],
]);

/**
 * Get a human-readable description of a token for error messages
 */
export function describeToken(tok: Token): string {
  switch (tok.kind) {
    case TokenKind.IntLit:
      return `integer '${tok.value?.int}'`;
    case TokenKind.RealLit:
      return `real '${tok.value?.real}'`;
    case TokenKind.Ident:
      return `identifier '${tok.value?.ident}'`;
    case TokenKind.Eof:
      return "end of input";
    case TokenKind.Error:
      return `error: ${tok.value?.error}`;
    default:
      return `'${tok.kind}'`;
  }
}
