/**
 * Lexer Tests
 */

import { describe, test, expect } from "vitest";
import { tokenizeString, TokenKind, type Token } from "../../src/lexer";

function tokenKinds(content: string): TokenKind[] {
  const { tokens } = tokenizeString(content);
  return tokens.map((t) => t.kind);
}

function firstToken(content: string): Token {
  const { tokens } = tokenizeString(content);
  return tokens[0];
}

describe("Lexer", () => {
  describe("Whitespace", () => {
    test("skips whitespace", () => {
      expect(tokenKinds("   \t\n\r  ")).toEqual([TokenKind.Eof]);
    });
  });

  describe("Numbers", () => {
    test("integers", () => {
      const tok = firstToken("42");
      expect(tok.kind).toBe(TokenKind.IntLit);
      expect(tok.value?.int).toBe(42n);
    });

    test("integers with underscores", () => {
      expect(firstToken("1_000_000").value?.int).toBe(1000000n);
    });

    test("reals", () => {
      expect(firstToken("2.5").kind).toBe(TokenKind.RealLit);
      expect(firstToken("2.5").value?.real).toBe(2.5);
      expect(firstToken(".5").value?.real).toBe(0.5);
    });

    test("a dot without digits after it is not part of the number", () => {
      expect(tokenKinds("3.")).toEqual([TokenKind.IntLit, TokenKind.Error, TokenKind.Eof]);
    });

    test("letters glued to digits are an error", () => {
      const { tokens, errors } = tokenizeString("3x");
      expect(tokens[0].kind).toBe(TokenKind.Error);
      expect(errors).toHaveLength(1);
      expect(errors[0].code).toBe("E0003");
      expect(errors[0].message).toBe("Invalid numeric literal '3x'");
    });

    test("reals too large for a double are an error", () => {
      const text = `${"9".repeat(400)}.5`;
      const { tokens, errors } = tokenizeString(text);
      expect(tokens[0].kind).toBe(TokenKind.Error);
      expect(errors).toHaveLength(1);
      expect(errors[0].code).toBe("E0003");
      expect(errors[0].message).toBe(`Real literal '${text}' is out of range`);
    });
  });

  describe("Identifiers and keywords", () => {
    test("identifiers", () => {
      expect(firstToken("n_max").value?.ident).toBe("n_max");
      expect(firstToken("x'").value?.ident).toBe("x'");
    });

    test("keywords", () => {
      expect(tokenKinds("if a then b else c")).toEqual([
        TokenKind.If,
        TokenKind.Ident,
        TokenKind.Then,
        TokenKind.Ident,
        TokenKind.Else,
        TokenKind.Ident,
        TokenKind.Eof,
      ]);
      expect(tokenKinds("true false")).toEqual([TokenKind.True, TokenKind.False, TokenKind.Eof]);
    });

    test("word connectives", () => {
      expect(tokenKinds("and or not")).toEqual([TokenKind.And, TokenKind.Or, TokenKind.Not, TokenKind.Eof]);
    });
  });

  describe("Operators", () => {
    test("ASCII comparisons and connectives", () => {
      expect(tokenKinds("x >= 3 && y < 4 || !p")).toEqual([
        TokenKind.Ident,
        TokenKind.GtEq,
        TokenKind.IntLit,
        TokenKind.And,
        TokenKind.Ident,
        TokenKind.Lt,
        TokenKind.IntLit,
        TokenKind.Or,
        TokenKind.Not,
        TokenKind.Ident,
        TokenKind.Eof,
      ]);
    });

    test("Unicode forms", () => {
      expect(tokenKinds("x ≤ 3 ∧ ¬p ∨ y ≥ 1 ∧ z ≠ 0")).toEqual([
        TokenKind.Ident,
        TokenKind.LtEq,
        TokenKind.IntLit,
        TokenKind.And,
        TokenKind.Not,
        TokenKind.Ident,
        TokenKind.Or,
        TokenKind.Ident,
        TokenKind.GtEq,
        TokenKind.IntLit,
        TokenKind.And,
        TokenKind.Ident,
        TokenKind.NotEq,
        TokenKind.IntLit,
        TokenKind.Eof,
      ]);
    });

    test("arithmetic and punctuation", () => {
      expect(tokenKinds("f(a, b) + 1 - 2 * 3 / 4 % 5 == 6 != 7 > 8")).toEqual([
        TokenKind.Ident,
        TokenKind.LParen,
        TokenKind.Ident,
        TokenKind.Comma,
        TokenKind.Ident,
        TokenKind.RParen,
        TokenKind.Plus,
        TokenKind.IntLit,
        TokenKind.Minus,
        TokenKind.IntLit,
        TokenKind.Star,
        TokenKind.IntLit,
        TokenKind.Slash,
        TokenKind.IntLit,
        TokenKind.Percent,
        TokenKind.IntLit,
        TokenKind.EqEq,
        TokenKind.IntLit,
        TokenKind.NotEq,
        TokenKind.IntLit,
        TokenKind.Gt,
        TokenKind.IntLit,
        TokenKind.Eof,
      ]);
    });
  });

  describe("Errors", () => {
    test("a single = asks for ==", () => {
      const { errors } = tokenizeString("x = 3");
      expect(errors[0].message).toBe("Expected '==' for equality");
      expect(errors[0].code).toBe("E0002");
    });

    test("unknown characters", () => {
      const { errors } = tokenizeString("x # 3");
      expect(errors[0].message).toBe("Unexpected character '#'");
      expect(errors[0].span.start.column).toBe(3);
    });

    test("lone & and |", () => {
      const { errors } = tokenizeString("a & b | c");
      expect(errors.map((e) => e.message)).toEqual(["Expected '&&'", "Expected '||'"]);
    });
  });

  describe("Spans", () => {
    test("track line and column", () => {
      const { tokens } = tokenizeString("x >= 3\n  && y");
      expect(tokens[1].span.start.column).toBe(3);
      expect(tokens[1].span.end.column).toBe(5);
      expect(tokens[3].span.start.line).toBe(2);
      expect(tokens[3].span.start.column).toBe(3);
    });
  });
});
