/**
 * Constraint Lexer
 *
 * Tokenizes constraint text. Supports both Unicode and ASCII operators.
 */

import { SourceFile } from "../utils/source";
import type { SourceSpan } from "../utils/span";
import { ErrorCode, type ErrorCodeType } from "../diagnostics/codes";
import { type Token, TokenKind, type TokenValue, token, KEYWORDS, UNICODE_SYMBOLS } from "./tokens";

export interface LexerError {
  code: ErrorCodeType;
  message: string;
  span: SourceSpan;
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

function isIdentifierStart(char: string): boolean {
  return /^[\p{L}_]$/u.test(char);
}

function isIdentifierContinue(char: string): boolean {
  return /^[\p{L}\p{N}_']$/u.test(char);
}

export class Lexer {
  private source: SourceFile;
  private pos: number = 0;
  private errors: LexerError[] = [];

  constructor(source: SourceFile) {
    this.source = source;
  }

  /**
   * Get all lexer errors
   */
  getErrors(): LexerError[] {
    return this.errors;
  }

  /**
   * Tokenize the entire input. The last token is always Eof.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];

    for (;;) {
      const tok = this.nextToken();
      tokens.push(tok);
      if (tok.kind === TokenKind.Eof) {
        break;
      }
    }

    return tokens;
  }

  /**
   * Get the next token from the input
   */
  nextToken(): Token {
    this.skipWhitespace();

    if (this.isAtEnd()) {
      return this.makeToken(TokenKind.Eof, this.pos, this.pos);
    }

    const char = this.peek();

    const unicodeKind = UNICODE_SYMBOLS.get(char);
    if (unicodeKind !== undefined) {
      const start = this.pos;
      this.advance();
      return this.makeToken(unicodeKind, start, this.pos);
    }

    if (isIdentifierStart(char)) {
      return this.scanIdentifier();
    }

    if (isDigit(char) || (char === "." && isDigit(this.peekNext()))) {
      return this.scanNumber();
    }

    return this.scanOperatorOrPunctuation();
  }

  // ===== Character Navigation =====

  private isAtEnd(): boolean {
    return this.pos >= this.source.content.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return "\0";
    const codePoint = this.source.content.codePointAt(this.pos);
    return codePoint !== undefined ? String.fromCodePoint(codePoint) : "\0";
  }

  private peekNext(): string {
    const nextPos = this.pos + this.peek().length;
    if (nextPos >= this.source.content.length) return "\0";
    const codePoint = this.source.content.codePointAt(nextPos);
    return codePoint !== undefined ? String.fromCodePoint(codePoint) : "\0";
  }

  private advance(): string {
    if (this.isAtEnd()) return "\0";
    const char = this.peek();
    this.pos += char.length;
    return char;
  }

  private match(expected: string): boolean {
    if (this.peek() !== expected) return false;
    this.advance();
    return true;
  }

  // ===== Token Creation =====

  private makeToken(kind: TokenKind, start: number, end: number, value?: TokenValue): Token {
    return token(kind, this.source.spanAt(start, end), value);
  }

  private errorToken(
    message: string,
    start: number,
    end: number,
    code: ErrorCodeType = ErrorCode.UnexpectedCharacter
  ): Token {
    const span = this.source.spanAt(start, end);
    this.errors.push({ code, message, span });
    return token(TokenKind.Error, span, { error: message });
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd() && /\s/.test(this.peek())) {
      this.advance();
    }
  }

  // ===== Identifiers and Keywords =====

  private scanIdentifier(): Token {
    const start = this.pos;

    while (!this.isAtEnd() && isIdentifierContinue(this.peek())) {
      this.advance();
    }

    const text = this.source.content.slice(start, this.pos);

    const keywordKind = KEYWORDS.get(text);
    if (keywordKind !== undefined) {
      return this.makeToken(keywordKind, start, this.pos);
    }

    return this.makeToken(TokenKind.Ident, start, this.pos, { ident: text });
  }

  // ===== Numbers =====

  private scanNumber(): Token {
    const start = this.pos;

    this.scanDigits();

    if (this.peek() === "." && isDigit(this.peekNext())) {
      this.advance(); // consume .
      this.scanDigits();
      const text = this.source.content.slice(start, this.pos);
      const value = parseFloat(text.replace(/_/g, ""));
      if (!Number.isFinite(value)) {
        return this.errorToken(`Real literal '${text}' is out of range`, start, this.pos, ErrorCode.InvalidNumeric);
      }
      return this.makeToken(TokenKind.RealLit, start, this.pos, { real: value });
    }

    // A letter glued to the digits (3x) is not a number
    if (isIdentifierStart(this.peek())) {
      while (!this.isAtEnd() && isIdentifierContinue(this.peek())) {
        this.advance();
      }
      return this.errorToken(
        `Invalid numeric literal '${this.source.content.slice(start, this.pos)}'`,
        start,
        this.pos,
        ErrorCode.InvalidNumeric
      );
    }

    const text = this.source.content.slice(start, this.pos);
    return this.makeToken(TokenKind.IntLit, start, this.pos, { int: BigInt(text.replace(/_/g, "")) });
  }

  private scanDigits(): void {
    while (isDigit(this.peek()) || (this.peek() === "_" && isDigit(this.peekNext()))) {
      this.advance();
    }
  }

  // ===== Operators and Punctuation =====

  private scanOperatorOrPunctuation(): Token {
    const start = this.pos;
    const char = this.advance();

    switch (char) {
      case "+":
        return this.makeToken(TokenKind.Plus, start, this.pos);
      case "-":
        return this.makeToken(TokenKind.Minus, start, this.pos);
      case "*":
        return this.makeToken(TokenKind.Star, start, this.pos);
      case "/":
        return this.makeToken(TokenKind.Slash, start, this.pos);
      case "%":
        return this.makeToken(TokenKind.Percent, start, this.pos);
      case "(":
        return this.makeToken(TokenKind.LParen, start, this.pos);
      case ")":
        return this.makeToken(TokenKind.RParen, start, this.pos);
      case ",":
        return this.makeToken(TokenKind.Comma, start, this.pos);
      case "=":
        if (this.match("=")) return this.makeToken(TokenKind.EqEq, start, this.pos);
        return this.errorToken("Expected '==' for equality", start, this.pos);
      case "!":
        if (this.match("=")) return this.makeToken(TokenKind.NotEq, start, this.pos);
        return this.makeToken(TokenKind.Not, start, this.pos);
      case "<":
        if (this.match("=")) return this.makeToken(TokenKind.LtEq, start, this.pos);
        return this.makeToken(TokenKind.Lt, start, this.pos);
      case ">":
        if (this.match("=")) return this.makeToken(TokenKind.GtEq, start, this.pos);
        return this.makeToken(TokenKind.Gt, start, this.pos);
      case "&":
        if (this.match("&")) return this.makeToken(TokenKind.And, start, this.pos);
        return this.errorToken("Expected '&&'", start, this.pos);
      case "|":
        if (this.match("|")) return this.makeToken(TokenKind.Or, start, this.pos);
        return this.errorToken("Expected '||'", start, this.pos);
      default:
        return this.errorToken(`Unexpected character '${char}'`, start, this.pos);
    }
  }
}

/**
 * Tokenize a source file
 */
export function tokenize(source: SourceFile): { tokens: Token[]; errors: LexerError[] } {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  return { tokens, errors: lexer.getErrors() };
}

/**
 * Tokenize a string directly
 */
export function tokenizeString(
  content: string,
  name: string = "<input>"
): { tokens: Token[]; errors: LexerError[] } {
  return tokenize(new SourceFile(name, content));
}
