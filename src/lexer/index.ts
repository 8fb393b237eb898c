/**
 * Lexer Module
 *
 * Tokenizes constraint text.
 */

export { Lexer, tokenize, tokenizeString, type LexerError } from "./lexer";
export { type Token, TokenKind, type TokenValue, token, describeToken, KEYWORDS, UNICODE_SYMBOLS } from "./tokens";
