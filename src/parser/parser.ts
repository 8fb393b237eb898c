/**
 * Constraint Parser
 *
 * Recursive descent over the token stream, producing expressions directly.
 *
 * Precedence, loosest first:
 *   if-then-else, ||, &&, !, comparisons (chainable), + -, * / %, unary -
 */

import { ErrorCode, type ErrorCodeType } from "../diagnostics/codes";
import {
  apply,
  boolConst,
  compare,
  FunctionApplication,
  intConst,
  ite,
  negate,
  not,
  realConst,
  variable,
  type ComparisonOp,
  type Expression,
  type ExpressionType,
} from "../expression";
import { tokenize, type LexerError } from "../lexer/lexer";
import { type Token, TokenKind, describeToken } from "../lexer/tokens";
import { SourceFile } from "../utils/source";
import type { SourceSpan } from "../utils/span";

// =============================================================================
// Parser Error
// =============================================================================

export interface ParseError {
  code: ErrorCodeType;
  message: string;
  span: SourceSpan;
  expected?: string[] | undefined;
}

/** Unwinds the parser to its entry point once a ParseError is recorded. */
class ParseFailure extends Error {
  readonly error: ParseError;

  constructor(error: ParseError) {
    super(error.message);
    this.error = error;
  }
}

export interface ParseOptions {
  /** Declared variable types; undeclared variables are integers. */
  types?: Record<string, ExpressionType>;
}

const COMPARISON_TOKENS: ReadonlyMap<TokenKind, ComparisonOp> = new Map([
  [TokenKind.EqEq, "=="],
  [TokenKind.NotEq, "!="],
  [TokenKind.Lt, "<"],
  [TokenKind.LtEq, "<="],
  [TokenKind.Gt, ">"],
  [TokenKind.GtEq, ">="],
]);

// =============================================================================
// Parser Class
// =============================================================================

export class Parser {
  private tokens: Token[];
  private pos: number = 0;
  private errors: ParseError[] = [];
  private types: ReadonlyMap<string, ExpressionType>;

  constructor(tokens: Token[], options: ParseOptions = {}) {
    this.tokens = tokens;
    this.types = new Map(Object.entries(options.types ?? {}));
  }

  getErrors(): ParseError[] {
    return this.errors;
  }

  /**
   * Parse one constraint spanning the whole input.
   */
  parseConstraint(): Expression | undefined {
    try {
      const expr = this.parseExpr();
      if (!this.isAtEnd()) {
        throw this.error(`Unexpected ${describeToken(this.peek())} after constraint`, ErrorCode.UnexpectedToken);
      }
      return expr;
    } catch (e) {
      if (e instanceof ParseFailure) {
        return undefined;
      }
      throw e;
    }
  }

  // ===========================================================================
  // Token Navigation
  // ===========================================================================

  private isAtEnd(): boolean {
    return this.peek().kind === TokenKind.Eof;
  }

  private peek(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return this.tokens[this.pos - 1];
  }

  private check(kind: TokenKind): boolean {
    return this.peek().kind === kind;
  }

  private match(...kinds: TokenKind[]): boolean {
    for (const kind of kinds) {
      if (this.check(kind)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private expect(kind: TokenKind, message: string, code: ErrorCodeType = ErrorCode.UnexpectedToken): Token {
    if (this.check(kind)) {
      return this.advance();
    }
    throw this.error(message, code, [kind.toString()]);
  }

  private error(message: string, code: ErrorCodeType, expected?: string[]): ParseFailure {
    const err: ParseError = {
      code,
      message,
      span: this.peek().span,
      expected,
    };
    this.errors.push(err);
    return new ParseFailure(err);
  }

  // ===========================================================================
  // Expression Parsing
  // ===========================================================================

  private parseExpr(): Expression {
    if (this.match(TokenKind.If)) {
      const condition = this.parseExpr();
      this.expect(TokenKind.Then, "Expected 'then' after condition");
      const then = this.parseExpr();
      this.expect(TokenKind.Else, "Expected 'else' branch");
      const otherwise = this.parseExpr();
      return ite(condition, then, otherwise);
    }
    return this.parseOrExpr();
  }

  private parseOrExpr(): Expression {
    const disjuncts = [this.parseAndExpr()];
    while (this.match(TokenKind.Or)) {
      disjuncts.push(this.parseAndExpr());
    }
    return disjuncts.length === 1 ? disjuncts[0] : apply("or", disjuncts, "bool");
  }

  private parseAndExpr(): Expression {
    const conjuncts = [this.parseNotExpr()];
    while (this.match(TokenKind.And)) {
      conjuncts.push(this.parseNotExpr());
    }
    return conjuncts.length === 1 ? conjuncts[0] : apply("and", conjuncts, "bool");
  }

  private parseNotExpr(): Expression {
    if (this.match(TokenKind.Not)) {
      return not(this.parseNotExpr());
    }
    return this.parseComparisonExpr();
  }

  /**
   * `a < b <= c` reads as `a < b && b <= c`.
   */
  private parseComparisonExpr(): Expression {
    const first = this.parseAddExpr();
    const relations: Expression[] = [];

    let left = first;
    let op = COMPARISON_TOKENS.get(this.peek().kind);
    while (op !== undefined) {
      this.advance();
      const right = this.parseAddExpr();
      relations.push(compare(left, op, right));
      left = right;
      op = COMPARISON_TOKENS.get(this.peek().kind);
    }

    if (relations.length === 0) {
      return asPredicate(first);
    }
    return relations.length === 1 ? relations[0] : apply("and", relations, "bool");
  }

  private parseAddExpr(): Expression {
    let expr = this.parseMulExpr();

    while (this.check(TokenKind.Plus) || this.check(TokenKind.Minus)) {
      const op = this.advance().kind === TokenKind.Plus ? "+" : "-";
      const right = this.parseMulExpr();
      expr = apply(op, [expr, right], numericType(expr, right));
    }

    return expr;
  }

  private parseMulExpr(): Expression {
    let expr = this.parseUnaryExpr();

    while (this.check(TokenKind.Star) || this.check(TokenKind.Slash) || this.check(TokenKind.Percent)) {
      const kind = this.advance().kind;
      const op = kind === TokenKind.Star ? "*" : kind === TokenKind.Slash ? "/" : "%";
      const right = this.parseUnaryExpr();
      expr = apply(op, [expr, right], numericType(expr, right));
    }

    return expr;
  }

  private parseUnaryExpr(): Expression {
    if (this.match(TokenKind.Minus)) {
      const tok = this.peek();
      if (tok.kind === TokenKind.IntLit && tok.value?.int !== undefined) {
        this.advance();
        return intConst(-tok.value.int);
      }
      if (tok.kind === TokenKind.RealLit && tok.value?.real !== undefined) {
        this.advance();
        return realConst(-tok.value.real);
      }
      return negate(this.parseUnaryExpr());
    }
    return this.parsePrimaryExpr();
  }

  private parsePrimaryExpr(): Expression {
    const tok = this.peek();

    switch (tok.kind) {
      case TokenKind.IntLit:
        this.advance();
        return intConst(tok.value?.int ?? 0n);

      case TokenKind.RealLit:
        this.advance();
        return realConst(tok.value?.real ?? 0);

      case TokenKind.True:
        this.advance();
        return boolConst(true);

      case TokenKind.False:
        this.advance();
        return boolConst(false);

      case TokenKind.Ident: {
        this.advance();
        const name = tok.value?.ident ?? "";
        if (this.match(TokenKind.LParen)) {
          return apply(name, this.parseArguments(), "int");
        }
        return variable(name, this.types.get(name) ?? "int");
      }

      case TokenKind.LParen: {
        this.advance();
        const inner = this.parseExpr();
        this.expect(TokenKind.RParen, "Expected ')' to close '('", ErrorCode.MismatchedParentheses);
        return inner;
      }

      case TokenKind.If:
        return this.parseExpr();

      default:
        throw this.error(`Expected an expression, found ${describeToken(tok)}`, ErrorCode.ExpectedExpression);
    }
  }

  private parseArguments(): Expression[] {
    const args: Expression[] = [];
    if (this.match(TokenKind.RParen)) {
      return args;
    }
    do {
      args.push(this.parseExpr());
    } while (this.match(TokenKind.Comma));
    this.expect(TokenKind.RParen, "Expected ')' after arguments", ErrorCode.MismatchedParentheses);
    return args;
  }
}

function numericType(left: Expression, right: Expression): ExpressionType {
  return left.type === "real" || right.type === "real" ? "real" : "int";
}

/**
 * A call standing on its own is a predicate, not a term.
 */
function asPredicate(expr: Expression): Expression {
  if (expr instanceof FunctionApplication && expr.type === "int" && expr.operator !== undefined && /^[\p{L}_]/u.test(expr.operator)) {
    return new FunctionApplication(expr.fn, expr.args, "bool");
  }
  return expr;
}

// =============================================================================
// Entry Points
// =============================================================================

export type SyntaxIssue = LexerError | ParseError;

/**
 * Parse constraint text. Lexer errors stop before parsing.
 */
export function parseConstraint(
  source: SourceFile,
  options: ParseOptions = {}
): { expr: Expression | undefined; errors: SyntaxIssue[] } {
  const { tokens, errors: lexErrors } = tokenize(source);
  if (lexErrors.length > 0) {
    return { expr: undefined, errors: lexErrors };
  }
  const parser = new Parser(tokens, options);
  const expr = parser.parseConstraint();
  return { expr, errors: parser.getErrors() };
}

export function parseConstraintString(
  content: string,
  options: ParseOptions = {},
  name: string = "<input>"
): { expr: Expression | undefined; errors: SyntaxIssue[] } {
  return parseConstraint(new SourceFile(name, content), options);
}
