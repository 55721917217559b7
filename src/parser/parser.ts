/**
 * Recursive-descent parser for Kaleido, with precedence climbing for
 * binary operators.
 */

import { Lexer, LexerError } from "../lexer/lexer.js";
import type { CharSource } from "../lexer/source.js";
import { Token, TokenKind, Position, isChar, lineNumber, columnNumber } from "../token/token.js";
import { TokenCursor } from "./cursor.js";
import { PrecedenceTable, PrecedenceLookup, NO_PRECEDENCE } from "./precedence.js";
import * as ast from "../ast/nodes.js";

/**
 * Parser error with position information.
 */
export class ParserError extends Error {
  constructor(
    /** The message without position */
    public readonly reason: string,
    public readonly position: Position,
    /** True when the input ran out before the construct was complete */
    public readonly unexpectedEnd: boolean = false
  ) {
    super(`${reason} at line ${lineNumber(position)}, column ${columnNumber(position)}`);
    this.name = "ParserError";
  }
}

/**
 * Anything a parse can fail with.
 */
export type ParseError = ParserError | LexerError;

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: ParseError };

/**
 * Parser configuration.
 */
export interface ParserOptions {
  /** Binary operator precedences. Copied when the parser is created. */
  precedence?: PrecedenceTable;
  /** Maximum nesting of expressions. */
  maxDepth?: number;
}

/**
 * A parse session: owns its cursor over the lexer and a snapshot of the
 * precedence table. Sessions share no state, so several may be in use at
 * once.
 *
 * Each public parse method starts at the current token and returns a
 * ParseResult. On failure nothing of the partial construct is returned and
 * the cursor is left at the offending token; call `resync()` to skip it.
 */
export class Parser {
  private cursor: TokenCursor;
  private precedence: PrecedenceLookup;
  private error: ParseError | null = null;
  private maxDepth: number;
  private depth = 0;
  /** Parentheses opened and not yet closed */
  private openGroups = 0;

  constructor(lexer: Lexer, options: ParserOptions = {}) {
    this.cursor = new TokenCursor(lexer);
    this.precedence = (options.precedence ?? PrecedenceTable.withDefaults()).clone();
    this.maxDepth = options.maxDepth ?? 500;
  }

  /**
   * The token the parser is looking at.
   */
  get current(): Token {
    return this.cursor.current;
  }

  /**
   * Consume the current token.
   */
  advance(): Token {
    return this.cursor.advance();
  }

  /**
   * Error recovery: discard the current token and move to the next.
   */
  resync(): Token {
    return this.cursor.advance();
  }

  parsePrimary(): ParseResult<ast.Expr> {
    return this.run(() => this.primary());
  }

  parseBinaryRHS(minPrecedence: number, lhs: ast.Expr): ParseResult<ast.Expr> {
    return this.run(() => this.binaryRHS(minPrecedence, lhs));
  }

  parseExpression(): ParseResult<ast.Expr> {
    return this.run(() => this.expression());
  }

  parsePrototype(): ParseResult<ast.Prototype> {
    return this.run(() => this.prototype());
  }

  parseDefinition(): ParseResult<ast.FunctionDef> {
    return this.run(() => this.definition());
  }

  parseExtern(): ParseResult<ast.Prototype> {
    return this.run(() => this.extern());
  }

  parseTopLevelExpr(): ParseResult<ast.FunctionDef> {
    return this.run(() => this.topLevelExpr());
  }

  private run<T>(parse: () => T | null): ParseResult<T> {
    this.error = null;
    this.depth = 0;
    this.openGroups = 0;
    const value = parse();
    if (value !== null) {
      return { ok: true, value };
    }
    const error = this.error;
    this.error = null;
    if (error === null) {
      throw new Error("parse failed without recording an error");
    }
    return { ok: false, error };
  }

  /**
   * Record a failure at the current token. An ILLEGAL token reports its own
   * lexer error instead.
   */
  private fail(reason: string): null {
    const tok = this.cursor.current;
    if (tok.kind === TokenKind.ILLEGAL) {
      this.error = tok.error;
    } else {
      this.error = new ParserError(reason, tok.start, tok.kind === TokenKind.EOF);
    }
    return null;
  }

  private curCharIs(ch: string): boolean {
    return isChar(this.cursor.current, ch);
  }

  /**
   * Precedence of the current token as a binary operator, or NO_PRECEDENCE.
   */
  private curPrecedence(): number {
    const tok = this.cursor.current;
    if (tok.kind !== TokenKind.CHAR) {
      return NO_PRECEDENCE;
    }
    return this.precedence.get(tok.literal);
  }

  // =========================================================================
  // Expression Parsing
  // =========================================================================

  /**
   * primary ::= identifierexpr | numberexpr | parenexpr
   */
  private primary(): ast.Expr | null {
    const tok = this.cursor.current;
    switch (tok.kind) {
      case TokenKind.IDENT:
        return this.identifierExpr();
      case TokenKind.NUMBER:
        this.cursor.advance();
        return new ast.NumberExpr(tok.start, tok.value);
      case TokenKind.CHAR:
        if (tok.literal === "(") {
          return this.parenExpr();
        }
        break;
      case TokenKind.EOF:
        if (this.openGroups > 0) {
          return this.fail("expected ')' before end of input");
        }
        break;
    }
    return this.fail("unknown token when expecting an expression");
  }

  /**
   * expression ::= primary binoprhs
   */
  private expression(): ast.Expr | null {
    this.depth++;
    try {
      if (this.depth > this.maxDepth) {
        return this.fail("maximum expression depth exceeded");
      }
      const lhs = this.primary();
      if (!lhs) return null;
      return this.binaryRHS(0, lhs);
    } finally {
      this.depth--;
    }
  }

  /**
   * binoprhs ::= (binop primary)*
   *
   * Folds operators binding at least as tightly as `minPrecedence` onto
   * `lhs`. Equal precedence folds to the left.
   */
  private binaryRHS(minPrecedence: number, lhs: ast.Expr): ast.Expr | null {
    for (;;) {
      const tokPrecedence = this.curPrecedence();

      // Not an operator, or one the caller should take
      if (tokPrecedence === NO_PRECEDENCE || tokPrecedence < minPrecedence) {
        return lhs;
      }

      const opTok = this.cursor.current;
      this.cursor.advance(); // consume operator

      let rhs = this.primary();
      if (!rhs) return null;

      // If the next operator binds tighter, it takes rhs as its lhs
      if (tokPrecedence < this.curPrecedence()) {
        rhs = this.binaryRHS(tokPrecedence + 1, rhs);
        if (!rhs) return null;
      }

      lhs = new ast.BinaryExpr(opTok.start, opTok.literal, lhs, rhs);
    }
  }

  /**
   * parenexpr ::= '(' expression ')'
   */
  private parenExpr(): ast.Expr | null {
    this.cursor.advance(); // consume '('
    this.openGroups++;
    try {
      const inner = this.expression();
      if (!inner) return null;
      if (!this.curCharIs(")")) {
        return this.fail("expected ')'");
      }
      this.cursor.advance(); // consume ')'
      return inner;
    } finally {
      this.openGroups--;
    }
  }

  /**
   * identifierexpr ::= identifier | identifier '(' expression* ')'
   */
  private identifierExpr(): ast.Expr | null {
    const ident = this.cursor.current;
    this.cursor.advance(); // consume identifier

    if (!this.curCharIs("(")) {
      return new ast.VariableExpr(ident.start, ident.literal);
    }
    this.cursor.advance(); // consume '('

    const args: ast.Expr[] = [];
    this.openGroups++;
    try {
      if (!this.curCharIs(")")) {
        for (;;) {
          const arg = this.expression();
          if (!arg) return null;
          args.push(arg);

          if (this.curCharIs(")")) break;
          if (!this.curCharIs(",")) {
            return this.fail("expected ')' or ',' in argument list");
          }
          this.cursor.advance(); // consume ','
        }
      }
    } finally {
      this.openGroups--;
    }
    this.cursor.advance(); // consume ')'

    return new ast.CallExpr(ident.start, ident.literal, args);
  }

  // =========================================================================
  // Top-Level Parsing
  // =========================================================================

  /**
   * prototype ::= id '(' id* ')'
   */
  private prototype(): ast.Prototype | null {
    const name = this.cursor.current;
    if (name.kind !== TokenKind.IDENT) {
      return this.fail("expected function name in prototype");
    }
    this.cursor.advance();

    if (!this.curCharIs("(")) {
      return this.fail("expected '(' in prototype");
    }

    const params: string[] = [];
    for (let tok = this.cursor.advance(); tok.kind === TokenKind.IDENT; tok = this.cursor.advance()) {
      params.push(tok.literal);
    }
    if (!this.curCharIs(")")) {
      return this.fail("expected ')' in prototype");
    }
    this.cursor.advance(); // consume ')'

    return new ast.Prototype(name.start, name.literal, params);
  }

  /**
   * definition ::= 'def' prototype expression
   */
  private definition(): ast.FunctionDef | null {
    this.cursor.advance(); // consume 'def'
    const proto = this.prototype();
    if (!proto) return null;
    const body = this.expression();
    if (!body) return null;
    return new ast.FunctionDef(proto, body);
  }

  /**
   * external ::= 'extern' prototype
   */
  private extern(): ast.Prototype | null {
    this.cursor.advance(); // consume 'extern'
    return this.prototype();
  }

  /**
   * toplevelexpr ::= expression
   */
  private topLevelExpr(): ast.FunctionDef | null {
    const start = this.cursor.current.start;
    const body = this.expression();
    if (!body) return null;
    return new ast.FunctionDef(new ast.Prototype(start, "", []), body);
  }
}

/**
 * Create a parser over a string or character source.
 */
export function createParser(
  input: string | CharSource,
  options: ParserOptions & { file?: string } = {}
): Parser {
  return new Parser(new Lexer(input, options.file), options);
}
