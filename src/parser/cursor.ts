import { Lexer, LexerError } from "../lexer/lexer.js";
import { Token, TokenKind } from "../token/token.js";

/**
 * Single-token buffer over the lexer. `current` is the token the parser is
 * looking at; `advance()` replaces it with the next one.
 */
export class TokenCursor {
  private lexer: Lexer;
  private curToken: Token;

  constructor(lexer: Lexer) {
    this.lexer = lexer;
    this.curToken = this.read();
  }

  get current(): Token {
    return this.curToken;
  }

  advance(): Token {
    this.curToken = this.read();
    return this.curToken;
  }

  /**
   * Pull a token, turning a lexer error into an ILLEGAL token so the cursor
   * always has something current.
   */
  private read(): Token {
    try {
      return this.lexer.nextToken();
    } catch (err) {
      if (!(err instanceof LexerError)) {
        throw err;
      }
      return {
        kind: TokenKind.ILLEGAL,
        literal: err.lexeme,
        start: err.position,
        end: this.lexer.currentPosition(),
        error: err,
      };
    }
  }
}
