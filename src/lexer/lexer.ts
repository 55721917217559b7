import {
  Token,
  TokenKind,
  Position,
  newPosition,
  newToken,
  lookupIdentifier,
  NumberToken,
  SimpleToken,
  lineNumber,
  columnNumber,
} from "../token/token.js";
import { CharSource, StringSource, END_OF_INPUT } from "./source.js";

/**
 * Lexer error with position information.
 */
export class LexerError extends Error {
  constructor(
    message: string,
    public readonly position: Position,
    /** The offending source text */
    public readonly lexeme: string = ""
  ) {
    super(`${message} at line ${lineNumber(position)}, column ${columnNumber(position)}`);
    this.name = "LexerError";
  }
}

const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)$/;

/**
 * Lexer tokenizes Kaleido source code.
 *
 * The lexer holds exactly one character of lookahead (`ch`): the character
 * after the last token, not yet classified.
 */
export class Lexer {
  private source: CharSource;
  private offset: number = -1;
  private ch: string = END_OF_INPUT;
  private line: number = 0;
  private column: number = -1;
  private file: string;
  private exhausted = false;
  private tokenStartPosition: Position;

  constructor(input: CharSource | string, file: string = "<stdin>") {
    this.source = typeof input === "string" ? new StringSource(input) : input;
    this.file = file;
    this.readChar();
    this.tokenStartPosition = this.currentPosition();
  }

  /**
   * Position of the lookahead character.
   */
  currentPosition(): Position {
    return newPosition(this.offset, this.line, this.column, this.file);
  }

  /**
   * Read the next character into the lookahead slot.
   *
   * Lines end at "\n", "\r\n" or a lone "\r".
   */
  private readChar(): void {
    if (this.exhausted) {
      return;
    }
    const prev = this.ch;
    if (prev === "\n") {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    this.offset++;
    this.ch = this.source.read();
    if (prev === "\r" && this.ch !== "\n") {
      this.line++;
      this.column = 0;
    }
    if (this.ch === END_OF_INPUT) {
      this.exhausted = true;
    }
  }

  /**
   * Skip whitespace, newlines included.
   */
  private skipWhitespace(): void {
    while (isSpace(this.ch)) {
      this.readChar();
    }
  }

  /**
   * Skip to end of line, leaving the line terminator as lookahead.
   */
  private skipToEndOfLine(): void {
    while (this.ch !== "\n" && this.ch !== "\r" && this.ch !== END_OF_INPUT) {
      this.readChar();
    }
  }

  /**
   * Start tracking a new token.
   */
  private startToken(): void {
    this.tokenStartPosition = this.currentPosition();
  }

  private makeToken(kind: SimpleToken["kind"], literal: string): Token {
    return newToken(kind, literal, this.tokenStartPosition, this.currentPosition());
  }

  /**
   * Get the next token.
   */
  nextToken(): Token {
    this.skipWhitespace();

    // Comments run to end of line and produce no token of their own
    while (this.ch === "#") {
      this.skipToEndOfLine();
      this.skipWhitespace();
    }

    this.startToken();

    if (this.ch === END_OF_INPUT) {
      return this.makeToken(TokenKind.EOF, "");
    }

    if (isLetter(this.ch)) {
      return this.readIdentifier();
    }

    if (isDigit(this.ch) || this.ch === ".") {
      return this.readNumber();
    }

    const ch = this.ch;
    this.readChar();
    return this.makeToken(TokenKind.CHAR, ch);
  }

  /**
   * Read an identifier or keyword.
   */
  private readIdentifier(): Token {
    let literal = "";
    while (isLetter(this.ch) || isDigit(this.ch)) {
      literal += this.ch;
      this.readChar();
    }
    return this.makeToken(lookupIdentifier(literal), literal);
  }

  /**
   * Read a number literal: a run of digits and dots.
   */
  private readNumber(): NumberToken {
    let literal = "";
    while (isDigit(this.ch) || this.ch === ".") {
      literal += this.ch;
      this.readChar();
    }

    if (!NUMBER_PATTERN.test(literal)) {
      throw new LexerError(`invalid number literal '${literal}'`, this.tokenStartPosition, literal);
    }

    const value = Number(literal);
    if (!Number.isFinite(value)) {
      throw new LexerError(`number literal '${literal}' is out of range`, this.tokenStartPosition, literal);
    }

    return {
      kind: TokenKind.NUMBER,
      literal,
      value,
      start: this.tokenStartPosition,
      end: this.currentPosition(),
    };
  }
}

function isSpace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r" || ch === "\v" || ch === "\f";
}

/**
 * Check if a character is an ASCII letter.
 */
function isLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

/**
 * Check if a character is a digit.
 */
function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

/**
 * Tokenize an input string into an array of tokens, ending with EOF.
 */
export function tokenize(input: string, file?: string): Token[] {
  const lexer = new Lexer(input, file);
  const tokens: Token[] = [];
  let tok: Token;
  do {
    tok = lexer.nextToken();
    tokens.push(tok);
  } while (tok.kind !== TokenKind.EOF);
  return tokens;
}
