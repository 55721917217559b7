/**
 * Token types for the Kaleido lexer.
 */

import type { LexerError } from "../lexer/lexer.js";

export const enum TokenKind {
  // Primary
  IDENT = "IDENT",
  NUMBER = "NUMBER",

  // Keywords
  DEF = "def",
  EXTERN = "extern",

  // Any other single character: operators and punctuation
  CHAR = "CHAR",

  // Special
  EOF = "EOF",
  ILLEGAL = "ILLEGAL",
}

/**
 * Keywords map for identifier lookup.
 */
const keywords: Map<string, TokenKind.DEF | TokenKind.EXTERN> = new Map([
  ["def", TokenKind.DEF],
  ["extern", TokenKind.EXTERN],
]);

/**
 * Look up an identifier to see if it's a keyword.
 */
export function lookupIdentifier(ident: string): TokenKind.IDENT | TokenKind.DEF | TokenKind.EXTERN {
  return keywords.get(ident) ?? TokenKind.IDENT;
}

/**
 * Position in source code.
 */
export interface Position {
  /** Character offset within the input */
  offset: number;
  /** 0-indexed line number */
  line: number;
  /** 0-indexed column number */
  column: number;
  /** Filename */
  file: string;
}

/**
 * Create a new Position.
 */
export function newPosition(offset: number, line: number, column: number, file: string): Position {
  return { offset, line, column, file };
}

/**
 * The zero value Position, representing an invalid/unset position.
 */
export const NoPos: Position = {
  offset: 0,
  line: 0,
  column: 0,
  file: "",
};

/**
 * Returns the 1-indexed line number.
 */
export function lineNumber(p: Position): number {
  return p.line + 1;
}

/**
 * Returns the 1-indexed column number.
 */
export function columnNumber(p: Position): number {
  return p.column + 1;
}

interface TokenBase {
  literal: string;
  start: Position;
  end: Position;
}

/**
 * A numeric literal. `value` is the parsed number.
 */
export interface NumberToken extends TokenBase {
  kind: TokenKind.NUMBER;
  value: number;
}

/**
 * A lexeme the lexer could not accept. The error surfaces when a parser
 * expects something in its place.
 */
export interface IllegalToken extends TokenBase {
  kind: TokenKind.ILLEGAL;
  error: LexerError;
}

export interface SimpleToken extends TokenBase {
  kind: TokenKind.IDENT | TokenKind.DEF | TokenKind.EXTERN | TokenKind.CHAR | TokenKind.EOF;
}

/**
 * A token produced by the lexer.
 */
export type Token = SimpleToken | NumberToken | IllegalToken;

/**
 * Create a new Token.
 */
export function newToken(kind: SimpleToken["kind"], literal: string, start: Position, end: Position): SimpleToken {
  return { kind, literal, start, end };
}

/**
 * Check whether a token is the single character `ch`.
 */
export function isChar(tok: Token, ch: string): boolean {
  return tok.kind === TokenKind.CHAR && tok.literal === ch;
}
