/**
 * Kaleido - lexer and parser for a small expression language.
 *
 * @packageDocumentation
 */

// Token exports
export {
  TokenKind,
  newToken,
  newPosition,
  NoPos,
  lineNumber,
  columnNumber,
  lookupIdentifier,
  isChar,
} from "./token/token.js";
export type { Token, NumberToken, IllegalToken, SimpleToken, Position } from "./token/token.js";

// Lexer exports
export { Lexer, LexerError, tokenize } from "./lexer/lexer.js";
export { StringSource, ChunkSource, END_OF_INPUT } from "./lexer/source.js";
export type { CharSource } from "./lexer/source.js";

// AST exports
export * from "./ast/nodes.js";

// Parser exports
export { Parser, ParserError, createParser } from "./parser/parser.js";
export type { ParseError, ParseResult, ParserOptions } from "./parser/parser.js";
export { TokenCursor } from "./parser/cursor.js";
export {
  PrecedenceTable,
  PrecedenceError,
  DEFAULT_PRECEDENCE,
  NO_PRECEDENCE,
  parsePrecedenceOption,
} from "./parser/precedence.js";
export type { PrecedenceLookup } from "./parser/precedence.js";

// Driver exports
export { topLevelItems, parseProgram, describeItem } from "./driver.js";
export type { TopLevelItem, ParsedProgram } from "./driver.js";

// Runner exports
export { runFile, runCode } from "./runner.js";

// REPL export
export { startRepl, isComplete } from "./repl.js";
export type { ReplOptions } from "./repl.js";
