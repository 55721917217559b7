/**
 * Top-level loop: definitions, externs and bare expressions, with coarse
 * error recovery.
 */

import type { CharSource } from "./lexer/source.js";
import { TokenKind, isChar } from "./token/token.js";
import { Parser, ParseError, ParserOptions, createParser } from "./parser/parser.js";
import type { FunctionDef, Prototype } from "./ast/nodes.js";

export type TopLevelItem =
  | { kind: "definition"; node: FunctionDef }
  | { kind: "extern"; node: Prototype }
  | { kind: "expression"; node: FunctionDef }
  | { kind: "error"; error: ParseError };

/**
 * top ::= definition | external | expression | ';'
 *
 * Yields one item per top-level construct until end of input. After a
 * failure the offending token is skipped and parsing resumes.
 */
export function* topLevelItems(parser: Parser): Generator<TopLevelItem, void, undefined> {
  for (;;) {
    const tok = parser.current;
    if (tok.kind === TokenKind.EOF) {
      return;
    }
    if (isChar(tok, ";")) {
      parser.advance();
      continue;
    }

    let item: TopLevelItem;
    if (tok.kind === TokenKind.DEF) {
      const result = parser.parseDefinition();
      item = result.ok ? { kind: "definition", node: result.value } : { kind: "error", error: result.error };
    } else if (tok.kind === TokenKind.EXTERN) {
      const result = parser.parseExtern();
      item = result.ok ? { kind: "extern", node: result.value } : { kind: "error", error: result.error };
    } else {
      const result = parser.parseTopLevelExpr();
      item = result.ok ? { kind: "expression", node: result.value } : { kind: "error", error: result.error };
    }

    if (item.kind === "error") {
      // Skip token for error recovery
      parser.resync();
    }
    yield item;
  }
}

/**
 * Everything parsed from one input.
 */
export interface ParsedProgram {
  items: TopLevelItem[];
  errors: ParseError[];
}

/**
 * Parse a whole input, collecting every item and every error.
 */
export function parseProgram(input: string | CharSource, options: ParserOptions & { file?: string } = {}): ParsedProgram {
  const parser = createParser(input, options);
  const items: TopLevelItem[] = [];
  const errors: ParseError[] = [];
  for (const item of topLevelItems(parser)) {
    items.push(item);
    if (item.kind === "error") {
      errors.push(item.error);
    }
  }
  return { items, errors };
}

/**
 * Status line for an item, as printed by the CLI and REPL.
 */
export function describeItem(item: TopLevelItem): string {
  switch (item.kind) {
    case "definition":
      return "Parsed a function definition.";
    case "extern":
      return "Parsed an extern.";
    case "expression":
      return "Parsed a top-level expression.";
    case "error":
      return `Error: ${item.error.message}`;
  }
}
