/**
 * Kaleido Runner - Parse Kaleido source files.
 */

import * as fs from "fs";
import * as path from "path";
import { parseProgram, ParsedProgram } from "./driver.js";
import type { ParserOptions } from "./parser/parser.js";

/**
 * Parse a Kaleido source file.
 */
export async function runFile(filepath: string, options: ParserOptions = {}): Promise<ParsedProgram> {
  // Resolve the path
  const resolved = path.resolve(filepath);

  // Check if file exists
  if (!fs.existsSync(resolved)) {
    throw new Error(`File not found: ${filepath}`);
  }

  const code = await fs.promises.readFile(resolved, "utf-8");
  return runCode(code, { ...options, file: resolved });
}

/**
 * Parse Kaleido code.
 */
export function runCode(code: string, options: ParserOptions & { file?: string } = {}): ParsedProgram {
  return parseProgram(code, { file: "<input>", ...options });
}
