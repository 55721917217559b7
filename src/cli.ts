#!/usr/bin/env node
/**
 * Kaleido CLI - Command-line interface for the Kaleido front end.
 */

import { startRepl } from "./repl.js";
import { runFile, runCode } from "./runner.js";
import { describeItem, ParsedProgram } from "./driver.js";
import { PrecedenceTable, parsePrecedenceOption } from "./parser/precedence.js";
import { dump } from "./ast/nodes.js";

const VERSION = "0.1.0";

function printUsage(): void {
  console.log(`
Kaleido v${VERSION} - Lexer and parser for the Kaleido toy language

Usage:
  kaleido [options] [file]

Options:
  -h, --help           Show this help message
  -v, --version        Show version
  -e, --eval <code>    Parse code from command line
  -i, --interactive    Start REPL after parsing
  -p, --prec <op>=<n>  Set the precedence of a binary operator (repeatable)
      --ast            Print each parsed unit as an S-expression

Examples:
  kaleido                        Start interactive REPL
  kaleido fib.kal                Parse a source file
  kaleido --ast -e "a+b*c"       Show the tree for an expression
  kaleido -p "/=40" -e "a/b"     Add a division operator
`);
}

function printVersion(): void {
  console.log(`Kaleido ${VERSION}`);
}

/**
 * Print one line per parsed unit. Returns the number of errors.
 */
function report(program: ParsedProgram, showAst: boolean): number {
  for (const item of program.items) {
    console.error(describeItem(item));
    if (showAst && item.kind !== "error") {
      console.log(dump(item.node));
    }
  }
  return program.errors.length;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const precedence = PrecedenceTable.withDefaults();
  let evalCode: string | null = null;
  let interactive = false;
  let showAst = false;
  let file: string | null = null;

  // Parse arguments
  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      printUsage();
      process.exit(0);
    } else if (arg === "-v" || arg === "--version") {
      printVersion();
      process.exit(0);
    } else if (arg === "-e" || arg === "--eval") {
      i++;
      if (i >= args.length) {
        console.error("Error: -e requires an argument");
        process.exit(1);
      }
      evalCode = args[i];
    } else if (arg === "-p" || arg === "--prec") {
      i++;
      if (i >= args.length) {
        console.error("Error: -p requires an argument");
        process.exit(1);
      }
      const [op, level] = parsePrecedenceOption(args[i]);
      precedence.set(op, level);
    } else if (arg === "-i" || arg === "--interactive") {
      interactive = true;
    } else if (arg === "--ast") {
      showAst = true;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      printUsage();
      process.exit(1);
    } else {
      file = arg;
      break;
    }
    i++;
  }

  let failures = 0;
  if (evalCode !== null) {
    failures += report(runCode(evalCode, { precedence }), showAst);
  } else if (file !== null) {
    failures += report(await runFile(file, { precedence }), showAst);
  }

  if (interactive || (evalCode === null && file === null)) {
    await startRepl({ precedence, showAst });
  } else if (failures > 0) {
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
