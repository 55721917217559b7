/**
 * Kaleido REPL - parse definitions and expressions interactively.
 */

import * as readline from "readline";
import { parseProgram, describeItem, TopLevelItem } from "./driver.js";
import { ParserError } from "./parser/parser.js";
import { PrecedenceTable } from "./parser/precedence.js";
import { dump } from "./ast/nodes.js";

const PROMPT = "ready> ";
const CONTINUE_PROMPT = "...    ";

export interface ReplOptions {
  precedence?: PrecedenceTable;
  /** Print each parsed unit as an S-expression */
  showAst?: boolean;
}

/**
 * Start the interactive REPL.
 */
export async function startRepl(options: ReplOptions = {}): Promise<void> {
  const precedence = options.precedence ?? PrecedenceTable.withDefaults();
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true,
  });

  console.log("Kaleido - Type 'exit' or Ctrl+D to quit");
  console.log("");

  let buffer = "";
  let inMultiline = false;

  await new Promise<void>((resolve) => {
    rl.on("close", () => {
      console.log("\nGoodbye!");
      resolve();
    });

    const prompt = (): void => {
      rl.question(inMultiline ? CONTINUE_PROMPT : PROMPT, (input) => {
        const line = input.trim();

        // Handle exit commands
        if (!inMultiline && (line === "exit" || line === "quit")) {
          rl.close();
          return;
        }

        // Handle special commands
        if (!inMultiline && line.startsWith("/")) {
          handleCommand(line, precedence);
          prompt();
          return;
        }

        // An empty line ends a multiline entry even if it is incomplete
        const force = inMultiline && line === "";
        buffer += (buffer ? "\n" : "") + input;

        if (force || isComplete(buffer, precedence)) {
          if (buffer.trim()) {
            for (const item of parseProgram(buffer, { precedence }).items) {
              report(item, options.showAst ?? false);
            }
          }
          buffer = "";
          inMultiline = false;
        } else {
          inMultiline = true;
        }

        prompt();
      });
    };

    prompt();
  });
}

/**
 * Check if the input is syntactically complete: parsing it does not stop
 * at end of input in the middle of a construct.
 */
export function isComplete(input: string, precedence?: PrecedenceTable): boolean {
  const { errors } = parseProgram(input, { precedence });
  return !errors.some((err) => err instanceof ParserError && err.unexpectedEnd);
}

function report(item: TopLevelItem, showAst: boolean): void {
  console.error(describeItem(item));
  if (showAst && item.kind !== "error") {
    console.log(dump(item.node));
  }
}

/**
 * Handle REPL commands.
 */
function handleCommand(cmd: string, precedence: PrecedenceTable): void {
  const parts = cmd.slice(1).split(/\s+/);
  const command = parts[0].toLowerCase();

  switch (command) {
    case "help":
      console.log(`
REPL Commands:
  /help     Show this help
  /prec     Show operator precedences
  /clear    Clear the screen
  /exit     Exit the REPL
`);
      break;

    case "prec":
      for (const [op, level] of precedence.entries()) {
        console.log(`  ${op}  ${level}`);
      }
      break;

    case "clear":
      console.clear();
      break;

    case "exit":
    case "quit":
      process.exit(0);

    default:
      console.log(`Unknown command: /${command}. Type /help for available commands.`);
  }
}
