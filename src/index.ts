#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { checkCommand, lexCommand, type LexCommandOptions } from "./commands.js";
import { DEFAULT_MAX_NESTING_DEPTH } from "./lexer/lexer.js";

async function resolveDefaultFile(file: string | undefined): Promise<string> {
  if (file) return file;
  const entries = await readdir(process.cwd());
  const found = entries.filter(f => f.endsWith(".an"));
  if (found.length === 0) {
    throw new Error("No .an file found in the current directory. Pass a file path explicitly.");
  }
  if (found.length > 1) {
    throw new Error(`Multiple .an files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(process.cwd(), found[0]);
}

function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return depth;
}

const program = new Command()
  .name("anlex")
  .description("Token-tree lexer for the An language")
  .version("0.3.0");

program
  .command("lex [file]")
  .description("Print the token tree of a .an file (defaults to the single .an file in the current directory)")
  .option("--json", "Print the tree as JSON")
  .option("--max-depth <n>", "Maximum nesting of strings and parentheses", parseDepth, DEFAULT_MAX_NESTING_DEPTH)
  .option("--no-color", "Disable colored diagnostics")
  .action(async (file: string | undefined, opts: LexCommandOptions) => {
    process.exitCode = await lexCommand(await resolveDefaultFile(file), opts);
  });

program
  .command("check [file]")
  .description("Lex a .an file and report the first error, if any")
  .option("--max-depth <n>", "Maximum nesting of strings and parentheses", parseDepth, DEFAULT_MAX_NESTING_DEPTH)
  .option("--no-color", "Disable colored diagnostics")
  .action(async (file: string | undefined, opts: LexCommandOptions) => {
    process.exitCode = await checkCommand(await resolveDefaultFile(file), opts);
  });

program.parseAsync().catch((e: unknown) => {
  console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
