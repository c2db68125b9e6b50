import { lexFile } from "./compiler.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { formatTree, treeToJson } from "./lexer/printer.js";

/** Where a command writes; `console` in the CLI. */
export interface CommandOutput {
  log(message: string): void;
  error(message: string): void;
}

export interface LexCommandOptions {
  json?: boolean;
  maxDepth: number;
  color: boolean;
}

/** Prints the token tree of `file`; returns the process exit code. */
export async function lexCommand(
  file: string,
  opts: LexCommandOptions,
  output: CommandOutput = console,
): Promise<number> {
  try {
    const result = await lexFile(file, { maxNestingDepth: opts.maxDepth });

    if (result.errors.length > 0 || !result.tree) {
      output.error(formatDiagnostics(result.source, result.errors, { color: opts.color }));
      return 1;
    }

    output.log(opts.json ? treeToJson(result.tree) : formatTree(result.tree));
    return 0;
  } catch (e) {
    output.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
}

/** Lexes `file` and reports only whether it succeeded. */
export async function checkCommand(
  file: string,
  opts: LexCommandOptions,
  output: CommandOutput = console,
): Promise<number> {
  try {
    const result = await lexFile(file, { maxNestingDepth: opts.maxDepth });

    if (result.errors.length > 0) {
      output.error(formatDiagnostics(result.source, result.errors, { color: opts.color }));
      return 1;
    }

    output.log(`ok: ${file}`);
    return 0;
  } catch (e) {
    output.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
}
