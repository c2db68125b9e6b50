import { readFile } from "node:fs/promises";
import { Lexer, type LexOptions } from "./lexer/lexer.js";
import { describeLexError, type LexError } from "./lexer/errors.js";
import type { TokenGroup } from "./lexer/tokens.js";
import type { Diagnostic } from "./errors/diagnostic.js";
import { error, makeSpan } from "./errors/diagnostic.js";
import { SourceText } from "./source/source-text.js";

export { Lexer, DEFAULT_MAX_NESTING_DEPTH } from "./lexer/lexer.js";
export type { LexOptions, LexResult } from "./lexer/lexer.js";
export type { LexError } from "./lexer/errors.js";
export { describeLexError } from "./lexer/errors.js";
export * from "./lexer/tokens.js";
export { formatTree, formatToken, treeToJson } from "./lexer/printer.js";
export { SourceText } from "./source/source-text.js";
export type { Diagnostic, Span } from "./errors/diagnostic.js";
export { formatDiagnostic, formatDiagnostics } from "./errors/reporter.js";
export type { ReportOptions } from "./errors/reporter.js";

export interface FrontendResult {
  source: SourceText;
  tree?: TokenGroup;
  /** The fatal error, if lexing failed. */
  lexError?: LexError;
  /** Empty on success; otherwise exactly one error. */
  errors: Diagnostic[];
}

/**
 * Lex a source string that is already in memory.
 */
export function lexSource(
  source: string,
  filename: string,
  options: LexOptions = {},
): FrontendResult {
  const text = new SourceText(source, filename);
  const result = new Lexer(text, filename, options).lex();
  if (result.ok) {
    return { source: text, tree: result.tree, errors: [] };
  }
  return { source: text, lexError: result.error, errors: [describeLexError(result.error)] };
}

/**
 * Read a file as UTF-8 and lex it. Bytes that are not valid UTF-8 are reported
 * as an InvalidEncoding error instead of being replaced.
 */
export async function lexFile(filePath: string, options: LexOptions = {}): Promise<FrontendResult> {
  const bytes = await readFile(filePath);
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return {
      source: new SourceText("", filePath),
      errors: [error("InvalidEncoding", `${filePath} is not valid UTF-8: ${msg}`, makeSpan(0, 0))],
    };
  }
  return lexSource(text, filePath, options);
}
