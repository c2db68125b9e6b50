import type { Diagnostic } from "../errors/diagnostic.js";
import { error, makeSpan } from "../errors/diagnostic.js";
import { Delimiter } from "./tokens.js";

// Labels for the alternatives a position would have accepted.
export const TOKEN_TREE_STARTS: readonly string[] = [
  "identifier",
  "integer",
  "operator",
  "string",
  "'('",
  "comment",
];
export const LINE_END: readonly string[] = ["newline", "end of input"];

interface LexErrorBase {
  /** Byte offset of the furthest point the lexer reached. */
  position: number;
  expected: readonly string[];
}

export interface UnexpectedCharacter extends LexErrorBase {
  kind: "UnexpectedCharacter";
  found: string;
}

export interface UnterminatedString extends LexErrorBase {
  kind: "UnterminatedString";
  start: number;
}

export interface UnterminatedComment extends LexErrorBase {
  kind: "UnterminatedComment";
  start: number;
}

export interface UnterminatedGroup extends LexErrorBase {
  kind: "UnterminatedGroup";
  start: number;
  delimiter: Delimiter;
}

export interface InvalidEscape extends LexErrorBase {
  kind: "InvalidEscape";
  found: string;
}

export interface NumericOverflow extends LexErrorBase {
  kind: "NumericOverflow";
  digits: string;
}

export interface InconsistentIndentation extends LexErrorBase {
  kind: "InconsistentIndentation";
}

export interface NestingTooDeep extends LexErrorBase {
  kind: "NestingTooDeep";
  limit: number;
}

export type LexError =
  | UnexpectedCharacter
  | UnterminatedString
  | UnterminatedComment
  | UnterminatedGroup
  | InvalidEscape
  | NumericOverflow
  | InconsistentIndentation
  | NestingTooDeep;

/**
 * Thrown by the scanners to unwind to `Lexer.lex()`, the only place that catches it.
 */
export class LexFailure extends Error {
  readonly error: LexError;

  constructor(lexError: LexError) {
    super(describeLexError(lexError).message);
    this.name = "LexFailure";
    this.error = lexError;
  }
}

const CLOSERS: Record<Delimiter, string> = {
  [Delimiter.Block]: "dedent",
  [Delimiter.Parenthesis]: "')'",
  [Delimiter.Curly]: "'}'",
  [Delimiter.Interpolation]: "'\"'",
};

export function closerOf(delimiter: Delimiter): string {
  return CLOSERS[delimiter];
}

export function describeLexError(err: LexError): Diagnostic {
  switch (err.kind) {
    case "UnexpectedCharacter":
      return error(
        err.kind,
        `Unexpected ${err.found === "" ? "end of input" : `character '${err.found}'`}`,
        makeSpan(err.position, err.position + Buffer.byteLength(err.found)),
        `Expected ${formatExpected(err.expected)}`,
      );
    case "UnterminatedString":
      return error(
        err.kind,
        "Unterminated string literal",
        makeSpan(err.start, err.start + 1),
        "Add a closing '\"'",
      );
    case "UnterminatedComment":
      return error(
        err.kind,
        "Unterminated block comment",
        makeSpan(err.start, err.start + 2),
        "Block comments do not nest; close this one with '*/'",
      );
    case "UnterminatedGroup":
      return error(
        err.kind,
        `Unclosed ${err.delimiter === Delimiter.Curly ? "interpolation splice" : "parenthesis"}`,
        makeSpan(err.start, err.delimiter === Delimiter.Curly ? err.start + 2 : err.start + 1),
        `Expected ${formatExpected(err.expected)} before position ${err.position}`,
      );
    case "InvalidEscape":
      return error(
        err.kind,
        `Invalid escape sequence '\\${err.found}'`,
        makeSpan(err.position, err.position + 1 + Buffer.byteLength(err.found)),
        "Valid escapes are \\\\ \\$ \\\" \\n \\r \\t \\0",
      );
    case "NumericOverflow":
      return error(
        err.kind,
        `Integer literal ${err.digits} does not fit in 64 bits`,
        makeSpan(err.position, err.position + err.digits.length),
      );
    case "InconsistentIndentation":
      return error(
        err.kind,
        "Inconsistent indentation",
        makeSpan(err.position, err.position),
        "Dedent to the indentation of an enclosing line",
      );
    case "NestingTooDeep":
      return error(
        err.kind,
        `Groups and strings nest deeper than ${err.limit} levels`,
        makeSpan(err.position, err.position + 1),
      );
  }
}

export function formatExpected(expected: readonly string[]): string {
  if (expected.length === 0) return "nothing";
  if (expected.length === 1) return expected[0];
  return `one of ${expected.join(", ")}`;
}
