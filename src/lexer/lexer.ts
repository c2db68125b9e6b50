import { SourceText } from "../source/source-text.js";
import { Cursor } from "./cursor.js";
import type { LexError } from "./errors.js";
import { LexFailure } from "./errors.js";
import { TokenTreeGrammar } from "./grammar.js";
import { groupLines } from "./indentation.js";
import type { TokenGroup } from "./tokens.js";

export const DEFAULT_MAX_NESTING_DEPTH = 256;

export interface LexOptions {
  /** Limit on strings and parentheses nested inside each other. Defaults to 256. */
  maxNestingDepth?: number;
}

export type LexResult =
  | { ok: true; tree: TokenGroup }
  | { ok: false; error: LexError };

export class Lexer {
  readonly source: SourceText;
  private maxNestingDepth: number;

  constructor(source: string | SourceText, filename: string = "<stdin>", options: LexOptions = {}) {
    this.source = typeof source === "string" ? new SourceText(source, filename) : source;
    this.maxNestingDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
    if (!Number.isInteger(this.maxNestingDepth) || this.maxNestingDepth < 1) {
      throw new RangeError(`maxNestingDepth must be a positive integer, got ${this.maxNestingDepth}`);
    }
  }

  /** Lexes the whole source into one top-level block, or the first fatal error. */
  lex(): LexResult {
    const cursor = new Cursor(this.source);
    const grammar = new TokenTreeGrammar(cursor, { maxNestingDepth: this.maxNestingDepth });
    try {
      return { ok: true, tree: groupLines(cursor, grammar) };
    } catch (e) {
      if (e instanceof LexFailure) return { ok: false, error: e.error };
      throw e;
    }
  }
}
