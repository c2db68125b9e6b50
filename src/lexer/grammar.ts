import type { Cursor } from "./cursor.js";
import { isDigit, isIdentStart } from "./cursor.js";
import { LexFailure, TOKEN_TREE_STARTS, closerOf } from "./errors.js";
import type { Scanned } from "./scanners.js";
import { scanComment, scanIdentifier, scanInteger, scanOperator, startsComment } from "./scanners.js";
import type { TreeScanner } from "./strings.js";
import { scanString } from "./strings.js";
import type { BareToken, Token, TokenGroup, TokenLeaf, TokenTree } from "./tokens.js";
import { Delimiter } from "./tokens.js";

export interface GrammarOptions {
  /** How deep strings and parentheses may nest inside each other. */
  maxNestingDepth: number;
}

/**
 * The recursive token-tree grammar: one token, string or parenthesized group per
 * call. Alternatives are told apart by their first character, so nothing here
 * backtracks except the one-token lookahead used for adjacency.
 */
export class TokenTreeGrammar implements TreeScanner {
  private readonly cursor: Cursor;
  private readonly maxNestingDepth: number;
  private depth: number = 0;

  constructor(cursor: Cursor, options: GrammarOptions) {
    this.cursor = cursor;
    this.maxNestingDepth = options.maxNestingDepth;
  }

  /** Scans one token tree, or returns null without consuming if none starts here. */
  scanTree(): TokenTree | null {
    const ch = this.cursor.peek();

    if (isDigit(ch)) return this.bare(scanInteger(this.cursor));
    if (isIdentStart(ch)) return this.bare(scanIdentifier(this.cursor));
    if (ch === '"') return this.nested(() => scanString(this.cursor, this));
    if (ch === "(") return this.nested(() => this.scanParenthesis());
    if (startsComment(this.cursor)) return leaf(scanComment(this.cursor));

    const operator = scanOperator(this.cursor);
    return operator === null ? null : leaf(operator);
  }

  scanDelimited(close: string, delimiter: Delimiter, openStart: number): TokenTree[] {
    const children: TokenTree[] = [];
    for (;;) {
      this.cursor.skipWhitespace();
      if (this.cursor.startsWith(close)) {
        this.cursor.advance(close.length);
        return children;
      }

      const tree = this.scanTree();
      if (tree === null) {
        throw new LexFailure({
          kind: "UnterminatedGroup",
          position: this.cursor.byteOffset(),
          expected: [...TOKEN_TREE_STARTS, closerOf(delimiter)],
          start: this.cursor.byteOffset(openStart),
          delimiter,
        });
      }
      children.push(tree);
    }
  }

  private scanParenthesis(): TokenGroup {
    const start = this.cursor.pos;
    this.cursor.advance();
    const children = this.scanDelimited(")", Delimiter.Parenthesis, start);
    return {
      kind: "Tree",
      delimiter: Delimiter.Parenthesis,
      children,
      span: this.cursor.spanFrom(start),
    };
  }

  private bare(scanned: Scanned<BareToken>): TokenLeaf {
    return {
      kind: "Token",
      token: scanned.token,
      adjacency: this.bareTokenFollows() ? "sequential" : "terminal",
      span: scanned.span,
    };
  }

  /** Looks past inline whitespace for the start of another bare token; consumes nothing. */
  private bareTokenFollows(): boolean {
    const saved = this.cursor.pos;
    this.cursor.skipInlineWhitespace();
    const next = this.cursor.peek();
    this.cursor.pos = saved;
    return isDigit(next) || isIdentStart(next);
  }

  private nested<T>(scan: () => T): T {
    if (this.depth >= this.maxNestingDepth) {
      throw new LexFailure({
        kind: "NestingTooDeep",
        position: this.cursor.byteOffset(),
        expected: [],
        limit: this.maxNestingDepth,
      });
    }
    this.depth++;
    try {
      return scan();
    } finally {
      this.depth--;
    }
  }
}

function leaf(scanned: Scanned<Token>): TokenLeaf {
  return { kind: "Token", token: scanned.token, span: scanned.span };
}
