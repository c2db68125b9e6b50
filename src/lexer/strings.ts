import type { Cursor } from "./cursor.js";
import { LexFailure } from "./errors.js";
import type { TokenGroup, TokenLeaf, TokenTree } from "./tokens.js";
import { Delimiter } from "./tokens.js";

/**
 * The part of the grammar a string needs to scan its `${…}` splices. Strings and
 * the grammar recurse into each other; this interface is the seam between them.
 */
export interface TreeScanner {
  /**
   * Scans whitespace-separated token trees up to and including `close`.
   * `openStart` is the index of the opening delimiter, for error reporting.
   */
  scanDelimited(close: string, delimiter: Delimiter, openStart: number): TokenTree[];
}

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ["\\", "\\"],
  ["$", "$"],
  ['"', '"'],
  ["n", "\n"],
  ["r", "\r"],
  ["t", "\t"],
  ["0", "\0"],
]);

export function scanString(cursor: Cursor, trees: TreeScanner): TokenGroup {
  const start = cursor.pos;
  cursor.advance(); // opening "
  const children: TokenTree[] = [];

  for (;;) {
    if (cursor.isAtEnd()) throw unterminated(cursor, start);

    if (cursor.peek() === '"') {
      cursor.advance();
      break;
    }

    if (cursor.startsWith("${")) {
      const spliceStart = cursor.pos;
      cursor.advance(2);
      const inner = trees.scanDelimited("}", Delimiter.Curly, spliceStart);
      children.push({
        kind: "Tree",
        delimiter: Delimiter.Curly,
        children: inner,
        span: cursor.spanFrom(spliceStart),
      });
      continue;
    }

    children.push(scanLiteralRun(cursor, start));
  }

  return {
    kind: "Tree",
    delimiter: Delimiter.Interpolation,
    children,
    span: cursor.spanFrom(start),
  };
}

/**
 * Everything up to the closing quote or the next splice, escapes included, so two
 * literal fragments are never adjacent.
 */
function scanLiteralRun(cursor: Cursor, stringStart: number): TokenLeaf {
  const start = cursor.pos;
  let value = "";

  while (!cursor.isAtEnd() && cursor.peek() !== '"' && !cursor.startsWith("${")) {
    const ch = cursor.peek();
    if (ch !== "\\") {
      value += ch;
      cursor.advance();
      continue;
    }

    const escaped = cursor.peekCodePoint(1);
    if (escaped === "") {
      cursor.advance();
      throw unterminated(cursor, stringStart);
    }
    const decoded = ESCAPES.get(escaped);
    if (decoded === undefined) {
      throw new LexFailure({
        kind: "InvalidEscape",
        position: cursor.byteOffset(),
        expected: [...ESCAPES.keys()].map((c) => `'\\${c}'`),
        found: escaped,
      });
    }
    value += decoded;
    cursor.advance(2);
  }

  return {
    kind: "Token",
    token: { kind: "StringLiteral", value },
    span: cursor.spanFrom(start),
  };
}

function unterminated(cursor: Cursor, stringStart: number): LexFailure {
  return new LexFailure({
    kind: "UnterminatedString",
    position: cursor.byteOffset(),
    expected: ["'\"'"],
    start: cursor.byteOffset(stringStart),
  });
}
