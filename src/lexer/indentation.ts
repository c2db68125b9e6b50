import { makeSpan } from "../errors/diagnostic.js";
import type { Cursor } from "./cursor.js";
import { isInlineWhitespace, isLineTerminator } from "./cursor.js";
import { LINE_END, LexFailure, TOKEN_TREE_STARTS } from "./errors.js";
import type { TokenTreeGrammar } from "./grammar.js";
import type { TokenGroup, TokenTree } from "./tokens.js";
import { Delimiter } from "./tokens.js";

interface Level {
  /** Full leading whitespace of the lines at this level. */
  indent: string;
  children: TokenTree[];
  start: number;
  end: number;
}

/**
 * Splits the source into logical lines, scans each with the grammar and nests
 * them into blocks by indentation. Returns the top-level block, which spans the
 * whole buffer.
 */
export function groupLines(cursor: Cursor, grammar: TokenTreeGrammar): TokenGroup {
  const root: Level = { indent: "", children: [], start: 0, end: 0 };
  const levels: Level[] = [root];

  for (;;) {
    const indent = cursor.takeWhile(isInlineWhitespace);
    const contentStart = cursor.byteOffset();
    const line = scanLine(cursor, grammar);
    const contentEnd = line.length > 0 ? line[line.length - 1].span.end : contentStart;
    placeLine(levels, indent, line, contentStart, contentEnd);

    if (!cursor.skipNewline()) break;
  }

  while (levels.length > 1) closeLevel(levels);

  return {
    kind: "Tree",
    delimiter: Delimiter.Block,
    children: root.children,
    span: makeSpan(0, cursor.source.byteLength),
  };
}

function scanLine(cursor: Cursor, grammar: TokenTreeGrammar): TokenTree[] {
  const trees: TokenTree[] = [];
  for (;;) {
    const tree = grammar.scanTree();
    if (tree === null) break;
    trees.push(tree);
    cursor.skipInlineWhitespace();
  }

  if (!cursor.isAtEnd() && !isLineTerminator(cursor.peek())) {
    throw new LexFailure({
      kind: "UnexpectedCharacter",
      position: cursor.byteOffset(),
      expected: [...TOKEN_TREE_STARTS, ...LINE_END],
      found: cursor.peekCodePoint(),
    });
  }
  return trees;
}

function placeLine(
  levels: Level[],
  indent: string,
  line: TokenTree[],
  contentStart: number,
  contentEnd: number,
): void {
  // Deepest open level whose indentation this line starts with.
  let depth = 0;
  while (depth + 1 < levels.length && indent.startsWith(levels[depth + 1].indent)) {
    depth++;
  }

  const inconsistent = indent !== levels[depth].indent && depth < levels.length - 1;
  if (inconsistent && line.length === 0) {
    // Stray whitespace on a blank line: dedent to the deepest matching level, open nothing.
    while (levels.length - 1 > depth) closeLevel(levels);
    return;
  }
  if (inconsistent) {
    throw new LexFailure({
      kind: "InconsistentIndentation",
      position: contentStart,
      expected: levels.map((level) => describeIndent(level.indent)),
    });
  }

  while (levels.length - 1 > depth) closeLevel(levels);

  const level = levels[depth];
  if (indent === level.indent) {
    level.children.push(...line);
    if (line.length > 0) level.end = contentEnd;
  } else {
    levels.push({ indent, children: [...line], start: contentStart, end: contentEnd });
  }
}

function closeLevel(levels: Level[]): void {
  const level = levels.pop();
  const parent = levels[levels.length - 1];
  if (level === undefined || parent === undefined) return;
  parent.children.push({
    kind: "Tree",
    delimiter: Delimiter.Block,
    children: level.children,
    span: makeSpan(level.start, level.end),
  });
  parent.end = level.end;
}

function describeIndent(indent: string): string {
  if (indent === "") return "no indentation";
  if (/^ +$/.test(indent)) return `${indent.length} space${indent.length === 1 ? "" : "s"}`;
  if (/^\t+$/.test(indent)) return `${indent.length} tab${indent.length === 1 ? "" : "s"}`;
  return JSON.stringify(indent);
}
