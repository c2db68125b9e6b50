import type { Span } from "../errors/diagnostic.js";
import type { Token, TokenTree } from "./tokens.js";

/**
 * Renders a token tree one node per line, children indented by two spaces:
 *
 *   Block 0..3
 *     Identifier "f" sequential 0..1
 *     Identifier "x" terminal 2..3
 */
export function formatTree(tree: TokenTree): string {
  const lines: string[] = [];
  write(tree, 0, lines);
  return lines.join("\n");
}

function write(tree: TokenTree, depth: number, lines: string[]): void {
  const pad = "  ".repeat(depth);
  if (tree.kind === "Tree") {
    lines.push(`${pad}${tree.delimiter} ${formatSpan(tree.span)}`);
    for (const child of tree.children) write(child, depth + 1, lines);
    return;
  }
  const adjacency = tree.adjacency === undefined ? "" : ` ${tree.adjacency}`;
  lines.push(`${pad}${formatToken(tree.token)}${adjacency} ${formatSpan(tree.span)}`);
}

export function formatToken(token: Token): string {
  switch (token.kind) {
    case "Identifier":
      return `Identifier ${JSON.stringify(token.name)}`;
    case "StringLiteral":
      return `StringLiteral ${JSON.stringify(token.value)}`;
    case "Integer":
      return `Integer ${token.value}${token.suffix ?? ""}`;
    case "Operator":
      return `Operator ${token.operator}`;
    case "Comment":
      return "Comment";
  }
}

function formatSpan(span: Span): string {
  return `${span.start}..${span.end}`;
}

/** JSON for a token tree; integer values become decimal strings. */
export function treeToJson(tree: TokenTree, indent: number = 2): string {
  return JSON.stringify(
    tree,
    (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
    indent,
  );
}
