import { describe, it, expect } from "vitest";
import { Lexer } from "../../src/lexer/lexer.js";
import type { LexError } from "../../src/lexer/errors.js";
import { Delimiter, Operator, type TokenTree } from "../../src/lexer/tokens.js";

function lexFirst(source: string): TokenTree {
  const result = new Lexer(source, "test.an").lex();
  if (!result.ok) throw new Error(`unexpected lex error: ${result.error.kind}`);
  return result.tree.children[0];
}

function lexError(source: string): LexError {
  const result = new Lexer(source, "test.an").lex();
  if (result.ok) throw new Error("expected a lex error");
  return result.error;
}

function literal(value: string, start: number, end: number): TokenTree {
  return { kind: "Token", token: { kind: "StringLiteral", value }, span: { start, end } };
}

describe("strings", () => {
  it("lexes an empty string as an interpolation with no children", () => {
    expect(lexFirst('""')).toEqual({
      kind: "Tree",
      delimiter: Delimiter.Interpolation,
      children: [],
      span: { start: 0, end: 2 },
    });
  });

  it("lexes a plain string as one literal fragment", () => {
    expect(lexFirst('"hello world"')).toEqual({
      kind: "Tree",
      delimiter: Delimiter.Interpolation,
      children: [literal("hello world", 1, 12)],
      span: { start: 0, end: 13 },
    });
  });

  it("splits literals around a splice", () => {
    expect(lexFirst('"a${1+2}b"')).toEqual({
      kind: "Tree",
      delimiter: Delimiter.Interpolation,
      children: [
        literal("a", 1, 2),
        {
          kind: "Tree",
          delimiter: Delimiter.Curly,
          children: [
            {
              kind: "Token",
              token: { kind: "Integer", value: 1n, suffix: null },
              adjacency: "terminal",
              span: { start: 4, end: 5 },
            },
            {
              kind: "Token",
              token: { kind: "Operator", operator: Operator.Add },
              span: { start: 5, end: 6 },
            },
            {
              kind: "Token",
              token: { kind: "Integer", value: 2n, suffix: null },
              adjacency: "terminal",
              span: { start: 6, end: 7 },
            },
          ],
          span: { start: 2, end: 8 },
        },
        literal("b", 8, 9),
      ],
      span: { start: 0, end: 10 },
    });
  });

  it("decodes an escaped newline to a single character", () => {
    const tree = lexFirst('"a\\nb"');
    expect(tree.kind === "Tree" && tree.children).toEqual([literal("a\nb", 1, 5)]);
  });

  it("decodes every escape into one fragment", () => {
    const tree = lexFirst('"\\\\ \\$ \\" \\r \\t \\0"');
    expect(tree.kind === "Tree" && tree.children).toEqual([literal('\\ $ " \r \t \0', 1, 18)]);
  });

  it("keeps a lone dollar sign as literal text", () => {
    const tree = lexFirst('"$a $"');
    expect(tree.kind === "Tree" && tree.children).toEqual([literal("$a $", 1, 5)]);
  });

  it("does not open a splice after an escaped dollar sign", () => {
    const tree = lexFirst('"\\${x}"');
    expect(tree.kind === "Tree" && tree.children).toEqual([literal("${x}", 1, 6)]);
  });

  it("allows whitespace and line breaks inside a splice", () => {
    const tree = lexFirst('"${ a\n b }"');
    expect(tree.kind === "Tree" && tree.children).toEqual([
      {
        kind: "Tree",
        delimiter: Delimiter.Curly,
        children: [
          {
            kind: "Token",
            token: { kind: "Identifier", name: "a" },
            adjacency: "terminal",
            span: { start: 4, end: 5 },
          },
          {
            kind: "Token",
            token: { kind: "Identifier", name: "b" },
            adjacency: "terminal",
            span: { start: 7, end: 8 },
          },
        ],
        span: { start: 1, end: 10 },
      },
    ]);
  });

  it("lexes adjacent splices and an empty splice", () => {
    const tree = lexFirst('"${a}${}"');
    expect(tree.kind === "Tree" && tree.children.map((c) => (c.kind === "Tree" ? c.delimiter : c.token.kind))).toEqual([
      Delimiter.Curly,
      Delimiter.Curly,
    ]);
  });

  it("nests strings inside splices", () => {
    const tree = lexFirst('"x${"y${z}"}"');
    expect(tree).toEqual({
      kind: "Tree",
      delimiter: Delimiter.Interpolation,
      children: [
        literal("x", 1, 2),
        {
          kind: "Tree",
          delimiter: Delimiter.Curly,
          children: [
            {
              kind: "Tree",
              delimiter: Delimiter.Interpolation,
              children: [
                literal("y", 5, 6),
                {
                  kind: "Tree",
                  delimiter: Delimiter.Curly,
                  children: [
                    {
                      kind: "Token",
                      token: { kind: "Identifier", name: "z" },
                      adjacency: "terminal",
                      span: { start: 8, end: 9 },
                    },
                  ],
                  span: { start: 6, end: 10 },
                },
              ],
              span: { start: 4, end: 11 },
            },
          ],
          span: { start: 2, end: 12 },
        },
      ],
      span: { start: 0, end: 13 },
    });
  });

  it("lets a string span lines", () => {
    const tree = lexFirst('"a\nb"');
    expect(tree.kind === "Tree" && tree.children).toEqual([literal("a\nb", 1, 4)]);
  });

  describe("errors", () => {
    it("fails on an unterminated string", () => {
      expect(lexError('x "abc')).toEqual({
        kind: "UnterminatedString",
        position: 6,
        expected: ["'\"'"],
        start: 2,
      });
    });

    it("fails on a backslash at the end of input", () => {
      expect(lexError('"abc\\')).toMatchObject({ kind: "UnterminatedString", position: 5, start: 0 });
    });

    it("fails on an unknown escape at the backslash", () => {
      expect(lexError('"a\\qb"')).toMatchObject({ kind: "InvalidEscape", position: 2, found: "q" });
    });

    it("fails on a splice without its closing brace", () => {
      expect(lexError('"${a')).toEqual({
        kind: "UnterminatedGroup",
        position: 4,
        expected: ["identifier", "integer", "operator", "string", "'('", "comment", "'}'"],
        start: 1,
        delimiter: Delimiter.Curly,
      });
    });
  });
});
