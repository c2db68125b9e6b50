import type { Span } from "../errors/diagnostic.js";

export enum IntegerKind {
  I8 = "i8",
  I16 = "i16",
  I32 = "i32",
  I64 = "i64",
  Isz = "isz",
  U8 = "u8",
  U16 = "u16",
  U32 = "u32",
  U64 = "u64",
  Usz = "usz",
}

export enum Operator {
  Add = "+",
  Equals = "=",
  MemberAccess = ".",
}

export enum Delimiter {
  /** Derived from indentation, no bracket in the source. */
  Block = "Block",
  Parenthesis = "Parenthesis",
  /** One `${…}` splice inside a string. */
  Curly = "Curly",
  /** A whole string literal: its literal fragments and splices. */
  Interpolation = "Interpolation",
}

// ============================================================
// Tokens
// ============================================================

export interface IdentifierToken {
  kind: "Identifier";
  name: string;
}

export interface StringLiteralToken {
  kind: "StringLiteral";
  /** Decoded text, escapes already applied. */
  value: string;
}

export interface IntegerToken {
  kind: "Integer";
  /** Unsigned 64-bit value. */
  value: bigint;
  suffix: IntegerKind | null;
}

export interface OperatorToken {
  kind: "Operator";
  operator: Operator;
}

export interface CommentToken {
  kind: "Comment";
}

export type Token =
  | IdentifierToken
  | StringLiteralToken
  | IntegerToken
  | OperatorToken
  | CommentToken;

/** Tokens that can be juxtaposed: `f x` is two bare tokens side by side. */
export type BareToken = IdentifierToken | IntegerToken;

/**
 * Whether another bare token follows on the same line. A later stage uses it to
 * rebuild application by juxtaposition without rescanning.
 */
export type Adjacency = "sequential" | "terminal";

// ============================================================
// Token trees
// ============================================================

export interface TokenLeaf {
  readonly kind: "Token";
  readonly token: Token;
  /** Set exactly when `token` is a bare token. */
  readonly adjacency?: Adjacency;
  readonly span: Span;
}

export interface TokenGroup {
  readonly kind: "Tree";
  readonly delimiter: Delimiter;
  readonly children: readonly TokenTree[];
  readonly span: Span;
}

export type TokenTree = TokenLeaf | TokenGroup;

export function isBareToken(token: Token): token is BareToken {
  return token.kind === "Identifier" || token.kind === "Integer";
}
