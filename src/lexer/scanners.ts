import type { Span } from "../errors/diagnostic.js";
import type { Cursor } from "./cursor.js";
import { isDigit, isIdentContinue, isIdentStart, isLineTerminator } from "./cursor.js";
import { LexFailure } from "./errors.js";
import { INTEGER_SUFFIXES, MAX_U64 } from "./suffixes.js";
import type {
  CommentToken,
  IdentifierToken,
  IntegerKind,
  IntegerToken,
  OperatorToken,
} from "./tokens.js";
import { Operator } from "./tokens.js";

export interface Scanned<T> {
  token: T;
  span: Span;
}

const OPERATORS: ReadonlyMap<string, Operator> = new Map([
  ["+", Operator.Add],
  ["=", Operator.Equals],
  [".", Operator.MemberAccess],
]);

export function scanIdentifier(cursor: Cursor): Scanned<IdentifierToken> {
  const start = cursor.pos;
  cursor.advance();
  const name = cursor.source.text[start] + cursor.takeWhile(isIdentContinue);
  return { token: { kind: "Identifier", name }, span: cursor.spanFrom(start) };
}

export function scanInteger(cursor: Cursor): Scanned<IntegerToken> {
  const start = cursor.pos;
  const digits = cursor.takeWhile(isDigit);
  const value = BigInt(digits);
  if (value > MAX_U64) {
    throw new LexFailure({
      kind: "NumericOverflow",
      position: cursor.byteOffset(start),
      expected: [],
      digits,
    });
  }

  // A suffix only counts when it is the whole identifier run after the digits,
  // so "1i8x" is 1 followed by the identifier "i8x".
  let suffix: IntegerKind | null = null;
  if (isIdentStart(cursor.peek())) {
    const afterDigits = cursor.pos;
    const word = cursor.takeWhile(isIdentContinue);
    suffix = INTEGER_SUFFIXES.get(word) ?? null;
    if (suffix === null) cursor.pos = afterDigits;
  }

  return { token: { kind: "Integer", value, suffix }, span: cursor.spanFrom(start) };
}

/** Returns null when the character is not an operator; consumes nothing then. */
export function scanOperator(cursor: Cursor): Scanned<OperatorToken> | null {
  const operator = OPERATORS.get(cursor.peek());
  if (operator === undefined) return null;
  const start = cursor.pos;
  cursor.advance();
  return { token: { kind: "Operator", operator }, span: cursor.spanFrom(start) };
}

export function startsComment(cursor: Cursor): boolean {
  return cursor.startsWith("//") || cursor.startsWith("/*");
}

export function scanComment(cursor: Cursor): Scanned<CommentToken> {
  const start = cursor.pos;

  if (cursor.startsWith("//")) {
    // The terminator stays: it ends the logical line.
    cursor.takeWhile((ch) => !isLineTerminator(ch));
    return { token: { kind: "Comment" }, span: cursor.spanFrom(start) };
  }

  cursor.advance(2);
  const close = cursor.source.text.indexOf("*/", cursor.pos);
  if (close === -1) {
    cursor.pos = cursor.source.text.length;
    throw new LexFailure({
      kind: "UnterminatedComment",
      position: cursor.byteOffset(),
      expected: ["'*/'"],
      start: cursor.byteOffset(start),
    });
  }
  cursor.pos = close + 2;
  return { token: { kind: "Comment" }, span: cursor.spanFrom(start) };
}
