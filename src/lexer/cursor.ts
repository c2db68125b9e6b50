import type { Span } from "../errors/diagnostic.js";
import { makeSpan } from "../errors/diagnostic.js";
import type { SourceText } from "../source/source-text.js";

export function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

export function isIdentStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

export function isIdentContinue(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}

export function isInlineWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t";
}

export function isLineTerminator(ch: string): boolean {
  return ch === "\n" || ch === "\r";
}

/**
 * Read position over a source. Positions are UTF-16 indices into the text; the
 * cursor converts them to byte offsets when building spans.
 */
export class Cursor {
  readonly source: SourceText;
  pos: number = 0;

  constructor(source: SourceText) {
    this.source = source;
  }

  isAtEnd(): boolean {
    return this.pos >= this.source.text.length;
  }

  /** Character at `pos + ahead`, or "" past the end. */
  peek(ahead: number = 0): string {
    return this.source.text[this.pos + ahead] ?? "";
  }

  /** Whole code point at `pos + ahead`, so a surrogate pair is never split; "" past the end. */
  peekCodePoint(ahead: number = 0): string {
    const code = this.source.text.codePointAt(this.pos + ahead);
    return code === undefined ? "" : String.fromCodePoint(code);
  }

  startsWith(prefix: string): boolean {
    return this.source.text.startsWith(prefix, this.pos);
  }

  advance(count: number = 1): void {
    this.pos = Math.min(this.pos + count, this.source.text.length);
  }

  /** Consumes characters while `pred` holds and returns them. */
  takeWhile(pred: (ch: string) => boolean): string {
    const start = this.pos;
    while (!this.isAtEnd() && pred(this.source.text[this.pos])) {
      this.pos++;
    }
    return this.source.text.slice(start, this.pos);
  }

  skipInlineWhitespace(): void {
    this.takeWhile(isInlineWhitespace);
  }

  /** Skips spaces, tabs and line terminators. */
  skipWhitespace(): void {
    this.takeWhile((ch) => isInlineWhitespace(ch) || isLineTerminator(ch));
  }

  /** Consumes one line terminator ("\n", "\r\n" or "\r"); returns false if none is here. */
  skipNewline(): boolean {
    if (this.startsWith("\r\n")) {
      this.pos += 2;
      return true;
    }
    if (isLineTerminator(this.peek())) {
      this.pos++;
      return true;
    }
    return false;
  }

  byteOffset(index: number = this.pos): number {
    return this.source.byteOffsetAt(index);
  }

  spanFrom(startIndex: number): Span {
    return makeSpan(this.byteOffset(startIndex), this.byteOffset());
  }
}
