export interface Location {
  line: number;
  column: number;
}

/**
 * A decoded source buffer together with the tables needed to talk about it in
 * UTF-8 byte offsets (spans) and 1-based line/column pairs (diagnostics).
 */
export class SourceText {
  readonly text: string;
  readonly filename: string;
  /** byteOffsets[i] is the UTF-8 offset of UTF-16 index i; one extra entry for the end. */
  private readonly byteOffsets: Uint32Array;
  /** Index at which each line starts; "\r\n", "\r" and "\n" all end a line. */
  private readonly lineStarts: number[];

  constructor(text: string, filename: string = "<stdin>") {
    this.text = text;
    this.filename = filename;
    this.byteOffsets = new Uint32Array(text.length + 1);
    this.lineStarts = [0];

    let bytes = 0;
    for (let i = 0; i < text.length; i++) {
      this.byteOffsets[i] = bytes;
      const code = text.charCodeAt(i);
      if (code < 0x80) {
        bytes += 1;
      } else if (code < 0x800) {
        bytes += 2;
      } else if (code >= 0xd800 && code <= 0xdbff && isLowSurrogate(text.charCodeAt(i + 1))) {
        // A surrogate pair is one four-byte sequence; its low half maps past the pair.
        bytes += 4;
        this.byteOffsets[++i] = bytes;
        continue;
      } else {
        bytes += 3;
      }
      if (code === 0x0a || (code === 0x0d && text.charCodeAt(i + 1) !== 0x0a)) {
        this.lineStarts.push(i + 1);
      }
    }
    this.byteOffsets[text.length] = bytes;
  }

  get byteLength(): number {
    return this.byteOffsets[this.text.length];
  }

  byteOffsetAt(index: number): number {
    return this.byteOffsets[Math.min(Math.max(index, 0), this.text.length)];
  }

  /** Smallest index whose byte offset is at least `byteOffset`. */
  indexAt(byteOffset: number): number {
    let low = 0;
    let high = this.text.length;
    while (low < high) {
      const mid = (low + high) >> 1;
      if (this.byteOffsets[mid] < byteOffset) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }

  /** Line and column of a byte offset; columns count characters. */
  locate(byteOffset: number): Location {
    const index = this.indexAt(byteOffset);
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= index) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    const before = this.text.slice(this.lineStarts[low], index);
    return { line: low + 1, column: [...before].length + 1 };
  }

  /** Text of a 1-based line, without its terminator. */
  lineText(line: number): string {
    return this.text.split(/\r\n|\r|\n/)[line - 1] ?? "";
  }
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}
