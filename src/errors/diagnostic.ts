/** Half-open range of UTF-8 byte offsets into a source buffer. */
export interface Span {
  start: number;
  end: number;
}

export type Severity = "error" | "warning";

export interface Diagnostic {
  severity: Severity;
  /** Stable machine-readable name, e.g. "UnterminatedString". */
  code: string;
  message: string;
  span: Span;
  help?: string;
}

export function error(code: string, message: string, span: Span, help?: string): Diagnostic {
  return { severity: "error", code, message, span, help };
}

export function makeSpan(start: number, end: number): Span {
  return { start, end: Math.max(start, end) };
}
