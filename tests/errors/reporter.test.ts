import { describe, it, expect } from "vitest";
import { lexSource } from "../../src/compiler.js";
import { formatDiagnostic, formatDiagnostics } from "../../src/errors/reporter.js";
import { error } from "../../src/errors/diagnostic.js";
import { SourceText } from "../../src/source/source-text.js";

describe("formatDiagnostic", () => {
  it("renders location, source line, caret and help", () => {
    const result = lexSource('x = "abc', "test.an");
    expect(formatDiagnostic(result.source, result.errors[0], { color: false })).toBe(
      [
        "error[UnterminatedString]: Unterminated string literal",
        "  --> test.an:1:5",
        "  |",
        '1 | x = "abc',
        "  |     ^",
        "  = help: Add a closing '\"'",
        "",
      ].join("\n"),
    );
  });

  it("underlines the whole span on its line", () => {
    const source = new SourceText("a\nlet 12345", "main.an");
    const diag = error("NumericOverflow", "too big", { start: 6, end: 11 });
    expect(formatDiagnostic(source, diag, { color: false })).toBe(
      [
        "error[NumericOverflow]: too big",
        "  --> main.an:2:5",
        "  |",
        "2 | let 12345",
        "  |     ^^^^^",
        "",
      ].join("\n"),
    );
  });

  it("counts lines ended by a lone CR", () => {
    const result = lexSource("a\r  b\r c", "t.an");
    expect(formatDiagnostic(result.source, result.errors[0], { color: false })).toBe(
      [
        "error[InconsistentIndentation]: Inconsistent indentation",
        "  --> t.an:3:2",
        "  |",
        "3 |  c",
        "  |  ^",
        "  = help: Dedent to the indentation of an enclosing line",
        "",
      ].join("\n"),
    );
  });

  it("places the caret by characters after multi-byte text", () => {
    const result = lexSource('"éé" )', "test.an");
    expect(formatDiagnostic(result.source, result.errors[0], { color: false })).toBe(
      [
        "error[UnexpectedCharacter]: Unexpected character ')'",
        "  --> test.an:1:6",
        "  |",
        '1 | "éé" )',
        "  |      ^",
        "  = help: Expected one of identifier, integer, operator, string, '(', comment, newline, end of input",
        "",
      ].join("\n"),
    );
  });

  it("joins several diagnostics with a blank line", () => {
    const source = new SourceText("ab", "x.an");
    const first = error("A", "first", { start: 0, end: 1 });
    const second = error("B", "second", { start: 1, end: 2 });
    const output = formatDiagnostics(source, [first, second], { color: false });
    expect(output.split("\n\n")).toHaveLength(2);
    expect(output.startsWith("error[A]: first\n")).toBe(true);
  });

  it("adds color codes when color is forced on", () => {
    const source = new SourceText("ab", "x.an");
    const output = formatDiagnostic(source, error("A", "first", { start: 0, end: 1 }), { color: true });
    expect(output).toContain("\u001b[");
  });
});
