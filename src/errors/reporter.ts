import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { SourceText } from "../source/source-text.js";
import type { Diagnostic } from "./diagnostic.js";

export interface ReportOptions {
  /** Defaults to whatever chalk detected for the terminal. */
  color?: boolean;
}

export function formatDiagnostic(
  source: SourceText,
  diag: Diagnostic,
  options: ReportOptions = {},
): string {
  const c = chalkFor(options.color);
  const start = source.locate(diag.span.start);
  const end = source.locate(diag.span.end);
  const line = source.lineText(start.line);
  const lineNum = String(start.line);
  const padding = " ".repeat(lineNum.length);
  const width = end.line === start.line ? Math.max(1, end.column - start.column) : 1;

  const severityLabel =
    diag.severity === "error" ? c.red.bold(`error[${diag.code}]`) : c.yellow.bold(`warning[${diag.code}]`);

  let output = `${severityLabel}: ${c.bold(diag.message)}\n`;
  output += `${padding} ${c.blue("-->")} ${source.filename}:${start.line}:${start.column}\n`;
  output += `${padding} ${c.blue("|")}\n`;
  output += `${c.blue(lineNum)} ${c.blue("|")} ${line}\n`;
  output += `${padding} ${c.blue("|")} ${" ".repeat(start.column - 1)}${c.red("^".repeat(width))}\n`;

  if (diag.help) {
    output += `${padding} ${c.blue("=")} ${c.green("help")}: ${diag.help}\n`;
  }

  return output;
}

function chalkFor(color: boolean | undefined): ChalkInstance {
  if (color === undefined) return chalk;
  if (!color) return new Chalk({ level: 0 });
  return chalk.level > 0 ? chalk : new Chalk({ level: 1 });
}

export function formatDiagnostics(
  source: SourceText,
  diagnostics: Diagnostic[],
  options: ReportOptions = {},
): string {
  return diagnostics.map((d) => formatDiagnostic(source, d, options)).join("\n");
}
