/**
 * Diagnostic Formatter
 *
 * Formats diagnostics and results as JSON or human-readable text.
 */

import { isError, isWarning, type Diagnostic } from "./diagnostic";
import type { SourceFile } from "../utils/source";
import { formatSpan } from "../utils/span";

/**
 * JSON replacer that converts BigInt to string.
 * Integer constants and enumerated index values are bigint.
 */
function bigIntReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
}

/**
 * Format any result as indented JSON.
 */
export function formatJson(value: unknown): string {
  return JSON.stringify(value, bigIntReplacer, 2);
}

/**
 * Format diagnostics as human-readable text with source snippets.
 */
export function formatPretty(
  diagnostics: Diagnostic[],
  source?: SourceFile
): string {
  const lines: string[] = [];

  for (const diag of diagnostics) {
    lines.push(formatDiagnostic(diag, source));
    lines.push("");
  }

  // Summary
  const errorCount = diagnostics.filter(isError).length;
  const warningCount = diagnostics.filter(isWarning).length;

  if (errorCount > 0 || warningCount > 0) {
    const parts: string[] = [];
    if (errorCount > 0) {
      parts.push(`${errorCount} error${errorCount === 1 ? "" : "s"}`);
    }
    if (warningCount > 0) {
      parts.push(`${warningCount} warning${warningCount === 1 ? "" : "s"}`);
    }
    lines.push(parts.join(", "));
  }

  return lines.join("\n");
}

/**
 * Format a single diagnostic with source context.
 */
export function formatDiagnostic(diag: Diagnostic, source?: SourceFile): string {
  const lines: string[] = [];

  // Header: severity[code]: message
  lines.push(`${diag.severity}[${diag.code}]: ${diag.message}`);

  const loc = diag.location;
  const gutter = "   ";

  if (loc && source) {
    // Location: --> file:line:column
    lines.push(`  --> ${formatSpan(loc)}`);

    const lineNum = loc.start.line;
    const lineNumWidth = Math.max(3, String(lineNum).length);
    const pad = " ".repeat(lineNumWidth);
    lines.push(`${pad} |`);

    const sourceLine = source.getLine(lineNum);
    lines.push(`${String(lineNum).padStart(lineNumWidth)} | ${sourceLine}`);

    // Underline the error location
    const startCol = loc.start.column;
    const endCol =
      loc.start.line === loc.end.line ? loc.end.column : sourceLine.length + 1;
    const underlineLength = Math.max(1, endCol - startCol);
    lines.push(`${pad} | ${" ".repeat(startCol - 1)}${"^".repeat(underlineLength)}`);
  } else if (diag.structured.constraint !== undefined) {
    lines.push(`${gutter} = constraint: ${diag.structured.constraint}`);
  }

  for (const hint of diag.hints) {
    lines.push(`${gutter} = help: ${hint.description}`);
    if (hint.template) {
      lines.push(`${gutter}         ${hint.template}`);
    }
  }

  return lines.join("\n");
}

/**
 * Format diagnostics as a simple list (no source context).
 */
export function formatSimple(diagnostics: Diagnostic[]): string {
  return diagnostics
    .map((d) => {
      const loc = d.location;
      const prefix = loc ? `${formatSpan(loc)}: ` : "";
      return `${prefix}${d.severity}[${d.code}]: ${d.message}`;
    })
    .join("\n");
}
