/**
 * Diagnostic types for structured output
 */

import type { SourceSpan } from "../utils/span";
import { getCodeSeverity } from "./codes";

// =============================================================================
// Core Diagnostic Types
// =============================================================================

export type Severity = "error" | "warning" | "info";

export interface Diagnostic {
  /** Unique ID for this diagnostic instance */
  id: string;
  severity: Severity;
  code: string;
  message: string;
  /** Absent when the input did not come from source text */
  location?: SourceSpan | undefined;
  structured: StructuredData;
  hints: Hint[];
}

export interface StructuredData {
  kind: string;
  constraint?: string | undefined;
  [key: string]: unknown;
}

export interface Hint {
  description: string;
  template?: string | undefined;
}

// =============================================================================
// Helpers
// =============================================================================

let diagnosticIdCounter = 0;

function generateDiagnosticId(): string {
  return `d${++diagnosticIdCounter}`;
}

export function resetDiagnosticIdCounter(): void {
  diagnosticIdCounter = 0;
}

/**
 * Create a diagnostic whose severity follows from its code.
 */
export function createDiagnostic(
  code: string,
  message: string,
  location?: SourceSpan,
  structured: StructuredData = { kind: "general" },
  hints: Hint[] = []
): Diagnostic {
  return {
    id: generateDiagnosticId(),
    severity: getCodeSeverity(code),
    code,
    message,
    location,
    structured,
    hints,
  };
}

export function isError(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === "error";
}

export function isWarning(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === "warning";
}
