/**
 * Diagnostics Module
 *
 * Structured reporting of syntax errors, extraction issues and domain
 * errors, with JSON and human-readable output.
 */

export type { Severity, Diagnostic, StructuredData, Hint } from "./diagnostic";

export {
  createDiagnostic,
  isError,
  isWarning,
  resetDiagnosticIdCounter,
} from "./diagnostic";

export { ErrorCode, getErrorDescription, getCodeSeverity, isErrorCode } from "./codes";
export type { ErrorCodeType } from "./codes";

export {
  formatJson,
  formatPretty,
  formatDiagnostic,
  formatSimple,
} from "./formatter";
