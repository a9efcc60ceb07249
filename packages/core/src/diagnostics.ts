import {
  AnalysisError,
  FileAccessError,
  GraphIntegrityViolation,
  ParseError,
} from "./errors.js";

export type DiagnosticSeverity = "info" | "warning" | "error";

/**
 * One recorded problem. A result never drops work without one of these.
 */
export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: string;
  readonly message: string;
  readonly filePath?: string;
  readonly line?: number;
  readonly elementId?: string;
  readonly relationshipId?: string;
}

export function diagnosticFromError(
  error: AnalysisError,
  severity: DiagnosticSeverity = "warning"
): Diagnostic {
  if (error instanceof FileAccessError) {
    return { severity, code: error.code, message: error.message, filePath: error.filePath };
  }
  if (error instanceof ParseError) {
    return {
      severity,
      code: error.code,
      message: error.message,
      filePath: error.filePath,
      ...(error.line !== undefined ? { line: error.line } : {}),
    };
  }
  if (error instanceof GraphIntegrityViolation) {
    return {
      severity,
      code: error.code,
      message: error.message,
      relationshipId: error.relationshipId,
    };
  }
  return { severity, code: error.code, message: error.message };
}

function compareOptional(a: string | number | undefined, b: string | number | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return -1;
  if (b === undefined) return 1;
  return a < b ? -1 : 1;
}

export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    compareOptional(a.filePath, b.filePath) ||
    compareOptional(a.line, b.line) ||
    compareOptional(a.code, b.code) ||
    compareOptional(a.elementId ?? a.relationshipId, b.elementId ?? b.relationshipId) ||
    compareOptional(a.message, b.message)
  );
}

/**
 * Stable order so two runs over the same tree report identical lists.
 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort(compareDiagnostics);
}
