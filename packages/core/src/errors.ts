/**
 * Error taxonomy shared by every analysis stage.
 *
 * Only ConfigurationError stops work, and only before a run starts.
 * The per-file and per-relationship errors become diagnostics on the result.
 */

export type AnalysisErrorCode =
  | "file_access"
  | "parse_error"
  | "graph_integrity"
  | "configuration"
  | "cancelled";

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AnalysisError";
    this.code = code;
  }
}

/** A file could not be read. The file is skipped. */
export class FileAccessError extends AnalysisError {
  readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? "unknown error");
    super("file_access", `Cannot read ${filePath}: ${reason}`, { cause });
    this.name = "FileAccessError";
    this.filePath = filePath;
  }
}

/** Malformed syntax. Whatever structure survived recovery is kept. */
export class ParseError extends AnalysisError {
  readonly filePath: string;
  readonly line: number | undefined;

  constructor(filePath: string, message: string, line?: number) {
    super("parse_error", message);
    this.name = "ParseError";
    this.filePath = filePath;
    this.line = line;
  }
}

/** A relationship points at an element id that does not exist. */
export class GraphIntegrityViolation extends AnalysisError {
  readonly relationshipId: string;
  readonly missingId: string;

  constructor(relationshipId: string, missingId: string) {
    super("graph_integrity", `Relationship ${relationshipId} references missing element ${missingId}`);
    this.name = "GraphIntegrityViolation";
    this.relationshipId = relationshipId;
    this.missingId = missingId;
  }
}

export class ConfigurationError extends AnalysisError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super("configuration", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class AnalysisCancelledError extends AnalysisError {
  constructor(message = "Analysis cancelled") {
    super("cancelled", message);
    this.name = "AnalysisCancelledError";
  }
}
