export type { Result, Success, Failure } from "./result.js";
export { Ok, Err, isOk, map, andThen, unwrapOr, toError, tryCatch, tryCatchAsync } from "./result.js";

export type { AnalysisErrorCode } from "./errors.js";
export {
  AnalysisError,
  FileAccessError,
  ParseError,
  GraphIntegrityViolation,
  ConfigurationError,
  AnalysisCancelledError,
} from "./errors.js";

export type { Diagnostic, DiagnosticSeverity } from "./diagnostics.js";
export { diagnosticFromError, compareDiagnostics, sortDiagnostics } from "./diagnostics.js";

export type { LogLevel, Logger } from "./logger.js";
export { createLogger, setLogLevel, getLogLevel } from "./logger.js";

export type { TextContent, ToolResponse } from "./mcp.js";
export { textResponse, errorResponse, successResponse, resultToResponse } from "./mcp.js";

export type { ServerIdentity, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, McpServer } from "./server.js";
