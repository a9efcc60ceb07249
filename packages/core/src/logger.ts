/**
 * Scoped stderr logging. stdout belongs to the MCP stdio transport.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const fromEnv = process.env.ARCHLENS_LOG_LEVEL?.toLowerCase();
let activeLevel: LogLevel = isLogLevel(fromEnv) ? fromEnv : "info";

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * @example
 * const log = createLogger("orchestrator");
 * log.info("Full run complete");  // [orchestrator] Full run complete
 */
export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, "silent">, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) return;
    const prefix = level === "warn" || level === "error" ? `[${scope}] ${level}:` : `[${scope}]`;
    console.error(`${prefix} ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => write("debug", message, details),
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details),
  };
}
