/**
 * Minimal structured logger.
 *
 * Everything goes to stderr: stdout is owned by the MCP stdio transport.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger for a sub-scope, e.g. `scan-runner:task`. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Minimum level written. Default: LOG_LEVEL env var, else "info". */
  level?: LogLevel;
  /** Where formatted lines go. Default: console.error */
  sink?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return normalized;
    default:
      return null;
  }
}

export function formatLogLine(
  scope: string,
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  let line = `[${scope}] ${level.toUpperCase()} ${message}`;
  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value === undefined) continue;
      const text = String(value);
      line += /\s/.test(text) ? ` ${key}=${JSON.stringify(text)}` : ` ${key}=${text}`;
    }
  }
  return line;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? "info";
  const sink = options.sink ?? ((line: string) => console.error(line));
  const threshold = LEVEL_ORDER[level];

  const write = (lineLevel: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[lineLevel] < threshold) return;
    sink(formatLogLine(scope, lineLevel, message, context));
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (child) => createLogger(`${scope}:${child}`, { level, sink }),
  };
}
