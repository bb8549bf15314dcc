export type { Result } from "./result.js";
export { Ok, Err, isOk, isErr, map, mapErr, andThen, unwrap, all } from "./result.js";

export type { LogLevel, LogContext, Logger, LoggerOptions } from "./logger.js";
export { createLogger, formatLogLine, parseLogLevel } from "./logger.js";

export type { TextContent, ToolResponse, ReportableError, ErrorPayload } from "./mcp.js";
export { textResponse, errorResponse, successResponse, resultToResponse } from "./mcp.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, McpServer } from "./server.js";
