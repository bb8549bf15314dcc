/**
 * MCP tool response helpers.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

/**
 * Shape returned from MCP tool handlers.
 * The index signature keeps it assignable to the SDK's CallToolResult.
 */
export interface ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
}

/** Anything with a message and, optionally, a machine-readable code. */
export interface ReportableError {
  message: string;
  code?: string;
}

export interface ErrorPayload extends Record<string, unknown> {
  success: false;
  error: string;
  code?: string;
}

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

export function errorResponse(error: string | ReportableError): ToolResponse<ErrorPayload> {
  const message = typeof error === "string" ? error : error.message;
  const code = typeof error === "string" ? undefined : error.code;
  return {
    content: [{ type: "text", text: code ? `Error [${code}]: ${message}` : `Error: ${message}` }],
    structuredContent: code ? { success: false, error: message, code } : { success: false, error: message },
    isError: true,
  };
}

export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}

/**
 * Convert a Result into a tool response.
 * Success goes through the formatter; failure becomes an error response.
 */
export function resultToResponse<T, E extends ReportableError>(
  result: Result<T, E>,
  formatter: (value: T) => ToolResponse
): ToolResponse {
  if (result.ok) {
    return formatter(result.value);
  }
  return errorResponse(result.error);
}
