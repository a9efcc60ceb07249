/**
 * MCP tool response helpers.
 *
 * Responses are type aliases (not interfaces) so they stay assignable to the
 * SDK's open-ended CallToolResult.
 */

import type { Result } from "./result.js";

export type TextContent = {
  type: "text";
  text: string;
};

export type ToolResponse = {
  content: TextContent[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
};

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

export function errorResponse(message: string): ToolResponse {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
    isError: true,
  };
}

/**
 * Human-readable text plus the same data as structured content.
 */
export function successResponse(text: string, data: Record<string, unknown> = {}): ToolResponse {
  return {
    content: [{ type: "text", text }],
    structuredContent: { success: true, ...data },
  };
}

export function resultToResponse<T>(
  result: Result<T, Error>,
  formatter: (value: T) => ToolResponse
): ToolResponse {
  return result.ok ? formatter(result.value) : errorResponse(result.error.message);
}
