/**
 * Helpers for building MCP tool responses.
 */

import type { Result } from "./result.js";

// Must stay type aliases: the SDK result type has an index signature.
export type TextContent = {
  type: "text";
  text: string;
};

export type ToolResponse = {
  content: TextContent[];
  isError?: boolean;
};

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Tool-level failure: the client sees `isError` and the message.
 */
export function errorResponse(message: string): ToolResponse {
  return { content: [{ type: "text", text: `Error: ${message}` }], isError: true };
}

/**
 * Format an Ok with `formatter`; turn an Err into an error response.
 */
export function resultToResponse<T>(
  result: Result<T, Error>,
  formatter: (value: T) => string
): ToolResponse {
  if (result.ok) {
    return textResponse(formatter(result.value));
  }
  return errorResponse(result.error.message);
}
