/**
 * MCP tool response helpers shared by every tool registration.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

/**
 * Shape returned from a registered tool callback.
 * The index signature is required by the SDK's callback typing.
 */
export type ToolResponse<T = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
};

export interface ToolFailure extends Record<string, unknown> {
  success: false;
  error: string;
}

export function errorResponse(message: string): ToolResponse<ToolFailure> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
  };
}

/**
 * Convert a Result into a tool response.
 * The formatter produces the text block and the structured payload for a success;
 * a failure becomes an error response.
 */
export function resultToStructuredResponse<T, E extends string | Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | ToolFailure> {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return {
      content: [{ type: "text", text }],
      structuredContent: { ...data, success: true },
    };
  }
  const error: string | Error = result.error;
  const message = error instanceof Error ? error.message : error;
  return errorResponse(message);
}
