/**
 * Tool result shaping for the MCP surface.
 *
 * Handlers return plain data; failures become an `isError` result whose text
 * says what to fix (config keys, tracker status and URL, bad timestamp).
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ConfigError } from "./config.js";
import { TimestampFormatError } from "./calendar.js";
import { TrackerHttpError, TrackerResponseError } from "./tracker.js";
import { withLogging } from "./logger.js";

export type { McpServer };

type TextContent = {
  type: "text";
  text: string;
};

export type ToolResult = {
  [key: string]: unknown;
  content: TextContent[];
  isError?: boolean;
};

/** Pretty JSON for objects, strings as they are */
export function toolResponse(data: unknown): ToolResult {
  const text = typeof data === "string" ? data : JSON.stringify(data, null, 2);
  return { content: [{ type: "text", text }] };
}

/** Human-readable text for a failed tool call */
export function describeError(error: unknown): string {
  if (error instanceof ConfigError) {
    return ["Error: Invalid configuration", ...error.issues.map((issue) => `  - ${issue}`)].join("\n");
  }
  if (error instanceof TrackerHttpError) {
    return `Error: ${error.message} from ${error.url}`;
  }
  if (error instanceof TrackerResponseError) {
    return `Error: ${error.message} (check that baseUrl points at the tracker)`;
  }
  if (error instanceof TimestampFormatError) {
    return `Error: ${error.message}; expected e.g. 2018-11-05T14:10:25.073-05:00`;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

export function toolError(error: unknown): ToolResult {
  return { content: [{ type: "text", text: describeError(error) }], isError: true };
}

/** Time and count the call, and turn a thrown error into an error result */
export function wrapTool<T>(
  toolName: string,
  handler: (params: T) => Promise<ToolResult>
): (params: T) => Promise<ToolResult> {
  return async (params: T) => {
    try {
      return await withLogging(toolName, () => handler(params));
    } catch (error) {
      return toolError(error);
    }
  };
}
