import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { describeError, isRagError, toErrorResponse } from "../domain/errors.js";
import { componentLogger } from "../infra/logging/logger.js";

const log = componentLogger("mcp-tools");

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

/** Reports a failure to the MCP client with the user-facing message only. */
export function errorResult(tool: string, error: unknown): CallToolResult {
  if (!isRagError(error) || error.statusCode >= 500) {
    log.error({ tool, err: error, detail: describeError(error) }, "tool call failed");
  }
  return { ...jsonResult(toErrorResponse(error).body), isError: true };
}
