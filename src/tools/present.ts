import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

/**
 * Serializes a tool result as pretty JSON text. `failed` marks results that
 * carry only an error; a warning alongside data is not a failure.
 */
export function present(result: object, failed: boolean): CallToolResult {
  const response: CallToolResult = {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
  if (failed) response.isError = true;
  return response;
}

