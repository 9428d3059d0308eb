import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { DocQaError, describeError } from "../domain/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("tools");

export function jsonResult(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/** Tool failures are reported to the client as results, never thrown into the transport. */
export function errorResult(tool: string, error: unknown): CallToolResult {
  const code = error instanceof DocQaError ? error.code : "INTERNAL_ERROR";
  const retryable =
    error instanceof DocQaError && "retryable" in error && typeof error.retryable === "boolean"
      ? error.retryable
      : undefined;
  if (code === "INTERNAL_ERROR") {
    logger.error("tool failed", { tool, error });
  }

  return {
    isError: true,
    content: [
      {
        type: "text",
        text: JSON.stringify({ error: { code, message: describeError(error), retryable } }, null, 2),
      },
    ],
  };
}
