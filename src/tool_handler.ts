/**
 * Factory for creating MCP tool handlers with logging.
 * Extracted for testability and reuse.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "./loggers/console_logger.js";
import { errorMessage } from "./utils.js";

/** Arguments as the MCP SDK hands them over, after schema validation. */
export type ToolArgs = Record<string, unknown>;

/** The parts of the SDK's request context used for log tags. */
export interface RequestExtra {
  requestId?: string | number;
  sessionId?: string;
}

/**
 * Map of tool names to their handler functions.
 * Handlers may be synchronous or asynchronous; the factory `await`s
 * the result regardless.
 */
export type ToolHandlerMap = Record<string, (args: ToolArgs) => CallToolResult | Promise<CallToolResult>>;

export function formatBytes(bytes: number): string {
  return `${(bytes / 1024).toFixed(2)} KB`;
}

/** Text of the first content block, the JSON payload every handler returns. */
function payloadText(result: CallToolResult): string | undefined {
  const first = result.content[0];
  return first && first.type === "text" ? first.text : undefined;
}

function reportedErrorMessage(text: string): string | undefined {
  try {
    const data: unknown = JSON.parse(text);
    if (typeof data !== "object" || data === null || !("error" in data)) return undefined;
    const { error } = data;
    if (typeof error === "string") return error;
    if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
      return error.message;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Creates a factory function that produces MCP tool handlers with logging.
 *
 * Each returned handler:
 * 1. Tags the log line with the request (and session, over HTTP)
 * 2. Dispatches to the matching handler in `handlerMap`
 * 3. Logs success/error, duration and payload size
 * 4. Turns a thrown error into an `INTERNAL_ERROR` result
 * 5. Returns a structured error if the tool name is not found
 */
export function createToolHandlerFactory(handlerMap: ToolHandlerMap, log: Pick<Logger, "debug">) {
  async function handle(toolName: string, args: ToolArgs, extra: RequestExtra | undefined): Promise<CallToolResult> {
    const reqTag = `[req:${String(extra?.requestId ?? 0).padStart(5, "0")}]`;
    const sesTag = extra?.sessionId ? ` [ses:${extra.sessionId.slice(-6)}]` : "";
    const prefix = `[tool:${toolName}]`.padEnd(30);
    log.debug(`${reqTag}${sesTag} ${prefix} called`);

    const handler = handlerMap[toolName];
    if (!handler) {
      log.debug(`${reqTag}${sesTag} ${prefix} not found`);
      return {
        content: [{ type: "text", text: JSON.stringify({ error: `Tool ${toolName} not available` }) }],
        isError: true,
      };
    }

    const start = Date.now();
    let result: CallToolResult;
    try {
      result = await handler(args);
    } catch (err) {
      const durationStr = `${Date.now() - start} ms`.padStart(7);
      const message = errorMessage(err);
      log.debug(`${reqTag}${sesTag} ${prefix} uncaught error in ${durationStr}: ${message}`);
      return {
        content: [{
          type: "text",
          text: JSON.stringify({
            success: false,
            error: {
              code: "INTERNAL_ERROR",
              message,
              suggestion:
                "This is an unexpected server error. Do not retry with the same parameters; the error is deterministic.",
            },
          }),
        }],
        isError: true,
      };
    }

    const durationStr = `${Date.now() - start} ms`.padStart(7);
    const text = payloadText(result);
    const sizeStr = formatBytes(text?.length ?? 0).padStart(10);

    if (result.isError) {
      const reported = text !== undefined ? reportedErrorMessage(text) : undefined;
      log.debug(`${reqTag}${sesTag} ${prefix} error in ${durationStr}, ${sizeStr}${reported ? `: ${reported}` : ""}`);
    } else {
      log.debug(`${reqTag}${sesTag} ${prefix} ok in ${durationStr}, ${sizeStr}`);
    }
    return result;
  }

  function createToolHandler(toolName: string, hasArgs: true): (args: ToolArgs, extra?: RequestExtra) => Promise<CallToolResult>;
  function createToolHandler(toolName: string, hasArgs?: false): (extra?: RequestExtra) => Promise<CallToolResult>;
  function createToolHandler(
    toolName: string,
    hasArgs = false,
  ): ((args: ToolArgs, extra?: RequestExtra) => Promise<CallToolResult>) | ((extra?: RequestExtra) => Promise<CallToolResult>) {
    if (hasArgs) {
      return (args: ToolArgs, extra?: RequestExtra) => handle(toolName, args, extra);
    }
    return (extra?: RequestExtra) => handle(toolName, {}, extra);
  }

  return createToolHandler;
}
