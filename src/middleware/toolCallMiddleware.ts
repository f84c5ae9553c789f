/**
 * Tool-call middleware: error relay and call logging.
 *
 * - Converts SymbolStoreError into an `isError` tool result carrying the code
 *   and upstream status/body. Any other error propagates to the SDK.
 * - Logs every call (succeeded or failed) to the JSONL call log.
 */

import { randomUUID } from "node:crypto";
import {
  isSymbolStoreError,
  type RequestOptions,
  type SymbolStoreError,
} from "../client/index.js";
import { errorResult, type ToolResult } from "../tools/format.js";
import { logToolCall, type ToolCallLog } from "./callLogging.js";

export type ToolHandler<A> = (args: A, options: RequestOptions) => Promise<ToolResult>;

export interface ToolCallMiddlewareOptions {
  callLogPath?: string;
}

function failureFields(err: SymbolStoreError): Pick<ToolCallLog, "errorCode" | "errorReason" | "upstreamStatus"> {
  return { errorCode: err.code, errorReason: err.message, upstreamStatus: err.status };
}

export function wrapToolCall<A extends Record<string, unknown>>(
  toolName: string,
  options: ToolCallMiddlewareOptions,
  handler: ToolHandler<A>
): (args: A, extra?: { signal?: AbortSignal }) => Promise<ToolResult> {
  return async (args: A, extra?: { signal?: AbortSignal }) => {
    const start = Date.now();
    const base = {
      eventType: "tool_call" as const,
      timestamp: new Date(start).toISOString(),
      callId: randomUUID(),
      toolName,
      args,
    };

    try {
      const result = await handler(args, { signal: extra?.signal });
      await logToolCall(options.callLogPath, {
        ...base,
        outcome: "succeeded",
        durationMs: Date.now() - start,
      });
      return result;
    } catch (err) {
      if (!isSymbolStoreError(err)) throw err;
      await logToolCall(options.callLogPath, {
        ...base,
        outcome: "failed",
        ...failureFields(err),
        durationMs: Date.now() - start,
      });
      return errorResult(err);
    }
  };
}
