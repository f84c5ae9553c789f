/**
 * Tool-call logging. One JSON line per call, appended to the file named by
 * SYMBOL_STORE_CALL_LOG_PATH. Nothing is written when no path is configured.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import type { SymbolStoreErrorCode } from "../client/errors.js";

export interface ToolCallLog {
  eventType: "tool_call";
  timestamp: string;
  callId: string;
  toolName: string;
  args: Record<string, unknown>;
  outcome: "succeeded" | "failed";
  errorCode?: SymbolStoreErrorCode;
  errorReason?: string;
  upstreamStatus?: number;
  durationMs: number;
}

async function appendJsonLine(filePath: string, record: ToolCallLog): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");
}

/** Write failures are reported on stderr and never fail the tool call. */
export async function logToolCall(logPath: string | undefined, record: ToolCallLog): Promise<void> {
  if (!logPath) return;
  try {
    await appendJsonLine(logPath, record);
  } catch (err) {
    // STDIO: stdout belongs to JSON-RPC
    console.error("[callLogging] Failed to write call log:", err);
  }
}
