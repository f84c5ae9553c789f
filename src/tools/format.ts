import type { JsonValue } from "../schemas/symbol.js";
import type { SymbolStoreError } from "../client/index.js";

/** Result shape returned to the MCP SDK by every tool handler. */
export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function formatJsonPayload(payload: JsonValue): string {
  return JSON.stringify(payload, null, 2);
}

export function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

export function errorResult(err: SymbolStoreError): ToolResult {
  return { content: [{ type: "text", text: `[${err.code}] ${err.message}` }], isError: true };
}

/** null, "", [] and {} count as empty */
export function isEmptyPayload(payload: JsonValue): boolean {
  if (payload === null || payload === "") return true;
  if (Array.isArray(payload)) return payload.length === 0;
  if (typeof payload === "object") return Object.keys(payload).length === 0;
  return false;
}
