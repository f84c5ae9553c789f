import type { SymbolStoreApi } from "../client/index.js";
import type { ToolHandler } from "../middleware/toolCallMiddleware.js";
import type { JsonValue } from "../schemas/symbol.js";
import { ListDomainsSchema, type ListDomainsInput } from "../schemas/tool-inputs.js";
import { formatJsonPayload, textResult } from "./format.js";

export type { ListDomainsInput };

export const listDomainsSchema = ListDomainsSchema.shape;

/** Drops repeated names from a string array, keeping first-seen order; other payloads pass through. */
export function uniqueDomains(payload: JsonValue): JsonValue {
  if (!Array.isArray(payload)) return payload;
  if (!payload.every((d) => typeof d === "string")) return payload;
  return [...new Set(payload)];
}

export function createListDomainsHandler(client: SymbolStoreApi): ToolHandler<ListDomainsInput> {
  return async (_args, options) => {
    const data = uniqueDomains(await client.listDomains(options));
    return textResult(`Available domains:\n${formatJsonPayload(data)}`);
  };
}
