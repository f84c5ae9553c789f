import type { SymbolStoreApi } from "../client/index.js";
import type { ToolHandler } from "../middleware/toolCallMiddleware.js";
import { PutSymbolSchema, type PutSymbolInput } from "../schemas/tool-inputs.js";
import { formatJsonPayload, textResult } from "./format.js";

export type { PutSymbolInput };

/** Raw shape for put_symbol_by_id: path ID plus the document stored under it */
export const putSymbolSchema = PutSymbolSchema.shape;

/**
 * Creates or replaces the document at /save_symbol/{symbol_id}. Not safe to
 * assume idempotent under cancellation: the write may land after the caller
 * has given up.
 */
export function createPutSymbolHandler(client: SymbolStoreApi): ToolHandler<PutSymbolInput> {
  return async (args, options) => {
    const { symbol_id, symbol } = args;
    const data = await client.putSymbol(symbol_id, symbol, options);
    return textResult(`Stored symbol ${symbol_id}:\n${formatJsonPayload(data)}`);
  };
}
