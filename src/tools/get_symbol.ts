import type { SymbolStoreApi } from "../client/index.js";
import type { ToolHandler } from "../middleware/toolCallMiddleware.js";
import { GetSymbolSchema, type GetSymbolInput } from "../schemas/tool-inputs.js";
import { formatJsonPayload, textResult } from "./format.js";

export type { GetSymbolInput };

export const getSymbolSchema = GetSymbolSchema.shape;

export function createGetSymbolHandler(client: SymbolStoreApi): ToolHandler<GetSymbolInput> {
  return async (args, options) => {
    const data = await client.getSymbol(args.id, options);
    return textResult(formatJsonPayload(data));
  };
}
