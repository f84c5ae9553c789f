import type { SymbolStoreApi } from "../client/index.js";
import type { ToolHandler } from "../middleware/toolCallMiddleware.js";
import { QuerySymbolsSchema, type QuerySymbolsInput } from "../schemas/tool-inputs.js";
import { formatJsonPayload, isEmptyPayload, textResult } from "./format.js";

export type { QuerySymbolsInput };

/** Raw shape for query_symbols; every filter is optional */
export const querySymbolsSchema = QuerySymbolsSchema.shape;

export function createQuerySymbolsHandler(client: SymbolStoreApi): ToolHandler<QuerySymbolsInput> {
  return async (args, options) => {
    const data = await client.querySymbols(
      {
        symbolDomain: args.symbol_domain,
        symbolTag: args.symbol_tag,
        lastSymbolId: args.last_symbol_id,
        limit: args.limit,
      },
      options
    );
    const message = isEmptyPayload(data) ? "No symbols returned" : "Query results";
    return textResult(`${message}:\n${formatJsonPayload(data)}`);
  };
}
