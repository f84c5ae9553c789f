import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SymbolStoreClient, type SymbolStoreApi } from "./client/index.js";
import type { SymbolStoreConfig } from "./config.js";
import { wrapToolCall } from "./middleware/index.js";
import {
  querySymbolsSchema,
  createQuerySymbolsHandler,
  getSymbolSchema,
  createGetSymbolHandler,
  putSymbolSchema,
  createPutSymbolHandler,
  listDomainsSchema,
  createListDomainsHandler,
} from "./tools/index.js";

export const SERVER_NAME = "symbol-store-mcp-server";
export const SERVER_VERSION = "1.0.0";

export interface CreateServerOptions {
  /** Defaults to a SymbolStoreClient built from config */
  client?: SymbolStoreApi;
}

export function createServer(
  config: SymbolStoreConfig,
  options: CreateServerOptions = {}
): { server: McpServer; client: SymbolStoreApi } {
  const client = options.client ?? new SymbolStoreClient(config);
  const middleware = { callLogPath: config.callLogPath };

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.tool(
    "query_symbols",
    "Query symbols, optionally filtered by domain and tag. Use last_symbol_id and limit to page through results.",
    querySymbolsSchema,
    wrapToolCall("query_symbols", middleware, createQuerySymbolsHandler(client))
  );

  server.tool(
    "get_symbol_by_id",
    "Get a single symbol by its identifier.",
    getSymbolSchema,
    wrapToolCall("get_symbol_by_id", middleware, createGetSymbolHandler(client))
  );

  server.tool(
    "put_symbol_by_id",
    "Create or replace the symbol stored under symbol_id.",
    putSymbolSchema,
    wrapToolCall("put_symbol_by_id", middleware, createPutSymbolHandler(client))
  );

  server.tool(
    "list_domains",
    "List the available symbol domains.",
    listDomainsSchema,
    wrapToolCall("list_domains", middleware, createListDomainsHandler(client))
  );

  return { server, client };
}
