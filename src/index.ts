#!/usr/bin/env node
/**
 * Symbol Store MCP Server
 *
 * Exposes query_symbols, get_symbol_by_id, put_symbol_by_id and list_domains,
 * each forwarded as one HTTP request to the symbol store API at
 * SYMBOL_STORE_BASE_URL (with x-api-key when SYMBOL_STORE_API_KEY is set).
 *
 * For STDIO: log to stderr only; stdout is used for JSON-RPC.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createServer, SERVER_NAME, SERVER_VERSION } from "./server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const { server } = createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(
    `${SERVER_NAME} v${SERVER_VERSION} running on stdio (upstream ${config.baseUrl}, api key ${
      config.apiKey ? "set" : "not set"
    })`
  );
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
