/**
 * Symbol Store MCP Server — tool definitions.
 * Each tool pairs a raw zod shape from ../schemas with a handler bound to a SymbolStoreApi.
 */

export { querySymbolsSchema, createQuerySymbolsHandler } from "./query_symbols.js";
export { getSymbolSchema, createGetSymbolHandler } from "./get_symbol.js";
export { putSymbolSchema, createPutSymbolHandler } from "./put_symbol.js";
export { listDomainsSchema, createListDomainsHandler, uniqueDomains } from "./list_domains.js";
export { isEmptyPayload } from "./format.js";
