/**
 * Symbol Store MCP Server — middleware exports.
 */

export { wrapToolCall } from "./toolCallMiddleware.js";
