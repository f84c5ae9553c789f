export {
  SymbolStoreClient,
  type SymbolStoreApi,
  type RequestOptions,
} from "./SymbolStoreClient.js";
export { isSymbolStoreError, type SymbolStoreError } from "./errors.js";
