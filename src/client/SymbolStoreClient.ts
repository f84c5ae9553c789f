/**
 * HTTP client for the symbol store API.
 *
 * Each operation issues exactly one request against the configured base URL:
 * no retries, batching or caching. Failures are mapped onto the error
 * taxonomy in ./errors.ts with the upstream status and body attached.
 */

import type { SymbolStoreConfig } from "../config.js";
import type { JsonValue, SymbolDocument } from "../schemas/symbol.js";
import {
  InvalidArgumentError,
  NotFoundError,
  RemoteError,
  describeHttpFailure,
  type SymbolStoreError,
} from "./errors.js";

export interface QuerySymbolsParams {
  symbolDomain?: string;
  symbolTag?: string;
  lastSymbolId?: string;
  limit?: number;
}

export interface RequestOptions {
  /** Caller cancellation; abandons the in-flight request */
  signal?: AbortSignal;
}

/** Operations exposed by the proxy. Tool handlers depend on this, not the class. */
export interface SymbolStoreApi {
  querySymbols(params?: QuerySymbolsParams, options?: RequestOptions): Promise<JsonValue>;
  getSymbol(symbolId: string, options?: RequestOptions): Promise<JsonValue>;
  putSymbol(symbolId: string, symbol: SymbolDocument, options?: RequestOptions): Promise<JsonValue>;
  listDomains(options?: RequestOptions): Promise<JsonValue>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

type StatusMapper = (status: number, message: string, details: HttpFailure) => SymbolStoreError;

interface HttpFailure {
  method: string;
  url: string;
  status: number;
  body: string;
}

const VALIDATION_STATUSES = new Set([400, 422]);

const toRemoteError: StatusMapper = (_status, message, details) => new RemoteError(message, details);

const validationOrRemote: StatusMapper = (status, message, details) =>
  VALIDATION_STATUSES.has(status)
    ? new InvalidArgumentError(message, details)
    : new RemoteError(message, details);

const notFoundOrRemote: StatusMapper = (status, message, details) =>
  status === 404 ? new NotFoundError(message, details) : new RemoteError(message, details);

function requireId(value: string, label: string): string {
  if (value.trim() === "") {
    throw new InvalidArgumentError(`${label} must be a non-empty string`);
  }
  return value;
}

function requireFilter(value: string | undefined, label: string): string | undefined {
  if (value !== undefined && value.trim() === "") {
    throw new InvalidArgumentError(`${label} must not be empty when provided`);
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class SymbolStoreClient implements SymbolStoreApi {
  private readonly baseUrl: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(config: SymbolStoreConfig, fetchImpl: FetchLike = fetch) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    const headers: Record<string, string> = { Accept: "application/json" };
    if (config.apiKey) headers["x-api-key"] = config.apiKey;
    this.headers = Object.freeze(headers);
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = fetchImpl;
  }

  async querySymbols(params: QuerySymbolsParams = {}, options: RequestOptions = {}): Promise<JsonValue> {
    const search = new URLSearchParams();
    const domain = requireFilter(params.symbolDomain, "symbol_domain");
    const tag = requireFilter(params.symbolTag, "symbol_tag");
    const cursor = requireFilter(params.lastSymbolId, "last_symbol_id");
    if (params.limit !== undefined && (!Number.isInteger(params.limit) || params.limit <= 0)) {
      throw new InvalidArgumentError(`limit must be a positive integer, got ${params.limit}`);
    }
    if (domain !== undefined) search.set("symbol_domain", domain);
    if (tag !== undefined) search.set("symbol_tag", tag);
    if (cursor !== undefined) search.set("last_symbol_id", cursor);
    if (params.limit !== undefined) search.set("limit", String(params.limit));

    const query = search.toString();
    return this.request("GET", query ? `/symbol?${query}` : "/symbol", validationOrRemote, options);
  }

  async getSymbol(symbolId: string, options: RequestOptions = {}): Promise<JsonValue> {
    const id = requireId(symbolId, "id");
    return this.request("GET", `/symbol/${encodeURIComponent(id)}`, notFoundOrRemote, options);
  }

  async putSymbol(symbolId: string, symbol: SymbolDocument, options: RequestOptions = {}): Promise<JsonValue> {
    const id = requireId(symbolId, "symbol_id");
    if (!isPlainObject(symbol)) {
      throw new InvalidArgumentError("symbol must be a JSON object");
    }
    return this.request("PUT", `/save_symbol/${encodeURIComponent(id)}`, validationOrRemote, {
      ...options,
      body: JSON.stringify(symbol),
    });
  }

  async listDomains(options: RequestOptions = {}): Promise<JsonValue> {
    return this.request("GET", "/domains", toRemoteError, options);
  }

  private async request(
    method: string,
    path: string,
    mapStatus: StatusMapper,
    options: RequestOptions & { body?: string }
  ): Promise<JsonValue> {
    const url = `${this.baseUrl}${path}`;
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
    const headers: Record<string, string> = { ...this.headers };
    if (options.body !== undefined) headers["Content-Type"] = "application/json";

    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(url, { method, headers, body: options.body, signal });
      text = await res.text();
    } catch (err) {
      if (timeout.aborted) {
        throw new RemoteError(`Request to ${method} ${url} timed out after ${this.timeoutMs}ms`, {
          method,
          url,
          timedOut: true,
          cause: err,
        });
      }
      if (options.signal?.aborted) {
        throw new RemoteError(`Request to ${method} ${url} was cancelled`, { method, url, cause: err });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new RemoteError(`Request to ${method} ${url} failed: ${reason}`, { method, url, cause: err });
    }

    if (!res.ok) {
      const failure: HttpFailure = { method, url, status: res.status, body: text };
      throw mapStatus(res.status, describeHttpFailure(method, url, res.status, text), failure);
    }

    if (text.trim() === "") return null;
    try {
      const payload: JsonValue = JSON.parse(text);
      return payload;
    } catch (err) {
      throw new RemoteError(`Request to ${method} ${url} returned a non-JSON body: ${text}`, {
        method,
        url,
        status: res.status,
        body: text,
        cause: err,
      });
    }
  }
}
