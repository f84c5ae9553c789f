/**
 * Error taxonomy for the symbol store proxy.
 *
 * Every failure is surfaced to the caller with the upstream status and body
 * attached when a response exists. Nothing here is retried.
 */

export type SymbolStoreErrorCode =
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "REMOTE_ERROR"
  | "CONFIGURATION_ERROR";

export interface RequestDetails {
  method?: string;
  url?: string;
  /** Upstream HTTP status, when a response was received */
  status?: number;
  /** Raw upstream response body, when a response was received */
  body?: string;
  cause?: unknown;
}

export abstract class SymbolStoreError extends Error {
  abstract readonly code: SymbolStoreErrorCode;
  readonly method?: string;
  readonly url?: string;
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, details: RequestDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
    this.method = details.method;
    this.url = details.url;
    this.status = details.status;
    this.body = details.body;
  }
}

/** Caller-supplied input failed local or upstream validation. */
export class InvalidArgumentError extends SymbolStoreError {
  readonly code = "INVALID_ARGUMENT" as const;
}

export class NotFoundError extends SymbolStoreError {
  readonly code = "NOT_FOUND" as const;
}

/** Network failure, timeout, cancellation or an unmapped non-2xx response. */
export class RemoteError extends SymbolStoreError {
  readonly code = "REMOTE_ERROR" as const;
  readonly timedOut: boolean;

  constructor(message: string, details: RequestDetails & { timedOut?: boolean } = {}) {
    super(message, details);
    this.timedOut = details.timedOut ?? false;
  }
}

export class ConfigurationError extends SymbolStoreError {
  readonly code = "CONFIGURATION_ERROR" as const;
}

export function isSymbolStoreError(err: unknown): err is SymbolStoreError {
  return err instanceof SymbolStoreError;
}

/** Message used for non-2xx responses: method, URL, status and raw body. */
export function describeHttpFailure(method: string, url: string, status: number, body: string): string {
  return `Request to ${method} ${url} failed with status ${status}: ${body}`;
}
