import { z } from "zod";
import { ConfigurationError } from "./client/errors.js";

export const DEFAULT_BASE_URL = "https://qnw96whs57.execute-api.us-west-2.amazonaws.com/prod";
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Process-wide settings, read once at startup and frozen. */
export interface SymbolStoreConfig {
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly timeoutMs: number;
  /** JSONL file receiving one record per tool call; unset disables call logging */
  readonly callLogPath?: string;
}

const emptyToUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const EnvSchema = z.object({
  SYMBOL_STORE_BASE_URL: z.preprocess(
    emptyToUndefined,
    z
      .string()
      .url("SYMBOL_STORE_BASE_URL must be an absolute URL")
      .refine((u) => /^https?:\/\//i.test(u), "SYMBOL_STORE_BASE_URL must use http or https")
      .default(DEFAULT_BASE_URL)
  ),
  SYMBOL_STORE_API_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
  SYMBOL_STORE_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce
      .number()
      .int("SYMBOL_STORE_TIMEOUT_MS must be an integer")
      .positive("SYMBOL_STORE_TIMEOUT_MS must be positive")
      .default(DEFAULT_TIMEOUT_MS)
  ),
  SYMBOL_STORE_CALL_LOG_PATH: z.preprocess(emptyToUndefined, z.string().optional()),
});

/**
 * Build the configuration from environment variables.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SymbolStoreConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }
  const vars = parsed.data;
  return Object.freeze({
    baseUrl: vars.SYMBOL_STORE_BASE_URL.replace(/\/+$/, ""),
    apiKey: vars.SYMBOL_STORE_API_KEY,
    timeoutMs: vars.SYMBOL_STORE_TIMEOUT_MS,
    callLogPath: vars.SYMBOL_STORE_CALL_LOG_PATH,
  });
}
