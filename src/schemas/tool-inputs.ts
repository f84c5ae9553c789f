import { z } from "zod";
import { SymbolSchema } from "./symbol.js";

/**
 * Tool input shapes. IDs and filters are plain strings here: emptiness is
 * checked by the client so it surfaces as INVALID_ARGUMENT, and everything
 * deeper is left to the upstream service.
 */

export const QuerySymbolsSchema = z.object({
  symbol_domain: z.string().optional().describe("Filter by domain"),
  symbol_tag: z.string().optional().describe("Filter by tag"),
  last_symbol_id: z.string().optional().describe("Start after ID"),
  limit: z.number().int().positive().optional().describe("Maximum results"),
});

export const GetSymbolSchema = z.object({
  id: z.string().describe("Symbol identifier"),
});

export const PutSymbolSchema = z.object({
  symbol_id: z.string().describe("Symbol identifier"),
  symbol: SymbolSchema,
});

export const ListDomainsSchema = z.object({});

export type QuerySymbolsInput = z.infer<typeof QuerySymbolsSchema>;
export type GetSymbolInput = z.infer<typeof GetSymbolSchema>;
export type PutSymbolInput = z.infer<typeof PutSymbolSchema>;
export type ListDomainsInput = z.infer<typeof ListDomainsSchema>;
