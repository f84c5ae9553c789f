import { z } from "zod";

/**
 * Symbol document as stored upstream. The upstream owns the schema, so any
 * JSON object is accepted and forwarded with its fields and their order intact.
 */
export const SymbolSchema = z
  .object({})
  .passthrough()
  .describe(
    "Symbol document. Common fields: id, name, kind, role, triad, macro, symbol_domain, " +
      "symbol_tag, activation_conditions, failure_mode, linked_patterns, facets, lattice, " +
      "created_at, updated_at. Other fields are stored as given."
  );

export type SymbolDocument = z.infer<typeof SymbolSchema>;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };
