import { describe, it, expect, vi } from "vitest";
import type { SymbolStoreApi } from "../client/SymbolStoreClient.js";
import { NotFoundError } from "../client/errors.js";
import type { JsonValue } from "../schemas/symbol.js";
import { wrapToolCall } from "../middleware/index.js";
import {
  createGetSymbolHandler,
  createQuerySymbolsHandler,
  isEmptyPayload,
  uniqueDomains,
} from "../tools/index.js";

function fakeApi(overrides: Partial<SymbolStoreApi> = {}): SymbolStoreApi {
  return {
    querySymbols: vi.fn(async () => []),
    getSymbol: vi.fn(async () => ({})),
    putSymbol: vi.fn(async () => ({})),
    listDomains: vi.fn(async () => []),
    ...overrides,
  };
}

describe("tool helpers", () => {
  it("treats null, empty string, [] and {} as empty", () => {
    const empty: JsonValue[] = [null, "", [], {}];
    const nonEmpty: JsonValue[] = [0, false, ["a"], { a: 1 }];
    expect(empty.map((p) => isEmptyPayload(p))).toEqual([true, true, true, true]);
    expect(nonEmpty.map((p) => isEmptyPayload(p))).toEqual([false, false, false, false]);
  });

  it("dedupes string domain lists and leaves other payloads alone", () => {
    expect(uniqueDomains(["b", "a", "b"])).toEqual(["b", "a"]);
    expect(uniqueDomains({ domains: ["a", "a"] })).toEqual({ domains: ["a", "a"] });
    expect(uniqueDomains([{ name: "a" }, { name: "a" }])).toHaveLength(2);
  });
});

describe("tool handlers", () => {
  it("maps query arguments onto client params", async () => {
    const querySymbols = vi.fn(async () => [{ id: "A" }]);
    const handler = createQuerySymbolsHandler(fakeApi({ querySymbols }));
    const signal = new AbortController().signal;

    const result = await handler({ symbol_domain: "d", symbol_tag: "t", last_symbol_id: "Z", limit: 3 }, { signal });

    expect(querySymbols).toHaveBeenCalledWith(
      { symbolDomain: "d", symbolTag: "t", lastSymbolId: "Z", limit: 3 },
      { signal }
    );
    expect(result.content[0].text).toBe('Query results:\n[\n  {\n    "id": "A"\n  }\n]');
  });
});

describe("wrapToolCall", () => {
  const middleware = {};

  it("turns a SymbolStoreError into an error result", async () => {
    const getSymbol = vi.fn(async () => {
      throw new NotFoundError("gone", { status: 404 });
    });
    const wrapped = wrapToolCall("get_symbol_by_id", middleware, createGetSymbolHandler(fakeApi({ getSymbol })));

    await expect(wrapped({ id: "x" })).resolves.toEqual({
      content: [{ type: "text", text: "[NOT_FOUND] gone" }],
      isError: true,
    });
  });

  it("passes the caller's abort signal through to the handler", async () => {
    const getSymbol = vi.fn(async () => ({ id: "x" }));
    const wrapped = wrapToolCall("get_symbol_by_id", middleware, createGetSymbolHandler(fakeApi({ getSymbol })));
    const signal = new AbortController().signal;

    await wrapped({ id: "x" }, { signal });

    expect(getSymbol).toHaveBeenCalledWith("x", { signal });
  });

  it("lets unexpected errors propagate", async () => {
    const getSymbol = vi.fn(async () => {
      throw new TypeError("bug");
    });
    const wrapped = wrapToolCall("get_symbol_by_id", middleware, createGetSymbolHandler(fakeApi({ getSymbol })));

    await expect(wrapped({ id: "x" })).rejects.toThrow("bug");
  });
});
