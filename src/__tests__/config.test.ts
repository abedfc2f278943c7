import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({ port: 3000, indexKind: "fbtrie", maxDistance: 3, dictionaryPath: undefined });
  });

  it("reads every setting", () => {
    expect(loadConfig({ PORT: "8080", INDEX_KIND: "TRIE", MAX_DISTANCE: "2", DICTIONARY_PATH: "/tmp/words.txt" })).toEqual({
      port: 8080,
      indexKind: "trie",
      maxDistance: 2,
      dictionaryPath: "/tmp/words.txt",
    });
  });

  it("warns and falls back to the plain trie for an unknown index kind", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(loadConfig({ INDEX_KIND: "dawg" }).indexKind).toBe("trie");
    expect(warn).toHaveBeenCalledWith("Unknown INDEX_KIND 'dawg', using 'trie'");
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow("PORT must be an integer between 0 and 65535, got 'http'");
    expect(() => loadConfig({ MAX_DISTANCE: "-1" })).toThrow("MAX_DISTANCE must be an integer between 0 and 16, got '-1'");
  });
});
