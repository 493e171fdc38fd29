import { describe, it, expect } from "vitest";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("falls back to offline backends without an API key", () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      embed_mode: "local",
      generation_mode: "extractive",
      chunk_size: 512,
      chunk_overlap: 128,
      top_k: 7,
      contradiction_mode: "rules",
      delete_strict: false,
    });
    expect(config.openai_api_key).toBeUndefined();
  });

  it("switches to OpenAI backends when a key is present", () => {
    const config = loadConfig({ OPENAI_API_KEY: " test-secret " });
    expect(config).toMatchObject({ openai_api_key: "test-secret", embed_mode: "openai", generation_mode: "openai" });
  });

  it("lets explicit modes win over the key", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret", EMBED_MODE: "local", GENERATION_MODE: "extractive" });
    expect(config).toMatchObject({ embed_mode: "local", generation_mode: "extractive" });
  });

  it("coerces numbers and flags from strings", () => {
    const config = loadConfig({ CHUNK_SIZE: "200", CHUNK_OVERLAP: "50", TOP_K: "3", DELETE_STRICT: "true" });
    expect(config).toMatchObject({ chunk_size: 200, chunk_overlap: 50, top_k: 3, delete_strict: true });
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => loadConfig({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(
      "Invalid policy-qa configuration: CHUNK_OVERLAP: CHUNK_OVERLAP must be smaller than CHUNK_SIZE"
    );
  });

  it("is frozen", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
