import { describe, it, expect, vi, afterEach } from "vitest";
import { MAX_LOG_ENTRIES, createLogger, serializeError } from "../logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops entries below the level and routes warnings to stderr", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = createLogger("policy_qa", { level: "info" });

    logger.debug("hidden");
    logger.warn("slow embed", { ms: 900 });

    expect(logger.entries.map((entry) => entry.message)).toEqual(["slow embed"]);
    expect(warn).toHaveBeenCalledWith('[policy_qa:warn] slow embed {"ms":900}');
    expect(log).not.toHaveBeenCalled();
  });

  it("writes nothing when silent and scopes children", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const child = createLogger("policy_qa", { silent: true }).child("answer");

    child.error("boom");

    expect(error).not.toHaveBeenCalled();
    expect(child.scope).toBe("policy_qa.answer");
    expect(child.entries[0]).toMatchObject({ level: "error", scope: "policy_qa.answer", message: "boom" });
  });

  it("can route every level to stderr", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createLogger("mcp", { level: "info", stderr: true }).child("tools").info("ready");

    expect(error).toHaveBeenCalledWith("[mcp.tools:info] ready");
    expect(log).not.toHaveBeenCalled();
  });

  it("keeps a bounded number of entries", () => {
    const logger = createLogger("bulk", { silent: true, level: "debug" });
    for (let i = 0; i <= MAX_LOG_ENTRIES; i += 1) logger.debug(`entry ${i}`);

    expect(logger.entries).toHaveLength(MAX_LOG_ENTRIES);
    expect(logger.entries[0].message).toBe("entry 1");
  });
});

describe("serializeError", () => {
  it("includes the cause chain", () => {
    const error = new Error("ingest failed", { cause: new TypeError("bad vector") });
    expect(serializeError(error)).toEqual({
      name: "Error",
      message: "ingest failed",
      cause: { name: "TypeError", message: "bad vector" },
    });
    expect(serializeError("plain")).toEqual({ name: "Error", message: "plain" });
  });
});
