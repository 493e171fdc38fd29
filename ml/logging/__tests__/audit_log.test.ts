import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { JsonlAuditLog, MemoryAuditSink, createAuditEvent } from "../audit_log";

describe("JsonlAuditLog", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "policy-audit-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("appends one JSON line per event to a daily file", async () => {
    const log = new JsonlAuditLog({ logDir: dir });
    const day = new Date("2026-03-02T10:00:00.000Z");

    await log.append(createAuditEvent("document_ingested", { document_id: "a", chunk_count: 2 }, day));
    await log.append(createAuditEvent("document_deleted", { document_id: "a", deleted: true }, day));

    const lines = fs.readFileSync(path.join(dir, "audit-2026-03-02.jsonl"), "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toMatchObject({
      type: "document_deleted",
      payload: { document_id: "a", deleted: true },
      timestamp: "2026-03-02T10:00:00.000Z",
    });
  });

  it("reads events back across files in date order", async () => {
    const log = new JsonlAuditLog({ logDir: dir });
    await log.append(createAuditEvent("query", { query: "second" }, new Date("2026-03-03T00:00:00.000Z")));
    await log.append(createAuditEvent("query", { query: "first" }, new Date("2026-03-02T00:00:00.000Z")));

    expect(log.readAll().map((event) => event.payload.query)).toEqual(["first", "second"]);
  });

  it("rejects events that do not match the schema", async () => {
    const log = new JsonlAuditLog({ logDir: dir });
    const event = { ...createAuditEvent("query", {}), timestamp: "yesterday" };

    await expect(log.append(event)).rejects.toThrow("Schema validation failed for AuditEvent");
  });
});

describe("MemoryAuditSink", () => {
  it("filters events by type", async () => {
    const sink = new MemoryAuditSink();
    await sink.append(createAuditEvent("query", { query: "q" }));
    await sink.append(createAuditEvent("user_feedback", { is_correct: true }));

    expect(sink.ofType("user_feedback").map((event) => event.payload)).toEqual([{ is_correct: true }]);
  });
});
