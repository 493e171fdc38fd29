/**
 * MCP tool registry contract: the policy tools are registered, inputs are
 * validated before handlers run, and outputs match their schemas.
 */

import { describe, it, expect, afterEach } from "vitest";
import Ajv from "ajv";
import addFormats from "ajv-formats";
import { listTools, callTool, toolRegistry } from "../tool_registry";
import type { ToolContext } from "../tool_types";
import { IngestQueue } from "../../ml/rag/ingest_queue";
import { ATTENDANCE_TEXT, createTestPipeline, silentLogger } from "../../tests/helpers/policy_fixtures";

function createContext(): ToolContext {
  const { pipeline } = createTestPipeline();
  return { pipeline, queue: new IngestQueue(pipeline, { concurrency: 1, logger: silentLogger() }) };
}

describe("MCP tool registry", () => {
  let ctx: ToolContext | null = null;

  afterEach(async () => {
    if (ctx) {
      await ctx.queue.drain();
      ctx.pipeline.close();
      ctx = null;
    }
  });

  it("registers every policy tool", () => {
    expect(listTools().map((tool) => tool.name)).toEqual([
      "policy.ingest_document",
      "policy.ingest_status",
      "policy.query",
      "policy.delete_document",
      "policy.list_documents",
      "policy.feedback",
      "policy.stats",
    ]);
  });

  it("publishes schemas that compile under strict mode", () => {
    const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
    addFormats(ajv);
    for (const tool of toolRegistry) {
      expect(() => ajv.compile(tool.inputSchema), tool.name).not.toThrow();
      expect(() => ajv.compile(tool.outputSchema), tool.name).not.toThrow();
    }
  });

  it("publishes object input schemas with descriptions", () => {
    for (const tool of listTools()) {
      expect(tool.description.length).toBeGreaterThan(0);
      expect(tool.inputSchema.type).toBe("object");
    }
  });

  it("rejects unknown tools", async () => {
    ctx = createContext();
    await expect(callTool("policy.missing", {}, ctx)).rejects.toThrow("Unknown tool: policy.missing");
  });

  it("rejects input that fails the schema", async () => {
    ctx = createContext();
    await expect(callTool("policy.query", { query: "" }, ctx)).rejects.toThrow(
      "Invalid tool input for policy.query"
    );
    await expect(callTool("policy.delete_document", { document_id: "a", extra: 1 }, ctx)).rejects.toThrow(
      "Invalid tool input for policy.delete_document"
    );
  });

  it("ingests, lists, queries and deletes through the tools", async () => {
    ctx = createContext();

    const job = await callTool(
      "policy.ingest_document",
      { filename: "attendance.txt", document_id: "attendance", raw_text: ATTENDANCE_TEXT, wait: true },
      ctx
    );
    expect(job).toMatchObject({ filename: "attendance.txt", state: "complete" });

    const listed = await callTool("policy.list_documents", {}, ctx);
    expect(listed).toMatchObject({ ok: true, documents: [{ document_id: "attendance", chunk_count: 1 }] });

    const answered = await callTool("policy.query", { query: "What is the attendance policy?", top_k: 3 }, ctx);
    expect(answered).toMatchObject({ ok: true, citations: [{ document_id: "attendance" }] });

    const deleted = await callTool("policy.delete_document", { document_id: "attendance" }, ctx);
    expect(deleted).toEqual({ ok: true, document_id: "attendance", deleted: true });

    const status = await callTool("policy.stats", {}, ctx);
    expect(status).toMatchObject({ index: { ok: true, stats: { document_count: 0 } }, queue: { active: 0, queued: 0 } });
  });

  it("reports job state by id", async () => {
    ctx = createContext();
    const job = await callTool("policy.ingest_document", { filename: "notes.md", content: "Library hours are 8 to 22." }, ctx);
    expect(job).toMatchObject({ state: "received" });

    await ctx.queue.drain();
    const jobs = ctx.queue.listJobs();
    const status = await callTool("policy.ingest_status", { job_id: jobs[0].job_id }, ctx);
    expect(status).toMatchObject({ jobs: [{ job_id: jobs[0].job_id, state: "complete" }] });

    const missing = await callTool("policy.ingest_status", { job_id: "nope" }, ctx);
    expect(missing).toEqual({ jobs: [] });
  });

  it("records feedback", async () => {
    ctx = createContext();
    const result = await callTool(
      "policy.feedback",
      { query: "Is lab attendance required?", answer: "Yes.", is_correct: true },
      ctx
    );
    expect(result).toMatchObject({ ok: true });
  });
});
