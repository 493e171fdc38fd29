import { describe, it, expect, vi } from "vitest";
import { IngestQueue } from "../ingest_queue";
import type { IngestJob } from "../ingest_queue";
import type { IngestInput, IngestResult, IngestState } from "../pipeline";
import { silentLogger } from "../../../tests/helpers/policy_fixtures";

/** Pipeline stand-in whose ingests stay open until released. */
class GatedPipeline {
  readonly started: string[] = [];
  active = 0;
  maxActive = 0;
  private open = false;
  private gates: Array<() => void> = [];

  constructor(open = false) {
    this.open = open;
  }

  async ingest(input: IngestInput, onTransition?: (state: IngestState) => void): Promise<IngestResult> {
    this.started.push(input.filename);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    onTransition?.("received");
    if (!this.open) {
      await new Promise<void>((resolve) => this.gates.push(resolve));
    }
    this.active -= 1;

    if (input.filename.startsWith("crash")) {
      throw new Error("disk full");
    }
    if (input.filename.startsWith("bad")) {
      onTransition?.("failed");
      return {
        ok: false,
        document_id: null,
        filename: input.filename,
        error: { kind: "EXTRACTION_ERROR", stage: "received", message: "unreadable", timed_out: false, context: {} },
        history: [],
      };
    }
    onTransition?.("extracted");
    onTransition?.("complete");
    return { ok: true, document_id: "doc", filename: input.filename, chunk_count: 1, replaced: false, history: [] };
  }

  releaseNext() {
    this.gates.shift()?.();
  }

  releaseAll() {
    this.open = true;
    this.gates.splice(0).forEach((release) => release());
  }
}

const input = (filename: string): IngestInput => ({ filename, content: "text" });
const states = (job: IngestJob | null) => job?.history.map((entry) => entry.state);

describe("IngestQueue", () => {
  it("runs at most `concurrency` ingests and starts queued jobs in submission order", async () => {
    const pipeline = new GatedPipeline();
    const queue = new IngestQueue(pipeline, { concurrency: 2, logger: silentLogger() });

    ["a.txt", "b.txt", "c.txt", "d.txt"].forEach((name) => queue.submit(input(name)));

    expect(pipeline.started).toEqual(["a.txt", "b.txt"]);
    expect(queue.activeCount).toBe(2);
    expect(queue.queuedCount).toBe(2);

    pipeline.releaseNext();
    await vi.waitFor(() => expect(pipeline.started).toEqual(["a.txt", "b.txt", "c.txt"]));

    pipeline.releaseAll();
    await queue.drain();

    expect(pipeline.started).toEqual(["a.txt", "b.txt", "c.txt", "d.txt"]);
    expect(pipeline.maxActive).toBe(2);
    expect(queue.listJobs().map((job) => job.state)).toEqual(["complete", "complete", "complete", "complete"]);
    expect(queue.activeCount).toBe(0);
  });

  it("records state transitions and attaches the result", async () => {
    const queue = new IngestQueue(new GatedPipeline(true), { logger: silentLogger() });

    const submitted = queue.submit(input("a.txt"));
    expect(submitted.state).toBe("received");

    const done = await queue.waitFor(submitted.job_id);
    expect(states(done)).toEqual(["received", "extracted", "complete"]);
    expect(done.result).toMatchObject({ ok: true, chunk_count: 1 });
    expect(done.finished_at).not.toBeNull();
    expect(states(queue.getJob(submitted.job_id))).toEqual(["received", "extracted", "complete"]);
  });

  it("marks failed ingests as failed", async () => {
    const queue = new IngestQueue(new GatedPipeline(true), { logger: silentLogger() });

    const done = await queue.waitFor(queue.submit(input("bad.txt")).job_id);

    expect(done.state).toBe("failed");
    expect(done.result).toMatchObject({ ok: false, error: { kind: "EXTRACTION_ERROR" } });
  });

  it("turns a thrown ingest into a failed job", async () => {
    const queue = new IngestQueue(new GatedPipeline(true), { logger: silentLogger() });

    const done = await queue.waitFor(queue.submit(input("crash.txt")).job_id);

    expect(states(done)).toEqual(["received", "failed"]);
    expect(done.result).toMatchObject({ ok: false, error: { kind: "INTERNAL", message: "disk full" } });
  });

  it("notifies subscribers until they unsubscribe", async () => {
    const queue = new IngestQueue(new GatedPipeline(true), { logger: silentLogger() });
    const seen: string[] = [];
    const unsubscribe = queue.subscribe((job) => seen.push(`${job.filename}:${job.state}`));
    queue.subscribe(() => {
      throw new Error("listener bug");
    });

    await queue.waitFor(queue.submit(input("a.txt")).job_id);
    unsubscribe();
    await queue.waitFor(queue.submit(input("b.txt")).job_id);

    expect(seen).toEqual(["a.txt:received", "a.txt:extracted", "a.txt:complete"]);
  });

  it("forgets the oldest finished jobs beyond the retention limit", async () => {
    const queue = new IngestQueue(new GatedPipeline(true), { concurrency: 1, retention: 2, logger: silentLogger() });

    const first = queue.submit(input("a.txt"));
    queue.submit(input("b.txt"));
    queue.submit(input("c.txt"));
    await queue.drain();

    expect(queue.getJob(first.job_id)).toBeNull();
    expect(queue.listJobs().map((job) => job.filename)).toEqual(["b.txt", "c.txt"]);
  });

  it("rejects waiting on an unknown job and drains immediately when idle", async () => {
    const queue = new IngestQueue(new GatedPipeline(true), { logger: silentLogger() });

    await expect(queue.waitFor("missing")).rejects.toThrow("Unknown ingest job missing");
    await expect(queue.drain()).resolves.toBeUndefined();
    expect(queue.getJob("missing")).toBeNull();
  });
});
