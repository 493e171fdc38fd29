import { nanoid } from "nanoid";
import type { IngestInput, IngestResult, IngestState, PolicyQaPipeline, Transition } from "./pipeline";
import type { Logger } from "../logging/logger";
import { createLogger, serializeError } from "../logging/logger";
import { toErrorPayload } from "./errors";

export type IngestJob = {
  job_id: string;
  filename: string;
  state: IngestState;
  history: Transition<IngestState>[];
  submitted_at: string;
  finished_at: string | null;
  result: IngestResult | null;
};

export type JobListener = (job: IngestJob) => void;

export type IngestQueueConfig = {
  concurrency?: number;
  // Finished jobs kept for polling; older ones are dropped first.
  retention?: number;
  logger?: Logger;
};

export const DEFAULT_JOB_RETENTION = 200;

function isTerminal(state: IngestState) {
  return state === "complete" || state === "failed";
}

function snapshot(job: IngestJob): IngestJob {
  return { ...job, history: [...job.history] };
}

/**
 * Runs ingests in the background with bounded concurrency. Jobs beyond the limit
 * wait in submission order.
 */
export class IngestQueue {
  private pipeline: Pick<PolicyQaPipeline, "ingest">;
  private concurrency: number;
  private retention: number;
  private logger: Logger;
  private jobs = new Map<string, IngestJob>();
  private inputs = new Map<string, IngestInput>();
  private pending: string[] = [];
  private running = 0;
  private listeners = new Set<JobListener>();
  private waiters = new Map<string, Array<(job: IngestJob) => void>>();
  private idle: Array<() => void> = [];

  constructor(pipeline: Pick<PolicyQaPipeline, "ingest">, config: IngestQueueConfig = {}) {
    this.pipeline = pipeline;
    this.concurrency = Math.max(1, config.concurrency ?? 2);
    this.retention = Math.max(0, config.retention ?? DEFAULT_JOB_RETENTION);
    this.logger = config.logger ?? createLogger("rag.ingest_queue");
  }

  submit(input: IngestInput): IngestJob {
    const job: IngestJob = {
      job_id: nanoid(),
      filename: input.filename,
      state: "received",
      history: [{ state: "received", at: new Date().toISOString() }],
      submitted_at: new Date().toISOString(),
      finished_at: null,
      result: null,
    };
    this.jobs.set(job.job_id, job);
    this.inputs.set(job.job_id, input);
    this.pending.push(job.job_id);
    this.notify(job);
    this.pump();
    return snapshot(job);
  }

  getJob(jobId: string): IngestJob | null {
    const job = this.jobs.get(jobId);
    return job ? snapshot(job) : null;
  }

  listJobs(): IngestJob[] {
    return [...this.jobs.values()].map(snapshot);
  }

  get activeCount() {
    return this.running;
  }

  get queuedCount() {
    return this.pending.length;
  }

  subscribe(listener: JobListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  waitFor(jobId: string): Promise<IngestJob> {
    const job = this.jobs.get(jobId);
    if (!job) return Promise.reject(new Error(`Unknown ingest job ${jobId}`));
    if (isTerminal(job.state)) return Promise.resolve(snapshot(job));
    return new Promise((resolve) => {
      const list = this.waiters.get(jobId) ?? [];
      list.push(resolve);
      this.waiters.set(jobId, list);
    });
  }

  drain(): Promise<void> {
    if (this.running === 0 && this.pending.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idle.push(resolve);
    });
  }

  private pump() {
    while (this.running < this.concurrency && this.pending.length > 0) {
      const jobId = this.pending.shift();
      if (!jobId) break;
      this.running += 1;
      this.run(jobId)
        .catch((error) => {
          this.logger.error("ingest job crashed", { job_id: jobId, error: serializeError(error) });
        })
        .finally(() => {
          this.running -= 1;
          this.pump();
          this.settleIdle();
        });
    }
  }

  private async run(jobId: string) {
    const job = this.jobs.get(jobId);
    const input = this.inputs.get(jobId);
    if (!job || !input) return;

    let result: IngestResult;
    try {
      result = await this.pipeline.ingest(input, (state) => {
        // Terminal states are recorded below, once the result is attached.
        if (state === job.state || isTerminal(state)) return;
        this.transition(job, state);
      });
    } catch (error) {
      result = {
        ok: false,
        document_id: input.document_id ?? null,
        filename: input.filename,
        error: toErrorPayload(error, job.state),
        history: [...job.history],
      };
    }
    this.inputs.delete(jobId);

    job.result = result;
    job.finished_at = new Date().toISOString();
    this.transition(job, result.ok ? "complete" : "failed");
    const resolvers = this.waiters.get(jobId) ?? [];
    this.waiters.delete(jobId);
    resolvers.forEach((resolve) => resolve(snapshot(job)));
    this.evictFinished();
  }

  private evictFinished() {
    const finished = [...this.jobs.values()].filter((job) => isTerminal(job.state));
    for (const job of finished.slice(0, Math.max(0, finished.length - this.retention))) {
      this.jobs.delete(job.job_id);
    }
  }

  private transition(job: IngestJob, state: IngestState) {
    job.state = state;
    job.history.push({ state, at: new Date().toISOString() });
    this.notify(job);
  }

  private notify(job: IngestJob) {
    for (const listener of this.listeners) {
      try {
        listener(snapshot(job));
      } catch (error) {
        this.logger.warn("ingest job listener threw", { job_id: job.job_id, error: serializeError(error) });
      }
    }
  }

  private settleIdle() {
    if (this.running > 0 || this.pending.length > 0) return;
    const resolvers = this.idle;
    this.idle = [];
    resolvers.forEach((resolve) => resolve());
  }
}
