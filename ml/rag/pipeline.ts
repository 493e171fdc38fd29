import type {
  AnswerResult,
  Citation,
  DocumentSummary,
  IndexStats,
  PolicyCheckResult,
  PolicyDocument,
  SearchFilter,
} from "./types";
import type { Embedder } from "./embeddings";
import type { VectorIndex } from "./store";
import type { Extractor } from "./extract";
import type { AuditSink } from "../logging/audit_log";
import type { AuditEventType, AuditPayload, FeedbackInput } from "../logging/log_types";
import type { Logger } from "../logging/logger";
import type { PolicyQaConfig } from "../config";
import type { ContradictionChecker } from "./policy/contradictions";
import type { PolicyQaErrorPayload } from "./errors";
import { loadConfig } from "../config";
import { createEmbedder } from "./embeddings";
import { SqliteVectorIndex } from "./store";
import { PlainTextExtractor, defaultDocumentId, documentTypeOf } from "./extract";
import { chunkDocument } from "./chunker";
import { Retriever, formatContext, getCitations } from "./retrieve";
import { AnswerSynthesizer } from "./answer";
import { ExtractiveGenerationService, createGenerationService } from "./generation";
import { PolicyChecker, unavailablePolicyResult } from "./policy/policy_checker";
import { LlmContradictionChecker, RuleBasedContradictionChecker } from "./policy/contradictions";
import { JsonlAuditLog, createAuditEvent } from "../logging/audit_log";
import { createLogger, serializeError } from "../logging/logger";
import { redactPayload, redactText } from "../logging/pii_redaction";
import { describeErrors, validateIngestDocument } from "../schemas/validators";
import {
  ChunkingError,
  EmbeddingServiceError,
  NotFoundError,
  PolicyQaError,
  toErrorPayload,
  withTimeout,
} from "./errors";

export type IngestInput = {
  filename: string;
  document_id?: string;
  document_type?: string;
  raw_text?: string;
  content?: string;
  page_map?: number[];
};

export type IngestState = "received" | "extracted" | "chunked" | "embedded" | "indexed" | "complete" | "failed";
export type QueryState = "received" | "retrieved" | "synthesized" | "checked" | "delivered" | "failed";

export type Transition<S extends string> = {
  state: S;
  at: string;
};

export type IngestResult =
  | {
      ok: true;
      document_id: string;
      filename: string;
      chunk_count: number;
      replaced: boolean;
      history: Transition<IngestState>[];
    }
  | {
      ok: false;
      document_id: string | null;
      filename: string;
      error: PolicyQaErrorPayload;
      history: Transition<IngestState>[];
    };

export type QueryOptions = {
  top_k?: number;
  filter?: SearchFilter;
};

export type QueryResult =
  | {
      ok: true;
      query: string;
      answer: AnswerResult;
      citations: Citation[];
      retrieved_count: number;
      policy: PolicyCheckResult;
      latency_ms: number;
      history: Transition<QueryState>[];
    }
  | {
      ok: false;
      query: string;
      error: PolicyQaErrorPayload;
      history: Transition<QueryState>[];
    };

export type DeleteResult = { ok: true; document_id: string; deleted: boolean } | { ok: false; error: PolicyQaErrorPayload };

export type ListDocumentsResult = { ok: true; documents: DocumentSummary[] } | { ok: false; error: PolicyQaErrorPayload };

export type FeedbackResult = { ok: true; event_id: string } | { ok: false; error: PolicyQaErrorPayload };

export type PipelineStats = IndexStats & {
  embedding_model: string;
  generation_model: string;
  chunk_size: number;
  chunk_overlap: number;
  top_k: number;
};

export type StatsResult = { ok: true; stats: PipelineStats } | { ok: false; error: PolicyQaErrorPayload };

export type PipelineSettings = {
  chunk_size: number;
  chunk_overlap: number;
  top_k: number;
  embed_timeout_ms: number;
  delete_strict: boolean;
};

export type PolicyQaPipelineDeps = {
  embedder: Embedder;
  index: VectorIndex;
  synthesizer: AnswerSynthesizer;
  policyChecker: PolicyChecker;
  audit: AuditSink;
  extractor?: Extractor;
  retriever?: Retriever;
  logger?: Logger;
  settings?: Partial<PipelineSettings>;
};

const DEFAULT_SETTINGS: PipelineSettings = {
  chunk_size: 512,
  chunk_overlap: 128,
  top_k: 7,
  embed_timeout_ms: 15_000,
  delete_strict: false,
};

class StateTracker<S extends string> {
  readonly history: Transition<S>[] = [];
  private listener?: (state: S) => void;

  constructor(initial: S, listener?: (state: S) => void) {
    this.listener = listener;
    this.move(initial);
  }

  get current(): S {
    return this.history[this.history.length - 1].state;
  }

  move(state: S) {
    this.history.push({ state, at: new Date().toISOString() });
    this.listener?.(state);
  }
}

/**
 * Ingest and query orchestration. Every collaborator is injected, so tests can
 * swap the index, the embedder or the generation backend without touching module
 * state. Public operations never throw; failures come back as error payloads.
 */
export class PolicyQaPipeline {
  private embedder: Embedder;
  private index: VectorIndex;
  private retriever: Retriever;
  private synthesizer: AnswerSynthesizer;
  private policyChecker: PolicyChecker;
  private extractor: Extractor;
  private auditSink: AuditSink;
  private logger: Logger;
  readonly settings: PipelineSettings;

  constructor(deps: PolicyQaPipelineDeps) {
    this.settings = { ...DEFAULT_SETTINGS, ...deps.settings };
    this.embedder = deps.embedder;
    this.index = deps.index;
    this.synthesizer = deps.synthesizer;
    this.policyChecker = deps.policyChecker;
    this.auditSink = deps.audit;
    this.extractor = deps.extractor ?? new PlainTextExtractor();
    this.logger = deps.logger ?? createLogger("policy_qa");
    this.retriever =
      deps.retriever ??
      new Retriever({ embedder: this.embedder, index: this.index, embedTimeoutMs: this.settings.embed_timeout_ms });
  }

  async ingest(input: IngestInput, onTransition?: (state: IngestState) => void): Promise<IngestResult> {
    const tracker = new StateTracker<IngestState>("received", onTransition);
    const filename = typeof input.filename === "string" ? input.filename : "";
    let documentId: string | null = null;

    try {
      if (!validateIngestDocument(withoutUndefined(input))) {
        throw new ChunkingError({
          stage: "validate",
          reason: `Invalid ingest input: ${describeErrors(validateIngestDocument)}`,
          context: { filename },
        });
      }
      const id = input.document_id ?? defaultDocumentId(input.filename);
      documentId = id;

      const document = await this.toDocument(id, input);
      tracker.move("extracted");

      const chunks = chunkDocument(document, {
        chunk_size: this.settings.chunk_size,
        chunk_overlap: this.settings.chunk_overlap,
      });
      tracker.move("chunked");

      const vectors = await this.embedChunks(
        id,
        chunks.map((chunk) => chunk.text)
      );
      tracker.move("embedded");

      // Replacement is atomic: a failure before this point leaves any earlier copy as it was.
      const replaced = await this.index.upsert(id, chunks, vectors);
      tracker.move("indexed");

      tracker.move("complete");
      this.logger.info("document ingested", { document_id: id, filename, chunks: chunks.length, replaced });
      await this.audit("document_ingested", {
        document_id: id,
        filename: document.filename,
        document_type: document.document_type,
        chunk_count: chunks.length,
        replaced,
      });
      return {
        ok: true,
        document_id: id,
        filename: document.filename,
        chunk_count: chunks.length,
        replaced,
        history: tracker.history,
      };
    } catch (error) {
      const failedAt = tracker.current;
      tracker.move("failed");
      const payload = toErrorPayload(error, failedAt, documentId ? { document_id: documentId } : {});
      this.logger.error("document ingest failed", { document_id: documentId, filename, error: serializeError(error) });
      await this.audit("document_ingest_failed", {
        document_id: documentId,
        filename,
        failed_at: failedAt,
        kind: payload.kind,
        message: payload.message,
      });
      return { ok: false, document_id: documentId, filename, error: payload, history: tracker.history };
    }
  }

  async query(text: string, options: QueryOptions = {}): Promise<QueryResult> {
    const tracker = new StateTracker<QueryState>("received");
    const started = Date.now();

    try {
      const retrieved = await this.retriever.retrieve(text, {
        top_k: options.top_k ?? this.settings.top_k,
        filter: options.filter,
      });
      tracker.move("retrieved");

      const citations = getCitations(retrieved);
      const answer = await this.synthesizer.generateAnswer(text, formatContext(retrieved), citations);
      tracker.move("synthesized");

      let policy: PolicyCheckResult;
      try {
        policy = await this.policyChecker.checkPolicy({ query: text, answer: answer.answer, retrieved, citations });
      } catch (error) {
        this.logger.warn("policy check unavailable", { error: serializeError(error) });
        policy = unavailablePolicyResult();
      }
      tracker.move("checked");

      const latencyMs = Date.now() - started;
      tracker.move("delivered");
      await this.audit("query", {
        query: text,
        summary: answer.summary,
        model: answer.model,
        retrieved_count: retrieved.length,
        cited_documents: citations.map((citation) => citation.filename),
        confidence_score: policy.confidence_score,
        warning_count: policy.warnings.length,
        latency_ms: latencyMs,
      });
      return {
        ok: true,
        query: text,
        answer,
        citations,
        retrieved_count: retrieved.length,
        policy,
        latency_ms: latencyMs,
        history: tracker.history,
      };
    } catch (error) {
      const failedAt = tracker.current;
      tracker.move("failed");
      const payload = toErrorPayload(error, failedAt, { query: redactText(text).text });
      this.logger.error("query failed", { failed_at: failedAt, error: serializeError(error) });
      await this.audit("query_failed", { query: text, failed_at: failedAt, kind: payload.kind, message: payload.message });
      return { ok: false, query: text, error: payload, history: tracker.history };
    }
  }

  async delete(documentId: string): Promise<DeleteResult> {
    try {
      const deleted = await this.index.delete(documentId);
      if (!deleted && this.settings.delete_strict) {
        throw new NotFoundError({
          stage: "delete",
          reason: `Document ${documentId} is not indexed`,
          context: { document_id: documentId },
        });
      }
      await this.audit("document_deleted", { document_id: documentId, deleted });
      return { ok: true, document_id: documentId, deleted };
    } catch (error) {
      this.logger.error("delete failed", { document_id: documentId, error: serializeError(error) });
      return { ok: false, error: toErrorPayload(error, "delete", { document_id: documentId }) };
    }
  }

  async listDocuments(): Promise<ListDocumentsResult> {
    try {
      return { ok: true, documents: await this.index.listDocuments() };
    } catch (error) {
      return { ok: false, error: toErrorPayload(error, "list") };
    }
  }

  async recordFeedback(input: FeedbackInput): Promise<FeedbackResult> {
    const event = createAuditEvent("user_feedback", redactPayload(feedbackPayload(input)).payload);
    try {
      await this.auditSink.append(event);
      return { ok: true, event_id: event.id };
    } catch (error) {
      this.logger.error("feedback not recorded", { error: serializeError(error) });
      return { ok: false, error: toErrorPayload(error, "feedback") };
    }
  }

  async stats(): Promise<StatsResult> {
    try {
      const indexStats = await this.index.stats();
      return {
        ok: true,
        stats: {
          ...indexStats,
          embedding_model: this.embedder.model,
          generation_model: this.synthesizer.model,
          chunk_size: this.settings.chunk_size,
          chunk_overlap: this.settings.chunk_overlap,
          top_k: this.settings.top_k,
        },
      };
    } catch (error) {
      return { ok: false, error: toErrorPayload(error, "stats") };
    }
  }

  close() {
    this.index.close();
  }

  private async toDocument(documentId: string, input: IngestInput): Promise<PolicyDocument> {
    if (input.raw_text !== undefined) {
      return {
        document_id: documentId,
        filename: input.filename,
        document_type: input.document_type ?? (documentTypeOf(input.filename) || "txt"),
        raw_text: input.raw_text,
        page_map: input.page_map ?? [0],
      };
    }
    const extracted = await this.extractor.extract({ filename: input.filename, content: input.content ?? "" });
    return {
      document_id: documentId,
      filename: input.filename,
      document_type: input.document_type ?? extracted.document_type,
      raw_text: extracted.raw_text,
      page_map: extracted.page_map,
    };
  }

  private async embedChunks(documentId: string, texts: string[]) {
    try {
      const vectors = await withTimeout(
        this.embedder.embed(texts),
        this.settings.embed_timeout_ms,
        () =>
          new EmbeddingServiceError({
            stage: "embed",
            reason: `Embedding timed out after ${this.settings.embed_timeout_ms}ms`,
            context: { document_id: documentId },
            timed_out: true,
          })
      );
      if (vectors.length !== texts.length) {
        throw new EmbeddingServiceError({
          stage: "embed",
          reason: `Embedder returned ${vectors.length} vectors for ${texts.length} chunks`,
          context: { document_id: documentId },
        });
      }
      return vectors;
    } catch (error) {
      if (error instanceof PolicyQaError) throw error;
      throw new EmbeddingServiceError({
        stage: "embed",
        reason: "Embedding failed",
        context: { document_id: documentId },
        cause: error,
      });
    }
  }

  private async audit(type: AuditEventType, payload: AuditPayload) {
    try {
      await this.auditSink.append(createAuditEvent(type, redactPayload(payload).payload));
    } catch (error) {
      this.logger.error("audit append failed", { type, error: serializeError(error) });
    }
  }
}

function withoutUndefined(input: IngestInput) {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

function feedbackPayload(input: FeedbackInput): AuditPayload {
  return {
    query: input.query,
    answer: input.answer,
    is_correct: input.is_correct,
    comment: input.comment ?? null,
  };
}

export type PipelineOverrides = Partial<Pick<PolicyQaPipelineDeps, "index" | "embedder" | "audit" | "logger">> & {
  contradictionChecker?: ContradictionChecker;
};

function selectContradictionChecker(
  config: PolicyQaConfig,
  generation: ReturnType<typeof createGenerationService>,
  logger: Logger
): ContradictionChecker {
  if (config.contradiction_mode !== "llm") return new RuleBasedContradictionChecker();
  if (generation instanceof ExtractiveGenerationService) {
    logger.warn("CONTRADICTION_MODE=llm needs a model backend; using rule-based checks");
    return new RuleBasedContradictionChecker();
  }
  return new LlmContradictionChecker({ generation, timeoutMs: config.generation_timeout_ms });
}

export function createPolicyQaPipeline(
  config: Readonly<PolicyQaConfig> = loadConfig(),
  overrides: PipelineOverrides = {}
): PolicyQaPipeline {
  const logger = overrides.logger ?? createLogger("policy_qa", { level: config.log_level });
  const embedder = overrides.embedder ?? createEmbedder(config);
  const index = overrides.index ?? new SqliteVectorIndex({ dbPath: config.db_path, dimension: embedder.dimension });
  const generation = createGenerationService(config);

  return new PolicyQaPipeline({
    embedder,
    index,
    synthesizer: new AnswerSynthesizer({
      generation,
      temperature: config.llm_temperature,
      maxTokens: config.llm_max_tokens,
      timeoutMs: config.generation_timeout_ms,
      logger: logger.child("answer"),
    }),
    policyChecker: new PolicyChecker({
      contradictionChecker: overrides.contradictionChecker ?? selectContradictionChecker(config, generation, logger),
      ambiguityThreshold: config.ambiguity_density_threshold,
      logger: logger.child("policy"),
    }),
    audit: overrides.audit ?? new JsonlAuditLog({ logDir: config.audit_log_dir }),
    logger,
    settings: {
      chunk_size: config.chunk_size,
      chunk_overlap: config.chunk_overlap,
      top_k: config.top_k,
      embed_timeout_ms: config.embed_timeout_ms,
      delete_strict: config.delete_strict,
    },
  });
}
