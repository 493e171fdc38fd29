import { LocalHashEmbedder } from "../../ml/rag/embeddings";
import { SqliteVectorIndex } from "../../ml/rag/store";
import { AnswerSynthesizer } from "../../ml/rag/answer";
import { ExtractiveGenerationService } from "../../ml/rag/generation";
import type { GenerateRequest, GenerationService } from "../../ml/rag/generation";
import { PolicyChecker } from "../../ml/rag/policy/policy_checker";
import type { ContradictionChecker } from "../../ml/rag/policy/contradictions";
import { PolicyQaPipeline } from "../../ml/rag/pipeline";
import type { PipelineSettings } from "../../ml/rag/pipeline";
import type { VectorIndex } from "../../ml/rag/store";
import type { Embedder } from "../../ml/rag/embeddings";
import { MemoryAuditSink } from "../../ml/logging/audit_log";
import { createLogger } from "../../ml/logging/logger";
import type { Chunk, PolicyDocument } from "../../ml/rag/types";

export const ATTENDANCE_TEXT =
  "Attendance is mandatory for all lab sessions. Students must attend at least 80% of lectures.";

export function makeDocument(overrides: Partial<PolicyDocument> = {}): PolicyDocument {
  return {
    document_id: "doc-1",
    filename: "policy.txt",
    document_type: "txt",
    raw_text: ATTENDANCE_TEXT,
    page_map: [0],
    ...overrides,
  };
}

export function makeChunk(overrides: Partial<Chunk> = {}): Chunk {
  const text = overrides.text ?? "Late submissions may be accepted at instructor discretion.";
  return {
    chunk_id: "doc-1_0",
    document_id: "doc-1",
    filename: "policy.txt",
    document_type: "txt",
    text,
    token_count: text.split(/\s+/).length,
    char_count: text.length,
    page_number: 1,
    sequence_index: 0,
    start_offset: 0,
    end_offset: text.length,
    ...overrides,
  };
}

type Reply = string | Error | ((request: GenerateRequest) => string | Promise<string>);

/** Generation fake that answers each purpose from a script and records every request. */
export class ScriptedGenerationService implements GenerationService {
  readonly model = "scripted";
  readonly requests: GenerateRequest[] = [];
  private replies: Partial<Record<GenerateRequest["purpose"], Reply>>;

  constructor(replies: Partial<Record<GenerateRequest["purpose"], Reply>>) {
    this.replies = replies;
  }

  async generate(request: GenerateRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies[request.purpose];
    if (reply === undefined) throw new Error(`No scripted reply for ${request.purpose}`);
    if (reply instanceof Error) throw reply;
    if (typeof reply === "function") return reply(request);
    return reply;
  }
}

export const silentLogger = () => createLogger("test", { silent: true });

export type TestPipelineOptions = {
  generation?: GenerationService;
  contradictionChecker?: ContradictionChecker;
  index?: VectorIndex;
  embedder?: Embedder;
  audit?: MemoryAuditSink;
  settings?: Partial<PipelineSettings>;
  generationTimeoutMs?: number;
};

export function createTestPipeline(options: TestPipelineOptions = {}) {
  const embedder = options.embedder ?? new LocalHashEmbedder(256);
  const index = options.index ?? new SqliteVectorIndex({ dbPath: ":memory:", dimension: embedder.dimension });
  const audit = options.audit ?? new MemoryAuditSink();
  const logger = silentLogger();
  const pipeline = new PolicyQaPipeline({
    embedder,
    index,
    synthesizer: new AnswerSynthesizer({
      generation: options.generation ?? new ExtractiveGenerationService(),
      timeoutMs: options.generationTimeoutMs,
      logger,
    }),
    policyChecker: new PolicyChecker({ contradictionChecker: options.contradictionChecker, logger }),
    audit,
    logger,
    settings: { chunk_size: 64, chunk_overlap: 16, ...options.settings },
  });
  return { pipeline, index, embedder, audit };
}
