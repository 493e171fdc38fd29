import type { Citation, RetrievedChunk, ScoredChunk, SearchFilter } from "./types";
import type { Embedder } from "./embeddings";
import type { VectorIndex } from "./store";
import { EmbeddingServiceError, PolicyQaError, withTimeout } from "./errors";

export const DEFAULT_TOP_K = 7;
export const MAX_CITATIONS = 3;
export const SNIPPET_CHARS = 200;

export type RetrieveOptions = {
  top_k?: number;
  filter?: SearchFilter;
};

export type RetrieverConfig = {
  embedder: Embedder;
  index: VectorIndex;
  embedTimeoutMs?: number;
  // Candidates fetched per requested result, before deduplication.
  overfetch?: number;
};

function windowsOverlap(a: ScoredChunk, b: ScoredChunk) {
  return (
    a.chunk.document_id === b.chunk.document_id &&
    a.chunk.start_offset < b.chunk.end_offset &&
    b.chunk.start_offset < a.chunk.end_offset
  );
}

/**
 * Keep the best-scoring instance among chunks of the same document whose text
 * windows overlap. Input must already be ranked.
 */
export function dedupeOverlapping(ranked: ScoredChunk[]): ScoredChunk[] {
  const kept: ScoredChunk[] = [];
  for (const candidate of ranked) {
    if (kept.some((existing) => windowsOverlap(existing, candidate))) continue;
    kept.push(candidate);
  }
  return kept;
}

export function truncateSnippet(text: string, maxChars = SNIPPET_CHARS): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  if (collapsed.length <= maxChars) return collapsed;
  const window = collapsed.slice(0, maxChars);
  const endsOnBoundary = collapsed[maxChars] === " ";
  const lastSpace = window.lastIndexOf(" ");
  // Hard cut only when the window is a single word.
  const cut = endsOnBoundary || lastSpace <= 0 ? window : window.slice(0, lastSpace);
  return `${cut.trimEnd()}...`;
}

export function formatContext(retrieved: RetrievedChunk[]): string {
  return retrieved
    .map(
      ({ chunk }) =>
        `[DOC: ${chunk.filename} | page: ${chunk.page_number} | paragraph: ${chunk.sequence_index}]\n${chunk.text}\n`
    )
    .join("\n");
}

export function getCitations(retrieved: RetrievedChunk[]): Citation[] {
  return retrieved.slice(0, MAX_CITATIONS).map(({ chunk, similarity_score }) => ({
    document_id: chunk.document_id,
    chunk_id: chunk.chunk_id,
    filename: chunk.filename,
    page_number: chunk.page_number,
    text_snippet: truncateSnippet(chunk.text),
    similarity_score,
  }));
}

export class Retriever {
  private embedder: Embedder;
  private index: VectorIndex;
  private embedTimeoutMs: number;
  private overfetch: number;

  constructor(config: RetrieverConfig) {
    this.embedder = config.embedder;
    this.index = config.index;
    this.embedTimeoutMs = config.embedTimeoutMs ?? 15_000;
    this.overfetch = config.overfetch ?? 2;
  }

  async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievedChunk[]> {
    const topK = options.top_k ?? DEFAULT_TOP_K;
    if (!query.trim() || topK <= 0) return [];

    const vector = await this.embedQuery(query);
    const candidates = await this.index.search(vector, topK * this.overfetch, options.filter);
    return dedupeOverlapping(candidates)
      .slice(0, topK)
      .map((scored, i) => ({ ...scored, rank: i + 1 }));
  }

  private async embedQuery(query: string) {
    try {
      return await withTimeout(
        this.embedder.embedOne(query),
        this.embedTimeoutMs,
        () =>
          new EmbeddingServiceError({
            stage: "retrieve",
            reason: `Query embedding timed out after ${this.embedTimeoutMs}ms`,
            context: { query },
            timed_out: true,
          })
      );
    } catch (error) {
      if (error instanceof PolicyQaError) throw error;
      throw new EmbeddingServiceError({
        stage: "retrieve",
        reason: "Query embedding failed",
        context: { query },
        cause: error,
      });
    }
  }
}
