import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import type { Chunk, DocumentSummary, EmbeddingVector, IndexStats, ScoredChunk, SearchFilter } from "./types";
import { ChunkingError, IndexDimensionError, IndexUnavailableError, PolicyQaError } from "./errors";

export interface VectorIndex {
  readonly dimension: number;
  // Resolves true when an earlier copy of the document was replaced.
  upsert(documentId: string, chunks: Chunk[], vectors: EmbeddingVector[]): Promise<boolean>;
  search(vector: EmbeddingVector, topK: number, filter?: SearchFilter): Promise<ScoredChunk[]>;
  delete(documentId: string): Promise<boolean>;
  hasDocument(documentId: string): Promise<boolean>;
  listDocuments(): Promise<DocumentSummary[]>;
  stats(): Promise<IndexStats>;
  close(): void;
}

export type SqliteVectorIndexConfig = {
  dbPath: string;
  dimension: number;
};

type ChunkRow = {
  chunk_id: string;
  document_id: string;
  filename: string;
  document_type: string;
  sequence_index: number;
  text: string;
  token_count: number;
  char_count: number;
  page_number: number;
  start_offset: number;
  end_offset: number;
  embedding: Buffer;
};

export function cosineSimilarity(a: number[], b: number[]) {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  if (b.similarity_score !== a.similarity_score) return b.similarity_score - a.similarity_score;
  if (a.chunk.sequence_index !== b.chunk.sequence_index) return a.chunk.sequence_index - b.chunk.sequence_index;
  if (a.chunk.document_id < b.chunk.document_id) return -1;
  if (a.chunk.document_id > b.chunk.document_id) return 1;
  return 0;
}

function encodeVector(vector: EmbeddingVector): Buffer {
  const buffer = Buffer.alloc(vector.length * 8);
  vector.forEach((value, i) => buffer.writeDoubleLE(value, i * 8));
  return buffer;
}

function decodeVector(buffer: Buffer): EmbeddingVector {
  const vector: number[] = [];
  for (let offset = 0; offset + 8 <= buffer.length; offset += 8) {
    vector.push(buffer.readDoubleLE(offset));
  }
  return vector;
}

function toChunk(row: ChunkRow): Chunk {
  return {
    chunk_id: row.chunk_id,
    document_id: row.document_id,
    filename: row.filename,
    document_type: row.document_type,
    text: row.text,
    token_count: row.token_count,
    char_count: row.char_count,
    page_number: row.page_number,
    sequence_index: row.sequence_index,
    start_offset: row.start_offset,
    end_offset: row.end_offset,
  };
}

function unavailable(stage: string, error: unknown, context: IndexUnavailableError["context"] = {}) {
  if (error instanceof PolicyQaError) return error;
  return new IndexUnavailableError({
    stage,
    reason: `Vector index ${stage} failed: ${error instanceof Error ? error.message : String(error)}`,
    context,
    cause: error,
  });
}

function openDb(dbPath: string): Database.Database {
  try {
    return initDb(dbPath);
  } catch (error) {
    throw unavailable("open", error, { db_path: dbPath });
  }
}

function initDb(dbPath: string) {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.exec(`
    CREATE TABLE IF NOT EXISTS rag_meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS rag_documents (
      document_id TEXT PRIMARY KEY,
      filename TEXT NOT NULL,
      document_type TEXT NOT NULL,
      chunk_count INTEGER NOT NULL,
      indexed_at TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS rag_chunks (
      chunk_id TEXT PRIMARY KEY,
      document_id TEXT NOT NULL REFERENCES rag_documents(document_id) ON DELETE CASCADE,
      sequence_index INTEGER NOT NULL,
      text TEXT NOT NULL,
      token_count INTEGER NOT NULL,
      char_count INTEGER NOT NULL,
      page_number INTEGER NOT NULL,
      start_offset INTEGER NOT NULL,
      end_offset INTEGER NOT NULL,
      embedding BLOB NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_rag_chunks_document ON rag_chunks(document_id);
    CREATE INDEX IF NOT EXISTS idx_rag_documents_filename ON rag_documents(filename);
  `);
  return db;
}

/**
 * Exact cosine-similarity index on SQLite.
 *
 * A document's chunks are written in one transaction, so readers see either every
 * chunk of a document or none of them. The vector dimension is pinned in rag_meta
 * on first open.
 */
export class SqliteVectorIndex implements VectorIndex {
  readonly dimension: number;
  private db: Database.Database;

  constructor(config: SqliteVectorIndexConfig) {
    this.dimension = config.dimension;
    this.db = openDb(config.dbPath);

    const stored = this.db
      .prepare<[string], { value: string }>("SELECT value FROM rag_meta WHERE key = ?")
      .get("dimension");
    if (!stored) {
      this.db.prepare("INSERT INTO rag_meta (key, value) VALUES (?, ?)").run("dimension", String(config.dimension));
    } else if (Number(stored.value) !== config.dimension) {
      this.db.close();
      throw new IndexDimensionError({
        stage: "open",
        reason: `Index at ${config.dbPath} holds ${stored.value}-d vectors; embedder produces ${config.dimension}-d`,
        context: { db_path: config.dbPath },
      });
    }
  }

  async upsert(documentId: string, chunks: Chunk[], vectors: EmbeddingVector[]): Promise<boolean> {
    if (chunks.length === 0) {
      throw new ChunkingError({
        stage: "index",
        reason: "Refusing to index a document without chunks",
        context: { document_id: documentId },
      });
    }
    if (chunks.length !== vectors.length) {
      throw new IndexUnavailableError({
        stage: "index",
        reason: `Got ${chunks.length} chunks but ${vectors.length} vectors`,
        context: { document_id: documentId },
      });
    }
    chunks.forEach((chunk, i) => {
      if (chunk.document_id !== documentId) {
        throw new IndexUnavailableError({
          stage: "index",
          reason: `Chunk ${chunk.chunk_id} belongs to ${chunk.document_id}, not ${documentId}`,
          context: { document_id: documentId },
        });
      }
      if (vectors[i].length !== this.dimension) {
        throw new IndexDimensionError({
          stage: "index",
          reason: `Vector for ${chunk.chunk_id} has dimension ${vectors[i].length}; index requires ${this.dimension}`,
          context: { document_id: documentId },
        });
      }
    });

    const first = chunks[0];
    try {
      const write = this.db.transaction(() => {
        this.db.prepare("DELETE FROM rag_chunks WHERE document_id = ?").run(documentId);
        const removed = this.db.prepare("DELETE FROM rag_documents WHERE document_id = ?").run(documentId);
        const replaced = removed.changes > 0;
        this.db
          .prepare(
            `INSERT INTO rag_documents (document_id, filename, document_type, chunk_count, indexed_at)
             VALUES (?, ?, ?, ?, ?)`
          )
          .run(documentId, first.filename, first.document_type, chunks.length, new Date().toISOString());
        const insertChunk = this.db.prepare(
          `INSERT INTO rag_chunks (chunk_id, document_id, sequence_index, text, token_count, char_count,
             page_number, start_offset, end_offset, embedding)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        );
        chunks.forEach((chunk, i) => {
          insertChunk.run(
            chunk.chunk_id,
            documentId,
            chunk.sequence_index,
            chunk.text,
            chunk.token_count,
            chunk.char_count,
            chunk.page_number,
            chunk.start_offset,
            chunk.end_offset,
            encodeVector(vectors[i])
          );
        });
        return replaced;
      });
      return write();
    } catch (error) {
      throw unavailable("index", error, { document_id: documentId });
    }
  }

  async search(vector: EmbeddingVector, topK: number, filter: SearchFilter = {}): Promise<ScoredChunk[]> {
    if (vector.length !== this.dimension) {
      throw new IndexDimensionError({
        stage: "search",
        reason: `Query vector has dimension ${vector.length}; index requires ${this.dimension}`,
      });
    }
    if (topK <= 0) return [];

    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.filename) {
      clauses.push("d.filename = ?");
      params.push(filter.filename);
    }
    if (filter.document_type) {
      clauses.push("d.document_type = ?");
      params.push(filter.document_type);
    }

    let rows: ChunkRow[];
    try {
      rows = this.db
        .prepare<string[], ChunkRow>(
          `SELECT c.chunk_id, c.document_id, d.filename, d.document_type, c.sequence_index, c.text,
                  c.token_count, c.char_count, c.page_number, c.start_offset, c.end_offset, c.embedding
           FROM rag_chunks c JOIN rag_documents d ON d.document_id = c.document_id
           ${clauses.length ? `WHERE ${clauses.join(" AND ")}` : ""}`
        )
        .all(...params);
    } catch (error) {
      throw unavailable("search", error);
    }

    return rows
      .map((row) => ({
        chunk: toChunk(row),
        similarity_score: cosineSimilarity(vector, decodeVector(row.embedding)),
      }))
      .sort(compareScored)
      .slice(0, topK);
  }

  async delete(documentId: string): Promise<boolean> {
    try {
      const remove = this.db.transaction(() => {
        this.db.prepare("DELETE FROM rag_chunks WHERE document_id = ?").run(documentId);
        return this.db.prepare("DELETE FROM rag_documents WHERE document_id = ?").run(documentId).changes;
      });
      return remove() > 0;
    } catch (error) {
      throw unavailable("delete", error, { document_id: documentId });
    }
  }

  async hasDocument(documentId: string): Promise<boolean> {
    try {
      const row = this.db
        .prepare<[string], { document_id: string }>("SELECT document_id FROM rag_documents WHERE document_id = ?")
        .get(documentId);
      return row !== undefined;
    } catch (error) {
      throw unavailable("lookup", error, { document_id: documentId });
    }
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    try {
      return this.db
        .prepare<[], DocumentSummary>(
          `SELECT document_id, filename, document_type, chunk_count, indexed_at
           FROM rag_documents ORDER BY filename, document_id`
        )
        .all();
    } catch (error) {
      throw unavailable("list", error);
    }
  }

  async stats(): Promise<IndexStats> {
    try {
      const documents = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM rag_documents").get();
      const chunks = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM rag_chunks").get();
      return {
        document_count: documents?.n ?? 0,
        chunk_count: chunks?.n ?? 0,
        dimension: this.dimension,
      };
    } catch (error) {
      throw unavailable("stats", error);
    }
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
