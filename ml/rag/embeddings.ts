import OpenAI from "openai";
import type { CreateEmbeddingResponse } from "openai/resources/embeddings";
import crypto from "node:crypto";
import type { EmbeddingVector } from "./types";
import { EmbeddingServiceError } from "./errors";

export interface Embedder {
  readonly model: string;
  readonly dimension: number;
  embed(texts: string[]): Promise<EmbeddingVector[]>;
  embedOne(text: string): Promise<EmbeddingVector>;
}

const WORD = /[\p{L}\p{N}%]+/gu;

function bucketFor(feature: string, dimension: number): { index: number; sign: number } {
  const hash = crypto.createHash("sha256").update(feature).digest();
  return {
    index: hash.readUInt32BE(0) % dimension,
    sign: (hash[4] & 1) === 0 ? 1 : -1,
  };
}

function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  if (norm === 0) return vector;
  return vector.map((value) => value / norm);
}

/**
 * Offline embedder: signed feature hashing of lowercase words and word bigrams.
 * Identical text always maps to an identical vector, and texts sharing vocabulary
 * land close together under cosine similarity.
 */
export class LocalHashEmbedder implements Embedder {
  readonly model: string;
  readonly dimension: number;

  constructor(dimension = 256) {
    this.dimension = dimension;
    this.model = `local-hash-${dimension}`;
  }

  vectorize(text: string): EmbeddingVector {
    const vector = new Array<number>(this.dimension).fill(0);
    const words = text.toLowerCase().match(WORD) ?? [];
    const features = [...words, ...words.slice(1).map((word, i) => `${words[i]} ${word}`)];
    for (const feature of features) {
      const { index, sign } = bucketFor(feature, this.dimension);
      vector[index] += sign;
    }
    return l2Normalize(vector);
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    return texts.map((text) => this.vectorize(text));
  }

  async embedOne(text: string): Promise<EmbeddingVector> {
    return this.vectorize(text);
  }
}

export type OpenAIEmbedderConfig = {
  apiKey: string;
  model?: string;
  batchSize?: number;
  timeoutMs?: number;
  client?: OpenAI;
};

function resolveEmbeddingDim(model: string) {
  if (model === "text-embedding-3-small") return 1536;
  if (model === "text-embedding-3-large") return 3072;
  if (model === "text-embedding-ada-002") return 1536;
  return 1536;
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  readonly dimension: number;
  private client: OpenAI;
  private batchSize: number;

  constructor(config: OpenAIEmbedderConfig) {
    this.model = config.model ?? "text-embedding-3-small";
    this.dimension = resolveEmbeddingDim(this.model);
    this.batchSize = config.batchSize ?? 100;
    this.client =
      config.client ?? new OpenAI({ apiKey: config.apiKey, maxRetries: 0, timeout: config.timeoutMs });
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];
    const vectors: EmbeddingVector[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      let response: CreateEmbeddingResponse;
      try {
        response = await this.client.embeddings.create({ model: this.model, input: batch });
      } catch (error) {
        throw new EmbeddingServiceError({
          stage: "embed",
          reason: `Embedding request failed for batch starting at ${i}`,
          cause: error,
        });
      }
      if (response.data.length !== batch.length) {
        throw new EmbeddingServiceError({
          stage: "embed",
          reason: `Embedding response length mismatch: expected ${batch.length}, got ${response.data.length}`,
        });
      }
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      for (const item of ordered) {
        if (item.embedding.length !== this.dimension) {
          throw new EmbeddingServiceError({
            stage: "embed",
            reason: `Embedding dimension ${item.embedding.length} does not match ${this.dimension}`,
          });
        }
        vectors.push(item.embedding);
      }
    }
    return vectors;
  }

  async embedOne(text: string): Promise<EmbeddingVector> {
    const [vector] = await this.embed([text]);
    if (!vector) {
      throw new EmbeddingServiceError({ stage: "embed", reason: "Embedding response was empty" });
    }
    return vector;
  }
}

export function createEmbedder(config: {
  embed_mode: "local" | "openai";
  embed_dim: number;
  embed_batch_size: number;
  openai_api_key?: string;
  openai_embed_model: string;
  embed_timeout_ms: number;
}): Embedder {
  if (config.embed_mode === "openai") {
    if (!config.openai_api_key) {
      throw new EmbeddingServiceError({
        stage: "embed",
        reason: "EMBED_MODE=openai requires OPENAI_API_KEY",
      });
    }
    return new OpenAIEmbedder({
      apiKey: config.openai_api_key,
      model: config.openai_embed_model,
      batchSize: config.embed_batch_size,
      timeoutMs: config.embed_timeout_ms,
    });
  }
  return new LocalHashEmbedder(config.embed_dim);
}
