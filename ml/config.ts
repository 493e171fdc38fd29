import path from "node:path";
import { z } from "zod";

const BooleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => value === true || value === "1" || value === "true");

const ConfigSchema = z
  .object({
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
    OPENAI_EMBED_MODEL: z.string().min(1).default("text-embedding-3-small"),
    EMBED_MODE: z.enum(["local", "openai"]).optional(),
    EMBED_DIM: z.coerce.number().int().min(8).max(4096).default(256),
    EMBED_BATCH_SIZE: z.coerce.number().int().min(1).max(2048).default(100),
    GENERATION_MODE: z.enum(["extractive", "openai"]).optional(),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    LLM_MAX_TOKENS: z.coerce.number().int().min(16).default(2000),
    CHUNK_SIZE: z.coerce.number().int().min(1).default(512),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(128),
    TOP_K: z.coerce.number().int().min(1).max(100).default(7),
    RAG_DB_PATH: z.string().min(1).optional(),
    AUDIT_LOG_DIR: z.string().min(1).optional(),
    EMBED_TIMEOUT_MS: z.coerce.number().int().min(1).default(15_000),
    GENERATION_TIMEOUT_MS: z.coerce.number().int().min(1).default(60_000),
    INGEST_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(2),
    AMBIGUITY_DENSITY_THRESHOLD: z.coerce.number().min(0).default(0.2),
    CONTRADICTION_MODE: z.enum(["rules", "llm"]).default("rules"),
    DELETE_STRICT: BooleanFlagSchema.default(false),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .refine((value) => value.CHUNK_OVERLAP < value.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  });

export type LogLevel = "debug" | "info" | "warn" | "error";

export type PolicyQaConfig = {
  openai_api_key?: string;
  openai_model: string;
  openai_embed_model: string;
  embed_mode: "local" | "openai";
  embed_dim: number;
  embed_batch_size: number;
  generation_mode: "extractive" | "openai";
  llm_temperature: number;
  llm_max_tokens: number;
  chunk_size: number;
  chunk_overlap: number;
  top_k: number;
  db_path: string;
  audit_log_dir: string;
  embed_timeout_ms: number;
  generation_timeout_ms: number;
  ingest_concurrency: number;
  ambiguity_density_threshold: number;
  contradiction_mode: "rules" | "llm";
  delete_strict: boolean;
  log_level: LogLevel;
};

/**
 * Resolve settings from the environment.
 *
 * Backends fall back to the offline implementations (hash embeddings, extractive
 * answers) whenever no OPENAI_API_KEY is present and no mode is forced.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<PolicyQaConfig> {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid policy-qa configuration: ${issues.join("; ")}`);
  }
  const value = parsed.data;
  const apiKey = value.OPENAI_API_KEY?.trim() ? value.OPENAI_API_KEY.trim() : undefined;

  return Object.freeze({
    openai_api_key: apiKey,
    openai_model: value.OPENAI_MODEL,
    openai_embed_model: value.OPENAI_EMBED_MODEL,
    embed_mode: value.EMBED_MODE ?? (apiKey ? "openai" : "local"),
    embed_dim: value.EMBED_DIM,
    embed_batch_size: value.EMBED_BATCH_SIZE,
    generation_mode: value.GENERATION_MODE ?? (apiKey ? "openai" : "extractive"),
    llm_temperature: value.LLM_TEMPERATURE,
    llm_max_tokens: value.LLM_MAX_TOKENS,
    chunk_size: value.CHUNK_SIZE,
    chunk_overlap: value.CHUNK_OVERLAP,
    top_k: value.TOP_K,
    db_path: value.RAG_DB_PATH ?? path.join(process.cwd(), "ml", "rag", "data", "policy_index.db"),
    audit_log_dir: value.AUDIT_LOG_DIR ?? path.join(process.cwd(), "ml", "logs"),
    embed_timeout_ms: value.EMBED_TIMEOUT_MS,
    generation_timeout_ms: value.GENERATION_TIMEOUT_MS,
    ingest_concurrency: value.INGEST_CONCURRENCY,
    ambiguity_density_threshold: value.AMBIGUITY_DENSITY_THRESHOLD,
    contradiction_mode: value.CONTRADICTION_MODE,
    delete_strict: value.DELETE_STRICT,
    log_level: value.LOG_LEVEL,
  });
}
