export type * from "./types";
export type { IngestInput, IngestResult, IngestState, QueryOptions, QueryResult, QueryState, Transition } from "./pipeline";
export type { IngestJob } from "./ingest_queue";
export { PolicyQaPipeline, createPolicyQaPipeline } from "./pipeline";
export { IngestQueue } from "./ingest_queue";
export { chunkDocument, normalizeDocumentText } from "./chunker";
export { LocalHashEmbedder, OpenAIEmbedder, createEmbedder } from "./embeddings";
export { SqliteVectorIndex } from "./store";
export { Retriever, formatContext, getCitations } from "./retrieve";
export { AnswerSynthesizer, parseAnswerSections } from "./answer";
export { ExtractiveGenerationService, OpenAIGenerationService, createGenerationService } from "./generation";
export { PolicyChecker } from "./policy/policy_checker";
export { LlmContradictionChecker, RuleBasedContradictionChecker } from "./policy/contradictions";
export { PlainTextExtractor } from "./extract";
export * from "./errors";
