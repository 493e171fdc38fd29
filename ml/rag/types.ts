export type PolicyDocument = {
  document_id: string;
  filename: string;
  document_type: string;
  raw_text: string;
  // Start offset of each page in raw_text, non-decreasing.
  page_map: number[];
};

export type Chunk = {
  chunk_id: string;
  document_id: string;
  filename: string;
  document_type: string;
  text: string;
  token_count: number;
  char_count: number;
  page_number: number;
  sequence_index: number;
  start_offset: number;
  end_offset: number;
};

export type EmbeddingVector = number[];

export type ScoredChunk = {
  chunk: Chunk;
  similarity_score: number;
};

export type RetrievedChunk = ScoredChunk & {
  rank: number;
};

export type Citation = {
  document_id: string;
  chunk_id: string;
  filename: string;
  page_number: number;
  text_snippet: string;
  similarity_score: number;
};

export type AnswerResult = {
  answer: string;
  summary: string;
  detailed_answer: string;
  followup_questions: string[];
  model: string;
  tokens_used: number;
};

export type ModalClass = "obligatory" | "permissive" | "recommendatory" | "none";

export type ContradictionFinding = {
  source_a: { document_id: string; filename: string; page_number: number };
  source_b: { document_id: string; filename: string; page_number: number };
  topic: string;
  explanation: string;
  detected_by: "rules" | "llm";
};

export type PolicyChecks = {
  ambiguity: { has_ambiguity: boolean; phrases: string[]; count: number; density: number } | null;
  modal_verbs: { classification: ModalClass; counts: Record<Exclude<ModalClass, "none">, number> } | null;
  contradictions: { has_contradictions: boolean; findings: ContradictionFinding[]; source_count: number } | null;
  legal_advice: { is_legal_advice: boolean; terms_in_answer: string[]; terms_in_query: string[] } | null;
};

export type PolicyCheckName = keyof PolicyChecks;

export type PolicyCheckResult = {
  confidence_score: number;
  warnings: string[];
  recommendations: string[];
  checks: PolicyChecks;
  degraded_checks: PolicyCheckName[];
};

export type DocumentSummary = {
  document_id: string;
  filename: string;
  document_type: string;
  chunk_count: number;
  indexed_at: string;
};

export type SearchFilter = {
  filename?: string;
  document_type?: string;
};

export type IndexStats = {
  document_count: number;
  chunk_count: number;
  dimension: number;
};
