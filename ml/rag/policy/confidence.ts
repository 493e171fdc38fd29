export const LOW_CONFIDENCE_THRESHOLD = 0.5;

export const CONFIDENCE_WEIGHTS = {
  retrieval_floor: 0.5,
  flags: 0.3,
  citations: 0.2,
} as const;

export type ConfidenceInputs = {
  similarity_scores: number[];
  has_ambiguity: boolean;
  has_contradictions: boolean;
  citation_count: number;
};

function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

export function retrievalStrength(similarityScores: number[]): number {
  const top = [...similarityScores].sort((a, b) => b - a).slice(0, 3);
  if (top.length === 0) return 0;
  return clamp(top.reduce((sum, score) => sum + score, 0) / top.length, 0, 1);
}

// Retrieval strength scaled by answer quality signals; 0 when nothing was retrieved.
export function computeConfidence(inputs: ConfidenceInputs): number {
  const retrieval = retrievalStrength(inputs.similarity_scores);
  const flags = 1 - 0.5 * Number(inputs.has_ambiguity) - 0.5 * Number(inputs.has_contradictions);
  const citations = Math.min(Math.max(inputs.citation_count, 0), 3) / 3;
  const quality =
    CONFIDENCE_WEIGHTS.retrieval_floor + CONFIDENCE_WEIGHTS.flags * flags + CONFIDENCE_WEIGHTS.citations * citations;
  return Math.round(clamp(retrieval * quality, 0, 1) * 100) / 100;
}
