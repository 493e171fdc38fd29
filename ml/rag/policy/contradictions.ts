import type { Chunk, ContradictionFinding } from "../types";
import type { GenerationService } from "../generation";
import { GenerationServiceError, PolicyQaError, withTimeout } from "../errors";
import { buildContradictionPrompt } from "../prompts";
import { contentTerms, isNegation, splitSentences, stem, words } from "./lexicon";

export interface ContradictionChecker {
  readonly mode: ContradictionFinding["detected_by"];
  checkContradictions(chunks: Chunk[], answer?: string): Promise<ContradictionFinding[]>;
}

const MIN_SHARED_TERMS = 2;
const QUANTITY = /(\d+(?:\.\d+)?)\s*(%|percent\b|[a-z]+)/gi;

type Statement = {
  chunk: Chunk;
  sentence: string;
  terms: Set<string>;
  negated: boolean;
  quantities: Map<string, string>;
};

function quantitiesOf(sentence: string): Map<string, string> {
  const found = new Map<string, string>();
  for (const match of sentence.matchAll(QUANTITY)) {
    const unit = match[2].toLowerCase() === "percent" ? "%" : match[2].toLowerCase();
    if (!found.has(unit)) found.set(unit, match[1]);
  }
  return found;
}

function toStatements(chunk: Chunk): Statement[] {
  return splitSentences(chunk.text).map((sentence) => ({
    chunk,
    sentence,
    terms: contentTerms(sentence),
    negated: words(sentence).some(isNegation),
    quantities: quantitiesOf(sentence),
  }));
}

function sharedTerms(a: Statement, b: Statement): Set<string> {
  return new Set([...a.terms].filter((term) => b.terms.has(term)));
}

function conflictingQuantity(a: Statement, b: Statement): string | null {
  for (const [unit, value] of a.quantities) {
    const other = b.quantities.get(unit);
    if (other !== undefined && Number(other) !== Number(value)) return unit;
  }
  return null;
}

// Surface words of the sentence whose stems are shared, in reading order.
function topicOf(statement: Statement, shared: Set<string>): string {
  const seen = new Set<string>();
  const picked: string[] = [];
  for (const word of words(statement.sentence)) {
    const term = stem(word);
    if (!shared.has(term) || seen.has(term)) continue;
    seen.add(term);
    picked.push(word);
  }
  return picked.join(" ");
}

function sourceOf(chunk: Chunk): ContradictionFinding["source_a"] {
  return { document_id: chunk.document_id, filename: chunk.filename, page_number: chunk.page_number };
}

/**
 * Flags sentence pairs from different documents that talk about the same thing
 * (at least two shared content terms) but disagree: one is negated and the other
 * is not, or they give different numbers for the same unit. At most one finding
 * is reported per document pair.
 */
export class RuleBasedContradictionChecker implements ContradictionChecker {
  readonly mode = "rules" as const;

  async checkContradictions(chunks: Chunk[]): Promise<ContradictionFinding[]> {
    const byDocument = new Map<string, Statement[]>();
    for (const chunk of chunks) {
      const statements = byDocument.get(chunk.document_id) ?? [];
      statements.push(...toStatements(chunk));
      byDocument.set(chunk.document_id, statements);
    }

    const documents = [...byDocument.values()];
    const findings: ContradictionFinding[] = [];
    for (let i = 0; i < documents.length; i += 1) {
      for (let j = i + 1; j < documents.length; j += 1) {
        const finding = this.firstConflict(documents[i], documents[j]);
        if (finding) findings.push(finding);
      }
    }
    return findings;
  }

  private firstConflict(left: Statement[], right: Statement[]): ContradictionFinding | null {
    for (const a of left) {
      for (const b of right) {
        const shared = sharedTerms(a, b);
        if (shared.size < MIN_SHARED_TERMS) continue;

        let reason: string | null = null;
        if (a.negated !== b.negated) {
          reason = "one source negates what the other allows";
        } else {
          const unit = conflictingQuantity(a, b);
          if (unit) reason = `the sources give different values (${unit === "%" ? "percent" : unit})`;
        }
        if (!reason) continue;

        return {
          source_a: sourceOf(a.chunk),
          source_b: sourceOf(b.chunk),
          topic: topicOf(a, shared),
          explanation: `${a.chunk.filename} says "${a.sentence}" but ${b.chunk.filename} says "${b.sentence}"; ${reason}.`,
          detected_by: "rules",
        };
      }
    }
    return null;
  }
}

export type LlmContradictionCheckerConfig = {
  generation: GenerationService;
  timeoutMs?: number;
  maxSources?: number;
};

export function parseContradictionReply(text: string): { has_contradictions: boolean; explanation: string } {
  const verdict = /HAS_CONTRADICTIONS\s*:\s*\[?\s*(YES|NO)/i.exec(text);
  if (!verdict) {
    throw new GenerationServiceError({
      stage: "contradictions",
      reason: "Contradiction review reply has no HAS_CONTRADICTIONS line",
    });
  }
  const explanation = /EXPLANATION\s*:\s*(.*)/i.exec(text);
  return {
    has_contradictions: verdict[1].toUpperCase() === "YES",
    explanation: explanation ? explanation[1].trim() : "",
  };
}

export class LlmContradictionChecker implements ContradictionChecker {
  readonly mode = "llm" as const;
  private generation: GenerationService;
  private timeoutMs: number;
  private maxSources: number;

  constructor(config: LlmContradictionCheckerConfig) {
    this.generation = config.generation;
    this.timeoutMs = config.timeoutMs ?? 60_000;
    this.maxSources = config.maxSources ?? 5;
  }

  async checkContradictions(chunks: Chunk[], answer = ""): Promise<ContradictionFinding[]> {
    const distinct: Chunk[] = [];
    for (const chunk of chunks) {
      if (!distinct.some((seen) => seen.document_id === chunk.document_id)) distinct.push(chunk);
    }
    if (distinct.length < 2) return [];

    const sources = chunks.slice(0, this.maxSources);
    const prompt = buildContradictionPrompt(answer, sources);
    let reply: string;
    try {
      reply = await withTimeout(
        this.generation.generate({ prompt, temperature: 0.1, max_tokens: 300, purpose: "contradiction" }),
        this.timeoutMs,
        () =>
          new GenerationServiceError({
            stage: "contradictions",
            reason: `Contradiction review timed out after ${this.timeoutMs}ms`,
            timed_out: true,
          })
      );
    } catch (error) {
      if (error instanceof PolicyQaError) throw error;
      throw new GenerationServiceError({ stage: "contradictions", reason: "Contradiction review failed", cause: error });
    }

    const verdict = parseContradictionReply(reply);
    if (!verdict.has_contradictions) return [];
    return [
      {
        source_a: sourceOf(distinct[0]),
        source_b: sourceOf(distinct[1]),
        topic: "retrieved policy text",
        explanation: verdict.explanation || "The reviewer reported conflicting statements across sources.",
        detected_by: "llm",
      },
    ];
  }
}
