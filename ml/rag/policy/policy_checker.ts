import type {
  Citation,
  ContradictionFinding,
  PolicyCheckName,
  PolicyCheckResult,
  PolicyChecks,
  RetrievedChunk,
} from "../types";
import type { Logger } from "../../logging/logger";
import { createLogger, serializeError } from "../../logging/logger";
import type { ContradictionChecker } from "./contradictions";
import { RuleBasedContradictionChecker } from "./contradictions";
import { isDecline } from "../answer";
import { DEFAULT_AMBIGUITY_DENSITY_THRESHOLD, analyzeModalVerbs, checkAmbiguity, checkLegalAdvice, modalRecommendation } from "./checks";
import { LOW_CONFIDENCE_THRESHOLD, computeConfidence } from "./confidence";

export const NO_DOCUMENTS_WARNING = "No relevant documents found.";
export const LOW_CONFIDENCE_WARNING = "Low confidence answer. Please verify with the official university office.";
export const AMBIGUITY_WARNING = "This answer contains ambiguous language. Consider consulting official sources.";
export const LEGAL_WARNING = "This topic may involve legal matters.";
export const LEGAL_RECOMMENDATION = "Consult the university legal services office for legal matters.";
export const CHECK_UNAVAILABLE_WARNING = "Policy check unavailable. Verify this answer with the official office.";

export type PolicyCheckInput = {
  query: string;
  answer: string;
  retrieved: RetrievedChunk[];
  citations: Citation[];
};

export type PolicyCheckerConfig = {
  contradictionChecker?: ContradictionChecker;
  ambiguityThreshold?: number;
  logger?: Logger;
};

export function contradictionWarning(finding: ContradictionFinding): string {
  const { source_a: a, source_b: b } = finding;
  const topic = finding.topic ? ` on "${finding.topic}"` : "";
  return `Potential contradiction between ${a.filename} (page ${a.page_number}) and ${b.filename} (page ${b.page_number})${topic}.`;
}

export function unavailablePolicyResult(): PolicyCheckResult {
  return {
    confidence_score: 0,
    warnings: [CHECK_UNAVAILABLE_WARNING],
    recommendations: [],
    checks: { ambiguity: null, modal_verbs: null, contradictions: null, legal_advice: null },
    degraded_checks: ["ambiguity", "modal_verbs", "contradictions", "legal_advice"],
  };
}

export class PolicyChecker {
  private contradictionChecker: ContradictionChecker;
  private ambiguityThreshold: number;
  private logger: Logger;

  constructor(config: PolicyCheckerConfig = {}) {
    this.contradictionChecker = config.contradictionChecker ?? new RuleBasedContradictionChecker();
    this.ambiguityThreshold = config.ambiguityThreshold ?? DEFAULT_AMBIGUITY_DENSITY_THRESHOLD;
    this.logger = config.logger ?? createLogger("rag.policy");
  }

  /** Never rejects: a failing sub-check is logged and reported in degraded_checks. */
  async checkPolicy(input: PolicyCheckInput): Promise<PolicyCheckResult> {
    const degraded: PolicyCheckName[] = [];
    const guard = async <T>(name: PolicyCheckName, run: () => T | Promise<T>): Promise<T | null> => {
      try {
        return await run();
      } catch (error) {
        this.logger.warn("policy sub-check failed", { check: name, error: serializeError(error) });
        degraded.push(name);
        return null;
      }
    };

    const chunks = input.retrieved.map((retrieved) => retrieved.chunk);
    const sourceCount = new Set(chunks.map((chunk) => chunk.document_id)).size;

    const checks: PolicyChecks = {
      // A decline is not hedging, even though it points the reader elsewhere.
      ambiguity: await guard("ambiguity", () =>
        checkAmbiguity(isDecline(input.answer) ? "" : input.answer, this.ambiguityThreshold)
      ),
      modal_verbs: await guard("modal_verbs", () => analyzeModalVerbs(input.answer)),
      contradictions: await guard("contradictions", async () => {
        const findings = await this.contradictionChecker.checkContradictions(chunks, input.answer);
        return { has_contradictions: findings.length > 0, findings, source_count: sourceCount };
      }),
      legal_advice: await guard("legal_advice", () => checkLegalAdvice(input.answer, input.query)),
    };

    const confidence = computeConfidence({
      similarity_scores: input.retrieved.map((retrieved) => retrieved.similarity_score),
      has_ambiguity: checks.ambiguity?.has_ambiguity ?? false,
      has_contradictions: checks.contradictions?.has_contradictions ?? false,
      citation_count: input.citations.length,
    });

    const warnings: string[] = [];
    const recommendations: string[] = [];

    if (checks.ambiguity?.has_ambiguity) {
      warnings.push(AMBIGUITY_WARNING);
      recommendations.push("Contact the relevant university department for clarification.");
    }
    for (const finding of checks.contradictions?.findings ?? []) {
      warnings.push(contradictionWarning(finding));
    }
    if (checks.legal_advice?.is_legal_advice) {
      warnings.push(LEGAL_WARNING);
      recommendations.push(LEGAL_RECOMMENDATION);
    }
    if (input.retrieved.length === 0) {
      warnings.push(NO_DOCUMENTS_WARNING);
    } else if (confidence < LOW_CONFIDENCE_THRESHOLD) {
      warnings.push(LOW_CONFIDENCE_WARNING);
    }

    const modal = checks.modal_verbs ? modalRecommendation(checks.modal_verbs) : null;
    if (modal) recommendations.push(modal);
    if (sourceCount > 1) {
      recommendations.push(
        `This answer draws on ${sourceCount} different policy documents. Review all sources for complete information.`
      );
    }

    return {
      confidence_score: confidence,
      warnings,
      recommendations,
      checks,
      degraded_checks: degraded,
    };
  }
}
