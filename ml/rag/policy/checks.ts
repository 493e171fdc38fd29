import type { ModalClass, PolicyChecks } from "../types";
import { LEXICON, countPhrase, splitSentences } from "./lexicon";

export const DEFAULT_AMBIGUITY_DENSITY_THRESHOLD = 0.2;

type AmbiguityCheck = NonNullable<PolicyChecks["ambiguity"]>;
type ModalCheck = NonNullable<PolicyChecks["modal_verbs"]>;
type LegalAdviceCheck = NonNullable<PolicyChecks["legal_advice"]>;

/**
 * Hedging density is matches per sentence. A single "it depends" in a long answer
 * stays under the threshold; the same phrase in a one-line answer does not.
 */
export function checkAmbiguity(answer: string, threshold = DEFAULT_AMBIGUITY_DENSITY_THRESHOLD): AmbiguityCheck {
  const phrases: string[] = [];
  let count = 0;
  for (const phrase of LEXICON.hedging_phrases) {
    const matches = countPhrase(answer, phrase);
    if (matches > 0) {
      phrases.push(phrase);
      count += matches;
    }
  }
  const sentences = Math.max(1, splitSentences(answer).length);
  const density = count / sentences;
  return {
    has_ambiguity: count > 0 && density >= threshold,
    phrases,
    count,
    density: Math.round(density * 1000) / 1000,
  };
}

// Tie order when two classes have the same count.
const MODAL_PRECEDENCE = ["obligatory", "recommendatory", "permissive"] as const;

export function analyzeModalVerbs(answer: string): ModalCheck {
  const counts = { obligatory: 0, permissive: 0, recommendatory: 0 };
  for (const modalClass of MODAL_PRECEDENCE) {
    counts[modalClass] = LEXICON.modal_verbs[modalClass].reduce((sum, verb) => sum + countPhrase(answer, verb), 0);
  }

  let classification: ModalClass = "none";
  let best = 0;
  for (const modalClass of MODAL_PRECEDENCE) {
    if (counts[modalClass] > best) {
      best = counts[modalClass];
      classification = modalClass;
    }
  }
  return { classification, counts };
}

export function modalRecommendation(check: ModalCheck): string | null {
  switch (check.classification) {
    case "permissive":
      return "This is optional, not mandatory. Confirm the conditions with the responsible office.";
    case "recommendatory":
      return "This is recommended, not strictly required.";
    case "obligatory":
      return check.counts.permissive > 0
        ? "The policy mixes mandatory and optional requirements. Check which conditions apply to you."
        : null;
    default:
      return null;
  }
}

export function checkLegalAdvice(answer: string, query: string): LegalAdviceCheck {
  const termsIn = (text: string) => LEXICON.legal_indicators.filter((term) => countPhrase(text, term) > 0);
  const termsInAnswer = termsIn(answer);
  return {
    is_legal_advice: termsInAnswer.length > 0,
    terms_in_answer: termsInAnswer,
    terms_in_query: termsIn(query),
  };
}
