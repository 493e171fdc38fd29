import lexiconJson from "./lexicon.json";
import type { ModalClass } from "../types";

export type Lexicon = {
  hedging_phrases: string[];
  modal_verbs: Record<Exclude<ModalClass, "none">, string[]>;
  legal_indicators: string[];
  negations: string[];
  stopwords: string[];
};

export const LEXICON: Lexicon = lexiconJson;

const STOPWORDS = new Set(LEXICON.stopwords);
const NEGATIONS = new Set(LEXICON.negations);
const WORD = /[\p{L}\p{N}%'’]+/gu;
const SUFFIXES = ["ations", "ation", "ances", "ance", "ences", "ence", "ments", "ment", "ings", "ing", "ions", "ion", "ed", "s"];

export function words(text: string): string[] {
  return (text.toLowerCase().match(WORD) ?? []).map((word) => word.replace(/’/g, "'"));
}

export function stem(word: string): string {
  for (const suffix of SUFFIXES) {
    if (word.endsWith(suffix) && word.length - suffix.length >= 3) {
      return word.slice(0, -suffix.length);
    }
  }
  return word;
}

export function isNegation(word: string): boolean {
  return NEGATIONS.has(word) || word.endsWith("n't");
}

// Stemmed, non-stopword, non-numeric terms.
export function contentTerms(text: string): Set<string> {
  const terms = new Set<string>();
  for (const word of words(text)) {
    if (STOPWORDS.has(word) || isNegation(word) || /\d/.test(word) || word.length < 3) continue;
    terms.add(stem(word));
  }
  return terms;
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => /[\p{L}\p{N}]/u.test(sentence));
}

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Number of word-bounded, case-insensitive occurrences of phrase in text. */
export function countPhrase(text: string, phrase: string): number {
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(phrase)}(?![\\p{L}\\p{N}])`, "giu");
  return text.match(pattern)?.length ?? 0;
}
