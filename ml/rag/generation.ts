import OpenAI from "openai";
import type { ChatCompletion } from "openai/resources/chat/completions";
import { GenerationServiceError } from "./errors";
import { DECLINE_MESSAGE, SNIPPETS_END, SNIPPETS_START } from "./prompts";
import { contentTerms, splitSentences, stem, words } from "./policy/lexicon";

export type GenerationPurpose = "answer" | "followups" | "contradiction";

export type GenerateRequest = {
  prompt: string;
  temperature: number;
  max_tokens: number;
  purpose: GenerationPurpose;
};

export interface GenerationService {
  readonly model: string;
  generate(request: GenerateRequest): Promise<string>;
}

export type OpenAIGenerationConfig = {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  client?: OpenAI;
};

export class OpenAIGenerationService implements GenerationService {
  readonly model: string;
  private client: OpenAI;

  constructor(config: OpenAIGenerationConfig) {
    this.model = config.model ?? "gpt-4o-mini";
    this.client =
      config.client ?? new OpenAI({ apiKey: config.apiKey, maxRetries: 0, timeout: config.timeoutMs });
  }

  async generate(request: GenerateRequest): Promise<string> {
    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: request.prompt }],
        temperature: request.temperature,
        max_tokens: request.max_tokens,
      });
    } catch (error) {
      throw new GenerationServiceError({
        stage: request.purpose,
        reason: `Chat completion failed (${this.model})`,
        cause: error,
      });
    }
    return response.choices[0]?.message?.content ?? "";
  }
}

type Snippet = {
  filename: string;
  page_number: number;
  text: string;
};

const SNIPPET_HEADER = /^\[DOC: (.+) \| page: (\d+) \| paragraph: \d+\]$/;
const MAX_ANSWER_SENTENCES = 3;

export function parseSnippets(prompt: string): Snippet[] {
  const start = prompt.indexOf(SNIPPETS_START);
  const end = prompt.indexOf(SNIPPETS_END, start + 1);
  if (start < 0 || end < 0) return [];

  const snippets: Snippet[] = [];
  let current: Snippet | null = null;
  for (const line of prompt.slice(start + SNIPPETS_START.length, end).split("\n")) {
    const header = SNIPPET_HEADER.exec(line.trim());
    if (header) {
      current = { filename: header[1], page_number: Number(header[2]), text: "" };
      snippets.push(current);
    } else if (current) {
      current.text = current.text ? `${current.text}\n${line}` : line;
    }
  }
  return snippets
    .map((snippet) => ({ ...snippet, text: snippet.text.trim() }))
    .filter((snippet) => snippet.text.length > 0);
}

function lastLabelledLine(prompt: string, label: string): string {
  const lines = prompt.split("\n").filter((line) => line.startsWith(`${label}:`));
  const line = lines[lines.length - 1];
  return line ? line.slice(label.length + 1).trim() : "";
}

function overlapScore(sentence: string, queryTerms: Set<string>): number {
  const sentenceStems = new Set(words(sentence).map(stem));
  let score = 0;
  for (const term of queryTerms) {
    if (sentenceStems.has(term)) score += 1;
  }
  return score;
}

/**
 * Offline generation backend. Answers by selecting the snippet sentences that
 * share the most vocabulary with the question and citing where each came from.
 * It never produces text that is not in the snippets.
 */
export class ExtractiveGenerationService implements GenerationService {
  readonly model = "extractive";

  async generate(request: GenerateRequest): Promise<string> {
    switch (request.purpose) {
      case "answer":
        return this.answer(request.prompt);
      case "followups":
        return this.followups(request.prompt);
      default:
        throw new GenerationServiceError({
          stage: request.purpose,
          reason: "Extractive generation does not support contradiction review",
        });
    }
  }

  private answer(prompt: string): string {
    const question = lastLabelledLine(prompt, "Question");
    const queryTerms = contentTerms(question);
    const candidates = parseSnippets(prompt).flatMap((snippet, snippetIndex) =>
      splitSentences(snippet.text).map((sentence, sentenceIndex) => ({
        sentence,
        snippet,
        order: snippetIndex * 1000 + sentenceIndex,
        score: overlapScore(sentence, queryTerms),
      }))
    );

    const picked = candidates
      .filter((candidate) => candidate.score > 0)
      .sort((a, b) => b.score - a.score || a.order - b.order)
      .slice(0, MAX_ANSWER_SENTENCES);
    if (picked.length === 0) return DECLINE_MESSAGE;

    const cite = (snippet: Snippet) => `(${snippet.filename} — page ${snippet.page_number})`;
    const [best] = picked;
    const details = [...picked]
      .sort((a, b) => a.order - b.order)
      .map((candidate) => `- ${candidate.sentence} ${cite(candidate.snippet)}`);

    return [
      `SUMMARY: ${best.sentence} ${cite(best.snippet)}`,
      "",
      "DETAILED ANSWER:",
      ...details,
      "",
      "FOLLOW-UP QUESTIONS:",
    ].join("\n");
  }

  private followups(prompt: string): string {
    const question = lastLabelledLine(prompt, "Question");
    const topic = words(question)
      .filter((word) => contentTerms(word).size > 0)
      .join(" ");
    if (!topic) return "";
    return [
      `Are there exceptions to the ${topic} rules?`,
      `Who should I contact with questions about ${topic}?`,
      `What happens if the ${topic} requirements are not met?`,
    ].join("\n");
  }
}

export function createGenerationService(config: {
  generation_mode: "extractive" | "openai";
  openai_api_key?: string;
  openai_model: string;
  generation_timeout_ms: number;
}): GenerationService {
  if (config.generation_mode === "openai") {
    if (!config.openai_api_key) {
      throw new GenerationServiceError({
        stage: "configure",
        reason: "GENERATION_MODE=openai requires OPENAI_API_KEY",
      });
    }
    return new OpenAIGenerationService({
      apiKey: config.openai_api_key,
      model: config.openai_model,
      timeoutMs: config.generation_timeout_ms,
    });
  }
  return new ExtractiveGenerationService();
}
