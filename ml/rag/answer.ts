import type { AnswerResult, Citation } from "./types";
import type { GenerationService } from "./generation";
import type { Logger } from "../logging/logger";
import { createLogger, serializeError } from "../logging/logger";
import { GenerationServiceError, PolicyQaError, withTimeout } from "./errors";
import { DECLINE_MESSAGE, buildAnswerPrompt, buildFollowupPrompt } from "./prompts";

export const MAX_FOLLOWUPS = 3;

export type AnswerSections = {
  summary: string;
  detailed_answer: string;
  followup_questions: string[];
};

type Section = "summary" | "detailed_answer" | "followup_questions";

const SECTION_LABEL = /^[\s*#]*(summary|detailed answer|follow-?up questions)[\s*]*:[\s*]*(.*)$/i;

function sectionFor(label: string): Section {
  const normalized = label.toLowerCase();
  if (normalized === "summary") return "summary";
  if (normalized === "detailed answer") return "detailed_answer";
  return "followup_questions";
}

export function parseFollowupLines(text: string): string[] {
  return text
    .split("\n")
    .filter((line) => line.includes("?"))
    .map((line) => line.replace(/^[\s\d.)\-•*]+/, "").trim())
    .filter(Boolean)
    .slice(0, MAX_FOLLOWUPS);
}

/**
 * Split a model response into summary, detail and follow-ups.
 * Labelled sections win; otherwise the first blank line separates summary from
 * detail; otherwise the first line is the summary.
 */
export function parseAnswerSections(text: string): AnswerSections {
  const trimmed = text.trim();
  const buckets: Record<Section, string[]> = { summary: [], detailed_answer: [], followup_questions: [] };
  let current: Section | null = null;
  let labelled = false;

  for (const line of trimmed.split("\n")) {
    const match = SECTION_LABEL.exec(line);
    if (match) {
      labelled = true;
      current = sectionFor(match[1]);
      if (match[2].trim()) buckets[current].push(match[2]);
      continue;
    }
    if (current) buckets[current].push(line);
  }

  if (labelled) {
    return {
      summary: buckets.summary.join("\n").trim(),
      detailed_answer: buckets.detailed_answer.join("\n").trim(),
      followup_questions: parseFollowupLines(buckets.followup_questions.join("\n")),
    };
  }

  const blank = trimmed.search(/\n\s*\n/);
  if (blank >= 0) {
    return {
      summary: trimmed.slice(0, blank).trim(),
      detailed_answer: trimmed.slice(blank).trim(),
      followup_questions: [],
    };
  }
  const [first = "", ...rest] = trimmed.split("\n");
  return { summary: first.trim(), detailed_answer: rest.join("\n").trim(), followup_questions: [] };
}

function countWords(text: string) {
  return text.split(/\s+/).filter(Boolean).length;
}

export function isDecline(answer: string) {
  return answer.trim().startsWith(DECLINE_MESSAGE.slice(0, 12));
}

export type AnswerSynthesizerConfig = {
  generation: GenerationService;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  logger?: Logger;
};

export class AnswerSynthesizer {
  private generation: GenerationService;
  private temperature: number;
  private maxTokens: number;
  private timeoutMs: number;
  private logger: Logger;

  constructor(config: AnswerSynthesizerConfig) {
    this.generation = config.generation;
    this.temperature = config.temperature ?? 0.1;
    this.maxTokens = config.maxTokens ?? 2000;
    this.timeoutMs = config.timeoutMs ?? 60_000;
    this.logger = config.logger ?? createLogger("rag.answer");
  }

  get model(): string {
    return this.generation.model;
  }

  declined(): AnswerResult {
    return {
      answer: DECLINE_MESSAGE,
      summary: DECLINE_MESSAGE,
      detailed_answer: "",
      followup_questions: [],
      model: this.generation.model,
      tokens_used: 0,
    };
  }

  async generateAnswer(query: string, context: string, citations: Citation[]): Promise<AnswerResult> {
    if (!context.trim() || citations.length === 0) {
      return this.declined();
    }

    const prompt = buildAnswerPrompt(query, context);
    const text = (
      await this.call({ prompt, temperature: this.temperature, max_tokens: this.maxTokens }, "answer", query)
    ).trim();
    if (!text) {
      throw new GenerationServiceError({
        stage: "answer",
        reason: "Generation returned an empty response",
        context: { query },
      });
    }

    const sections = parseAnswerSections(text);
    let followups = sections.followup_questions;
    if (followups.length === 0 && !isDecline(text)) {
      followups = await this.generateFollowupQuestions(query, text);
    }

    return {
      answer: text,
      summary: sections.summary,
      detailed_answer: sections.detailed_answer,
      followup_questions: followups.slice(0, MAX_FOLLOWUPS),
      model: this.generation.model,
      tokens_used: countWords(prompt) + countWords(text),
    };
  }

  async generateFollowupQuestions(query: string, answer: string): Promise<string[]> {
    try {
      const text = await this.call(
        { prompt: buildFollowupPrompt(query, answer), temperature: 0.7, max_tokens: 200 },
        "followups",
        query
      );
      return parseFollowupLines(text);
    } catch (error) {
      this.logger.warn("follow-up generation failed", { error: serializeError(error) });
      return [];
    }
  }

  private async call(
    request: { prompt: string; temperature: number; max_tokens: number },
    purpose: "answer" | "followups",
    query: string
  ): Promise<string> {
    try {
      return await withTimeout(
        this.generation.generate({ ...request, purpose }),
        this.timeoutMs,
        () =>
          new GenerationServiceError({
            stage: purpose,
            reason: `Generation timed out after ${this.timeoutMs}ms`,
            context: { query },
            timed_out: true,
          })
      );
    } catch (error) {
      if (error instanceof PolicyQaError) throw error;
      throw new GenerationServiceError({
        stage: purpose,
        reason: "Generation failed",
        context: { query },
        cause: error,
      });
    }
  }
}
