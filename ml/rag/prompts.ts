export const SNIPPETS_START = "--- SNIPPETS START ---";
export const SNIPPETS_END = "--- SNIPPETS END ---";

export const DECLINE_MESSAGE = "I don't know — please consult the official office.";

const ANSWER_SYSTEM_PROMPT = `You answer questions about university policies and regulations.

Rules:
1. Answer ONLY from the document snippets provided.
2. Open with a short summary in your own words that directly answers the question.
3. Follow with details, citing sources inline as (filename — page N).
4. If the snippets do not contain the answer, reply exactly: "${DECLINE_MESSAGE}" and name the office to contact.
5. Quote policy text where it matters. Do not assume anything beyond the text.
6. If the snippets are ambiguous or contradict each other, say so.`;

export function buildAnswerPrompt(query: string, context: string): string {
  return `${ANSWER_SYSTEM_PROMPT}

Each snippet starts with a metadata line: [DOC: filename | page: N | paragraph: P]

Respond with these labelled sections:
SUMMARY: 2-3 sentences answering "${query}"
DETAILED ANSWER: supporting details with inline citations
FOLLOW-UP QUESTIONS: up to 3 short questions a student might ask next, one per line

Snippets:
${SNIPPETS_START}
${context}
${SNIPPETS_END}

Question: ${query}

Answer:`;
}

export function buildFollowupPrompt(query: string, answer: string): string {
  return `Based on this Q&A about university policies, suggest 3 relevant follow-up questions a student might ask.

Question: ${query}
Answer: ${answer}

Write 3 short, specific follow-up questions, one per line:`;
}

export type ContradictionSource = {
  filename: string;
  page_number: number;
  text: string;
};

export function buildContradictionPrompt(answer: string, sources: ContradictionSource[]): string {
  const snippets = sources
    .map((source, i) => `Source ${i + 1} (${source.filename}, page ${source.page_number}):\n${source.text}`)
    .join("\n\n");
  return `You check policy answers. Given an answer and its supporting snippets, decide whether the snippets contradict each other.

Answer: ${answer}

Supporting snippets:
${snippets}

Respond in exactly this format:
HAS_CONTRADICTIONS: YES or NO
CONFIDENCE: a number between 0.0 and 1.0
EXPLANATION: one sentence`;
}
