import { defineTool, resultSchema } from "../tool_types";

export type QueryArgs = {
  query: string;
  top_k?: number;
  filename?: string;
  document_type?: string;
};

export const queryTool = defineTool<QueryArgs>({
  name: "policy.query",
  description:
    "Answer a question from the indexed policy documents, with citations, follow-up questions and a policy check (confidence, warnings, recommendations).",
  inputSchema: {
    type: "object",
    additionalProperties: false,
    required: ["query"],
    properties: {
      query: { type: "string", minLength: 1, maxLength: 2000 },
      top_k: { type: "integer", minimum: 1, maximum: 50 },
      filename: { type: "string" },
      document_type: { type: "string" },
    },
  },
  outputSchema: resultSchema({
    type: "object",
    required: ["query", "answer", "citations", "retrieved_count", "policy", "latency_ms"],
    properties: {
      query: { type: "string" },
      answer: {
        type: "object",
        required: ["answer", "summary", "detailed_answer", "followup_questions", "model", "tokens_used"],
        properties: {
          answer: { type: "string" },
          summary: { type: "string" },
          detailed_answer: { type: "string" },
          followup_questions: { type: "array", items: { type: "string" } },
          model: { type: "string" },
          tokens_used: { type: "integer", minimum: 0 },
        },
      },
      citations: {
        type: "array",
        maxItems: 3,
        items: {
          type: "object",
          required: ["document_id", "chunk_id", "filename", "page_number", "text_snippet", "similarity_score"],
          properties: {
            document_id: { type: "string" },
            chunk_id: { type: "string" },
            filename: { type: "string" },
            page_number: { type: "integer", minimum: 1 },
            text_snippet: { type: "string" },
            similarity_score: { type: "number" },
          },
        },
      },
      retrieved_count: { type: "integer", minimum: 0 },
      policy: {
        type: "object",
        required: ["confidence_score", "warnings", "recommendations", "checks", "degraded_checks"],
        properties: {
          confidence_score: { type: "number", minimum: 0, maximum: 1 },
          warnings: { type: "array", items: { type: "string" } },
          recommendations: { type: "array", items: { type: "string" } },
          checks: { type: "object" },
          degraded_checks: { type: "array", items: { type: "string" } },
        },
      },
      latency_ms: { type: "number" },
    },
  }),
  handler: async ({ query, top_k, filename, document_type }, { pipeline }) =>
    pipeline.query(query, {
      top_k,
      filter: filename || document_type ? { filename, document_type } : undefined,
    }),
});
