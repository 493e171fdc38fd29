import { defineTool, resultSchema } from "../tool_types";
import type { FeedbackInput } from "../../ml/logging/log_types";

export const feedbackTool = defineTool<FeedbackInput>({
  name: "policy.feedback",
  description: "Record whether an answer was correct. Stored in the audit log with personal data redacted.",
  inputSchema: {
    type: "object",
    additionalProperties: false,
    required: ["query", "answer", "is_correct"],
    properties: {
      query: { type: "string", minLength: 1 },
      answer: { type: "string" },
      is_correct: { type: "boolean" },
      comment: { type: "string", maxLength: 2000 },
    },
  },
  outputSchema: resultSchema({
    type: "object",
    required: ["event_id"],
    properties: { event_id: { type: "string" } },
  }),
  handler: async (args, { pipeline }) => pipeline.recordFeedback(args),
});
