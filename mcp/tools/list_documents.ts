import { defineTool, resultSchema } from "../tool_types";

export const listDocumentsTool = defineTool<Record<string, never>>({
  name: "policy.list_documents",
  description: "List indexed documents with their chunk counts.",
  inputSchema: { type: "object", additionalProperties: false, properties: {} },
  outputSchema: resultSchema({
    type: "object",
    required: ["documents"],
    properties: {
      documents: {
        type: "array",
        items: {
          type: "object",
          required: ["document_id", "filename", "document_type", "chunk_count", "indexed_at"],
          properties: {
            document_id: { type: "string" },
            filename: { type: "string" },
            document_type: { type: "string" },
            chunk_count: { type: "integer", minimum: 0 },
            indexed_at: { type: "string" },
          },
        },
      },
    },
  }),
  handler: async (_args, { pipeline }) => pipeline.listDocuments(),
});
