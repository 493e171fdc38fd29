import { defineTool, resultSchema } from "../tool_types";

export const deleteDocumentTool = defineTool<{ document_id: string }>({
  name: "policy.delete_document",
  description: "Remove a document and all of its chunks from the index. Deleting an unknown id reports deleted=false.",
  inputSchema: {
    type: "object",
    additionalProperties: false,
    required: ["document_id"],
    properties: {
      document_id: { type: "string", minLength: 1 },
    },
  },
  outputSchema: resultSchema({
    type: "object",
    required: ["document_id", "deleted"],
    properties: {
      document_id: { type: "string" },
      deleted: { type: "boolean" },
    },
  }),
  handler: async ({ document_id }, { pipeline }) => pipeline.delete(document_id),
});
