import { defineTool } from "../tool_types";
import type { IngestInput } from "../../ml/rag/pipeline";

export type IngestDocumentArgs = IngestInput & {
  wait?: boolean;
};

export const jobSchema = {
  type: "object",
  required: ["job_id", "filename", "state", "history", "submitted_at", "finished_at", "result"],
  properties: {
    job_id: { type: "string" },
    filename: { type: "string" },
    state: { type: "string", enum: ["received", "extracted", "chunked", "embedded", "indexed", "complete", "failed"] },
    history: {
      type: "array",
      items: {
        type: "object",
        required: ["state", "at"],
        properties: { state: { type: "string" }, at: { type: "string" } },
      },
    },
    submitted_at: { type: "string" },
    finished_at: { type: ["string", "null"] },
    result: { type: ["object", "null"] },
  },
};

export const ingestDocumentTool = defineTool<IngestDocumentArgs>({
  name: "policy.ingest_document",
  description:
    "Queue a policy document for ingestion (chunk, embed, index). Pass raw_text, or content plus a .txt/.md filename. Set wait=true to block until the job finishes.",
  inputSchema: {
    type: "object",
    additionalProperties: false,
    required: ["filename"],
    properties: {
      filename: { type: "string", minLength: 1 },
      document_id: { type: "string", pattern: "^[A-Za-z0-9_-]{1,64}$" },
      document_type: { type: "string" },
      raw_text: { type: "string" },
      content: { type: "string" },
      page_map: { type: "array", items: { type: "integer", minimum: 0 } },
      wait: { type: "boolean" },
    },
  },
  outputSchema: jobSchema,
  handler: async ({ wait, ...input }, { queue }) => {
    const job = queue.submit(input);
    return wait ? queue.waitFor(job.job_id) : job;
  },
});
