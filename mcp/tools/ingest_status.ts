import { defineTool } from "../tool_types";
import { jobSchema } from "./ingest_document";

export const ingestStatusTool = defineTool<{ job_id?: string }>({
  name: "policy.ingest_status",
  description: "Report ingest job state. With job_id, one job; without, every job this server has seen.",
  inputSchema: {
    type: "object",
    additionalProperties: false,
    properties: {
      job_id: { type: "string", minLength: 1 },
    },
  },
  outputSchema: {
    type: "object",
    required: ["jobs"],
    properties: {
      jobs: { type: "array", items: jobSchema },
    },
  },
  handler: async ({ job_id }, { queue }) => {
    if (!job_id) return { jobs: queue.listJobs() };
    const job = queue.getJob(job_id);
    return { jobs: job ? [job] : [] };
  },
});
