import { defineTool } from "../tool_types";

export const statsTool = defineTool<Record<string, never>>({
  name: "policy.stats",
  description: "Index size, active models and chunking settings, plus ingest queue depth.",
  inputSchema: { type: "object", additionalProperties: false, properties: {} },
  outputSchema: {
    type: "object",
    required: ["index", "queue"],
    properties: {
      index: { type: "object", required: ["ok"], properties: { ok: { type: "boolean" } } },
      queue: {
        type: "object",
        required: ["active", "queued"],
        properties: {
          active: { type: "integer", minimum: 0 },
          queued: { type: "integer", minimum: 0 },
        },
      },
    },
  },
  handler: async (_args, { pipeline, queue }) => ({
    index: await pipeline.stats(),
    queue: { active: queue.activeCount, queued: queue.queuedCount },
  }),
});
