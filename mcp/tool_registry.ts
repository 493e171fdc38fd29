import { loadConfig, type PolicyQaConfig } from "../ml/config";
import { IngestQueue, createPolicyQaPipeline } from "../ml/rag";
import { createLogger } from "../ml/logging/logger";
import type { RegisteredTool, ToolContext } from "./tool_types";

import { ingestDocumentTool } from "./tools/ingest_document";
import { ingestStatusTool } from "./tools/ingest_status";
import { queryTool } from "./tools/query";
import { deleteDocumentTool } from "./tools/delete_document";
import { listDocumentsTool } from "./tools/list_documents";
import { feedbackTool } from "./tools/feedback";
import { statsTool } from "./tools/stats";

export const toolRegistry: RegisteredTool[] = [
  ingestDocumentTool,
  ingestStatusTool,
  queryTool,
  deleteDocumentTool,
  listDocumentsTool,
  feedbackTool,
  statsTool,
];

export function createToolContext(config: Readonly<PolicyQaConfig> = loadConfig()): ToolContext {
  // stdout is the MCP transport.
  const logger = createLogger("policy_qa", { level: config.log_level, stderr: true });
  const pipeline = createPolicyQaPipeline(config, { logger });
  return {
    pipeline,
    queue: new IngestQueue(pipeline, { concurrency: config.ingest_concurrency, logger: logger.child("ingest_queue") }),
  };
}

export function listTools() {
  return toolRegistry.map((tool) => ({
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
  }));
}

export async function callTool(name: string, args: Record<string, unknown>, ctx: ToolContext): Promise<unknown> {
  const tool = toolRegistry.find((entry) => entry.name === name);
  if (!tool) {
    throw new Error(`Unknown tool: ${name}`);
  }
  return tool.call(args, ctx);
}
