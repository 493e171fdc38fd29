import "dotenv/config";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import { callTool, createToolContext, listTools } from "./tool_registry";
import type { ToolContext } from "./tool_types";

function shouldSelfTest(argv: string[]) {
  if (process.env.MCP_SELFTEST === "1") return true;
  return argv.some((arg) => arg === "--selftest" || arg.startsWith("--selftest="));
}

function createServer(ctx: ToolContext) {
  const server = new Server(
    { name: "policy-qa", version: "0.1.0" },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listTools().map((tool) => ({ ...tool, inputSchema: { ...tool.inputSchema, type: "object" as const } })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const result = await callTool(request.params.name, request.params.arguments ?? {}, ctx);
    return {
      content: [
        {
          type: "text",
          text: JSON.stringify(result),
        },
      ],
    };
  });

  return server;
}

async function main() {
  if (shouldSelfTest(process.argv.slice(2))) {
    listTools().forEach((tool) => {
      console.log(tool.name);
    });
    return;
  }
  const ctx = createToolContext();
  const server = createServer(ctx);
  const shutdown = async () => {
    await ctx.queue.drain();
    ctx.pipeline.close();
    await server.close();
  };
  process.on("SIGINT", () => {
    shutdown()
      .catch((error) => console.error(error instanceof Error ? error.message : String(error)))
      .finally(() => process.exit(0));
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("MCP server failed.");
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
