import Ajv, { type SchemaObject } from "ajv";
import addFormats from "ajv-formats";
import type { IngestQueue, PolicyQaPipeline } from "../ml/rag";

export type ToolContext = {
  pipeline: PolicyQaPipeline;
  queue: IngestQueue;
};

export type ToolDefinition<Args> = {
  name: string;
  description: string;
  inputSchema: SchemaObject;
  outputSchema: SchemaObject;
  handler: (args: Args, ctx: ToolContext) => Promise<unknown>;
};

export type RegisteredTool = {
  name: string;
  description: string;
  inputSchema: SchemaObject;
  outputSchema: SchemaObject;
  call: (args: Record<string, unknown>, ctx: ToolContext) => Promise<unknown>;
};

const ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true });
addFormats(ajv);

export const errorPayloadSchema = {
  type: "object",
  required: ["kind", "stage", "message", "timed_out", "context"],
  properties: {
    kind: { type: "string" },
    stage: { type: "string" },
    message: { type: "string" },
    timed_out: { type: "boolean" },
    context: { type: "object" },
    cause: { type: "string" },
  },
} satisfies SchemaObject;

// Either `{ ok: true, ...success }` or `{ ok: false, error }`.
export function resultSchema(success: SchemaObject): SchemaObject {
  return {
    type: "object",
    required: ["ok"],
    properties: { ok: { type: "boolean" } },
    if: { type: "object", properties: { ok: { const: true } } },
    then: success,
    else: { type: "object", required: ["error"], properties: { error: errorPayloadSchema } },
  };
}

/**
 * Compile a tool's schemas once. Input is checked before the handler runs and
 * output before it is returned to the client.
 */
export function defineTool<Args>(definition: ToolDefinition<Args>): RegisteredTool {
  const validateInput = ajv.compile<Args>(definition.inputSchema);
  const validateOutput = ajv.compile(definition.outputSchema);
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    outputSchema: definition.outputSchema,
    call: async (args, ctx) => {
      if (!validateInput(args)) {
        throw new Error(`Invalid tool input for ${definition.name}: ${ajv.errorsText(validateInput.errors)}`);
      }
      const result = await definition.handler(args, ctx);
      if (!validateOutput(result)) {
        throw new Error(`Invalid tool output for ${definition.name}: ${ajv.errorsText(validateOutput.errors)}`);
      }
      return result;
    },
  };
}
