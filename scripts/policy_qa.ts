import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import minimist from "minimist";
import { loadConfig } from "../ml/config";
import { createLogger } from "../ml/logging/logger";
import { createPolicyQaPipeline } from "../ml/rag";
import type { PolicyQaPipeline } from "../ml/rag";

const USAGE = `Usage:
  policy_qa ingest --in <file.txt|file.md> [--id <document_id>] [--type <document_type>]
  policy_qa query --q "<question>" [--top_k 7] [--filename <name>] [--type <document_type>]
  policy_qa delete --id <document_id>
  policy_qa list
  policy_qa stats`;

function optionalString(value: unknown): string | undefined {
  if (value === undefined || value === null || value === true || value === false) return undefined;
  return String(value);
}

async function runCommand(pipeline: PolicyQaPipeline, command: string | undefined, args: minimist.ParsedArgs) {
  switch (command) {
    case "ingest": {
      const file = optionalString(args.in);
      if (!file) throw new Error("Provide --in <file>.");
      return pipeline.ingest({
        filename: path.basename(file),
        content: fs.readFileSync(file, "utf-8"),
        ...(optionalString(args.id) ? { document_id: optionalString(args.id) } : {}),
        ...(optionalString(args.type) ? { document_type: optionalString(args.type) } : {}),
      });
    }
    case "query": {
      const question = optionalString(args.q);
      if (!question) throw new Error('Provide --q "<question>".');
      const filename = optionalString(args.filename);
      const documentType = optionalString(args.type);
      return pipeline.query(question, {
        top_k: args.top_k === undefined ? undefined : Number(args.top_k),
        filter: filename || documentType ? { filename, document_type: documentType } : undefined,
      });
    }
    case "delete": {
      const id = optionalString(args.id);
      if (!id) throw new Error("Provide --id <document_id>.");
      return pipeline.delete(id);
    }
    case "list":
      return pipeline.listDocuments();
    case "stats":
      return pipeline.stats();
    default:
      throw new Error(USAGE);
  }
}

async function run() {
  const args = minimist(process.argv.slice(2), { string: ["id", "q", "in", "type", "filename"] });
  const config = loadConfig();
  // Results go to stdout as JSON; logs stay on stderr.
  const logger = createLogger("policy_qa", { level: config.log_level, stderr: true });
  const pipeline = createPolicyQaPipeline(config, { logger });
  try {
    const result = await runCommand(pipeline, optionalString(args._[0]), args);
    console.log(JSON.stringify(result, null, 2));
    if (!result.ok) process.exitCode = 1;
  } finally {
    pipeline.close();
  }
}

run().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
