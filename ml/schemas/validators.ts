import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import auditEventSchema from "./audit_event.schema.json";
import ingestDocumentSchema from "./ingest_document.schema.json";

const ajv = new Ajv({ allErrors: true, strict: true });
addFormats(ajv);

export const validateAuditEvent = ajv.compile(auditEventSchema);
export const validateIngestDocument = ajv.compile(ingestDocumentSchema);

export function describeErrors(validate: ValidateFunction): string {
  return (validate.errors ?? []).map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`).join("; ");
}

export function assertValid(validate: ValidateFunction, data: unknown, label: string): void {
  const ok = validate(data);
  if (!ok) {
    throw new Error(`Schema validation failed for ${label}: ${describeErrors(validate)}`);
  }
}
