import { describe, it, expect } from "vitest";
import { assertValid, describeErrors, validateAuditEvent, validateIngestDocument } from "../validators";

describe("validateIngestDocument", () => {
  it("accepts raw text or uploaded content", () => {
    expect(validateIngestDocument({ filename: "rules.txt", raw_text: "Attendance is mandatory." })).toBe(true);
    expect(validateIngestDocument({ filename: "rules.md", content: "# Rules", document_id: "rules_v2" })).toBe(true);
  });

  it("requires one of raw_text or content", () => {
    expect(validateIngestDocument({ filename: "rules.txt" })).toBe(false);
    expect(describeErrors(validateIngestDocument)).toContain("/ must match a schema in anyOf");
  });

  it("rejects unknown fields and malformed ids", () => {
    expect(validateIngestDocument({ filename: "a.txt", raw_text: "x", owner: "me" })).toBe(false);
    expect(validateIngestDocument({ filename: "a.txt", raw_text: "x", document_id: "has space" })).toBe(false);
  });
});

describe("validateAuditEvent", () => {
  const event = {
    id: "evt-1",
    type: "query",
    payload: { query: "When are exams?" },
    timestamp: "2026-01-15T09:30:00.000Z",
  };

  it("accepts a well-formed event", () => {
    expect(() => assertValid(validateAuditEvent, event, "audit event")).not.toThrow();
  });

  it("rejects unknown event types and bad timestamps", () => {
    expect(validateAuditEvent({ ...event, type: "document_renamed" })).toBe(false);
    expect(() => assertValid(validateAuditEvent, { ...event, timestamp: "yesterday" }, "audit event")).toThrow(
      'Schema validation failed for audit event: /timestamp must match format "date-time"'
    );
  });
});
