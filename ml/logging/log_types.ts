export type AuditEventType =
  | "document_ingested"
  | "document_ingest_failed"
  | "document_deleted"
  | "query"
  | "query_failed"
  | "user_feedback";

export type AuditPayloadValue = string | number | boolean | null | string[] | AuditPayload;

export type AuditPayload = {
  [key: string]: AuditPayloadValue;
};

export type AuditEvent = {
  id: string;
  type: AuditEventType;
  payload: AuditPayload;
  timestamp: string;
};

export type FeedbackInput = {
  query: string;
  answer: string;
  is_correct: boolean;
  comment?: string;
};
