import type { AuditPayload, AuditPayloadValue } from "./log_types";

type RedactionResult = {
  text: string;
  redacted: boolean;
  notes: string[];
};

const EMAIL = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi;
const PHONE = /(\+?\d{1,2}[\s.-]?)?(\(?\d{3}\)?[\s.-]?)\d{3}[\s.-]?\d{4}\b/g;
const STUDENT_ID = /\b(student\s+(?:id|number)|matric(?:ulation)?\s+(?:no|number))[:#\s]*[A-Z0-9-]{5,}\b/gi;
const NAME_HINT = /\b(Mr|Ms|Mrs|Dr|Prof|Name):?\s+[A-Z][a-z]+\s+[A-Z][a-z]+\b/g;

export function redactText(input: string): RedactionResult {
  let text = input;
  const notes: string[] = [];
  const apply = (pattern: RegExp, label: string) => {
    const next = text.replace(pattern, `[REDACTED_${label}]`);
    if (next !== text) {
      text = next;
      notes.push(label);
    }
  };

  apply(EMAIL, "EMAIL");
  apply(STUDENT_ID, "STUDENT_ID");
  apply(PHONE, "PHONE");
  apply(NAME_HINT, "NAME");

  return { text, redacted: notes.length > 0, notes };
}

export function redactPayload(payload: AuditPayload): { payload: AuditPayload; redacted: boolean; notes: string[] } {
  const notes = new Set<string>();

  const walk = (value: AuditPayloadValue): AuditPayloadValue => {
    if (typeof value === "string") {
      const result = redactText(value);
      result.notes.forEach((note) => notes.add(note));
      return result.text;
    }
    if (Array.isArray(value)) {
      return value.map((item) => {
        const result = redactText(item);
        result.notes.forEach((note) => notes.add(note));
        return result.text;
      });
    }
    if (value && typeof value === "object") {
      const next: AuditPayload = {};
      for (const [key, item] of Object.entries(value)) {
        next[key] = walk(item);
      }
      return next;
    }
    return value;
  };

  const next: AuditPayload = {};
  for (const [key, value] of Object.entries(payload)) {
    next[key] = walk(value);
  }
  return { payload: next, redacted: notes.size > 0, notes: [...notes] };
}
