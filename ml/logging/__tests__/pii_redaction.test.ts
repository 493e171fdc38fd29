import { describe, it, expect } from "vitest";
import { redactPayload, redactText } from "../pii_redaction";

describe("redactText", () => {
  it("masks emails, phone numbers, student ids and titled names", () => {
    const result = redactText(
      "Mail jo.lee@uni.example, call 555-123-4567, student id: AB12345, or ask Dr. Grace Hopper."
    );
    expect(result.text).toBe(
      "Mail [REDACTED_EMAIL], call [REDACTED_PHONE], [REDACTED_STUDENT_ID], or ask Dr. Grace Hopper."
    );
    expect(result.notes).toEqual(["EMAIL", "STUDENT_ID", "PHONE"]);
  });

  it("masks a name after a title without a period", () => {
    expect(redactText("Prof Ada Lovelace approved it.").text).toBe("[REDACTED_NAME] approved it.");
  });

  it("leaves policy text alone", () => {
    expect(redactText("Students must attend 80% of lectures.")).toEqual({
      text: "Students must attend 80% of lectures.",
      redacted: false,
      notes: [],
    });
  });
});

describe("redactPayload", () => {
  it("redacts nested strings and string arrays and keeps other values", () => {
    const result = redactPayload({
      query: "Is ann@uni.example enrolled?",
      cited: ["a.txt", "bob@uni.example"],
      count: 3,
      nested: { note: "call 555 123 4567" },
      empty: null,
    });

    expect(result.payload).toEqual({
      query: "Is [REDACTED_EMAIL] enrolled?",
      cited: ["a.txt", "[REDACTED_EMAIL]"],
      count: 3,
      nested: { note: "call [REDACTED_PHONE]" },
      empty: null,
    });
    expect(result.redacted).toBe(true);
    expect(result.notes).toEqual(["EMAIL", "PHONE"]);
  });
});
