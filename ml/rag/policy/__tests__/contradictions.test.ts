import { describe, it, expect } from "vitest";
import { LlmContradictionChecker, RuleBasedContradictionChecker, parseContradictionReply } from "../contradictions";
import { GenerationServiceError } from "../../errors";
import { ScriptedGenerationService, makeChunk } from "../../../../tests/helpers/policy_fixtures";

const handbook = (text: string) =>
  makeChunk({ chunk_id: "doc-a_0", document_id: "doc-a", filename: "handbook.txt", text });
const faq = (text: string) =>
  makeChunk({ chunk_id: "doc-b_0", document_id: "doc-b", filename: "faq.md", text, page_number: 2 });

describe("RuleBasedContradictionChecker", () => {
  const checker = new RuleBasedContradictionChecker();

  it("reports a negation mismatch between documents", async () => {
    const findings = await checker.checkContradictions([
      handbook("Late submissions are accepted with a penalty."),
      faq("Late submissions are never accepted."),
    ]);

    expect(findings).toEqual([
      {
        source_a: { document_id: "doc-a", filename: "handbook.txt", page_number: 1 },
        source_b: { document_id: "doc-b", filename: "faq.md", page_number: 2 },
        topic: "late submissions accepted",
        explanation:
          'handbook.txt says "Late submissions are accepted with a penalty." but faq.md says "Late submissions are never accepted."; one source negates what the other allows.',
        detected_by: "rules",
      },
    ]);
  });

  it("reports different values for the same unit", async () => {
    const [finding] = await checker.checkContradictions([
      handbook("Students must attend 80% of lectures."),
      faq("Students must attend 75% of lectures."),
    ]);

    expect(finding.topic).toBe("students attend lectures");
    expect(finding.explanation.endsWith("; the sources give different values (percent).")).toBe(true);
  });

  it("ignores conflicts inside one document", async () => {
    const findings = await checker.checkContradictions([
      handbook("Late submissions are accepted with a penalty."),
      makeChunk({ chunk_id: "doc-a_1", document_id: "doc-a", filename: "handbook.txt", text: "Late submissions are never accepted." }),
    ]);
    expect(findings).toEqual([]);
  });

  it("ignores agreeing or unrelated statements", async () => {
    expect(
      await checker.checkContradictions([
        handbook("Students must attend 80% of lectures."),
        faq("Students must attend 80% of lectures."),
      ])
    ).toEqual([]);
    expect(
      await checker.checkContradictions([handbook("Parking is never free."), faq("Parking permits cost money.")])
    ).toEqual([]);
  });
});

describe("parseContradictionReply", () => {
  it("reads the verdict and explanation", () => {
    expect(parseContradictionReply("HAS_CONTRADICTIONS: YES\nCONFIDENCE: 0.8\nEXPLANATION: Deadlines differ.")).toEqual({
      has_contradictions: true,
      explanation: "Deadlines differ.",
    });
    expect(parseContradictionReply("has_contradictions: [no]")).toEqual({ has_contradictions: false, explanation: "" });
  });

  it("rejects a reply without a verdict", () => {
    expect(() => parseContradictionReply("Looks fine to me.")).toThrow(GenerationServiceError);
  });
});

describe("LlmContradictionChecker", () => {
  const chunks = [handbook("Essays are due Friday."), faq("Essays are due Monday.")];

  it("skips the model when fewer than two documents were retrieved", async () => {
    const generation = new ScriptedGenerationService({ contradiction: "HAS_CONTRADICTIONS: YES" });
    const checker = new LlmContradictionChecker({ generation });

    expect(await checker.checkContradictions([chunks[0]], "Friday.")).toEqual([]);
    expect(generation.requests).toHaveLength(0);
  });

  it("turns a YES verdict into a finding over the first two documents", async () => {
    const generation = new ScriptedGenerationService({
      contradiction: "HAS_CONTRADICTIONS: YES\nCONFIDENCE: 0.9\nEXPLANATION: The deadlines differ.",
    });
    const checker = new LlmContradictionChecker({ generation });

    const findings = await checker.checkContradictions(chunks, "Essays are due Friday.");

    expect(findings).toEqual([
      {
        source_a: { document_id: "doc-a", filename: "handbook.txt", page_number: 1 },
        source_b: { document_id: "doc-b", filename: "faq.md", page_number: 2 },
        topic: "retrieved policy text",
        explanation: "The deadlines differ.",
        detected_by: "llm",
      },
    ]);
    expect(generation.requests[0].purpose).toBe("contradiction");
    expect(generation.requests[0].prompt).toContain("Source 2 (faq.md, page 2):\nEssays are due Monday.");
  });

  it("returns nothing for a NO verdict", async () => {
    const generation = new ScriptedGenerationService({ contradiction: "HAS_CONTRADICTIONS: NO" });
    expect(await new LlmContradictionChecker({ generation }).checkContradictions(chunks)).toEqual([]);
  });

  it("wraps model failures", async () => {
    const generation = new ScriptedGenerationService({ contradiction: new Error("overloaded") });
    await expect(new LlmContradictionChecker({ generation }).checkContradictions(chunks)).rejects.toMatchObject({
      kind: "GENERATION_SERVICE_ERROR",
      stage: "contradictions",
    });
  });
});
