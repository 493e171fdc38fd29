import { describe, it, expect } from "vitest";
import { PlainTextExtractor, defaultDocumentId, documentTypeOf, splitPages } from "../extract";
import { ExtractionError } from "../errors";

describe("documentTypeOf", () => {
  it("lowercases the extension without the dot", () => {
    expect(documentTypeOf("Handbook.MD")).toBe("md");
    expect(documentTypeOf("README")).toBe("");
  });
});

describe("defaultDocumentId", () => {
  it("derives a stable 16-character id from the filename", () => {
    const id = defaultDocumentId("attendance.txt");
    expect(id).toMatch(/^[0-9a-f]{16}$/);
    expect(defaultDocumentId("attendance.txt")).toBe(id);
    expect(defaultDocumentId("grading.txt")).not.toBe(id);
  });
});

describe("splitPages", () => {
  it("replaces form feeds with newlines and records page starts", () => {
    expect(splitPages("one\ftwo\fthree")).toEqual({ raw_text: "one\ntwo\nthree", page_map: [0, 4, 8] });
  });

  it("treats text without form feeds as one page", () => {
    expect(splitPages("single page")).toEqual({ raw_text: "single page", page_map: [0] });
  });
});

describe("PlainTextExtractor", () => {
  const extractor = new PlainTextExtractor();

  it("extracts text and pages from supported files", async () => {
    expect(await extractor.extract({ filename: "rules.md", content: "# Rules\fPage two" })).toEqual({
      raw_text: "# Rules\nPage two",
      page_map: [0, 8],
      document_type: "md",
    });
  });

  it("rejects unsupported extensions", async () => {
    expect(extractor.supports("scan.pdf")).toBe(false);
    const error = await extractor.extract({ filename: "scan.pdf", content: "%PDF" }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({ message: "No extractor for .pdf files", stage: "extract" });
  });

  it("rejects empty files", async () => {
    await expect(extractor.extract({ filename: "blank.txt", content: " \n " })).rejects.toThrow("blank.txt is empty");
  });
});
