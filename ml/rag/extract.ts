import path from "node:path";
import crypto from "node:crypto";
import { ExtractionError } from "./errors";

export type ExtractInput = {
  filename: string;
  content: string;
};

export type ExtractedText = {
  raw_text: string;
  page_map: number[];
  document_type: string;
};

export interface Extractor {
  supports(filename: string): boolean;
  extract(input: ExtractInput): Promise<ExtractedText>;
}

const PAGE_BREAK = "\f";

export function documentTypeOf(filename: string): string {
  return path.extname(filename).replace(/^\./, "").toLowerCase();
}

export function defaultDocumentId(filename: string): string {
  return crypto.createHash("sha256").update(filename).digest("hex").slice(0, 16);
}

/** Page offsets of a form-feed separated text, with the form feeds removed. */
export function splitPages(content: string): { raw_text: string; page_map: number[] } {
  const pages = content.split(PAGE_BREAK);
  const pageMap: number[] = [];
  let rawText = "";
  pages.forEach((page, index) => {
    if (index > 0) rawText += "\n";
    pageMap.push(rawText.length);
    rawText += page;
  });
  return { raw_text: rawText, page_map: pageMap };
}

export class PlainTextExtractor implements Extractor {
  private extensions: Set<string>;

  constructor(extensions: string[] = ["txt", "md"]) {
    this.extensions = new Set(extensions);
  }

  supports(filename: string): boolean {
    return this.extensions.has(documentTypeOf(filename));
  }

  async extract(input: ExtractInput): Promise<ExtractedText> {
    const documentType = documentTypeOf(input.filename);
    if (!this.supports(input.filename)) {
      throw new ExtractionError({
        stage: "extract",
        reason: `No extractor for .${documentType || "(none)"} files`,
        context: { filename: input.filename },
      });
    }
    if (!input.content.trim()) {
      throw new ExtractionError({
        stage: "extract",
        reason: `${input.filename} is empty`,
        context: { filename: input.filename },
      });
    }
    return { ...splitPages(input.content), document_type: documentType };
  }
}
