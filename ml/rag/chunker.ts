import type { Chunk, PolicyDocument } from "./types";
import { ChunkingError } from "./errors";

export const DEFAULT_CHUNK_SIZE = 512;
export const DEFAULT_CHUNK_OVERLAP = 128;
// Longest whitespace-free run counted as one token; longer runs are hard-cut.
export const HARD_CUT_CHARS = 48;

export type ChunkerOptions = {
  chunk_size?: number;
  chunk_overlap?: number;
};

export type NormalizedText = {
  text: string;
  page_starts: number[];
};

type TokenSpan = {
  start: number;
  end: number;
};

const BOUNDARY = {
  hard: 0,
  whitespace: 1,
  sentence: 2,
  paragraph: 3,
} as const;

type Boundary = (typeof BOUNDARY)[keyof typeof BOUNDARY];

const SENTENCE_END = /[.!?]["')\]]*$/;

function normalizePage(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/[\u0000-\u0008\u000B-\u001F\u007F]/g, " ")
    .replace(/[ \t]+/g, " ")
    .replace(/ ?\n ?/g, "\n")
    .replace(/([A-Za-z])-\n(?=[a-z])/g, "$1")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Normalize each page slice of raw_text and recompute where every page starts in
 * the normalized text. Pages are separated by a blank line, so page breaks also
 * act as paragraph boundaries for splitting.
 */
export function normalizeDocumentText(rawText: string, pageMap: number[]): NormalizedText {
  const starts = pageMap.length > 0 ? pageMap : [0];
  starts.forEach((offset, index) => {
    const previous = index === 0 ? 0 : starts[index - 1];
    if (!Number.isInteger(offset) || offset < previous || offset > rawText.length) {
      throw new ChunkingError({
        stage: "chunk",
        reason: `page_map must be non-decreasing offsets within the text (page ${index + 1} starts at ${offset})`,
      });
    }
  });

  let text = "";
  const pageStarts: number[] = [];
  starts.forEach((offset, index) => {
    const from = index === 0 ? 0 : offset;
    const to = index + 1 < starts.length ? starts[index + 1] : rawText.length;
    const page = normalizePage(rawText.slice(from, to));
    if (!page) {
      pageStarts.push(text.length === 0 ? 0 : text.length + 2);
      return;
    }
    if (text.length > 0) text += "\n\n";
    pageStarts.push(text.length);
    text += page;
  });

  return { text, page_starts: pageStarts };
}

export function pageForOffset(pageStarts: number[], offset: number): number {
  let low = 0;
  let high = pageStarts.length - 1;
  let page = 0;
  while (low <= high) {
    const mid = (low + high) >> 1;
    if (pageStarts[mid] <= offset) {
      page = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }
  return page + 1;
}

function tokenize(text: string): TokenSpan[] {
  const spans: TokenSpan[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    for (let cut = start; cut < end; cut += HARD_CUT_CHARS) {
      spans.push({ start: cut, end: Math.min(cut + HARD_CUT_CHARS, end) });
    }
  }
  return spans;
}

// Boundary quality between tokens[index - 1] and tokens[index].
function boundaryAt(text: string, tokens: TokenSpan[], index: number): Boundary {
  const before = tokens[index - 1];
  const after = tokens[index];
  if (before.end === after.start) return BOUNDARY.hard;
  const gap = text.slice(before.end, after.start);
  if (gap.includes("\n\n")) return BOUNDARY.paragraph;
  if (gap.includes("\n") || SENTENCE_END.test(text.slice(before.start, before.end))) {
    return BOUNDARY.sentence;
  }
  return BOUNDARY.whitespace;
}

function pickWindowEnd(text: string, tokens: TokenSpan[], start: number, limit: number, size: number): number {
  const floor = start + Math.max(1, Math.floor(size / 2));
  for (const wanted of [BOUNDARY.paragraph, BOUNDARY.sentence, BOUNDARY.whitespace]) {
    for (let index = limit; index >= floor; index -= 1) {
      if (boundaryAt(text, tokens, index) >= wanted) return index;
    }
  }
  return limit;
}

export function resolveChunkerOptions(options: ChunkerOptions = {}): Required<ChunkerOptions> {
  const chunkSize = options.chunk_size ?? DEFAULT_CHUNK_SIZE;
  const chunkOverlap = options.chunk_overlap ?? DEFAULT_CHUNK_OVERLAP;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ChunkingError({ stage: "chunk", reason: `chunk_size must be a positive integer, got ${chunkSize}` });
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ChunkingError({
      stage: "chunk",
      reason: `chunk_overlap must be an integer in [0, chunk_size), got ${chunkOverlap}`,
    });
  }
  return { chunk_size: chunkSize, chunk_overlap: chunkOverlap };
}

/**
 * Split a document into overlapping, page-attributed chunks ordered by
 * sequence_index. Token windows end on the best boundary found in their second
 * half: paragraph, then sentence or line, then whitespace, then a hard cut.
 */
export function chunkDocument(document: PolicyDocument, options: ChunkerOptions = {}): Chunk[] {
  const { chunk_size: size, chunk_overlap: overlap } = resolveChunkerOptions(options);
  const { text, page_starts: pageStarts } = normalizeDocumentText(document.raw_text, document.page_map);
  if (!text) {
    throw new ChunkingError({
      stage: "chunk",
      reason: `Document ${document.filename} has no text after normalization`,
      context: { document_id: document.document_id },
    });
  }

  const tokens = tokenize(text);
  const chunks: Chunk[] = [];
  let start = 0;

  while (start < tokens.length) {
    const limit = Math.min(start + size, tokens.length);
    const end = limit < tokens.length ? pickWindowEnd(text, tokens, start, limit, size) : limit;
    const startOffset = tokens[start].start;
    const endOffset = tokens[end - 1].end;
    const chunkText = text.slice(startOffset, endOffset);
    const sequenceIndex = chunks.length;

    chunks.push({
      chunk_id: `${document.document_id}_${sequenceIndex}`,
      document_id: document.document_id,
      filename: document.filename,
      document_type: document.document_type,
      text: chunkText,
      token_count: end - start,
      char_count: chunkText.length,
      page_number: pageForOffset(pageStarts, startOffset),
      sequence_index: sequenceIndex,
      start_offset: startOffset,
      end_offset: endOffset,
    });

    if (end >= tokens.length) break;
    start = Math.max(end - overlap, start + 1);
  }

  return chunks;
}

export function chunkStatistics(chunks: Chunk[]) {
  if (chunks.length === 0) {
    return { total_chunks: 0, total_tokens: 0, total_chars: 0, avg_tokens_per_chunk: 0, avg_chars_per_chunk: 0 };
  }
  const totalTokens = chunks.reduce((sum, chunk) => sum + chunk.token_count, 0);
  const totalChars = chunks.reduce((sum, chunk) => sum + chunk.char_count, 0);
  return {
    total_chunks: chunks.length,
    total_tokens: totalTokens,
    total_chars: totalChars,
    avg_tokens_per_chunk: totalTokens / chunks.length,
    avg_chars_per_chunk: totalChars / chunks.length,
  };
}
