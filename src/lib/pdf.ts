// src/lib/pdf.ts
import pdf from "pdf-parse/lib/pdf-parse.js";
import { encode } from "gpt-tokenizer";
import { ConfigurationError, ExtractionError, errorMessage } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("pdf");

// input limit of the OpenAI embedding models
export const MAX_EMBEDDING_TOKENS = 8191;

export interface Chunk {
  /** 0-based ordinal assigned at split time; part of the vector id. */
  index: number;
  text: string;
  tokenCount: number;
}

const PDF_MAGIC = "%PDF-";

/** Checks the file header; says nothing about whether the PDF parses. */
export function looksLikePdf(bytes: Buffer): boolean {
  return bytes.subarray(0, PDF_MAGIC.length).toString("latin1") === PDF_MAGIC;
}

export async function extractTextFromPDF(fileBuffer: Buffer): Promise<string> {
  let text: string;
  try {
    const data = await pdf(fileBuffer);
    text = (data.text || "").trim();
  } catch (err) {
    log.error("PDF text extraction failed:", err);
    throw new ExtractionError(`Could not read PDF: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (!text) {
    throw new ExtractionError(
      "No text extracted — PDF may be scanned or image-based"
    );
  }
  return text;
}

export function cleanDocumentText(text: string): string {
  return text
    .replace(/\s+/g, " ")
    .replace(/[^a-zA-Z0-9\s.,]/g, "")
    .trim();
}

/**
 * Overlapping word windows over `text`. Window `n` starts at word
 * `n * (chunkSize - overlap)`; the last windows may be shorter. The returned
 * iterable is lazy and can be iterated more than once.
 */
export function splitIntoChunks(
  text: string,
  chunkSize = 500,
  overlap = 50
): Iterable<string> {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(
      `chunkSize must be a positive integer, got ${chunkSize}`
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(
      `overlap must be a non-negative integer, got ${overlap}`
    );
  }
  if (chunkSize <= overlap) {
    throw new ConfigurationError(
      `chunkSize (${chunkSize}) must be greater than overlap (${overlap})`
    );
  }

  const stride = chunkSize - overlap;
  return {
    *[Symbol.iterator]() {
      const words = text.split(/\s+/).filter(Boolean);
      for (let i = 0; i < words.length; i += stride) {
        yield words.slice(i, i + chunkSize).join(" ");
      }
    },
  };
}

export function buildChunks(
  cleanedText: string,
  chunkSize = 500,
  overlap = 50
): Chunk[] {
  const chunks: Chunk[] = [];
  let index = 0;
  for (const text of splitIntoChunks(cleanedText, chunkSize, overlap)) {
    const tokenCount = encode(text).length;
    if (tokenCount > MAX_EMBEDDING_TOKENS) {
      log.warn(
        `Chunk ${index} has ${tokenCount} tokens, above the embedding limit of ${MAX_EMBEDDING_TOKENS}`
      );
    }
    chunks.push({ index, text, tokenCount });
    index++;
  }

  if (chunks.length > 0) {
    const totalTokens = chunks.reduce((sum, c) => sum + c.tokenCount, 0);
    log.info("Chunk summary", {
      chunks: chunks.length,
      totalTokens,
      avgTokens: Math.round(totalTokens / chunks.length),
      maxTokensInChunk: Math.max(...chunks.map((c) => c.tokenCount)),
    });
  }

  return chunks;
}
