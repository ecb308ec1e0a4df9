// src/lib/retrievalService.ts
import crypto from "crypto";
import type { AnswerGenerator, Passage } from "./answer";
import {
  AnswerGenerationError,
  ExtractionError,
  IndexProvisioningError,
  InvalidRequestError,
  NoDocumentLoaded,
  type PipelineError,
  UploadSuperseded,
  VectorDeletionError,
  asPipelineError,
  errorMessage,
} from "./errors";
import { createLogger } from "./logger";
import { buildChunks, cleanDocumentText, extractTextFromPDF } from "./pdf";
import { type LoadedDocument, SessionRegistry } from "./sessions";
import type { IndexStats, QueryMatch } from "./vectorIndex";
import { type VectorStore, chunkIndexFromId } from "./vectorStore";

const log = createLogger("retrieval");

/** The parts of VectorStore the service relies on. */
export type DocumentStore = Pick<
  VectorStore,
  "upsert" | "query" | "deleteDocument" | "stats"
>;

export interface RetrievalOptions {
  chunkSize: number;
  overlap: number;
  topK: number;
  reduceDimensions: boolean;
  targetDimension: number;
  sessionTtlMs: number;
}

export interface RetrievalServiceDeps {
  store: DocumentStore;
  answers: AnswerGenerator;
  options: RetrievalOptions;
  sessions?: SessionRegistry;
  extractText?: (bytes: Buffer) => Promise<string>;
}

export type ServiceResult<T> = ({ ok: true } & T) | { ok: false; error: PipelineError };

export interface UploadedFile {
  fileName: string;
  bytes: Buffer;
}

export type UploadResult = ServiceResult<{
  documentId: string;
  fileName: string;
  chunkCount: number;
}>;

export type AnswerResult = ServiceResult<{
  question: string;
  answer: string;
  sources: Passage[];
}>;

export type DeleteResult = ServiceResult<{ deleted: number }>;

export type StatsResult = ServiceResult<{ stats: IndexStats }>;

function fail(error: PipelineError): { ok: false; error: PipelineError } {
  return { ok: false, error };
}

export function toPassages(matches: QueryMatch[], doc: LoadedDocument): Passage[] {
  const passages: Passage[] = [];
  for (const m of matches) {
    const chunkIndex = m.metadata?.chunkIndex ?? chunkIndexFromId(m.id);
    if (chunkIndex === null) continue;
    const chunk = doc.chunks[chunkIndex];
    if (!chunk) continue;
    passages.push({ id: m.id, chunkIndex, score: m.score, text: chunk.text });
  }
  return passages;
}

/**
 * Upload and question flows over per-session document slots. Results are
 * returned as values; nothing thrown by a stage escapes these methods.
 */
export class RetrievalService {
  readonly sessions: SessionRegistry;
  private extractText: (bytes: Buffer) => Promise<string>;

  constructor(private deps: RetrievalServiceDeps) {
    this.sessions = deps.sessions ?? new SessionRegistry();
    this.extractText = deps.extractText ?? extractTextFromPDF;
  }

  private get options(): RetrievalOptions {
    return this.deps.options;
  }

  // stale vectors are filtered out by document id, so a failed cleanup is
  // reported but does not fail the request
  private async retire(doc: LoadedDocument): Promise<void> {
    try {
      await this.deps.store.deleteDocument(doc.documentId, doc.chunks.length);
    } catch (err) {
      log.warn(
        `Could not delete vectors of document ${doc.documentId}: ${errorMessage(err)}`
      );
    }
  }

  private async pruneIdleSessions(): Promise<void> {
    const expired = this.sessions.prune(this.options.sessionTtlMs);
    for (const s of expired) {
      if (s.document) await this.retire(s.document);
    }
    if (expired.length > 0) log.info(`Pruned ${expired.length} idle session(s)`);
  }

  async uploadDocument(sessionId: string, file: UploadedFile): Promise<UploadResult> {
    await this.pruneIdleSessions();

    const previous = this.sessions.getOrCreate(sessionId).document;
    const generation = this.sessions.markProcessing(sessionId);
    let pending: LoadedDocument | null = null;

    try {
      log.info(`[UPLOAD] ${file.fileName} (${file.bytes.length} bytes) for session ${sessionId}`);
      const text = await this.extractText(file.bytes);
      const cleaned = cleanDocumentText(text);
      const chunks = buildChunks(cleaned, this.options.chunkSize, this.options.overlap);
      if (chunks.length === 0) {
        throw new ExtractionError("No usable text found in the PDF");
      }

      pending = {
        documentId: crypto.randomUUID(),
        fileName: file.fileName,
        chunks,
        uploadedAt: Date.now(),
      };
      const count = await this.deps.store.upsert(
        chunks.map((c) => c.text),
        {
          documentId: pending.documentId,
          reduceDimensions: this.options.reduceDimensions,
          targetDimension: this.options.targetDimension,
        }
      );

      if (!this.sessions.isCurrent(sessionId, generation)) {
        await this.retire(pending);
        return fail(
          new UploadSuperseded(
            `Upload of ${file.fileName} was superseded by a newer upload`
          )
        );
      }

      this.sessions.markReady(sessionId, pending);
      if (previous) await this.retire(previous);

      log.info(`[UPLOAD] ${file.fileName} ready: ${count} chunks`);
      return {
        ok: true,
        documentId: pending.documentId,
        fileName: file.fileName,
        chunkCount: count,
      };
    } catch (err) {
      const error = asPipelineError(
        err,
        (message, cause) =>
          new ExtractionError(`Error processing PDF: ${message}`, { cause })
      );
      log.error(`[UPLOAD] ${file.fileName} failed: ${error.message}`);

      if (pending) await this.retire(pending);
      if (this.sessions.isCurrent(sessionId, generation)) {
        this.sessions.markFailed(sessionId, error.message);
        if (previous) await this.retire(previous);
      }
      return fail(error);
    }
  }

  async askQuestion(sessionId: string, question: string): Promise<AnswerResult> {
    const q = question.trim();
    if (!q) return fail(new InvalidRequestError("Question is required"));

    const failedUpload = this.sessions.takeError(sessionId);
    if (failedUpload) {
      return fail(
        new NoDocumentLoaded(
          `The last upload failed (${failedUpload}). Please upload a PDF again.`
        )
      );
    }

    const session = this.sessions.get(sessionId);
    if (session?.state === "PROCESSING") {
      return fail(
        new NoDocumentLoaded(
          "The PDF is still being processed. Please try again shortly."
        )
      );
    }
    const doc = session?.state === "READY" ? session.document : null;
    if (!doc) {
      return fail(new NoDocumentLoaded("No PDF uploaded. Please upload a PDF first."));
    }

    try {
      const matches = await this.deps.store.query(q, {
        topK: this.options.topK,
        includeMetadata: true,
        documentId: doc.documentId,
      });
      const sources = toPassages(matches, doc);
      log.debug(`Retrieved ${sources.length} passage(s) for "${q}"`);

      const answer = await this.deps.answers.generate({ question: q, passages: sources });
      return { ok: true, question: q, answer, sources };
    } catch (err) {
      const error = asPipelineError(
        err,
        (message, cause) =>
          new AnswerGenerationError(`Error processing question: ${message}`, { cause })
      );
      log.error(`Question failed: ${error.message}`);
      return fail(error);
    }
  }

  async deleteDocument(sessionId: string): Promise<DeleteResult> {
    const doc = this.sessions.get(sessionId)?.document;
    if (!doc) {
      return fail(new NoDocumentLoaded("No PDF uploaded. Nothing to delete."));
    }
    try {
      const deleted = await this.deps.store.deleteDocument(
        doc.documentId,
        doc.chunks.length
      );
      this.sessions.clear(sessionId);
      return { ok: true, deleted };
    } catch (err) {
      const error = asPipelineError(
        err,
        (message, cause) =>
          new VectorDeletionError(`Error deleting document: ${message}`, { cause })
      );
      return fail(error);
    }
  }

  async indexStats(): Promise<StatsResult> {
    try {
      return { ok: true, stats: await this.deps.store.stats() };
    } catch (err) {
      return fail(
        asPipelineError(
          err,
          (message, cause) =>
            new IndexProvisioningError(`Error reading index stats: ${message}`, { cause })
        )
      );
    }
  }
}
