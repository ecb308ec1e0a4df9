import { describe, it, expect, vi } from "vitest";
import { ExtractiveAnswerGenerator, type AnswerGenerator } from "../answer";
import { EmbeddingProviderError, ExtractionError } from "../errors";
import {
  type DocumentStore,
  type RetrievalOptions,
  RetrievalService,
} from "../retrievalService";
import { SessionRegistry } from "../sessions";
import type { QueryMatch } from "../vectorIndex";
import type { QueryOptions, UpsertOptions } from "../vectorStore";
import { deferred } from "./doubles";

const OPTIONS: RetrievalOptions = {
  chunkSize: 2,
  overlap: 0,
  topK: 3,
  reduceDimensions: false,
  targetDimension: 128,
  sessionTtlMs: 60_000,
};

function stubStore(matches: QueryMatch[] = []) {
  return {
    upsert: vi.fn(async (chunks: string[], _options?: UpsertOptions) => chunks.length),
    query: vi.fn(async (_text: string, _options?: QueryOptions) => matches),
    deleteDocument: vi.fn(async (_documentId: string, chunkCount: number) => chunkCount),
    stats: vi.fn(async () => ({ totalVectorCount: 4, dimension: 768, indexFullness: 0 })),
  } satisfies DocumentStore;
}

function stubAnswers() {
  return { generate: vi.fn(async () => "stub answer") } satisfies AnswerGenerator;
}

const pdf = (fileName = "doc.pdf") => ({ fileName, bytes: Buffer.from("%PDF-1.4") });

describe("RetrievalService", () => {
  it("refuses questions before any upload without touching the store or the answerer", async () => {
    const store = stubStore();
    const answers = stubAnswers();
    const service = new RetrievalService({ store, answers, options: OPTIONS });

    const result = await service.askQuestion("s1", "What is this about?");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("NoDocumentLoaded");
    expect(result.error.message).toBe("No PDF uploaded. Please upload a PDF first.");
    expect(store.query).not.toHaveBeenCalled();
    expect(answers.generate).not.toHaveBeenCalled();
  });

  it("uploads a document as word-window chunks scoped to a new document id", async () => {
    const store = stubStore();
    const service = new RetrievalService({
      store,
      answers: stubAnswers(),
      options: OPTIONS,
      extractText: async () => "zero one\ntwo three four!",
    });

    const result = await service.uploadDocument("s1", pdf());

    expect(result).toMatchObject({ ok: true, fileName: "doc.pdf", chunkCount: 3 });
    if (!result.ok) return;
    expect(store.upsert).toHaveBeenCalledWith(["zero one", "two three", "four"], {
      documentId: result.documentId,
      reduceDimensions: false,
      targetDimension: 128,
    });
    expect(service.sessions.get("s1")?.state).toBe("READY");
  });

  it("answers from the retrieved chunks in score order", async () => {
    const store = stubStore([
      { id: "1", score: 0.9 },
      { id: "0", score: 0.5 },
    ]);
    const service = new RetrievalService({
      store,
      answers: new ExtractiveAnswerGenerator(),
      options: OPTIONS,
      extractText: async () => "zero one two three four five",
    });
    await service.uploadDocument("s1", pdf());

    const result = await service.askQuestion("s1", "  Which numbers?  ");

    expect(result).toEqual({
      ok: true,
      question: "Which numbers?",
      answer:
        "Based on the document, here are the most relevant passages:\n" +
        "[1] (chunk 1, score 0.900) two three\n" +
        "[2] (chunk 0, score 0.500) zero one",
      sources: [
        { id: "1", chunkIndex: 1, score: 0.9, text: "two three" },
        { id: "0", chunkIndex: 0, score: 0.5, text: "zero one" },
      ],
    });
    expect(store.query).toHaveBeenCalledWith("Which numbers?", {
      topK: 3,
      includeMetadata: true,
      documentId: expect.any(String),
    });
  });

  it("skips matches that point at no known chunk", async () => {
    const answers = stubAnswers();
    const store = stubStore([
      { id: "other:9", score: 0.8 },
      { id: "doc:1", score: 0.7, metadata: { documentId: "doc", chunkIndex: 0 } },
    ]);
    const service = new RetrievalService({
      store,
      answers,
      options: OPTIONS,
      extractText: async () => "alpha beta",
    });
    await service.uploadDocument("s1", pdf());

    const result = await service.askQuestion("s1", "alpha?");

    expect(result.ok && result.sources).toEqual([
      { id: "doc:1", chunkIndex: 0, score: 0.7, text: "alpha beta" },
    ]);
  });

  it("rejects a blank question", async () => {
    const service = new RetrievalService({ store: stubStore(), answers: stubAnswers(), options: OPTIONS });
    const result = await service.askQuestion("s1", "   ");
    expect(!result.ok && result.error.kind).toBe("InvalidRequestError");
  });

  it("reports a failed upload once, then asks for a new upload", async () => {
    const service = new RetrievalService({
      store: stubStore(),
      answers: stubAnswers(),
      options: OPTIONS,
      extractText: async () => {
        throw new ExtractionError("Could not read PDF: bad XRef entry");
      },
    });

    const upload = await service.uploadDocument("s1", pdf());
    expect(!upload.ok && upload.error.kind).toBe("ExtractionError");

    const first = await service.askQuestion("s1", "anything?");
    expect(!first.ok && first.error.message).toBe(
      "The last upload failed (Could not read PDF: bad XRef entry). Please upload a PDF again."
    );
    const second = await service.askQuestion("s1", "anything?");
    expect(!second.ok && second.error.message).toBe("No PDF uploaded. Please upload a PDF first.");
  });

  it("wraps unexpected extraction failures", async () => {
    const service = new RetrievalService({
      store: stubStore(),
      answers: stubAnswers(),
      options: OPTIONS,
      extractText: async () => {
        throw new Error("boom");
      },
    });
    const upload = await service.uploadDocument("s1", pdf());
    expect(upload.ok).toBe(false);
    if (upload.ok) return;
    expect(upload.error).toBeInstanceOf(ExtractionError);
    expect(upload.error.message).toBe("Error processing PDF: boom");
  });

  it("fails an upload whose text yields no chunks", async () => {
    const store = stubStore();
    const service = new RetrievalService({
      store,
      answers: stubAnswers(),
      options: OPTIONS,
      extractText: async () => "!!! ### ***",
    });
    const upload = await service.uploadDocument("s1", pdf());
    expect(!upload.ok && upload.error.message).toBe("No usable text found in the PDF");
    expect(store.upsert).not.toHaveBeenCalled();
  });

  it("replaces the previous document and deletes its vectors", async () => {
    const store = stubStore();
    const texts = ["a b c d e f", "g h"];
    const service = new RetrievalService({
      store,
      answers: stubAnswers(),
      options: OPTIONS,
      extractText: async () => texts.shift() ?? "",
    });

    const first = await service.uploadDocument("s1", pdf("one.pdf"));
    const second = await service.uploadDocument("s1", pdf("two.pdf"));

    if (!first.ok || !second.ok) throw new Error("uploads should succeed");
    expect(store.deleteDocument).toHaveBeenCalledTimes(1);
    expect(store.deleteDocument).toHaveBeenCalledWith(first.documentId, 3);
    expect(service.sessions.get("s1")?.document?.fileName).toBe("two.pdf");
  });

  it("discards an upload overtaken by a newer one in the same session", async () => {
    const store = stubStore();
    const slow = deferred<string>();
    const texts = [slow.promise, Promise.resolve("gamma delta")];
    const service = new RetrievalService({
      store,
      answers: stubAnswers(),
      options: OPTIONS,
      extractText: () => texts.shift() ?? Promise.resolve(""),
    });

    const pendingFirst = service.uploadDocument("s1", pdf("first.pdf"));
    const second = await service.uploadDocument("s1", pdf("second.pdf"));
    slow.resolve("alpha beta");
    const first = await pendingFirst;

    expect(second.ok).toBe(true);
    expect(first.ok).toBe(false);
    if (first.ok) return;
    expect(first.error.kind).toBe("UploadSuperseded");

    const firstCall = store.upsert.mock.calls.find(([chunks]) => chunks[0] === "alpha beta");
    const staleId = firstCall?.[1]?.documentId;
    expect(staleId).toEqual(expect.any(String));
    expect(store.deleteDocument).toHaveBeenCalledWith(staleId, 1);
    expect(service.sessions.get("s1")?.document?.fileName).toBe("second.pdf");
  });

  it("refuses questions while an upload is processing", async () => {
    const slow = deferred<string>();
    const started = deferred<void>();
    const service = new RetrievalService({
      store: stubStore(),
      answers: stubAnswers(),
      options: OPTIONS,
      extractText: () => {
        started.resolve();
        return slow.promise;
      },
    });

    const pending = service.uploadDocument("s1", pdf());
    await started.promise;
    const result = await service.askQuestion("s1", "ready yet?");
    slow.resolve("alpha beta");
    await pending;

    expect(!result.ok && result.error.message).toBe(
      "The PDF is still being processed. Please try again shortly."
    );
  });

  it("keeps sessions apart", async () => {
    const store = stubStore([{ id: "0", score: 1 }]);
    const texts = ["first doc", "second doc"];
    const service = new RetrievalService({
      store,
      answers: new ExtractiveAnswerGenerator(),
      options: OPTIONS,
      extractText: async () => texts.shift() ?? "",
    });
    await service.uploadDocument("s1", pdf());
    await service.uploadDocument("s2", pdf());

    const a = await service.askQuestion("s1", "which?");
    const b = await service.askQuestion("s2", "which?");
    expect(a.ok && a.sources[0].text).toBe("first doc");
    expect(b.ok && b.sources[0].text).toBe("second doc");
  });

  it("returns retrieval failures as values", async () => {
    const store = stubStore();
    store.query.mockRejectedValueOnce(new EmbeddingProviderError("Embedding request failed: 500"));
    const service = new RetrievalService({
      store,
      answers: stubAnswers(),
      options: OPTIONS,
      extractText: async () => "alpha beta",
    });
    await service.uploadDocument("s1", pdf());

    const result = await service.askQuestion("s1", "alpha?");
    expect(!result.ok && result.error.kind).toBe("EmbeddingProviderError");
  });

  it("deletes the session's document", async () => {
    const store = stubStore();
    const service = new RetrievalService({
      store,
      answers: stubAnswers(),
      options: OPTIONS,
      extractText: async () => "a b c d",
    });
    const upload = await service.uploadDocument("s1", pdf());
    if (!upload.ok) throw new Error("upload should succeed");

    await expect(service.deleteDocument("s1")).resolves.toEqual({ ok: true, deleted: 2 });
    expect(store.deleteDocument).toHaveBeenCalledWith(upload.documentId, 2);

    const again = await service.deleteDocument("s1");
    expect(!again.ok && again.error.kind).toBe("NoDocumentLoaded");
  });

  it("drops idle sessions and their vectors on the next upload", async () => {
    let now = 0;
    const store = stubStore();
    const service = new RetrievalService({
      store,
      answers: stubAnswers(),
      sessions: new SessionRegistry(() => now),
      options: { ...OPTIONS, sessionTtlMs: 1_000 },
      extractText: async () => "a b",
    });
    const stale = await service.uploadDocument("idle", pdf());
    if (!stale.ok) throw new Error("upload should succeed");

    now = 5_000;
    await service.uploadDocument("active", pdf());

    expect(store.deleteDocument).toHaveBeenCalledWith(stale.documentId, 1);
    expect(service.sessions.get("idle")).toBeNull();
  });

  it("reports index stats", async () => {
    const service = new RetrievalService({ store: stubStore(), answers: stubAnswers(), options: OPTIONS });
    await expect(service.indexStats()).resolves.toEqual({
      ok: true,
      stats: { totalVectorCount: 4, dimension: 768, indexFullness: 0 },
    });
  });
});
