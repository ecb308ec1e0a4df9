// Test doubles shared by the pipeline tests.
import type { EmbeddingClient, EmbeddingIntent } from "../embeddings";
import type { AnalyzedToken, LanguageModel } from "../languageModel";

export const STOP_WORDS = new Set(["the", "a", "an", "is", "are", "of", "in", "and", "to"]);

/** Whitespace tokenizer; lemmas drop a trailing "s" from words longer than three letters. */
export class StubLanguageModel implements LanguageModel {
  analyze(text: string): AnalyzedToken[] {
    return text
      .split(/\s+/)
      .filter(Boolean)
      .map((w) => ({
        text: w,
        lemma: w.length > 3 && w.endsWith("s") ? w.slice(0, -1) : w,
        isStopWord: STOP_WORDS.has(w),
        isWord: /^[a-z]+$/i.test(w),
      }));
  }
}

export function fnv1a(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h >>> 0;
}

/** Bag-of-words vectors: each word adds 1 to the bucket its hash falls in. */
export class HashEmbeddingClient implements EmbeddingClient {
  readonly calls: Array<{ texts: string[]; intent: EmbeddingIntent }> = [];

  constructor(readonly dimension = 64) {}

  async embed(texts: string[], intent: EmbeddingIntent): Promise<number[][]> {
    this.calls.push({ texts, intent });
    return texts.map((t) => {
      const v = new Array<number>(this.dimension).fill(0);
      for (const w of t.split(/\s+/).filter(Boolean)) {
        v[fnv1a(w) % this.dimension] += 1;
      }
      return v;
    });
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
