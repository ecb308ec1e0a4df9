// src/lib/preprocessing.ts
import type { LanguageModel } from "./languageModel";

/**
 * Normalizes text into lemma tokens. Document chunks and questions must go
 * through the same instance, otherwise their embeddings are not comparable.
 */
export class TextPreprocessor {
  constructor(private model: LanguageModel) {}

  cleanText(text: string): string {
    return text
      .toLowerCase()
      .replace(/[^a-z\s]/g, "")
      .replace(/\s+/g, " ")
      .trim();
  }

  tokenize(text: string): string[] {
    if (!text) return [];
    return this.model
      .analyze(text)
      .filter((t) => t.isWord)
      .map((t) => t.text);
  }

  removeStopwords(tokens: string[]): string[] {
    if (tokens.length === 0) return [];
    return this.model
      .analyze(tokens.join(" "))
      .filter((t) => t.isWord && !t.isStopWord)
      .map((t) => t.text);
  }

  lemmatize(tokens: string[]): string[] {
    if (tokens.length === 0) return [];
    return this.model
      .analyze(tokens.join(" "))
      .filter((t) => t.isWord)
      .map((t) => t.lemma);
  }

  preprocess(text: string): string[] {
    const cleaned = this.cleanText(text);
    const tokens = this.tokenize(cleaned);
    const filtered = this.removeStopwords(tokens);
    return this.lemmatize(filtered);
  }

  /** The form that gets embedded: lemma tokens joined by single spaces. */
  preprocessToString(text: string): string {
    return this.preprocess(text).join(" ");
  }
}
