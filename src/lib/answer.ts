// src/lib/answer.ts
import OpenAI from "openai";
import { AnswerGenerationError, errorMessage } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("answer");

export interface Passage {
  id: string;
  chunkIndex: number;
  score: number;
  text: string;
}

export interface AnswerRequest {
  question: string;
  /** Retrieved chunks, best match first. */
  passages: Passage[];
}

export interface AnswerGenerator {
  generate(request: AnswerRequest): Promise<string>;
}

export const NOT_FOUND_ANSWER =
  "I couldn't find that information in the document. Please try rephrasing the question.";

export function safeSnippet(t: string, len = 800): string {
  if (!t) return "";
  return t.replace(/\s+/g, " ").trim().slice(0, len);
}

/** Lists the retrieved passages with their scores; no model involved. */
export class ExtractiveAnswerGenerator implements AnswerGenerator {
  constructor(private snippetLength = 400) {}

  async generate({ passages }: AnswerRequest): Promise<string> {
    if (passages.length === 0) return NOT_FOUND_ANSWER;
    const lines = passages.map(
      (p, i) =>
        `[${i + 1}] (chunk ${p.chunkIndex}, score ${p.score.toFixed(3)}) ${safeSnippet(
          p.text,
          this.snippetLength
        )}`
    );
    return `Based on the document, here are the most relevant passages:\n${lines.join("\n")}`;
  }
}

const SYSTEM_PROMPT = `
You are an assistant that answers questions about a PDF. Use ONLY the provided context snippets.
- Quote or paraphrase the snippets; do not add outside knowledge.
- If the snippets do not contain the answer, say you couldn't find it in the document.
Answer naturally and concisely.
`.trim();

export interface OpenAIAnswerOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
}

export class OpenAIAnswerGenerator implements AnswerGenerator {
  private openai: OpenAI;
  private model: string;
  private maxTokens: number;

  constructor(options: OpenAIAnswerOptions) {
    this.openai = new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? "gpt-4o-mini";
    this.maxTokens = options.maxTokens ?? 600;
  }

  async generate({ question, passages }: AnswerRequest): Promise<string> {
    if (passages.length === 0) return NOT_FOUND_ANSWER;

    const contextText = passages
      .map((p) => `[chunk ${p.chunkIndex}] ${safeSnippet(p.text, 1400)}`)
      .join("\n\n");

    try {
      const completion = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          {
            role: "user",
            content: `Context:\n${contextText}\n\nQuestion: ${question}`,
          },
        ],
        max_tokens: this.maxTokens,
      });
      const answer = completion.choices[0]?.message?.content?.trim();
      return answer || NOT_FOUND_ANSWER;
    } catch (err) {
      log.error("Answer generation failed:", err);
      throw new AnswerGenerationError(
        `Answer generation failed: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }
}
