// src/lib/languageModel.ts
import type winkNLP from "wink-nlp";
import type { ItemToken } from "wink-nlp";
import { PreprocessingUnavailable, errorMessage } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("languageModel");

export interface AnalyzedToken {
  text: string;
  lemma: string;
  isStopWord: boolean;
  /** False for punctuation, numbers, symbols and whitespace tokens. */
  isWord: boolean;
}

/** Tokenizer, stopword tagger and lemmatizer behind the text preprocessor. */
export interface LanguageModel {
  analyze(text: string): AnalyzedToken[];
}

type WinkNlp = ReturnType<typeof winkNLP>;

export class WinkLanguageModel implements LanguageModel {
  constructor(private nlp: WinkNlp) {}

  analyze(text: string): AnalyzedToken[] {
    const its = this.nlp.its;
    const tokens: AnalyzedToken[] = [];
    this.nlp
      .readDoc(text)
      .tokens()
      .each((t: ItemToken) => {
        tokens.push({
          text: t.out(),
          lemma: String(t.out(its.lemma)),
          isStopWord: t.out(its.stopWordFlag) === true,
          isWord: t.out(its.type) === "word",
        });
      });
    return tokens;
  }
}

let cached: Promise<LanguageModel> | null = null;

/**
 * Loads the English lite model once per process. A failure is not cached so a
 * later call can try again, but callers at startup treat it as fatal.
 */
export function loadLanguageModel(): Promise<LanguageModel> {
  if (!cached) {
    cached = (async () => {
      try {
        const [{ default: createNlp }, { default: model }] = await Promise.all([
          import("wink-nlp"),
          import("wink-eng-lite-web-model"),
        ]);
        const nlp = createNlp(model);
        log.info("Loaded wink-eng-lite-web-model");
        return new WinkLanguageModel(nlp);
      } catch (err) {
        log.error("Language model load failed:", err);
        throw new PreprocessingUnavailable(
          `Language model could not be loaded: ${errorMessage(err)}`,
          { cause: err }
        );
      }
    })();
    cached.catch(() => {
      cached = null;
    });
  }
  return cached;
}
