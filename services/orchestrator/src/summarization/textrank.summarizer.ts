import { Injectable, Logger } from "@nestjs/common";

import type { SummarizerConfig } from "../config.js";
import { PipelineError } from "../errors.js";
import type { CallOptions, SummarizationResult } from "../types.js";
import { splitSentences, tokenize } from "./sentences.js";
import type { StopWordLoader } from "./stopwords.js";
import { languageOf, loadStopWords } from "./stopwords.js";
import type { Summarizer } from "./summarizer.js";
import { rankSentences, selectTop } from "./textrank.js";

/**
 * Extractive summarizer: ranks sentences by centrality in a lexical-overlap
 * graph and returns the best ones in the order they appear in the source.
 */
@Injectable()
export class TextRankSummarizer implements Summarizer {
  readonly name = "textrank";
  private readonly logger = new Logger(TextRankSummarizer.name);
  private stopWords?: Promise<ReadonlySet<string>>;

  private readonly locale: string;
  private readonly maxSentences: number;

  constructor(
    config: Pick<SummarizerConfig, "locale" | "maxSentences">,
    private readonly loader: StopWordLoader = loadStopWords,
  ) {
    this.locale = config.locale;
    this.maxSentences = config.maxSentences;
  }

  async summarize(text: string, sentenceCount: number, options: CallOptions = {}): Promise<SummarizationResult> {
    if (!text.trim()) {
      throw new PipelineError("InvalidInput", "summarize", "Text to summarize is empty");
    }
    if (!Number.isInteger(sentenceCount) || sentenceCount < 1) {
      throw new PipelineError("InvalidInput", "summarize", `Sentence count ${sentenceCount} must be a positive integer`);
    }
    options.signal?.throwIfAborted();

    const stopWords = await this.loadStopWords();
    const sentences = splitSentences(text, this.locale, this.maxSentences + 1);
    if (sentences.length > this.maxSentences) {
      throw new PipelineError(
        "PayloadTooLarge",
        "summarize",
        `Text has more than ${this.maxSentences} sentences`,
        { limit: this.maxSentences },
      );
    }

    let selected: string[];
    if (sentences.length <= sentenceCount) {
      selected = sentences;
    } else {
      const tokens = sentences.map((sentence) => tokenize(sentence, this.locale, stopWords));
      const scores = await rankSentences(tokens, options.signal);
      selected = selectTop(scores, sentenceCount).map((index) => sentences[index]);
    }

    return {
      summary: selected.join(" "),
      sentences: selected,
      sentenceCount: selected.length,
      requestedCount: sentenceCount,
    };
  }

  private loadStopWords(): Promise<ReadonlySet<string>> {
    if (!this.stopWords) {
      const language = languageOf(this.locale);
      this.stopWords = this.loader(language).catch((error: unknown) => {
        this.stopWords = undefined;
        this.logger.debug(`Stop words for "${language}" unavailable: ${error instanceof Error ? error.message : String(error)}`);
        throw new PipelineError("EngineUnavailable", "summarize", `Summarizer resources for "${language}" are unavailable`, {
          language,
        }, { cause: error });
      });
    }
    return this.stopWords;
  }
}
