import type { CallOptions, SummarizationResult } from "../types.js";

export interface Summarizer {
  readonly name: string;
  summarize(text: string, sentenceCount: number, options?: CallOptions): Promise<SummarizationResult>;
}
