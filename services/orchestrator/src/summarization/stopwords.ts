import { readFile } from "node:fs/promises";

import { z } from "zod";

export type StopWordLoader = (language: string) => Promise<ReadonlySet<string>>;

const wordListSchema = z.array(z.string().min(1));

export function languageOf(locale: string): string {
  return locale.split(/[-_]/)[0].toLowerCase();
}

export const loadStopWords: StopWordLoader = async (language) => {
  if (!/^[a-z]{2,3}$/.test(language)) {
    throw new Error(`Unsupported language "${language}"`);
  }
  const file = new URL(`../../data/stopwords-${language}.json`, import.meta.url);
  const words = wordListSchema.parse(JSON.parse(await readFile(file, "utf8")));
  return new Set(words.map((word) => word.toLowerCase()));
};
