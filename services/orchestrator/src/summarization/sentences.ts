const WORD = /[\p{L}\p{N}]+(?:'[\p{L}]+)*/gu;

/**
 * Sentence boundaries from ICU; each returned sentence is a trimmed slice of
 * `text`. Segmentation is lazy, so stopping at `limit` leaves the rest of the
 * text unscanned.
 */
export function splitSentences(text: string, locale: string, limit = Number.POSITIVE_INFINITY): string[] {
  const segmenter = new Intl.Segmenter(locale, { granularity: "sentence" });
  const sentences: string[] = [];
  for (const { segment } of segmenter.segment(text)) {
    const sentence = segment.trim();
    if (sentence) {
      sentences.push(sentence);
      if (sentences.length >= limit) {
        break;
      }
    }
  }
  return sentences;
}

export function tokenize(sentence: string, locale: string, stopWords: ReadonlySet<string>): Set<string> {
  const words = sentence.toLocaleLowerCase(locale).replace(/’/g, "'").match(WORD) ?? [];
  return new Set(words.filter((word) => !stopWords.has(word)));
}
