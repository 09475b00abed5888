import { STOPWORDS } from "./tables";

const WORD = /\b[a-zA-Z]{2,}\b/g;

/**
 * Lower-cased alphabetic content tokens, in order. Tokens of two characters or fewer
 * and stopwords are dropped; there is no stemming.
 */
export function tokenize(text: string): string[] {
  const words = text.toLowerCase().match(WORD) ?? [];
  return words.filter((w) => w.length > 2 && !STOPWORDS.has(w));
}
