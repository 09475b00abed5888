import { tokenize } from "./tokenizer";
import { splitSentences } from "./refine";

function mostCommon(items: string[], n: number): string[] {
  const counts = new Map<string, number>();
  for (const it of items) counts.set(it, (counts.get(it) ?? 0) + 1);
  // Map keeps first-seen order, so equal counts stay in text order
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, n)
    .map(([k]) => k);
}

export function extractKeyPhrases(text: string, max = 10): string[] {
  if (!text) return [];
  const tokens = tokenize(text);
  const half = Math.floor(max / 2);
  const bigrams = tokens.slice(1).map((t, i) => `${tokens[i]} ${t}`);
  return [...mostCommon(tokens, half), ...mostCommon(bigrams, half)].slice(0, max);
}

/** Extractive summary favouring the first and last sentences and moderate length. */
export function summarizeText(text: string, maxSentences = 3): string {
  if (!text) return "";
  const sentences = splitSentences(text);
  if (sentences.length <= maxSentences) return sentences.join(". ") + ".";

  const last = sentences.length - 1;
  const keep = new Set(
    sentences
      .map((s, i) => ({ i, score: (i === 0 || i === last ? 1 : 0.5) + Math.min(s.length / 100, 1) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, maxSentences)
      .map((s) => s.i)
  );
  return sentences.filter((_, i) => keep.has(i)).join(". ") + ".";
}
