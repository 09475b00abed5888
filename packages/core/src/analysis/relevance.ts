import { tokenize } from "./tokenizer";
import { DOMAIN_KEYWORDS } from "./tables";

// Pseudo-IDF for a notional 10-document corpus.
const IDF = Math.log(10);

const WEIGHTS = { persona: 0.3, job: 0.4, tfidf: 0.2, domain: 0.1 } as const;

export interface RelevanceBreakdown {
  persona: number;
  job: number;
  tfidf: number;
  domain: number;
  total: number;
}

/** Jaccard similarity averaged with coverage of the target set. */
export function tokenOverlap(textTokens: string[], targetTokens: string[]): number {
  const target = new Set(targetTokens);
  if (target.size === 0) return 0;
  const text = new Set(textTokens);
  let shared = 0;
  for (const t of target) if (text.has(t)) shared++;
  const union = new Set([...text, ...target]).size;
  const jaccard = union ? shared / union : 0;
  const coverage = shared / target.size;
  return (jaccard + coverage) / 2;
}

export function tfidfScore(textTokens: string[], keyTerms: string[]): number {
  if (!keyTerms.length || !textTokens.length) return 0;
  const counts = new Map<string, number>();
  for (const t of textTokens) counts.set(t, (counts.get(t) ?? 0) + 1);
  let score = 0;
  for (const term of new Set(keyTerms)) {
    const n = counts.get(term);
    if (n) score += (n / textTokens.length) * IDF;
  }
  return Math.min(score, 1);
}

/** Keywords of every domain named in the persona, or the job's own tokens when none is. */
export function domainKeywordsFor(persona: string, job: string): string[] {
  const p = persona.toLowerCase();
  const out = new Set<string>();
  for (const [domain, words] of Object.entries(DOMAIN_KEYWORDS)) {
    if (p.includes(domain)) words.forEach((w) => out.add(w));
  }
  if (out.size === 0) tokenize(job).forEach((w) => out.add(w));
  return [...out];
}

export function domainScore(text: string, persona: string, job: string): number {
  const keywords = domainKeywordsFor(persona, job);
  if (!keywords.length) return 0;
  const lower = text.toLowerCase();
  const hits = keywords.filter((k) => lower.includes(k)).length;
  return Math.min(hits / keywords.length, 1);
}

export function scoreBreakdown(text: string, persona: string, job: string): RelevanceBreakdown {
  const zero = { persona: 0, job: 0, tfidf: 0, domain: 0, total: 0 };
  if (!text || !text.trim()) return zero;
  const textTokens = tokenize(text);
  if (!textTokens.length) return zero;
  const personaTokens = tokenize(persona);
  const jobTokens = tokenize(job);

  const parts = {
    persona: tokenOverlap(textTokens, personaTokens),
    job: tokenOverlap(textTokens, jobTokens),
    tfidf: tfidfScore(textTokens, [...personaTokens, ...jobTokens]),
    domain: domainScore(text, persona, job),
  };
  const raw =
    parts.persona * WEIGHTS.persona +
    parts.job * WEIGHTS.job +
    parts.tfidf * WEIGHTS.tfidf +
    parts.domain * WEIGHTS.domain;
  return { ...parts, total: Math.min(raw, 1) };
}

/** Relevance of `text` to a persona and job, in [0, 1]. */
export function scoreRelevance(text: string, persona: string, job: string): number {
  return scoreBreakdown(text, persona, job).total;
}
