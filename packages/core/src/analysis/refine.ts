import type { RefinedExcerpt, ScoredSection, SubsectionAnalysis } from "../types";
import { scoreRelevance } from "./relevance";

const MIN_SENTENCE_LENGTH = 20;

interface ScoredSentence {
  text: string;
  score: number;
}

export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+/)
    .map((s) => s.trim())
    .filter((s) => s.length > MIN_SENTENCE_LENGTH);
}

function scoreSentences(text: string, persona: string, job: string): ScoredSentence[] {
  return splitSentences(text)
    .map((s) => ({ text: s, score: scoreRelevance(s, persona, job) }))
    .sort((a, b) => b.score - a.score);
}

export function extractKeyPoints(text: string, persona: string, job: string, max = 5): string[] {
  return scoreSentences(text, persona, job)
    .slice(0, max)
    .map((s) => s.text);
}

function terminate(text: string): string {
  const core = text.replace(/[.!?\s]+$/, "");
  return core ? `${core}.` : "";
}

/** Condenses text to its three most relevant sentences (four when that stays short). */
export function refineText(text: string, persona: string, job: string): string {
  const scored = scoreSentences(text, persona, job);
  if (!scored.length) return terminate(text.trim());
  let refined = scored.slice(0, 3).map((s) => s.text).join(". ");
  if (refined.length < 100 && scored.length > 3) refined += ". " + scored[3].text;
  return terminate(refined);
}

export interface RefineOptions {
  sections: number;
  keyPoints: number;
  maxExcerpts: number;
}

export function analyzeSubsections(
  ranked: ScoredSection[],
  persona: string,
  job: string,
  opts: RefineOptions = { sections: 10, keyPoints: 5, maxExcerpts: 15 }
): RefinedExcerpt[] {
  const excerpts: RefinedExcerpt[] = [];
  for (const section of ranked.slice(0, opts.sections)) {
    const points = extractKeyPoints(section.body, persona, job, opts.keyPoints);
    points.forEach((point, i) => {
      excerpts.push({
        document: section.document,
        page: section.page,
        refinedText: refineText(point, persona, job),
        relevanceScore: points.length - i,
      });
    });
  }
  return excerpts.sort((a, b) => b.relevanceScore - a.relevanceScore).slice(0, opts.maxExcerpts);
}

export function toSubsectionAnalysis(e: RefinedExcerpt): SubsectionAnalysis {
  return {
    document: e.document,
    page_number: e.page,
    refined_text: e.refinedText,
    relevance_score: e.relevanceScore,
  };
}
