import type { ExtractedSection, ScoredSection, Section } from "../types";
import { scoreRelevance } from "./relevance";

/**
 * Scores every section against the persona/job and keeps the `limit` best.
 * Ties keep extraction order (Array#sort is stable). Ranks are 1..K.
 */
export function rankSections(sections: Section[], persona: string, job: string, limit = 20): ScoredSection[] {
  return sections
    .map((s) => ({ ...s, score: scoreRelevance(s.body, persona, job), rank: 0 }))
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, limit))
    .map((s, i) => ({ ...s, rank: i + 1 }));
}

export function toExtractedSection(section: ScoredSection, textLimit = 500): ExtractedSection {
  return {
    document: section.document,
    page_number: section.page,
    section_title: section.title,
    importance_rank: section.rank,
    text: section.body.slice(0, textLimit),
  };
}
