export type BBox = [number, number, number, number]; // x0, y0, x1, y1; origin top-left

export interface Span {
  text: string;
  fontSize: number;
  bold: boolean;
  bbox: BBox;
  page: number; // 1-based
}

export interface TextLine {
  spans: Span[];
}

export interface Page {
  number: number; // 1-based
  width: number;
  height: number;
  plainText: string;
  lines: TextLine[];
}

export interface TocEntry {
  level: number;
  title: string;
  page: number;
}

export interface DocumentModel {
  name: string;
  pages: Page[];
  metadataTitle?: string | null;
  toc?: TocEntry[] | null;
}

export type HeadingLevel = "H1" | "H2" | "H3";

export interface HeadingEntry {
  level: HeadingLevel;
  text: string;
  page: number;
}

export interface Section {
  document: string;
  page: number;
  title: string;
  body: string;
}

export interface ScoredSection extends Section {
  score: number; // 0..1
  rank: number; // 1-based, dense
}

export interface RefinedExcerpt {
  document: string;
  page: number;
  refinedText: string;
  relevanceScore: number;
}

export interface AnalysisOptions {
  topSections: number;
  sectionTextLimit: number;
  refineSections: number;
  keyPointsPerSection: number;
  maxExcerpts: number;
  minSectionLength: number;
}

export const DEFAULT_ANALYSIS_OPTIONS: Readonly<AnalysisOptions> = Object.freeze({
  topSections: 20,
  sectionTextLimit: 500,
  refineSections: 10,
  keyPointsPerSection: 5,
  maxExcerpts: 15,
  minSectionLength: 100,
});

// Wire formats (snake_case, as written to disk / returned by the API)

export interface StructureOutput {
  title: string;
  outline: HeadingEntry[];
}

export interface ExtractedSection {
  document: string;
  page_number: number;
  section_title: string;
  importance_rank: number;
  text: string;
}

export interface SubsectionAnalysis {
  document: string;
  page_number: number;
  refined_text: string;
  relevance_score: number;
}

export interface PersonaAnalysisOutput {
  metadata: {
    input_documents: string[];
    persona: string;
    job_to_be_done: string;
    processing_timestamp: string;
  };
  extracted_sections: ExtractedSection[];
  subsection_analysis: SubsectionAnalysis[];
}
