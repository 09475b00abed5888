export { tokenize } from "./tokenizer";
export { scoreRelevance, scoreBreakdown, tokenOverlap, tfidfScore, domainScore, domainKeywordsFor } from "./relevance";
export type { RelevanceBreakdown } from "./relevance";
export { resolveTitle, resolveTitleDetailed, titleFromFilename } from "./title";
export { classifyHeadings, isLikelyHeading, deriveThresholds, headingLevel } from "./headings";
export type { FontThresholds } from "./headings";
export { segmentPage, segmentDocument, isSectionHeading } from "./sections";
export { rankSections, toExtractedSection } from "./ranking";
export { splitSentences, extractKeyPoints, refineText, analyzeSubsections } from "./refine";
export { extractKeyPhrases, summarizeText } from "./phrases";
export { extractStructure, processStructureBatch } from "./structure";
export type { DocumentLoader, BatchFailure, StructureResult } from "./structure";
export { analyzeDocuments, analyzePersonaBatch, loadDocuments, requirePersonaInputs } from "./persona";
export { firstDefined } from "./strategy";
export type { Strategy, StrategyHit } from "./strategy";
