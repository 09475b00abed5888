import stopwordList from "./data/stopwords.json";
import domainKeywordTable from "./data/domain-keywords.json";

// Process-wide heuristic tables. Loaded once, never mutated.

export type Domain = keyof typeof domainKeywordTable;

export const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export const DOMAIN_KEYWORDS: Readonly<Record<Domain, readonly string[]>> = Object.freeze({
  researcher: Object.freeze([...domainKeywordTable.researcher]),
  student: Object.freeze([...domainKeywordTable.student]),
  analyst: Object.freeze([...domainKeywordTable.analyst]),
  business: Object.freeze([...domainKeywordTable.business]),
  technical: Object.freeze([...domainKeywordTable.technical]),
});

export const TITLE_KEYWORDS = Object.freeze(["challenge", "hackathon", "introduction"]);

export const TITLE_BOILERPLATE = Object.freeze([
  "page ", "figure ", "table ", "section ", "chapter ",
  "http", "www.", ".com", ".pdf", "appendix",
]);

export const TOP_LEVEL_HEADINGS = Object.freeze([
  "introduction", "overview", "conclusion", "summary", "references",
  "acknowledgements", "table of contents", "revision history",
]);
