import type { DocumentModel, Page } from "../types";
import { firstDefined, Strategy, StrategyHit } from "./strategy";
import { TITLE_BOILERPLATE, TITLE_KEYWORDS } from "./tables";

interface TitleCandidate {
  text: string;
  fontSize: number;
  top: number;
  page: number;
}

const QUOTE_CHARS = /["“”]/g;
const HAS_QUOTE = /["“”]/;
const QUOTED_PHRASE = /["“]([^"“”]+)["”]/g;
const VERBATIM_QUOTED_TITLE = /["“]([^"“”\n]{3,})["”][ \t]+(challenge|hackathon|introduction)\b/i;

const LAYOUT_SCAN_PAGES = 3;
const LEADING_LINES = 10;
const TITLE_REGION = 0.4;

function hasTitleKeyword(text: string): boolean {
  const lower = text.toLowerCase();
  return TITLE_KEYWORDS.some((k) => lower.includes(k));
}

function stripQuotes(text: string): string {
  return text.replace(QUOTE_CHARS, "").trim();
}

/** `"Quoted Name" Keyword` written out on the page; beats any layout scoring. */
export function verbatimQuotedTitle(text: string): string | undefined {
  const m = VERBATIM_QUOTED_TITLE.exec(text);
  if (!m) return undefined;
  return `"${m[1].trim()}" ${m[2]}`;
}

/** Longest quoted phrase (> 10 chars) that carries a title keyword. */
export function longestQuotedPhrase(text: string): string | undefined {
  const matches = Array.from(text.matchAll(QUOTED_PHRASE), (m) => m[1])
    .filter((q) => q.length > 10 && hasTitleKeyword(q));
  if (!matches.length) return undefined;
  const longest = matches.reduce((best, q) => (q.length > best.length ? q : best));
  return longest.replace(/\s+/g, " ").trim();
}

// Text of the lines that start in the top of the page, where a title can sit.
function titleRegionText(page: Page): string {
  return page.lines
    .filter((line) => line.spans.length > 0 && line.spans[0].bbox[1] < page.height * TITLE_REGION)
    .map((line) => line.spans.map((s) => s.text.trim()).join(" "))
    .join("\n");
}

export function layoutCandidates(page: Page): TitleCandidate[] {
  const out: TitleCandidate[] = [];
  for (const line of page.lines) {
    for (const span of line.spans) {
      const text = span.text.trim();
      if (text.length <= 10 || text.length >= 150) continue;
      if (span.fontSize <= 14) continue;
      if (span.bbox[1] >= page.height * TITLE_REGION) continue;
      const lower = text.toLowerCase();
      if (TITLE_BOILERPLATE.some((b) => lower.includes(b))) continue;
      out.push({ text, fontSize: span.fontSize, top: span.bbox[1], page: page.number });
    }
  }
  return out.sort((a, b) => b.fontSize - a.fontSize || a.top - b.top || a.page - b.page);
}

function titleFromPage(page: Page): string | undefined {
  const verbatim = verbatimQuotedTitle(titleRegionText(page));
  if (verbatim) return verbatim;

  const preferred = layoutCandidates(page).find(
    (c) => HAS_QUOTE.test(c.text) || /^\p{Lu}/u.test(c.text) || hasTitleKeyword(c.text)
  );
  if (!preferred) return undefined;
  if (HAS_QUOTE.test(preferred.text)) {
    const full = longestQuotedPhrase(page.plainText);
    if (full) return full;
  }
  return stripQuotes(preferred.text);
}

export function titleFromFilename(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? "";
  const stem = base.replace(/\.[^.]+$/, "").replace(/[_-]/g, " ").trim();
  return stem || "Untitled Document";
}

const TITLE_STRATEGIES: ReadonlyArray<Strategy<DocumentModel, string>> = [
  {
    name: "metadata",
    run: (doc) => (doc.metadataTitle && doc.metadataTitle.trim() ? doc.metadataTitle.trim() : undefined),
  },
  {
    name: "layout",
    run: (doc) => {
      for (const page of doc.pages.slice(0, LAYOUT_SCAN_PAGES)) {
        const title = titleFromPage(page);
        if (title) return title;
      }
      return undefined;
    },
  },
  {
    name: "leading-lines",
    run: (doc) => {
      const first = doc.pages[0];
      if (!first) return undefined;
      for (const raw of first.plainText.split("\n").slice(0, LEADING_LINES)) {
        const line = raw.trim();
        const verbatim = verbatimQuotedTitle(line);
        if (verbatim) return verbatim;
        if (line.length > 15 && line.length < 100 && hasTitleKeyword(line)) return line;
      }
      return undefined;
    },
  },
  {
    name: "quoted-phrase",
    run: (doc) => (doc.pages[0] ? longestQuotedPhrase(doc.pages[0].plainText) : undefined),
  },
  {
    name: "filename",
    run: (doc) => titleFromFilename(doc.name),
  },
];

export function resolveTitleDetailed(doc: DocumentModel): StrategyHit<string> {
  return firstDefined(TITLE_STRATEGIES, doc) ?? { strategy: "filename", result: titleFromFilename(doc.name) };
}

export function resolveTitle(doc: DocumentModel): string {
  return resolveTitleDetailed(doc).result;
}
