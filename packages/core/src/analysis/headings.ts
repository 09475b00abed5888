import type { DocumentModel, HeadingEntry, HeadingLevel, TextLine } from "../types";
import { firstDefined, Strategy } from "./strategy";
import { TOP_LEVEL_HEADINGS } from "./tables";

export interface FontThresholds {
  h1: number;
  h2: number;
  h3: number;
}

// Matched against the lower-cased, trimmed text.
const EXCLUDE_PATTERNS: RegExp[] = [
  /^\d+$/,
  /^page \d+/,
  /^\d+\.\d+$/,
  /^figure \d+/,
  /^table \d+/,
  /^\w+@\w+\.\w+/,
  /^https?:\/\//,
  /^www\./,
  /\.com/,
  /\.git$/,
  /github\.com/,
  /:\/\/.*\.git/,
];

const DOMAIN_LIKE = /[a-z0-9.-]+\.(com|org|net|edu|gov|mil|int)/;

const POSITIVE_PATTERNS: RegExp[] = [
  /^\d+\.?\s+\w+/,
  /^chapter \d+/i,
  /^section \d+/i,
  /^round \d+[a-z]?:?/i,
  /^[A-Z][a-z]+(\s+[A-Z][a-z]+)*:?$/,
  /^[A-Z]{2,}/,
  /challenge|hackathon|appendix/i,
];

const STRUCTURAL_PATTERNS: RegExp[] = [
  /^\d+\.?\s+/,
  /^(chapter|section|part|appendix)\s+\d+/,
  /^(introduction|overview|conclusion|summary|references|acknowledgements)/,
  /^(table of contents|revision history)/,
  /:\s*$/,
];

function isLinkLike(text: string): boolean {
  return /https?:\/\//.test(text) || text.toLowerCase().includes("github.com") || text.endsWith(".git");
}

/** Shared plausibility filter for TOC titles and layout lines. */
export function isLikelyHeading(text: string): boolean {
  const lower = text.toLowerCase().trim();
  if (EXCLUDE_PATTERNS.some((rx) => rx.test(lower))) return false;
  if (lower.includes("www.") || lower.includes(".git") || DOMAIN_LIKE.test(lower)) return false;

  if (text.length > 150) return false;
  if (text.endsWith(".") && text.split(".").length - 1 > 1) return false;

  if (POSITIVE_PATTERNS.some((rx) => rx.test(text))) return true;
  if (text.endsWith(":") && text.split(/\s+/).length <= 8) return true;
  return text.split(/\s+/).length <= 12 && !text.endsWith(",") && !text.endsWith(".");
}

export function hasHeadingPattern(text: string): boolean {
  const lower = text.toLowerCase().trim();
  return STRUCTURAL_PATTERNS.some((rx) => rx.test(lower));
}

/** Font-size thresholds for H1/H2/H3; undefined when the document has no sized text. */
export function deriveThresholds(fontSizes: number[]): FontThresholds | undefined {
  const sizes = fontSizes.filter((s) => s > 0);
  if (!sizes.length) return undefined;
  const distinct = [...new Set(sizes)].sort((a, b) => b - a);
  if (distinct.length >= 3) return { h1: distinct[0], h2: distinct[1], h3: distinct[2] };
  if (distinct.length === 2) return { h1: distinct[0], h2: distinct[1], h3: distinct[1] - 1 };
  const avg = sizes.reduce((a, b) => a + b, 0) / sizes.length;
  return { h1: avg + 4, h2: avg + 2, h3: avg };
}

function toLevel(n: number): HeadingLevel {
  if (n <= 1) return "H1";
  return n === 2 ? "H2" : "H3";
}

export function headingLevel(text: string, fontSize: number, t: FontThresholds): HeadingLevel {
  let level = fontSize >= t.h1 ? 1 : fontSize >= t.h2 ? 2 : 3;
  const lower = text.toLowerCase().trim();
  if (TOP_LEVEL_HEADINGS.some((k) => lower.includes(k)) || /^\d+\.\s+[A-Z]/.test(text)) {
    level = Math.min(level, 1);
  } else if (/^\d+\.\d+\s+/.test(text)) {
    level = Math.min(level, 2);
  } else if (/^\d+\.\d+\.\d+\s+/.test(text)) {
    level = 3;
  }
  return toLevel(level);
}

interface LineFeatures {
  text: string;
  maxFontSize: number;
  bold: boolean;
}

function lineFeatures(line: TextLine): LineFeatures {
  let text = "";
  let maxFontSize = 0;
  let bold = false;
  for (const span of line.spans) {
    text += span.text.trim() + " ";
    maxFontSize = Math.max(maxFontSize, span.fontSize);
    bold = bold || span.bold;
  }
  return { text: text.trim(), maxFontSize, bold };
}

export function outlineFromToc(doc: DocumentModel): HeadingEntry[] | undefined {
  if (!doc.toc || !doc.toc.length) return undefined;
  const out: HeadingEntry[] = [];
  for (const entry of doc.toc) {
    const title = entry.title.trim();
    if (isLinkLike(title) || !isLikelyHeading(title)) continue;
    out.push({ level: toLevel(entry.level), text: title, page: entry.page });
  }
  return out;
}

export function outlineFromLayout(doc: DocumentModel): HeadingEntry[] {
  const sizes: number[] = [];
  for (const page of doc.pages) {
    for (const line of page.lines) for (const span of line.spans) sizes.push(span.fontSize);
  }
  const thresholds = deriveThresholds(sizes);
  if (!thresholds) return [];

  const out: HeadingEntry[] = [];
  for (const page of doc.pages) {
    for (const line of page.lines) {
      const { text, maxFontSize, bold } = lineFeatures(line);
      if (isLinkLike(text)) continue;
      if (text.length <= 3 || text.length >= 200 || !isLikelyHeading(text)) continue;
      if (maxFontSize >= thresholds.h3 || bold || hasHeadingPattern(text)) {
        out.push({ level: headingLevel(text, maxFontSize, thresholds), text, page: page.number });
      }
    }
  }
  return out;
}

const OUTLINE_STRATEGIES: ReadonlyArray<Strategy<DocumentModel, HeadingEntry[]>> = [
  { name: "toc", run: outlineFromToc },
  { name: "layout", run: outlineFromLayout },
];

/** Title-free H1..H3 outline in document order. The declared TOC wins over layout analysis. */
export function classifyHeadings(doc: DocumentModel): HeadingEntry[] {
  return firstDefined(OUTLINE_STRATEGIES, doc)?.result ?? [];
}
