import type { DocumentModel, Page, Section } from "../types";

const SECTION_HEADING_PATTERNS: RegExp[] = [
  /^[A-Z][A-Z\s]+$/, // ALL CAPS
  /^\d+\.?\s+[A-Z].*/, // numbered
  /^[A-Z][a-z]+(\s+[A-Z][a-z]+)*\s*$/, // Title Case
  /^(Chapter|Section|Part)\s+\d+/,
];

const MAX_HEADING_LENGTH = 100;
const INITIAL_SECTION_TITLE = "Introduction";

export function isSectionHeading(line: string): boolean {
  return line.length < MAX_HEADING_LENGTH && SECTION_HEADING_PATTERNS.some((rx) => rx.test(line));
}

/**
 * Splits one page into titled sections. Text before the first heading is filed under
 * "Introduction"; a section is kept only when its body is longer than `minLength`.
 */
export function segmentPage(documentName: string, page: Page, minLength = 100): Section[] {
  const sections: Section[] = [];
  let title = INITIAL_SECTION_TITLE;
  let body: string[] = [];

  const flush = () => {
    const text = body.join(" ").trim();
    if (text.length > minLength) sections.push({ document: documentName, page: page.number, title, body: text });
  };

  for (const raw of page.plainText.split("\n")) {
    const line = raw.trim();
    if (!line) continue;
    if (isSectionHeading(line)) {
      flush();
      title = line;
      body = [];
    } else {
      body.push(line);
    }
  }
  flush();
  return sections;
}

export function segmentDocument(doc: DocumentModel, minLength = 100): Section[] {
  return doc.pages.flatMap((page) => segmentPage(doc.name, page, minLength));
}
