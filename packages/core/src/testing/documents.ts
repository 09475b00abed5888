import type { BBox, DocumentModel, Page, Span, TextLine } from "../types";

export interface SpanSpec {
  text: string;
  size?: number;
  bold?: boolean;
  top?: number;
}

export function span(page: number, s: SpanSpec): Span {
  const size = s.size ?? 11;
  const top = s.top ?? 500;
  const bbox: BBox = [72, top, 72 + s.text.length * size * 0.5, top + size];
  return { text: s.text, fontSize: size, bold: s.bold ?? false, bbox, page };
}

/** One span per line; plain text is the lines joined by newlines unless given. */
export function page(number: number, lines: SpanSpec[], plainText?: string): Page {
  const textLines: TextLine[] = lines.map((l) => ({ spans: [span(number, l)] }));
  return {
    number,
    width: 612,
    height: 792,
    plainText: plainText ?? lines.map((l) => l.text).join("\n"),
    lines: textLines,
  };
}

export function textPage(number: number, plainText: string): Page {
  return { number, width: 612, height: 792, plainText, lines: [] };
}

export function doc(name: string, pages: Page[], extra: Partial<DocumentModel> = {}): DocumentModel {
  return { name, pages, metadataTitle: null, toc: null, ...extra };
}
