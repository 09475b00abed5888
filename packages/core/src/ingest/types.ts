export type IngestOptions = {
  mime?: string;
  filename?: string;
  // PDF only; pages past this are ignored
  maxPages?: number;
};

// Minimal pdfjs-like surface. Kept structural so the reader can run against pdfjs-dist
// proxies or in-memory fakes.

export type PdfOutlineNodeLike = {
  title: string;
  dest: unknown;
  items: PdfOutlineNodeLike[];
};

export type PdfRefLike = { num: number; gen: number };

export type PdfTextContentLike = {
  items: unknown[];
  styles: Record<string, { fontFamily: string }>;
};

export type PdfPageLike = {
  getViewport(params: { scale: number }): { width: number; height: number };
  getTextContent(): Promise<PdfTextContentLike>;
  getOperatorList(): Promise<unknown>;
  commonObjs: { has(id: string): boolean; get(id: string): unknown };
};

export type PdfDocLike = {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPageLike>;
  getMetadata(): Promise<{ info: unknown }>;
  getOutline(): Promise<PdfOutlineNodeLike[] | null>;
  getDestination(id: string): Promise<unknown[] | null>;
  getPageIndex(ref: PdfRefLike): Promise<number>;
  destroy(): Promise<void>;
};
