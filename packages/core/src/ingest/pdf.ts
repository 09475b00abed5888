import type { BBox, DocumentModel, Page, Span, TextLine, TocEntry } from '../types';
import type { IngestOptions, PdfDocLike, PdfOutlineNodeLike, PdfPageLike, PdfRefLike } from './types';
import { cleanPageText } from './text';
import { getLogger } from '../logger';
import { DocumentLoadError, errorMessage } from '../errors';

type PdfTextItem = {
  str: string;
  x: number;
  y: number; // baseline, PDF origin bottom-left
  width: number;
  height: number;
  fontSize: number;
  fontName: string;
};

const BOLD_FONT = /bold|black|heavy|semibold|demi/i;
const DEFAULT_MAX_PAGES = 200;

function asNum(n: unknown, fallback = 0): number {
  const v = Number(n);
  return Number.isFinite(v) ? v : fallback;
}

function isRef(v: unknown): v is PdfRefLike {
  return typeof v === 'object' && v !== null && 'num' in v && 'gen' in v
    && typeof v.num === 'number' && typeof v.gen === 'number';
}

function parseTextItem(raw: unknown): PdfTextItem | null {
  if (typeof raw !== 'object' || raw === null || !('str' in raw)) return null;
  if (typeof raw.str !== 'string' || !raw.str.trim()) return null;
  const tr: unknown[] = 'transform' in raw && Array.isArray(raw.transform) ? raw.transform : [];
  const [a, b, c, d, e, f] = [0, 1, 2, 3, 4, 5].map((i) => asNum(tr[i]));
  const fontSize = Math.max(Math.hypot(a, b), Math.hypot(c, d));
  const str = raw.str.replace(/[\u00A0]/g, ' ');
  return {
    str,
    x: e,
    y: f,
    width: ('width' in raw ? asNum(raw.width) : 0) || str.length * fontSize * 0.5,
    height: ('height' in raw ? asNum(raw.height) : 0) || fontSize,
    fontSize,
    fontName: 'fontName' in raw && typeof raw.fontName === 'string' ? raw.fontName : '',
  };
}

function clusterItemsIntoLines(items: PdfTextItem[]) {
  const lineTolerance = 3; // points
  const lines: Array<{ y: number; items: PdfTextItem[] }> = [];
  for (const item of items) {
    let line = lines.find((ln) => Math.abs(ln.y - item.y) <= lineTolerance);
    if (!line) {
      line = { y: item.y, items: [] };
      lines.push(line);
    }
    line.items.push(item);
  }

  // Sort top-to-bottom (PDF origin bottom-left)
  lines.sort((a, b) => b.y - a.y);
  for (const line of lines) line.items.sort((a, b) => a.x - b.x);
  return lines;
}

// Rebuild line text from geometry: wide jumps become tabs so columns stay apart,
// smaller gaps become spaces.
function lineText(items: PdfTextItem[]): string {
  const defaultWordGap = 2.5;
  const defaultColumnGap = 12;
  let totalWidth = 0;
  let totalChars = 0;
  for (const item of items) {
    totalWidth += item.width;
    totalChars += item.str.replace(/\s+/g, '').length || item.str.length;
  }
  const avgCharWidth = totalChars ? totalWidth / totalChars : 0;
  const wordGapThreshold = Math.max(defaultWordGap, avgCharWidth * 0.6);
  const columnGapThreshold = Math.max(defaultColumnGap, avgCharWidth * 3.5);

  let out = '';
  let prevRight: number | null = null;
  for (const item of items) {
    if (prevRight !== null) {
      const gap = item.x - prevRight;
      if (gap > columnGapThreshold) out += '\t';
      else if (gap > wordGapThreshold && !out.endsWith(' ') && !item.str.startsWith(' ')) out += ' ';
    }
    out += item.str;
    prevRight = item.x + item.width;
  }
  return out;
}

async function resolveBoldFonts(page: PdfPageLike, fontNames: Set<string>, styles: Record<string, { fontFamily: string }>): Promise<Set<string>> {
  const bold = new Set<string>();
  try {
    // Fonts land in commonObjs only once the operator list has been built.
    await page.getOperatorList();
  } catch (e) {
    getLogger('core').debug('ingest.pdf.fonts_unavailable', { error: errorMessage(e) });
  }
  for (const id of fontNames) {
    let name = styles[id]?.fontFamily ?? '';
    if (page.commonObjs.has(id)) {
      const font = page.commonObjs.get(id);
      if (typeof font === 'object' && font !== null && 'name' in font && typeof font.name === 'string') {
        name = `${font.name} ${name}`;
      }
    }
    if (BOLD_FONT.test(name)) bold.add(id);
  }
  return bold;
}

export async function readPage(page: PdfPageLike, pageNumber: number): Promise<Page> {
  const viewport = page.getViewport({ scale: 1 });
  const content = await page.getTextContent();
  const items = content.items
    .map(parseTextItem)
    .filter((it): it is PdfTextItem => it !== null);
  const bold = await resolveBoldFonts(page, new Set(items.map((it) => it.fontName)), content.styles);

  const lines: TextLine[] = [];
  const texts: string[] = [];
  for (const cluster of clusterItemsIntoLines(items)) {
    const spans: Span[] = cluster.items.map((it) => {
      const top = viewport.height - (it.y + it.height);
      const bbox: BBox = [it.x, top, it.x + it.width, viewport.height - it.y];
      return { text: it.str, fontSize: it.fontSize, bold: bold.has(it.fontName), bbox, page: pageNumber };
    });
    lines.push({ spans });
    texts.push(lineText(cluster.items));
  }

  return {
    number: pageNumber,
    width: viewport.width,
    height: viewport.height,
    plainText: cleanPageText(texts.join('\n')),
    lines,
  };
}

async function resolveDestinationPage(pdf: PdfDocLike, dest: unknown): Promise<number | null> {
  const explicit: unknown[] | null = typeof dest === 'string'
    ? await pdf.getDestination(dest)
    : Array.isArray(dest) ? dest : null;
  const target = explicit?.[0];
  if (typeof target === 'number') return target + 1;
  if (isRef(target)) return (await pdf.getPageIndex(target)) + 1;
  return null;
}

export async function readOutline(pdf: PdfDocLike): Promise<TocEntry[]> {
  const log = getLogger('core');
  const outline = await pdf.getOutline();
  const out: TocEntry[] = [];
  const walk = async (nodes: PdfOutlineNodeLike[], level: number) => {
    for (const node of nodes) {
      let page: number | null = null;
      try {
        page = await resolveDestinationPage(pdf, node.dest);
      } catch (e) {
        log.debug('ingest.pdf.outline_dest_unresolved', { title: node.title, error: errorMessage(e) });
      }
      if (page !== null) out.push({ level, title: node.title, page });
      await walk(node.items ?? [], level + 1);
    }
  };
  await walk(outline ?? [], 1);
  return out;
}

export async function readMetadataTitle(pdf: PdfDocLike): Promise<string | null> {
  const { info } = await pdf.getMetadata();
  if (typeof info === 'object' && info !== null && 'Title' in info && typeof info.Title === 'string') {
    return info.Title;
  }
  return null;
}

/** Converts an opened pdfjs document into the page/span model the analysis consumes. */
export async function readDocumentModel(pdf: PdfDocLike, name: string, maxPages = DEFAULT_MAX_PAGES): Promise<DocumentModel> {
  const numPages = Math.min(pdf.numPages, maxPages);
  const pages: Page[] = [];
  for (let p = 1; p <= numPages; p++) {
    pages.push(await readPage(await pdf.getPage(p), p));
  }
  return {
    name,
    pages,
    metadataTitle: await readMetadataTitle(pdf),
    toc: await readOutline(pdf),
  };
}

export async function loadPdfDocument(buf: Buffer): Promise<PdfDocLike> {
  const pdfjs = await import('pdfjs-dist');
  const data = new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  const loadingTask = pdfjs.getDocument({ data, disableFontFace: true, useSystemFonts: false });
  return loadingTask.promise;
}

export async function ingestPDF(buf: Buffer, opts: IngestOptions): Promise<DocumentModel> {
  const name = opts.filename ?? 'document.pdf';
  if (buf.subarray(0, 4).toString('ascii') !== '%PDF') {
    throw new DocumentLoadError(name, new Error('Input not recognized as PDF header'));
  }
  let pdf: PdfDocLike;
  try {
    pdf = await loadPdfDocument(buf);
  } catch (e) {
    throw new DocumentLoadError(name, e);
  }
  try {
    return await readDocumentModel(pdf, name, opts.maxPages);
  } catch (e) {
    throw new DocumentLoadError(name, e);
  } finally {
    await pdf.destroy();
  }
}
