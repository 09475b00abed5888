import { ingestPlainText } from './text';
import { ingestPDF } from './pdf';
import { IngestOptions } from './types';
import type { DocumentModel } from '../types';
import { getLogger } from '../logger';

export type Adapter = 'pdf' | 'text';

export function guessAdapter(filename?: string, mime?: string): Adapter {
  const ext = (filename || '').toLowerCase();
  const m = (mime || '').toLowerCase();
  if (ext.endsWith('.pdf') || m.includes('application/pdf')) return 'pdf';
  return 'text';
}

// Document Model Provider entry point.
export async function ingestBuffer(buf: Buffer, opts: IngestOptions = {}): Promise<DocumentModel> {
  const log = getLogger('core');
  const adapter = guessAdapter(opts.filename, opts.mime);
  const doc = adapter === 'pdf' ? await ingestPDF(buf, opts) : ingestPlainText(buf, opts);
  log.info('ingestBuffer.complete', {
    adapter,
    filename: opts.filename,
    mime: opts.mime,
    bytes: buf.byteLength,
    pages: doc.pages.length,
    toc_entries: doc.toc?.length ?? 0,
  });
  return doc;
}

export { cleanPageText, documentFromText } from './text';
export { readDocumentModel, readPage, readOutline, readMetadataTitle } from './pdf';
export type { IngestOptions, PdfDocLike, PdfPageLike, PdfOutlineNodeLike } from './types';
