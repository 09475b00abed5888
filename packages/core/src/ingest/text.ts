import type { DocumentModel } from '../types';
import { IngestOptions } from './types';

/**
 * Normalizes extracted page text: collapses blank runs and space runs, splits glued
 * camelCase words, rejoins hyphenated line breaks, and drops page-number and
 * near-empty lines.
 */
export function cleanPageText(text: string): string {
  if (!text) return '';
  const normalized = text
    .replace(/\n\s*\n/g, '\n\n')
    .replace(/ +/g, ' ')
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/(\w)-\s*\n\s*(\w)/g, '$1$2');
  return normalized
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => !/^\d+$/.test(line) && line.length >= 3)
    .join('\n');
}

export function documentFromText(text: string, opts: IngestOptions = {}): DocumentModel {
  return {
    name: opts.filename ?? 'untitled.txt',
    pages: [{ number: 1, width: 0, height: 0, plainText: cleanPageText(text), lines: [] }],
    metadataTitle: null,
    toc: null,
  };
}

export function ingestPlainText(buf: Buffer, opts: IngestOptions): DocumentModel {
  return documentFromText(buf.toString('utf8'), opts);
}
