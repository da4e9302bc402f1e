/**
 * PDF Chunking
 *
 * Splits uploaded PDFs into windows of at most `maxPages` pages so each
 * part stays within the ingestion size limit of the indexing backend.
 *
 * Key layout in the object store:
 *   input/<name>.pdf              uploaded document
 *   output/<name>_part_<n>.pdf    parts of a split document (n from 1)
 *   processed/<name>.pdf          documents that needed no split
 */

import { PDFDocument } from 'pdf-lib';
import { PdfProcessingError, describeError } from '@/errors/gateway';
import type { ObjectStore } from '@/services/backends/types';
import { logger as rootLogger, type Logger } from '@/utils/logger';

export const DEFAULT_MAX_PAGES = 20;

const PDF_CONTENT_TYPE = 'application/pdf';

/** Zero-based page range; `end` is exclusive */
export interface PageWindow {
  start: number;
  end: number;
}

export interface PdfProcessReport {
  key: string;
  pageCount: number;
  split: boolean;
  outputKeys: string[];
}

export function planPageWindows(pageCount: number, maxPages: number = DEFAULT_MAX_PAGES): PageWindow[] {
  if (!Number.isInteger(pageCount) || pageCount < 0) {
    throw new PdfProcessingError(`Invalid page count: ${pageCount}`);
  }
  if (!Number.isInteger(maxPages) || maxPages < 1) {
    throw new PdfProcessingError(`Invalid page window size: ${maxPages}`);
  }

  const windows: PageWindow[] = [];
  for (let start = 0; start < pageCount; start += maxPages) {
    windows.push({ start, end: Math.min(start + maxPages, pageCount) });
  }
  return windows;
}

async function loadPdf(bytes: Uint8Array): Promise<PDFDocument> {
  try {
    return await PDFDocument.load(bytes);
  } catch (error) {
    throw new PdfProcessingError(`Unreadable PDF: ${describeError(error)}`, { cause: error });
  }
}

export async function countPages(bytes: Uint8Array): Promise<number> {
  const document = await loadPdf(bytes);
  return document.getPageCount();
}

/**
 * Split a PDF into parts of at most `maxPages` pages. A document that
 * already fits comes back as a single part holding the original bytes.
 *
 * @throws PdfProcessingError when the input cannot be parsed or written
 */
export async function splitPdf(bytes: Uint8Array, maxPages: number = DEFAULT_MAX_PAGES): Promise<Uint8Array[]> {
  const source = await loadPdf(bytes);
  const windows = planPageWindows(source.getPageCount(), maxPages);
  if (windows.length <= 1) return [bytes];

  try {
    const parts: Uint8Array[] = [];
    for (const { start, end } of windows) {
      const part = await PDFDocument.create();
      const indices = Array.from({ length: end - start }, (_, i) => start + i);
      const pages = await part.copyPages(source, indices);
      pages.forEach((page) => part.addPage(page));
      parts.push(await part.save());
    }
    return parts;
  } catch (error) {
    throw new PdfProcessingError(`Failed to split PDF: ${describeError(error)}`, { cause: error });
  }
}

/** "input/reports/q1.pdf" -> "reports/q1" */
export function baseNameForKey(key: string): string {
  return key.replace(/^input\//, '').replace(/\.pdf$/i, '');
}

export function partKey(key: string, partNumber: number): string {
  return `output/${baseNameForKey(key)}_part_${partNumber}.pdf`;
}

export function processedKey(key: string): string {
  return `processed/${baseNameForKey(key)}.pdf`;
}

/**
 * Split the stored PDF at `key` into output parts, or move it to
 * processed/ when it already fits in one window. The original is
 * kept when it was split and deleted when it was moved.
 *
 * @throws PdfProcessingError when the object is missing or unreadable
 */
export async function processUploadedPdf(
  store: ObjectStore,
  key: string,
  options: { maxPages?: number; log?: Logger } = {},
): Promise<PdfProcessReport> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const log = (options.log ?? rootLogger).child({ key });

  const object = await store.get(key);
  if (!object) {
    throw new PdfProcessingError(`Object not found: ${key}`);
  }

  const pageCount = await countPages(object.body);
  log.info('Processing PDF', { pageCount, maxPages });

  if (pageCount <= maxPages) {
    const target = processedKey(key);
    await store.put(target, object.body, { contentType: PDF_CONTENT_TYPE, metadata: object.metadata });
    await store.delete(key);
    log.info('PDF within page limit, moved', { target });
    return { key, pageCount, split: false, outputKeys: [target] };
  }

  const parts = await splitPdf(object.body, maxPages);
  const outputKeys: string[] = [];
  for (const [i, part] of parts.entries()) {
    const target = partKey(key, i + 1);
    await store.put(target, part, { contentType: PDF_CONTENT_TYPE, metadata: object.metadata });
    outputKeys.push(target);
  }

  log.info('PDF split', { parts: outputKeys.length });
  return { key, pageCount, split: true, outputKeys };
}
