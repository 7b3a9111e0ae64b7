import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import type { EmbeddedImage } from '../parser/image-extractor.js';
import { SourceUnreadableError, errorMessage } from '../shared/errors.js';
import { collectEmbeddedImages } from './image-streams.js';
import { readTextLayer } from './text-layer.js';
import type { PdfJsDocument } from './text-layer.js';

/** An opened export: raw image streams through pdf-lib, text through pdfjs */
export interface SourceDocument {
  readonly path: string;
  /** Metadata title, or the file name without extension */
  readonly title: string;
  readonly pageCount: number;
  images(): Iterable<EmbeddedImage>;
  readText(): Promise<string>;
  close(): Promise<void>;
}

export function titleFromPath(path: string): string {
  return basename(path, extname(path));
}

async function openTextLayer(bytes: Uint8Array): Promise<PdfJsDocument> {
  // Loaded lazily: the legacy build pulls in its Node polyfills on import
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');
  // pdfjs takes ownership of (and detaches) the buffer it is given
  const task = getDocument({ data: new Uint8Array(bytes), isEvalSupported: false, verbosity: 0 });
  return task.promise;
}

/**
 * Opens the PDF with both libraries up front, so an unreadable file fails
 * before anything is written.
 */
export async function openSourceDocument(path: string): Promise<SourceDocument> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new SourceUnreadableError(`PDF file not found at: ${path}`, { cause: err });
  }

  let pdf: PDFDocument;
  let text: PdfJsDocument;
  try {
    pdf = await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
    text = await openTextLayer(bytes);
  } catch (err) {
    throw new SourceUnreadableError(`Cannot open PDF '${path}': ${errorMessage(err)}`, { cause: err });
  }

  const title = pdf.getTitle()?.trim() || titleFromPath(path);

  return {
    path,
    title,
    pageCount: pdf.getPageCount(),
    images: () => collectEmbeddedImages(pdf),
    readText: () => readTextLayer(text),
    close: () => text.destroy(),
  };
}
