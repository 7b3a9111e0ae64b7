import { vi } from 'vitest';
import type { EmbeddedImage } from '../../src/parser/image-extractor.js';
import type { SourceDocument } from '../../src/pdf/source-document.js';
import { fakeImage } from './fixtures.js';

/** Text layer of a small export: a highlight with a note, then a note-only marker */
export const EXPORT_TEXT = 'Loc 1 Highlight\nfirst\nNote:\nLoc 2 Note\n\n';

export function exportImages(): EmbeddedImage[] {
  return [fakeImage('Logo', [9]), fakeImage('Im1', [1], 0), fakeImage('Logo', [9], 1), fakeImage('Im2', [2], 1)];
}

export function fakeSource(text = EXPORT_TEXT, images: EmbeddedImage[] = exportImages()): SourceDocument {
  return {
    path: '/books/book.pdf',
    title: 'Book',
    pageCount: 2,
    images: () => images,
    readText: vi.fn(async () => text),
    close: vi.fn(async () => undefined),
  };
}
