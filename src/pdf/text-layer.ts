type PdfJs = typeof import('pdfjs-dist/legacy/build/pdf.mjs');
export type PdfJsDocument = Awaited<ReturnType<PdfJs['getDocument']>['promise']>;

/** The two fields of a pdfjs text item the line reconstruction needs */
export interface TextFragment {
  str: string;
  hasEOL: boolean;
}

function isTextFragment(item: unknown): item is TextFragment {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'hasEOL' in item &&
    typeof item.hasEOL === 'boolean'
  );
}

/** Rebuilds a page's plain text, breaking lines where pdfjs reports an end of line */
export function joinTextItems(items: readonly unknown[]): string {
  let text = '';
  for (const item of items) {
    // Marked-content items carry no text
    if (!isTextFragment(item)) continue;
    text += item.str;
    if (item.hasEOL) text += '\n';
  }
  return text;
}

/** Joins page texts in page order, with a blank line after each page */
export function joinPages(pages: readonly string[]): string {
  return pages.map((page) => `${page}\n\n`).join('');
}

/**
 * Extracts the text layer page by page. Pages are read one after another and
 * re-joined in their original order.
 */
export async function readTextLayer(doc: PdfJsDocument): Promise<string> {
  const pages: string[] = [];
  for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
    const page = await doc.getPage(pageNumber);
    const content = await page.getTextContent();
    pages.push(joinTextItems(content.items));
    page.cleanup();
  }
  return joinPages(pages);
}
