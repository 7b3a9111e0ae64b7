import { assembleAnnotations } from '../parser/annotation-assembler.js';
import { parseAnnotationText, splitLines } from '../parser/annotation-text-parser.js';
import { ImageDirectory, extractUniqueImages } from '../parser/image-extractor.js';
import type { ImageSink } from '../parser/image-extractor.js';
import { openSourceDocument } from '../pdf/source-document.js';
import { logger } from '../shared/logger.js';
import type { AnnotationRecord, ParseWarning, UniqueImage } from '../shared/types.js';

export interface ParseDocumentOptions {
  imageDir: string;
  /** Overrides the directory sink, mostly for tests */
  sink?: ImageSink;
}

export interface ParseDocumentResult {
  title: string;
  record: AnnotationRecord;
  images: UniqueImage[];
  warnings: ParseWarning[];
}

/**
 * PDF → structured annotations: open, extract unique images, extract text,
 * parse, then pair note markers with images.
 */
export async function parseDocument(pdfPath: string, options: ParseDocumentOptions): Promise<ParseDocumentResult> {
  logger.info(`Starting parsing process for '${pdfPath}'...`);
  const source = await openSourceDocument(pdfPath);

  try {
    const text = await source.readText();
    const images = await extractUniqueImages(source.images(), options.sink ?? new ImageDirectory(options.imageDir));

    const parsed = parseAnnotationText(splitLines(text));
    const { record, warnings, unusedImages } = assembleAnnotations(parsed, images);

    for (const warning of warnings) {
      logger.warn(warning.message);
    }
    if (unusedImages.length > 0) {
      logger.warn(
        `${unusedImages.length} note image(s) were not matched to any note marker: ${unusedImages.map((i) => i.fileName).join(', ')}`,
      );
    }

    logger.info(`Structured ${record.size} location(s) from ${source.pageCount} page(s).`);
    return { title: source.title, record, images, warnings };
  } finally {
    await source.close();
  }
}
