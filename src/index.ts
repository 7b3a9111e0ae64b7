export { parseAnnotationText, AnnotationTextParser, splitLines } from './parser/annotation-text-parser.js';
export type { DraftEntry, NotePlaceholder, ParsedAnnotations } from './parser/annotation-text-parser.js';
export { assembleAnnotations, ImageCursor } from './parser/annotation-assembler.js';
export type { AssemblyResult } from './parser/annotation-assembler.js';
export { extractUniqueImages, ImageDirectory } from './parser/image-extractor.js';
export type { EmbeddedImage, ImageSink } from './parser/image-extractor.js';
export { openSourceDocument } from './pdf/source-document.js';
export type { SourceDocument } from './pdf/source-document.js';
export { parseDocument } from './pipeline/parse-document.js';
export type { ParseDocumentOptions, ParseDocumentResult } from './pipeline/parse-document.js';
export { transcribeNotes } from './pipeline/transcribe-notes.js';
export { ZettelProcessor } from './pipeline/processor.js';
export type { Collaborators, PipelineStep } from './pipeline/processor.js';
export { ZettelStorage, StageFile } from './server/storage.js';
export { serializeRecord, parseRecord } from './shared/record-json.js';
export { generateLiteratureNote, generatePermanentNote } from './shared/export.js';
export { loadConfig } from './config.js';
export type { ZettelConfig } from './config.js';
export type { Transcriber } from './ai/transcriber.js';
export type { Organizer } from './ai/organizer.js';
export * from './shared/errors.js';
export type * from './shared/types.js';
export { isHighlight, isNote } from './shared/types.js';
