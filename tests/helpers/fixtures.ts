import type { EmbeddedImage, ImageSink } from '../../src/parser/image-extractor.js';
import type { AnnotationEntry, AnnotationRecord, HighlightEntry, NoteEntry } from '../../src/shared/types.js';

export function highlight(content: string): HighlightEntry {
  return { type: 'highlight', content };
}

export function note(imagePath: string, transcription?: NoteEntry['transcription']): NoteEntry {
  return transcription ? { type: 'note', image_path: imagePath, transcription } : { type: 'note', image_path: imagePath };
}

export function makeRecord(entries: Array<[string, AnnotationEntry[]]>): AnnotationRecord {
  return new Map(entries);
}

/** An already-decoded image whose file bytes are its encoded bytes */
export function fakeImage(name: string, bytes: number[], pageIndex = 0, extension = 'png'): EmbeddedImage {
  const encoded = new Uint8Array(bytes);
  return { pageIndex, name, encoded, extension, toFileBytes: () => encoded };
}

/** Keeps written images in memory */
export class MemorySink implements ImageSink {
  readonly files = new Map<string, Uint8Array>();
  clears = 0;

  async clear(): Promise<void> {
    this.clears++;
    this.files.clear();
  }

  async write(fileName: string, bytes: Uint8Array): Promise<string> {
    this.files.set(fileName, bytes);
    return `/mem/${fileName}`;
  }
}
