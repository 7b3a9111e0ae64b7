import type {
  AnnotationEntry,
  AnnotationRecord,
  NoteEntry,
  ParseWarning,
  UniqueImage,
} from '../shared/types.js';
import type { NotePlaceholder, ParsedAnnotations } from './annotation-text-parser.js';
import { isNotePlaceholder } from './annotation-text-parser.js';

/** Forward-only cursor over the unique image sequence */
export class ImageCursor {
  private index = 0;

  constructor(private readonly images: readonly UniqueImage[]) {}

  /** Takes the next image, or undefined once every image has been consumed */
  next(): UniqueImage | undefined {
    if (this.index >= this.images.length) return undefined;
    return this.images[this.index++];
  }

  remaining(): UniqueImage[] {
    return this.images.slice(this.index);
  }
}

export interface AssemblyResult {
  record: AnnotationRecord;
  warnings: ParseWarning[];
  /** Images left over after every note marker took one */
  unusedImages: UniqueImage[];
}

/**
 * Pairs note placeholders with images. Images and note markers share no
 * identifier, so the only link is order: the n-th placeholder emitted by
 * the parser gets the n-th unique image. Placeholders past the end of the
 * image sequence are dropped with an `image-starvation` warning.
 */
export function assembleAnnotations(
  parsed: ParsedAnnotations,
  images: readonly UniqueImage[],
): AssemblyResult {
  const warnings: ParseWarning[] = [...parsed.warnings];
  const cursor = new ImageCursor(images);

  const placeholders: NotePlaceholder[] = [];
  for (const entries of parsed.locations.values()) {
    placeholders.push(...entries.filter(isNotePlaceholder));
  }
  placeholders.sort((a, b) => a.sequence - b.sequence);

  const notes = new Map<number, NoteEntry>();
  for (const placeholder of placeholders) {
    const image = cursor.next();
    if (!image) {
      warnings.push({
        kind: 'image-starvation',
        location: placeholder.location,
        message: `Found a note at Loc ${placeholder.location} but no corresponding image.`,
      });
      continue;
    }
    notes.set(placeholder.sequence, { type: 'note', image_path: image.path });
  }

  const record: AnnotationRecord = new Map();
  for (const [location, drafts] of parsed.locations) {
    const entries: AnnotationEntry[] = [];
    for (const draft of drafts) {
      if (isNotePlaceholder(draft)) {
        const note = notes.get(draft.sequence);
        if (note) entries.push(note);
      } else {
        entries.push({ type: 'highlight', content: draft.content });
      }
    }
    record.set(location, entries);
  }

  return { record, warnings, unusedImages: cursor.remaining() };
}
