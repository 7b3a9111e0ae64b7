/**
 * Location key taken from a `Loc <n>` or `Page <n>` marker — always a string
 * of decimal digits. Keys are compared by first appearance, never numerically.
 */
export type LocationKey = string;

/** A highlighted passage, possibly merged from several "Continued" segments */
export interface HighlightEntry {
  type: 'highlight';
  content: string;
}

/** A handwritten note, known only by the snapshot image it points at */
export interface NoteEntry {
  type: 'note';
  image_path: string;
  transcription?: Transcription;
}

/** Discriminated union — everything that can sit under a location */
export type AnnotationEntry = HighlightEntry | NoteEntry;

/**
 * Location key → entries, in first-appearance order.
 *
 * A Map rather than a plain object: object keys that look like integers are
 * iterated in ascending numeric order, which would reorder the document.
 */
export type AnnotationRecord = Map<LocationKey, AnnotationEntry[]>;

/** Transcription returned for a note image */
export interface TranscriptionResult {
  /** `summary`, `idea` or `comment` as classified by the transcriber */
  type: string;
  transcription: string;
}

export interface TranscriptionFailure {
  error: string;
}

export type Transcription = TranscriptionResult | TranscriptionFailure;

/** A reference from an organized idea to another location */
export interface IdeaLink {
  ref_location: LocationKey;
}

/** One idea picked out by the organizer, pointing at a `(location, index)` entry */
export interface Idea {
  idea_location: LocationKey;
  idea_index: number;
  title?: string;
  links?: IdeaLink[];
}

export interface OrganizedIdeas {
  ideas: Idea[];
}

/** One distinct, non-logo image written to the image directory */
export interface UniqueImage {
  /** 1-based, gapless */
  id: number;
  /** Hex SHA-256 of the encoded stream bytes */
  hash: string;
  fileName: string;
  path: string;
  extension: string;
}

export type ParseWarningKind = 'image-starvation' | 'orphan-continuation' | 'orphan-note-marker';

/** Recoverable data-quality problem found while parsing or assembling */
export interface ParseWarning {
  kind: ParseWarningKind;
  location?: LocationKey;
  message: string;
}

/** Type guard for highlight entries */
export function isHighlight(entry: AnnotationEntry): entry is HighlightEntry {
  return entry.type === 'highlight';
}

/** Type guard for note entries */
export function isNote(entry: AnnotationEntry): entry is NoteEntry {
  return entry.type === 'note';
}

export function isTranscriptionFailure(t: Transcription): t is TranscriptionFailure {
  return 'error' in t;
}

/** Number of highlights and notes across the whole record */
export function countEntries(record: AnnotationRecord): { highlights: number; notes: number } {
  let highlights = 0;
  let notes = 0;
  for (const entries of record.values()) {
    for (const entry of entries) {
      if (isHighlight(entry)) highlights++;
      else notes++;
    }
  }
  return { highlights, notes };
}
