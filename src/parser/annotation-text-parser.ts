import type { HighlightEntry, LocationKey, ParseWarning } from '../shared/types.js';

/**
 * `Loc 123` / `Page 45` at the start of a line. The number must not run on
 * into a word or end a sentence: `Loc 5th` and `Page 12. The…` are body
 * text, while `Page 13, Highlight` is a marker.
 */
const LOCATION_MARKER = /^(?:Loc|Page) (\d+)(?!\w|\.(?:\s|$))/;

/** A body line consisting only of this marks a handwritten note */
const NOTE_LINE = 'Note:';

/** Page numbers leak into the captured text as a trailing number */
const TRAILING_PAGE_NUMBER = /\s+\d+$/;

// Marker kinds are recognised by substring, so `Highlight(yellow)` and
// `Note -` both count
const HIGHLIGHT = 'Highlight';
const CONTINUED = 'Continued';
const NOTE = 'Note';

/** Stand-in for a note whose image is resolved later, in emission order */
export interface NotePlaceholder {
  type: 'note-placeholder';
  /** Global emission order, 0-based */
  sequence: number;
  location: LocationKey;
}

export type DraftEntry = HighlightEntry | NotePlaceholder;

export interface ParsedAnnotations {
  /** Location → entries, in first-appearance order */
  locations: Map<LocationKey, DraftEntry[]>;
  placeholderCount: number;
  warnings: ParseWarning[];
}

interface ScanState {
  kind: 'scan';
}

interface CollectBodyState {
  kind: 'collect';
  markerLine: string;
  location: LocationKey;
  content: string[];
  noteFound: boolean;
}

type ParserState = ScanState | CollectBodyState;

/** Returns the location number of a marker line, or undefined */
export function matchLocationMarker(line: string): LocationKey | undefined {
  const match = LOCATION_MARKER.exec(line);
  return match ? match[1] : undefined;
}

/** Joins body lines and strips a trailing page number */
export function cleanContent(lines: readonly string[]): string {
  return lines.join(' ').trim().replace(TRAILING_PAGE_NUMBER, '');
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export function isNotePlaceholder(entry: DraftEntry): entry is NotePlaceholder {
  return entry.type === 'note-placeholder';
}

/**
 * Rebuilds highlights and note markers from the text layer of an annotation
 * export.
 *
 * Two states. In `scan` blank lines are skipped until a location marker
 * opens a body; in `collect` lines accumulate until the next marker or the
 * end of input, at which point the body is turned into entries according to
 * the words on the marker line that opened it.
 *
 * Notes come out as placeholders numbered in emission order; the assembler
 * pairs them with images afterwards.
 */
export class AnnotationTextParser {
  private state: ParserState = { kind: 'scan' };
  private readonly locations = new Map<LocationKey, DraftEntry[]>();
  private readonly warnings: ParseWarning[] = [];
  private nextSequence = 0;

  feed(rawLine: string): void {
    const line = rawLine.trim();
    const location = matchLocationMarker(line);

    if (this.state.kind === 'collect') {
      if (location === undefined) {
        this.collect(this.state, line);
        return;
      }
      this.closeBody(this.state);
      this.state = { kind: 'scan' };
    }

    if (!line) return;

    if (location !== undefined) {
      this.openBody(line, location);
    } else if (line === NOTE_LINE) {
      this.warnStrayNote();
    }
  }

  finish(): ParsedAnnotations {
    if (this.state.kind === 'collect') {
      this.closeBody(this.state);
      this.state = { kind: 'scan' };
    }
    return {
      locations: this.locations,
      placeholderCount: this.nextSequence,
      warnings: this.warnings,
    };
  }

  private openBody(markerLine: string, location: LocationKey): void {
    this.entriesFor(location);
    this.state = { kind: 'collect', markerLine, location, content: [], noteFound: false };
  }

  private collect(body: CollectBodyState, line: string): void {
    if (line === NOTE_LINE) {
      body.noteFound = true;
    } else if (line) {
      body.content.push(line);
    }
  }

  private closeBody(body: CollectBodyState): void {
    const entries = this.entriesFor(body.location);
    const content = cleanContent(body.content);
    const marker = body.markerLine;

    if (marker.includes(HIGHLIGHT)) {
      const hasNote = body.noteFound || marker.includes(NOTE);
      // "Highlight Continued" has to win over the plain "Highlight" check
      if (marker.includes(CONTINUED)) {
        this.continueHighlight(body.location, entries, content);
      } else if (content || hasNote) {
        // An empty highlight is kept when a note follows it, so entry
        // indexes at this location stay stable
        entries.push({ type: 'highlight', content });
      }
      if (hasNote) {
        this.pushPlaceholder(body.location, entries);
      }
    } else if (marker.includes(NOTE) || body.noteFound) {
      // Note-only markers carry no highlight text; the body is dropped
      this.pushPlaceholder(body.location, entries);
    }
  }

  // An empty continuation changes nothing, not even by a trailing space
  private continueHighlight(location: LocationKey, entries: DraftEntry[], content: string): void {
    if (!content) return;

    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (entry.type === 'highlight') {
        entry.content = entry.content ? `${entry.content} ${content}` : content;
        return;
      }
    }

    this.warnings.push({
      kind: 'orphan-continuation',
      location,
      message: `Highlight continuation at Loc ${location} has no highlight to extend; text dropped.`,
    });
  }

  // Only reachable before the first marker: after that every line belongs to a body
  private warnStrayNote(): void {
    this.warnings.push({
      kind: 'orphan-note-marker',
      message: 'Found a "Note:" marker before any location marker; ignored.',
    });
  }

  private pushPlaceholder(location: LocationKey, entries: DraftEntry[]): void {
    entries.push({ type: 'note-placeholder', sequence: this.nextSequence++, location });
  }

  private entriesFor(location: LocationKey): DraftEntry[] {
    let entries = this.locations.get(location);
    if (!entries) {
      entries = [];
      this.locations.set(location, entries);
    }
    return entries;
  }
}

/** Parses a whole document's lines in one go */
export function parseAnnotationText(lines: Iterable<string>): ParsedAnnotations {
  const parser = new AnnotationTextParser();
  for (const line of lines) {
    parser.feed(line);
  }
  return parser.finish();
}
