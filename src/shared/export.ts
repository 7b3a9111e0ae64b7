import type { AnnotationEntry, AnnotationRecord, Idea, LocationKey } from './types.js';
import { isHighlight, isNote, isTranscriptionFailure } from './types.js';

/** A note whose transcription was classified as a summary of the passage */
function isSummaryNote(entry: AnnotationEntry): boolean {
  return (
    isNote(entry) &&
    entry.transcription !== undefined &&
    !isTranscriptionFailure(entry.transcription) &&
    entry.transcription.type === 'summary'
  );
}

function quote(text: string): string[] {
  return text.split('\n').map((line) => `> ${line}`);
}

/**
 * Generate the literature note: every highlight and every summary note,
 * grouped by location in reading order. Other notes feed the permanent
 * notes instead.
 */
export function generateLiteratureNote(record: AnnotationRecord, title: string): string {
  const lines: string[] = [`# Literature Note — ${title}`, ''];

  let rendered = 0;
  for (const [location, entries] of record) {
    const kept = entries.filter((e) => (isHighlight(e) && e.content !== '') || isSummaryNote(e));
    if (kept.length === 0) continue;

    lines.push(`## Loc ${location}`, '');
    for (const entry of kept) {
      if (isHighlight(entry)) {
        lines.push(...quote(entry.content), '');
      } else if (entry.transcription && !isTranscriptionFailure(entry.transcription)) {
        lines.push(`**Summary:** ${entry.transcription.transcription}`, '');
      }
    }
    rendered++;
  }

  if (rendered === 0) {
    lines.push('No highlights or summaries yet.');
  }

  return lines.join('\n');
}

/**
 * Text of the entry an idea points at: the transcription of a note or the
 * content of a highlight. Undefined when the reference does not resolve or
 * the entry has nothing usable.
 */
export function resolveIdeaContent(record: AnnotationRecord, idea: Idea): string | undefined {
  const entry = record.get(idea.idea_location)?.[idea.idea_index];
  if (!entry) return undefined;

  if (isHighlight(entry)) return entry.content || undefined;
  if (entry.transcription && !isTranscriptionFailure(entry.transcription)) {
    return entry.transcription.transcription || undefined;
  }
  return undefined;
}

export interface PermanentNoteInput {
  content: string;
  location: LocationKey;
  linkedLocations: LocationKey[];
  sourceTitle: string;
  title?: string;
  /** YYYY-MM-DD */
  dateCreated: string;
}

export function generatePermanentNote(input: PermanentNoteInput): string {
  const safeTitle = input.sourceTitle.replace(/"/g, '\\"');
  const lines: string[] = [
    '---',
    `created: ${input.dateCreated}`,
    `source: "${safeTitle}"`,
    `location: ${input.location}`,
    '---',
    '',
  ];

  if (input.title) {
    lines.push(`# ${input.title}`, '');
  }

  lines.push(input.content, '');
  lines.push('## Source', `- ${input.sourceTitle}, Loc ${input.location}`);

  if (input.linkedLocations.length > 0) {
    lines.push('', '## Related');
    for (const location of input.linkedLocations) {
      lines.push(`- Loc ${location}`);
    }
  }

  return lines.join('\n') + '\n';
}

export function permanentNoteFileName(position: number): string {
  return `idea_${String(position).padStart(3, '0')}.md`;
}
