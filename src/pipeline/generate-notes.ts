import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import {
  generateLiteratureNote,
  generatePermanentNote,
  permanentNoteFileName,
  resolveIdeaContent,
} from '../shared/export.js';
import { logger } from '../shared/logger.js';
import type { AnnotationRecord, OrganizedIdeas } from '../shared/types.js';

export async function writeLiteratureNote(record: AnnotationRecord, title: string, outputPath: string): Promise<void> {
  logger.info('Generating literature note...');
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, generateLiteratureNote(record, title), 'utf-8');
  logger.info(`Literature note saved to '${outputPath}'.`);
}

export interface PermanentNotesOptions {
  outputDir: string;
  sourceTitle: string;
  now?: Date;
}

/**
 * Writes one markdown file per idea. Files are numbered by the idea's
 * position in the list, so a skipped idea leaves a gap rather than shifting
 * the names of the ones after it. Returns the paths written.
 */
export async function writePermanentNotes(
  ideas: OrganizedIdeas,
  record: AnnotationRecord,
  options: PermanentNotesOptions,
): Promise<string[]> {
  logger.info('Generating permanent notes...');

  if (ideas.ideas.length === 0) {
    logger.warn('No ideas found in organized data. Skipping permanent note generation.');
    return [];
  }

  await mkdir(options.outputDir, { recursive: true });
  const dateCreated = (options.now ?? new Date()).toISOString().slice(0, 10);
  const written: string[] = [];

  for (const [i, idea] of ideas.ideas.entries()) {
    const content = resolveIdeaContent(record, idea);
    if (content === undefined) {
      logger.warn(`No content at Loc ${idea.idea_location}, index ${idea.idea_index}. Skipping.`);
      continue;
    }

    const markdown = generatePermanentNote({
      content,
      location: idea.idea_location,
      linkedLocations: (idea.links ?? []).map((link) => link.ref_location),
      sourceTitle: options.sourceTitle,
      title: idea.title,
      dateCreated,
    });

    const path = join(options.outputDir, permanentNoteFileName(i + 1));
    await writeFile(path, markdown, 'utf-8');
    written.push(path);
  }

  logger.info(`${written.length} permanent note(s) generated in '${options.outputDir}'.`);
  return written;
}
