import { access } from 'node:fs/promises';
import type { Transcriber } from '../ai/transcriber.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { AnnotationRecord, LocationKey, NoteEntry } from '../shared/types.js';
import { isNote } from '../shared/types.js';

export const IMAGE_NOT_FOUND = 'Image file not found.';

export interface TranscribeOptions {
  maxAttempts: number;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Attaches a transcription to every note that has none yet and returns the
 * updated copy; the input record is left untouched. Notes already carrying
 * a transcription (including a recorded failure) are skipped, so re-running
 * the stage on its own output does no work.
 */
export async function transcribeNotes(
  record: AnnotationRecord,
  transcriber: Transcriber,
  options: TranscribeOptions,
): Promise<AnnotationRecord> {
  const result = structuredClone(record);

  const pending: Array<{ location: LocationKey; note: NoteEntry }> = [];
  for (const [location, entries] of result) {
    for (const entry of entries) {
      if (isNote(entry) && !entry.transcription) pending.push({ location, note: entry });
    }
  }

  logger.info(`Found ${pending.length} note(s) to transcribe.`);

  for (const [i, { location, note }] of pending.entries()) {
    logger.info(`Transcribing note ${i + 1}/${pending.length} for Loc ${location}...`);

    if (!(await fileExists(note.image_path))) {
      logger.warn(`Image not found for Loc ${location}: ${note.image_path}. Skipping.`);
      note.transcription = { error: IMAGE_NOT_FOUND };
      continue;
    }

    let lastError: unknown;
    for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
      try {
        note.transcription = await transcriber.transcribe(note.image_path);
        logger.debug(`  -> Transcribed note for Loc ${location}.`);
        break;
      } catch (err) {
        lastError = err;
        logger.warn(`  -> Attempt ${attempt}/${options.maxAttempts} failed: ${errorMessage(err)}`);
      }
    }

    if (!note.transcription) {
      logger.error(`Failed to transcribe note for Loc ${location} after ${options.maxAttempts} attempts.`);
      note.transcription = {
        error: `Failed after ${options.maxAttempts} attempts. Last error: ${errorMessage(lastError)}`,
      };
    }
  }

  return result;
}
