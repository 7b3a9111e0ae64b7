import type { Organizer } from '../ai/organizer.js';
import { OpenAiOrganizer } from '../ai/organizer.js';
import { createOpenAiClient } from '../ai/openai-client.js';
import type { Transcriber } from '../ai/transcriber.js';
import { OpenAiTranscriber } from '../ai/transcriber.js';
import type { ZettelConfig } from '../config.js';
import { ZettelStorage } from '../server/storage.js';
import { logger } from '../shared/logger.js';
import type { AnnotationRecord, OrganizedIdeas } from '../shared/types.js';
import { writeLiteratureNote, writePermanentNotes } from './generate-notes.js';
import { parseDocument } from './parse-document.js';
import type { ParseDocumentResult } from './parse-document.js';
import { transcribeNotes } from './transcribe-notes.js';

export type PipelineStep = 'all' | 'parse' | 'transcribe' | 'organize' | 'generate';

export const PIPELINE_STEPS: readonly PipelineStep[] = ['all', 'parse', 'transcribe', 'organize', 'generate'];

export interface Collaborators {
  transcriber?: Transcriber;
  organizer?: Organizer;
}

/**
 * Runs the workflow PDF → structured JSON → transcribed JSON → organized
 * ideas → markdown. Each stage persists its output; a stage run on its own
 * loads its input from the previous stage's file.
 *
 * The OpenAI-backed collaborators are created on first use, so the parse and
 * generate steps work without an API key.
 */
export class ZettelProcessor {
  readonly storage: ZettelStorage;
  private transcriber?: Transcriber;
  private organizer?: Organizer;

  constructor(
    private readonly config: ZettelConfig,
    collaborators: Collaborators = {},
  ) {
    this.storage = new ZettelStorage(config);
    this.transcriber = collaborators.transcriber;
    this.organizer = collaborators.organizer;
  }

  async runFullProcess(pdfPath: string, title?: string): Promise<void> {
    logger.info('Starting full Zettelkasten process...');
    const parsed = await this.runParser(pdfPath);
    const transcribed = await this.runTranscriber(parsed.record);
    const ideas = await this.runOrganizer(transcribed);
    await this.runNoteGenerator(title ?? parsed.title, ideas, transcribed);
    logger.info('Full process completed successfully.');
  }

  async runParser(pdfPath: string): Promise<ParseDocumentResult> {
    const result = await parseDocument(pdfPath, { imageDir: this.config.imageDir });
    logger.info(`Saving data to '${this.storage.structured.filePath}'...`);
    await this.storage.structured.write(result.record);
    return result;
  }

  async runTranscriber(record?: AnnotationRecord): Promise<AnnotationRecord> {
    const input = record ?? (await this.storage.structured.read());
    const transcribed = await transcribeNotes(input, this.getTranscriber(), {
      maxAttempts: this.config.maxRetries,
    });
    logger.info(`Saving data to '${this.storage.transcribed.filePath}'...`);
    await this.storage.transcribed.write(transcribed);
    return transcribed;
  }

  async runOrganizer(record?: AnnotationRecord): Promise<OrganizedIdeas> {
    const input = record ?? (await this.storage.transcribed.read());
    const ideas = await this.getOrganizer().organize(input);
    logger.info(`Saving data to '${this.storage.organized.filePath}'...`);
    await this.storage.organized.write(ideas);
    return ideas;
  }

  async runNoteGenerator(title: string, ideas?: OrganizedIdeas, record?: AnnotationRecord): Promise<string[]> {
    const organized = ideas ?? (await this.storage.organized.read());
    const transcribed = record ?? (await this.storage.transcribed.read());

    await writeLiteratureNote(transcribed, title, this.config.literatureNotePath);
    return writePermanentNotes(organized, transcribed, {
      outputDir: this.config.permanentNoteDir,
      sourceTitle: title,
    });
  }

  private getTranscriber(): Transcriber {
    this.transcriber ??= new OpenAiTranscriber(createOpenAiClient(this.config.openai), this.config.openai.model);
    return this.transcriber;
  }

  private getOrganizer(): Organizer {
    this.organizer ??= new OpenAiOrganizer(createOpenAiClient(this.config.openai), this.config.openai.model);
    return this.organizer;
  }
}
