import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type OpenAI from 'openai';
import { z } from 'zod';
import { TranscriptionError, errorMessage } from '../shared/errors.js';
import type { TranscriptionResult } from '../shared/types.js';
import { completionText, safeJsonParse } from './openai-client.js';

/** Turns one handwritten-note snapshot into text */
export interface Transcriber {
  transcribe(imagePath: string): Promise<TranscriptionResult>;
}

const TranscriptionReply = z.object({
  type: z.enum(['summary', 'idea', 'comment']),
  transcription: z.string(),
});

const TRANSCRIPTION_PROMPT =
  'You transcribe handwritten margin notes written while reading a book. ' +
  'Respond ONLY with a JSON object {"type": "summary" | "idea" | "comment", "transcription": string}. ' +
  'Use "summary" when the note restates the passage, "idea" when it develops a thought of its own, ' +
  'and "comment" for anything else. Transcribe faithfully; do not correct or extend the text.';

const MIME_TYPES: Record<string, string> = {
  '.jpeg': 'image/jpeg',
  '.jpg': 'image/jpeg',
  '.png': 'image/png',
  '.jpx': 'image/jp2',
};

export function imageMimeType(imagePath: string): string {
  return MIME_TYPES[extname(imagePath).toLowerCase()] ?? 'application/octet-stream';
}

export class OpenAiTranscriber implements Transcriber {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {}

  async transcribe(imagePath: string): Promise<TranscriptionResult> {
    const image = await readFile(imagePath);
    const dataUrl = `data:${imageMimeType(imagePath)};base64,${image.toString('base64')}`;

    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: TRANSCRIPTION_PROMPT },
        { role: 'user', content: [{ type: 'image_url', image_url: { url: dataUrl } }] },
      ],
      response_format: { type: 'json_object' },
    });

    try {
      return TranscriptionReply.parse(safeJsonParse(completionText(completion)));
    } catch (err) {
      throw new TranscriptionError(`Unusable transcription reply: ${errorMessage(err)}`, { cause: err });
    }
  }
}
