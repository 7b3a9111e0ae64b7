import OpenAI from 'openai';
import { OrganizationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { organizedIdeasSchema, serializeRecord } from '../shared/record-json.js';
import type { AnnotationRecord, OrganizedIdeas } from '../shared/types.js';
import { completionText, safeJsonParse } from './openai-client.js';

/** Picks out the ideas worth a permanent note and links them to other locations */
export interface Organizer {
  organize(record: AnnotationRecord): Promise<OrganizedIdeas>;
}

const ORGANIZATION_PROMPT =
  'You organize reading annotations into a Zettelkasten. The user sends a JSON object mapping ' +
  'location keys to lists of entries (highlights with "content", notes with a "transcription"). ' +
  'Pick the entries that carry an idea worth its own permanent note. Respond ONLY with a JSON object ' +
  '{"ideas": [{"idea_location": string, "idea_index": number, "title": string, ' +
  '"links": [{"ref_location": string}]}]} where idea_index is the position of the entry in its location list ' +
  'and links point at other locations that discuss a related idea.';

export class OpenAiOrganizer implements Organizer {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {}

  async organize(record: AnnotationRecord): Promise<OrganizedIdeas> {
    logger.info('Organizing ideas...');

    let text: string;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: ORGANIZATION_PROMPT },
          { role: 'user', content: serializeRecord(record) },
        ],
        response_format: { type: 'json_object' },
      });
      text = completionText(completion);
    } catch (err) {
      if (err instanceof OpenAI.APIError) {
        throw new OrganizationError(`Failed to connect to OpenAI API: ${err.message}`, { cause: err });
      }
      throw err;
    }

    let ideas: OrganizedIdeas;
    try {
      ideas = organizedIdeasSchema.parse(safeJsonParse(text));
    } catch (err) {
      throw new OrganizationError(`Failed to parse AI response as JSON: ${errorMessage(err)}`, { cause: err });
    }

    logger.info(`Organized ${ideas.ideas.length} idea(s).`);
    return ideas;
  }
}
