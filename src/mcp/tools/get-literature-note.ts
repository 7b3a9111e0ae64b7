import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZettelStorage } from '../../server/storage.js';
import { errorMessage } from '../../shared/errors.js';
import { generateLiteratureNote } from '../../shared/export.js';
import type { ToolResult, ErrorResult } from '../types.js';
import { errorResult, textResult } from '../types.js';

export const DEFAULT_NOTE_TITLE = 'Reading Notes';

export async function getLiteratureNoteHandler(
  storage: ZettelStorage,
  params: { title?: string },
): Promise<ToolResult | ErrorResult> {
  try {
    const record = await storage.readLatestRecord();
    return textResult(generateLiteratureNote(record, params.title ?? DEFAULT_NOTE_TITLE));
  } catch (err) {
    return errorResult(errorMessage(err));
  }
}

export function register(server: McpServer, storage: ZettelStorage): void {
  server.tool(
    'get_literature_note',
    'Render the literature note as markdown: every highlight plus every note transcribed as a summary, grouped by location in reading order.',
    { title: z.string().optional().describe('Title of the source, used as the note heading') },
    async (params) => getLiteratureNoteHandler(storage, params),
  );
}
