import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZettelStorage } from '../../server/storage.js';
import { errorMessage } from '../../shared/errors.js';
import { serializeRecord } from '../../shared/record-json.js';
import type { AnnotationRecord } from '../../shared/types.js';
import type { ToolResult, ErrorResult } from '../types.js';
import { errorResult, textResult } from '../types.js';

export async function listAnnotationsHandler(
  storage: ZettelStorage,
  params: { location?: string },
): Promise<ToolResult | ErrorResult> {
  let record: AnnotationRecord;
  try {
    record = await storage.readLatestRecord();
  } catch (err) {
    return errorResult(errorMessage(err));
  }

  if (params.location === undefined) {
    return textResult(serializeRecord(record));
  }

  const entries = record.get(params.location);
  if (!entries) {
    return errorResult(`No annotations at Loc ${params.location}`);
  }
  return textResult(serializeRecord(new Map([[params.location, entries]])));
}

export function register(server: McpServer, storage: ZettelStorage): void {
  server.tool(
    'list_annotations',
    'List the parsed annotations as a JSON object keyed by location, in reading order. Includes transcriptions once the transcription step has run. Optionally restrict to one location.',
    { location: z.string().regex(/^\d+$/).optional().describe('Location key to show (e.g. "1234")') },
    async (params) => listAnnotationsHandler(storage, params),
  );
}
