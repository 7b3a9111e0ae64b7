import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZettelStorage } from '../../server/storage.js';
import { errorMessage } from '../../shared/errors.js';
import type { ToolResult, ErrorResult } from '../types.js';
import { errorResult, textResult } from '../types.js';

export async function getAnnotationHandler(
  storage: ZettelStorage,
  params: { location: string; index: number },
): Promise<ToolResult | ErrorResult> {
  try {
    const record = await storage.readLatestRecord();
    const entry = record.get(params.location)?.[params.index];
    if (!entry) {
      return errorResult(`Annotation ${params.index} at Loc ${params.location} not found`);
    }
    return textResult(JSON.stringify(entry, null, 2));
  } catch (err) {
    return errorResult(errorMessage(err));
  }
}

export function register(server: McpServer, storage: ZettelStorage): void {
  server.tool(
    'get_annotation',
    'Get a single annotation by location and position within that location. Notes include the path of their image and, once transcribed, the transcription.',
    {
      location: z.string().regex(/^\d+$/).describe('Location key (e.g. "1234")'),
      index: z.number().int().nonnegative().describe('0-based position of the entry within the location'),
    },
    async (params) => getAnnotationHandler(storage, params),
  );
}
