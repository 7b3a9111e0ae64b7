import { resolve } from 'node:path';
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZettelProcessor } from '../../pipeline/processor.js';
import { errorMessage } from '../../shared/errors.js';
import { countEntries } from '../../shared/types.js';
import type { ToolResult, ErrorResult } from '../types.js';
import { errorResult, textResult } from '../types.js';

export async function parseDocumentHandler(
  processor: ZettelProcessor,
  params: { pdfPath: string },
): Promise<ToolResult | ErrorResult> {
  try {
    const result = await processor.runParser(resolve(params.pdfPath));
    const { highlights, notes } = countEntries(result.record);
    const summary = {
      title: result.title,
      locations: result.record.size,
      highlights,
      notes,
      images: result.images.length,
      savedTo: processor.storage.structured.filePath,
      warnings: result.warnings,
    };
    return textResult(JSON.stringify(summary, null, 2));
  } catch (err) {
    return errorResult(errorMessage(err));
  }
}

export function register(server: McpServer, processor: ZettelProcessor): void {
  server.tool(
    'parse_document',
    'Parse an e-reader annotation export (PDF) into structured annotations. Extracts the handwritten-note images, pairs them with note markers, and saves the result for the other tools. Returns counts and any data-quality warnings.',
    { pdfPath: z.string().min(1).describe('Path to the exported PDF') },
    async (params) => parseDocumentHandler(processor, params),
  );
}
