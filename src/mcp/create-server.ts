import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZettelProcessor } from '../pipeline/processor.js';
import { register as registerParseDocument } from './tools/parse-document.js';
import { register as registerListAnnotations } from './tools/list-annotations.js';
import { register as registerGetAnnotation } from './tools/get-annotation.js';
import { register as registerGetLiteratureNote } from './tools/get-literature-note.js';

export function createServer(processor: ZettelProcessor): McpServer {
  const server = new McpServer({
    name: 'zettel-notes-mcp',
    version: '0.1.0',
  });

  registerParseDocument(server, processor);
  registerListAnnotations(server, processor.storage);
  registerGetAnnotation(server, processor.storage);
  registerGetLiteratureNote(server, processor.storage);

  return server;
}
