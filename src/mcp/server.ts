#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../config.js';
import { ZettelProcessor } from '../pipeline/processor.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { parseOutputDir } from './args.js';
import { createServer } from './create-server.js';

async function main() {
  const config = loadConfig(process.env, { outputDir: parseOutputDir(process.argv) });
  const server = createServer(new ZettelProcessor(config));

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err: unknown) => {
  logger.error(`MCP server failed: ${errorMessage(err)}`);
  process.exitCode = 1;
});
