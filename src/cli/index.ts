#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from '../config.js';
import { titleFromPath } from '../pdf/source-document.js';
import { ZettelProcessor } from '../pipeline/processor.js';
import { ZettelError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { USAGE, parseCliArgs } from './args.js';

export async function run(argv: readonly string[]): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return 0;
    }
    logger.setVerbose(args.verbose);

    const config = loadConfig(process.env, { outputDir: args.outputDir });
    const processor = new ZettelProcessor(config);

    switch (args.step) {
      case 'all':
        await processor.runFullProcess(args.pdfPath, args.title);
        break;
      case 'parse':
        await processor.runParser(args.pdfPath);
        logger.info('Parsing step completed.');
        break;
      case 'transcribe':
        await processor.runTranscriber();
        logger.info('Transcription step completed.');
        break;
      case 'organize':
        await processor.runOrganizer();
        logger.info('Organization step completed.');
        break;
      case 'generate':
        await processor.runNoteGenerator(args.title ?? titleFromPath(args.pdfPath));
        logger.info('Note generation step completed.');
        break;
    }
    return 0;
  } catch (err) {
    if (err instanceof ZettelError) {
      logger.error(`An application error occurred: ${err.message}`);
    } else {
      logger.error(`An unexpected error occurred: ${errorMessage(err)}`);
      if (err instanceof Error && err.stack) logger.debug(err.stack);
    }
    return 1;
  }
}

run(process.argv).then((code) => {
  process.exitCode = code;
});
