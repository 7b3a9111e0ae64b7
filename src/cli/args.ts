import { resolve } from 'node:path';
import type { PipelineStep } from '../pipeline/processor.js';
import { PIPELINE_STEPS } from '../pipeline/processor.js';
import { hasFlag, readFlag } from '../shared/argv.js';
import { UsageError } from '../shared/errors.js';

export const USAGE = `Usage: zettel <pdf> [--title <title>] [--step ${PIPELINE_STEPS.join('|')}] [--output <dir>] [--verbose]

Process reading annotations from an e-reader PDF export into a Zettelkasten.

  --title     Title of the source document (defaults to the PDF title)
  --step      Run a single step; 'all' runs the full pipeline (default)
  --output    Output directory (default: $ZETTEL_OUTPUT_DIR or ./zettel_output)
  --verbose   Log debug messages`;

export interface CliArgs {
  pdfPath: string;
  title?: string;
  step: PipelineStep;
  outputDir?: string;
  verbose: boolean;
  help: boolean;
}

const FLAGS_WITH_VALUES = new Set(['--title', '--step', '--output']);

function isPipelineStep(value: string): value is PipelineStep {
  return PIPELINE_STEPS.some((step) => step === value);
}

/** Parses `process.argv` (node binary and script path included) */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args = argv.slice(2);
  const help = hasFlag(args, 'help') || args.includes('-h');

  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (FLAGS_WITH_VALUES.has(args[i])) {
      i++;
    } else if (!args[i].startsWith('-')) {
      positionals.push(args[i]);
    }
  }

  const rawStep = readFlag(args, 'step') ?? 'all';
  if (!isPipelineStep(rawStep)) {
    throw new UsageError(`Invalid --step '${rawStep}'. Expected one of: ${PIPELINE_STEPS.join(', ')}`);
  }

  const [pdfPath] = positionals;
  if (!pdfPath && !help) {
    throw new UsageError('Missing path to the input PDF file.');
  }

  const outputDir = readFlag(args, 'output');

  return {
    pdfPath: pdfPath ? resolve(pdfPath) : '',
    title: readFlag(args, 'title'),
    step: rawStep,
    outputDir: outputDir ? resolve(outputDir) : undefined,
    verbose: hasFlag(args, 'verbose'),
    help,
  };
}
