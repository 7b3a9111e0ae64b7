import { resolve } from 'node:path';
import { readFlag } from '../shared/argv.js';

/** `--output <dir>` resolved against the working directory, if given */
export function parseOutputDir(argv: readonly string[]): string | undefined {
  const value = readFlag(argv, 'output');
  return value ? resolve(process.cwd(), value) : undefined;
}
