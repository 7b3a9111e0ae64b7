import { join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './shared/errors.js';

export const DEFAULT_OUTPUT_DIR = 'zettel_output';
export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_MAX_RETRIES = 3;

// Empty variables count as unset
const optionalString = z
  .string()
  .optional()
  .transform((value) => value || undefined);

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_PROJECT_ID: optionalString,
  OPENAI_ORG_ID: optionalString,
  OPENAI_MODEL: optionalString.transform((value) => value ?? DEFAULT_MODEL),
  ZETTEL_OUTPUT_DIR: optionalString,
  ZETTEL_MAX_RETRIES: optionalString.pipe(z.coerce.number().int().positive().default(DEFAULT_MAX_RETRIES)),
});

export interface OpenAiSettings {
  apiKey?: string;
  project?: string;
  organization?: string;
  model: string;
}

export interface ZettelConfig {
  outputDir: string;
  imageDir: string;
  structuredJsonPath: string;
  transcribedJsonPath: string;
  organizedJsonPath: string;
  literatureNotePath: string;
  permanentNoteDir: string;
  /** Attempts per note image before the transcription is recorded as failed */
  maxRetries: number;
  openai: OpenAiSettings;
}

export interface ConfigOverrides {
  outputDir?: string;
}

/** Every stage path derived from one output directory */
export function outputLayout(outputDir: string) {
  return {
    outputDir,
    imageDir: join(outputDir, 'images'),
    structuredJsonPath: join(outputDir, '1_structured_annotations.json'),
    transcribedJsonPath: join(outputDir, '2_transcribed_annotations.json'),
    organizedJsonPath: join(outputDir, '3_organized_ideas.json'),
    literatureNotePath: join(outputDir, 'literature_note.md'),
    permanentNoteDir: join(outputDir, 'permanent_notes'),
  };
}

/**
 * Builds the configuration from environment variables (a `.env` file is
 * loaded by the CLI before this runs) plus command-line overrides.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): ZettelConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  const vars = parsed.data;

  return {
    ...outputLayout(overrides.outputDir ?? vars.ZETTEL_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR),
    maxRetries: vars.ZETTEL_MAX_RETRIES,
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      project: vars.OPENAI_PROJECT_ID,
      organization: vars.OPENAI_ORG_ID,
      model: vars.OPENAI_MODEL,
    },
  };
}
