/** Base class for every error this tool raises on purpose */
export class ZettelError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The source PDF is missing or cannot be parsed. Nothing has been written yet. */
export class SourceUnreadableError extends ZettelError {}

/** An embedded image could not be read or decoded; the document is abandoned. */
export class ImageExtractionError extends ZettelError {}

/** A persisted stage file is missing or does not have the expected shape */
export class StoredDataError extends ZettelError {}

/** A single transcription attempt failed */
export class TranscriptionError extends ZettelError {}

export class OrganizationError extends ZettelError {}

export class ConfigurationError extends ZettelError {}

/** Bad command-line usage */
export class UsageError extends ZettelError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
