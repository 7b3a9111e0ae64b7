import { access, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StoredDataError } from '../shared/errors.js';
import type { DecodeResult } from '../shared/record-json.js';
import { parseIdeas, parseRecord, serializeIdeas, serializeRecord } from '../shared/record-json.js';
import type { AnnotationRecord, OrganizedIdeas } from '../shared/types.js';

export interface JsonCodec<T> {
  encode(value: T): string;
  decode(text: string): DecodeResult<T>;
}

export const recordCodec: JsonCodec<AnnotationRecord> = { encode: serializeRecord, decode: parseRecord };

export const ideasCodec: JsonCodec<OrganizedIdeas> = { encode: serializeIdeas, decode: parseIdeas };

/**
 * One persisted stage file with atomic writes.
 *
 * Writes go to a temp file that is renamed over the target, chained on a
 * queue so overlapping writes land in order. Reads always hit the disk so a
 * hand-edited file is picked up by the next stage.
 */
export class StageFile<T> {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly codec: JsonCodec<T>,
  ) {}

  async exists(): Promise<boolean> {
    try {
      await access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  async read(): Promise<T> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new StoredDataError(`Could not load data. File not found: ${this.filePath}`, { cause: err });
      }
      throw err;
    }

    const decoded = this.codec.decode(raw);
    if (!decoded.ok) {
      throw new StoredDataError(`Malformed data in ${this.filePath}: ${decoded.error}`);
    }
    return decoded.value;
  }

  async write(value: T): Promise<void> {
    const json = this.codec.encode(value);
    const next = this.writeQueue.then(async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      const tmpPath = this.filePath + '.tmp';
      await writeFile(tmpPath, json, 'utf-8');
      await rename(tmpPath, this.filePath);
    });
    // A failed write must not poison the ones queued after it
    this.writeQueue = next.catch(() => undefined);
    return next;
  }
}

export interface StoragePaths {
  structuredJsonPath: string;
  transcribedJsonPath: string;
  organizedJsonPath: string;
}

/** The three JSON hand-off points between pipeline stages */
export class ZettelStorage {
  readonly structured: StageFile<AnnotationRecord>;
  readonly transcribed: StageFile<AnnotationRecord>;
  readonly organized: StageFile<OrganizedIdeas>;

  constructor(paths: StoragePaths) {
    this.structured = new StageFile(paths.structuredJsonPath, recordCodec);
    this.transcribed = new StageFile(paths.transcribedJsonPath, recordCodec);
    this.organized = new StageFile(paths.organizedJsonPath, ideasCodec);
  }

  /** The most processed record available: transcribed if present, else structured */
  async readLatestRecord(): Promise<AnnotationRecord> {
    if (await this.transcribed.exists()) return this.transcribed.read();
    return this.structured.read();
  }
}
