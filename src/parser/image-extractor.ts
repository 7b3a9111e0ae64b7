import { createHash } from 'node:crypto';
import { mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { UniqueImage } from '../shared/types.js';
import { logger } from '../shared/logger.js';

/** An image resource as found in the document, before de-duplication */
export interface EmbeddedImage {
  pageIndex: number;
  name: string;
  /** Raw encoded stream bytes, exactly as stored in the document */
  encoded: Uint8Array;
  /** File extension of the bytes `toFileBytes()` returns */
  extension: string;
  /** Bytes to write to disk. May decode and re-wrap the stream (e.g. as PNG). */
  toFileBytes(): Uint8Array;
}

/** Where unique images end up */
export interface ImageSink {
  /** Removes everything a previous run left behind */
  clear(): Promise<void>;
  /** Stores the bytes and returns the path to record in `image_path` */
  write(fileName: string, bytes: Uint8Array): Promise<string>;
}

/** Image sink backed by a directory on disk */
export class ImageDirectory implements ImageSink {
  constructor(readonly dir: string) {}

  async clear(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const stale = await readdir(this.dir);
    if (stale.length > 0) {
      logger.debug(`Clearing ${stale.length} old file(s) from '${this.dir}'...`);
    }
    await Promise.all(stale.map((name) => rm(join(this.dir, name), { recursive: true, force: true })));
  }

  async write(fileName: string, bytes: Uint8Array): Promise<string> {
    const path = join(this.dir, fileName);
    await writeFile(path, bytes);
    return path;
  }
}

export function hashImageBytes(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export function noteImageFileName(id: number, extension: string): string {
  return `note_${String(id).padStart(3, '0')}.${extension}`;
}

/**
 * De-duplicates the document's images by content hash and writes each
 * distinct one once, named by its position in the sequence.
 *
 * The first distinct image is the reader's logo printed on every export. Its
 * hash is remembered so later copies are still skipped, but it is never
 * written and never returned, and numbering starts with the image after it.
 */
export async function extractUniqueImages(
  images: Iterable<EmbeddedImage>,
  sink: ImageSink,
): Promise<UniqueImage[]> {
  await sink.clear();

  const seen = new Set<string>();
  const unique: UniqueImage[] = [];

  for (const image of images) {
    const hash = hashImageBytes(image.encoded);
    if (seen.has(hash)) continue;
    seen.add(hash);

    if (seen.size === 1) {
      logger.debug(`Skipping first unique image '${image.name}' on page ${image.pageIndex + 1} (reader logo).`);
      continue;
    }

    const id = unique.length + 1;
    const fileName = noteImageFileName(id, image.extension);
    const path = await sink.write(fileName, image.toFileBytes());
    unique.push({ id, hash, fileName, path, extension: image.extension });
  }

  logger.info(`Extracted ${unique.length} unique note image(s).`);
  return unique;
}
