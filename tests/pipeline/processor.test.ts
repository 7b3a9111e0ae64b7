import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { Organizer } from '../../src/ai/organizer.js';
import type { Transcriber } from '../../src/ai/transcriber.js';
import { loadConfig } from '../../src/config.js';
import type { ZettelConfig } from '../../src/config.js';
import { openSourceDocument } from '../../src/pdf/source-document.js';
import { ZettelProcessor } from '../../src/pipeline/processor.js';
import { ConfigurationError, StoredDataError } from '../../src/shared/errors.js';
import { parseRecord } from '../../src/shared/record-json.js';
import { fakeSource } from '../helpers/source.js';

vi.mock('../../src/pdf/source-document.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/pdf/source-document.js')>()),
  openSourceDocument: vi.fn(),
}));

const TEST_DIR = join(tmpdir(), 'zettel-processor-' + Date.now());

const transcriber: Transcriber = {
  transcribe: async (imagePath) => ({
    type: 'summary',
    transcription: imagePath.endsWith('note_001.png') ? 'first thought' : 'second thought',
  }),
};

const organizer: Organizer = {
  organize: async () => ({
    ideas: [{ idea_location: '1', idea_index: 1, title: 'Idea', links: [{ ref_location: '2' }] }],
  }),
};

describe('ZettelProcessor', () => {
  let config: ZettelConfig;

  beforeEach(() => {
    config = loadConfig({}, { outputDir: TEST_DIR });
    vi.mocked(openSourceDocument).mockResolvedValue(fakeSource());
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('runs every stage and writes each stage file', async () => {
    const processor = new ZettelProcessor(config, { transcriber, organizer });

    await processor.runFullProcess('/books/book.pdf', 'My Title');

    const structured = parseRecord(readFileSync(config.structuredJsonPath, 'utf-8'));
    expect(structured).toEqual({
      ok: true,
      value: new Map([
        [
          '1',
          [
            { type: 'highlight', content: 'first' },
            { type: 'note', image_path: join(config.imageDir, 'note_001.png') },
          ],
        ],
        ['2', [{ type: 'note', image_path: join(config.imageDir, 'note_002.png') }]],
      ]),
    });
    expect(existsSync(config.transcribedJsonPath)).toBe(true);
    expect(existsSync(config.organizedJsonPath)).toBe(true);
    expect(readFileSync(config.literatureNotePath, 'utf-8')).toBe(
      '# Literature Note — My Title\n\n## Loc 1\n\n> first\n\n**Summary:** first thought\n\n' +
        '## Loc 2\n\n**Summary:** second thought\n',
    );
    const permanent = readFileSync(join(config.permanentNoteDir, 'idea_001.md'), 'utf-8');
    expect(permanent.endsWith('# Idea\n\nfirst thought\n\n## Source\n- My Title, Loc 1\n\n## Related\n- Loc 2\n')).toBe(
      true,
    );
  });

  it('writes the note images into the image directory', async () => {
    const processor = new ZettelProcessor(config);

    await processor.runParser('/books/book.pdf');

    expect([...readFileSync(join(config.imageDir, 'note_001.png'))]).toEqual([1]);
    expect([...readFileSync(join(config.imageDir, 'note_002.png'))]).toEqual([2]);
  });

  it('loads each stage input from the previous stage file', async () => {
    const processor = new ZettelProcessor(config, { transcriber, organizer });

    await processor.runParser('/books/book.pdf');
    await processor.runTranscriber();
    await processor.runOrganizer();
    const written = await processor.runNoteGenerator('Book');

    expect(written).toEqual([join(config.permanentNoteDir, 'idea_001.md')]);
    expect(readFileSync(config.literatureNotePath, 'utf-8').startsWith('# Literature Note — Book\n')).toBe(true);
  });

  it('fails a stage whose input file has not been written', async () => {
    const processor = new ZettelProcessor(config, { transcriber, organizer });

    await expect(processor.runOrganizer()).rejects.toThrow(StoredDataError);
  });

  it('parses without an API key but needs one to transcribe', async () => {
    const processor = new ZettelProcessor(config);

    await processor.runParser('/books/book.pdf');

    await expect(processor.runTranscriber()).rejects.toThrow(ConfigurationError);
    await expect(processor.runTranscriber()).rejects.toThrow('OPENAI_API_KEY not found in environment.');
  });
});
