import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readFileSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { writeLiteratureNote, writePermanentNotes } from '../../src/pipeline/generate-notes.js';
import { highlight, makeRecord, note } from '../helpers/fixtures.js';

const TEST_DIR = join(tmpdir(), 'zettel-generate-' + Date.now());
const NOTE_DIR = join(TEST_DIR, 'permanent_notes');
const NOW = new Date('2026-10-19T12:00:00Z');

const record = makeRecord([
  ['1', [highlight('alpha')]],
  ['2', [note('b.png', { type: 'idea', transcription: 'beta' })]],
]);

describe('writeLiteratureNote', () => {
  afterEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('writes the rendered note, creating the directory', async () => {
    const path = join(TEST_DIR, 'literature_note.md');

    await writeLiteratureNote(record, 'Book', path);

    expect(readFileSync(path, 'utf-8')).toBe('# Literature Note — Book\n\n## Loc 1\n\n> alpha\n');
  });
});

describe('writePermanentNotes', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('writes one file per idea, numbered by position', async () => {
    const ideas = {
      ideas: [
        { idea_location: '1', idea_index: 0, title: 'Alpha' },
        { idea_location: '9', idea_index: 0 },
        { idea_location: '2', idea_index: 0, links: [{ ref_location: '1' }] },
      ],
    };

    const written = await writePermanentNotes(ideas, record, { outputDir: NOTE_DIR, sourceTitle: 'Book', now: NOW });

    expect(written).toEqual([join(NOTE_DIR, 'idea_001.md'), join(NOTE_DIR, 'idea_003.md')]);
    expect(readdirSync(NOTE_DIR).sort()).toEqual(['idea_001.md', 'idea_003.md']);
    expect(readFileSync(join(NOTE_DIR, 'idea_003.md'), 'utf-8')).toBe(
      '---\ncreated: 2026-10-19\nsource: "Book"\nlocation: 2\n---\n\nbeta\n\n## Source\n- Book, Loc 2\n\n## Related\n- Loc 1\n',
    );
  });

  it('warns about ideas that point at nothing', async () => {
    await writePermanentNotes({ ideas: [{ idea_location: '9', idea_index: 0 }] }, record, {
      outputDir: NOTE_DIR,
      sourceTitle: 'Book',
      now: NOW,
    });

    expect(console.warn).toHaveBeenCalledWith('[zettel] No content at Loc 9, index 0. Skipping.');
  });

  it('writes nothing when there are no ideas', async () => {
    const written = await writePermanentNotes({ ideas: [] }, record, { outputDir: NOTE_DIR, sourceTitle: 'Book' });

    expect(written).toEqual([]);
    expect(existsSync(NOTE_DIR)).toBe(false);
  });
});
