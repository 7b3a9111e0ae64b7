import { describe, it, expect } from 'vitest';
import {
  generateLiteratureNote,
  generatePermanentNote,
  permanentNoteFileName,
  resolveIdeaContent,
} from '../../src/shared/export.js';
import { highlight, makeRecord, note } from '../helpers/fixtures.js';

describe('generateLiteratureNote', () => {
  it('renders highlights and summary notes grouped by location', () => {
    const record = makeRecord([
      ['1', [highlight('first'), note('a.png', { type: 'summary', transcription: 'first thought' })]],
      ['2', [note('b.png', { type: 'summary', transcription: 'second thought' })]],
    ]);

    expect(generateLiteratureNote(record, 'My Title')).toBe(
      [
        '# Literature Note — My Title',
        '',
        '## Loc 1',
        '',
        '> first',
        '',
        '**Summary:** first thought',
        '',
        '## Loc 2',
        '',
        '**Summary:** second thought',
        '',
      ].join('\n'),
    );
  });

  it('leaves out idea notes, failed transcriptions and untranscribed notes', () => {
    const record = makeRecord([
      ['1', [note('a.png', { type: 'idea', transcription: 'an idea' })]],
      ['2', [note('b.png', { error: 'Image file not found.' }), note('c.png')]],
      ['3', [highlight('kept')]],
    ]);

    expect(generateLiteratureNote(record, 'T')).toBe('# Literature Note — T\n\n## Loc 3\n\n> kept\n');
  });

  it('skips empty highlights kept in front of a note', () => {
    const record = makeRecord([['4', [highlight(''), note('a.png', { type: 'summary', transcription: 'gist' })]]]);

    expect(generateLiteratureNote(record, 'T')).toBe('# Literature Note — T\n\n## Loc 4\n\n**Summary:** gist\n');
  });

  it('says so when there is nothing to render', () => {
    expect(generateLiteratureNote(new Map(), 'T')).toBe('# Literature Note — T\n\nNo highlights or summaries yet.');
  });
});

describe('resolveIdeaContent', () => {
  const record = makeRecord([
    ['10', [highlight('passage'), note('a.png', { type: 'idea', transcription: 'my idea' })]],
    ['11', [note('b.png', { error: 'failed' })]],
  ]);

  it('returns the highlight text or the transcription', () => {
    expect(resolveIdeaContent(record, { idea_location: '10', idea_index: 0 })).toBe('passage');
    expect(resolveIdeaContent(record, { idea_location: '10', idea_index: 1 })).toBe('my idea');
  });

  it('returns undefined for failed transcriptions and dangling references', () => {
    expect(resolveIdeaContent(record, { idea_location: '11', idea_index: 0 })).toBeUndefined();
    expect(resolveIdeaContent(record, { idea_location: '10', idea_index: 5 })).toBeUndefined();
    expect(resolveIdeaContent(record, { idea_location: '99', idea_index: 0 })).toBeUndefined();
  });
});

describe('generatePermanentNote', () => {
  it('renders front matter, title, content, source and related locations', () => {
    const markdown = generatePermanentNote({
      content: 'Systems resist change.',
      location: '120',
      linkedLocations: ['45', '300'],
      sourceTitle: 'Book "One"',
      title: 'Resistance',
      dateCreated: '2026-10-19',
    });

    expect(markdown).toBe(
      '---\n' +
        'created: 2026-10-19\n' +
        'source: "Book \\"One\\""\n' +
        'location: 120\n' +
        '---\n' +
        '\n' +
        '# Resistance\n' +
        '\n' +
        'Systems resist change.\n' +
        '\n' +
        '## Source\n' +
        '- Book "One", Loc 120\n' +
        '\n' +
        '## Related\n' +
        '- Loc 45\n' +
        '- Loc 300\n',
    );
  });

  it('omits the heading and the related section when there is nothing to put in them', () => {
    const markdown = generatePermanentNote({
      content: 'text',
      location: '1',
      linkedLocations: [],
      sourceTitle: 'B',
      dateCreated: '2026-01-01',
    });

    expect(markdown).toBe('---\ncreated: 2026-01-01\nsource: "B"\nlocation: 1\n---\n\ntext\n\n## Source\n- B, Loc 1\n');
  });
});

describe('permanentNoteFileName', () => {
  it('pads the position to three digits', () => {
    expect(permanentNoteFileName(7)).toBe('idea_007.md');
  });
});
