import { describe, it, expect } from 'vitest';
import { ImageCursor, assembleAnnotations } from '../../src/parser/annotation-assembler.js';
import { parseAnnotationText } from '../../src/parser/annotation-text-parser.js';
import type { UniqueImage } from '../../src/shared/types.js';

function image(id: number): UniqueImage {
  const fileName = `note_00${id}.png`;
  return { id, hash: `hash-${id}`, fileName, path: `/out/images/${fileName}`, extension: 'png' };
}

describe('ImageCursor', () => {
  it('hands out images in order and then runs dry', () => {
    const cursor = new ImageCursor([image(1), image(2)]);

    expect(cursor.next()?.id).toBe(1);
    expect(cursor.remaining().map((i) => i.id)).toEqual([2]);
    expect(cursor.next()?.id).toBe(2);
    expect(cursor.next()).toBeUndefined();
    expect(cursor.remaining()).toEqual([]);
  });
});

describe('assembleAnnotations', () => {
  it('pairs the n-th note marker with the n-th image', () => {
    const parsed = parseAnnotationText(['Loc 1 Note', 'Loc 2 Highlight', 'a', 'Note:', 'Loc 1 Note']);

    const { record, warnings, unusedImages } = assembleAnnotations(parsed, [image(1), image(2), image(3)]);

    expect([...record]).toEqual([
      [
        '1',
        [
          { type: 'note', image_path: '/out/images/note_001.png' },
          { type: 'note', image_path: '/out/images/note_003.png' },
        ],
      ],
      [
        '2',
        [
          { type: 'highlight', content: 'a' },
          { type: 'note', image_path: '/out/images/note_002.png' },
        ],
      ],
    ]);
    expect(warnings).toEqual([]);
    expect(unusedImages).toEqual([]);
  });

  it('drops notes past the last image and warns for each', () => {
    const parsed = parseAnnotationText(['Loc 1 Note', 'Loc 2 Highlight', 'a', 'Note:', 'Loc 1 Note']);

    const { record, warnings } = assembleAnnotations(parsed, [image(1), image(2)]);

    expect(record.get('1')).toEqual([{ type: 'note', image_path: '/out/images/note_001.png' }]);
    expect(warnings).toEqual([
      {
        kind: 'image-starvation',
        location: '1',
        message: 'Found a note at Loc 1 but no corresponding image.',
      },
    ]);
  });

  it('gives a note-only marker one note and no highlight', () => {
    const parsed = parseAnnotationText(['Loc 9 Note', 'Loc 10 Highlight', 'x']);

    const { record, warnings, unusedImages } = assembleAnnotations(parsed, [image(1)]);

    expect([...record]).toEqual([
      ['9', [{ type: 'note', image_path: '/out/images/note_001.png' }]],
      ['10', [{ type: 'highlight', content: 'x' }]],
    ]);
    expect(warnings).toEqual([]);
    expect(unusedImages).toEqual([]);
  });

  it('keeps a location whose only note went unmatched', () => {
    const parsed = parseAnnotationText(['Loc 9 Note']);

    const { record, warnings } = assembleAnnotations(parsed, []);

    expect([...record]).toEqual([['9', []]]);
    expect(warnings).toHaveLength(1);
  });

  it('reports images left over after every note is matched', () => {
    const parsed = parseAnnotationText(['Loc 1 Highlight', 'text', 'Note:']);

    const { unusedImages } = assembleAnnotations(parsed, [image(1), image(2)]);

    expect(unusedImages.map((i) => i.fileName)).toEqual(['note_002.png']);
  });

  it('carries parser warnings through', () => {
    const parsed = parseAnnotationText(['Note:', 'Loc 1 Highlight', 'x']);

    const { warnings } = assembleAnnotations(parsed, []);

    expect(warnings.map((w) => w.kind)).toEqual(['orphan-note-marker']);
  });
});
