import { describe, it, expect } from 'vitest';
import { joinPages, joinTextItems } from '../../src/pdf/text-layer.js';

describe('joinTextItems', () => {
  it('concatenates fragments and breaks lines at end-of-line markers', () => {
    const items = [
      { str: 'Loc 12 Highlight', hasEOL: true },
      { str: 'The first', hasEOL: false },
      { str: ' sentence', hasEOL: true },
      { str: 'Note:', hasEOL: true },
    ];

    expect(joinTextItems(items)).toBe('Loc 12 Highlight\nThe first sentence\nNote:\n');
  });

  it('skips marked-content items', () => {
    const items = [{ type: 'beginMarkedContent', id: 'P1' }, { str: 'text', hasEOL: false }, { type: 'endMarkedContent' }];

    expect(joinTextItems(items)).toBe('text');
  });
});

describe('joinPages', () => {
  it('follows every page with a blank line', () => {
    expect(joinPages(['one', 'two'])).toBe('one\n\ntwo\n\n');
  });

  it('returns an empty string for no pages', () => {
    expect(joinPages([])).toBe('');
  });
});
