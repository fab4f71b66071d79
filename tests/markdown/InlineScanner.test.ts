import { describe, it, expect } from 'vitest';
import { scanInline, spansToPlainText } from '../../src/markdown/InlineScanner.js';

describe('scanInline', () => {
  it('returns no spans for empty text', () => {
    expect(scanInline('')).toEqual([]);
  });

  it('returns a single text span for plain text', () => {
    expect(scanInline('just words')).toEqual([{ type: 'text', text: 'just words' }]);
  });

  it('splits bold and italic with the text between them preserved', () => {
    expect(scanInline('**bold** and *italic*')).toEqual([
      { type: 'bold', text: 'bold' },
      { type: 'text', text: ' and ' },
      { type: 'italic', text: 'italic' },
    ]);
  });

  it('treats an unmatched italic delimiter as literal text', () => {
    expect(scanInline('*italic')).toEqual([{ type: 'text', text: '*italic' }]);
  });

  it('treats an unmatched bold delimiter as literal text', () => {
    expect(scanInline('a **b c')).toEqual([{ type: 'text', text: 'a **b c' }]);
  });

  it('parses links and keeps the url', () => {
    expect(scanInline('see [docs](https://example.com/docs) now')).toEqual([
      { type: 'text', text: 'see ' },
      { type: 'link', text: 'docs', url: 'https://example.com/docs' },
      { type: 'text', text: ' now' },
    ]);
  });

  it('does not nest formatting inside a link', () => {
    expect(scanInline('[**x**](u)')).toEqual([{ type: 'link', text: '**x**', url: 'u' }]);
  });

  it('treats a bracket without a target as literal text', () => {
    expect(scanInline('[not a link] here')).toEqual([{ type: 'text', text: '[not a link] here' }]);
  });

  it('parses bold-italic triple asterisks', () => {
    expect(scanInline('***both*** done')).toEqual([
      { type: 'boldItalic', text: 'both' },
      { type: 'text', text: ' done' },
    ]);
  });

  it('handles adjacent spans without separators', () => {
    expect(scanInline('**a***b*')).toEqual([
      { type: 'bold', text: 'a' },
      { type: 'italic', text: 'b' },
    ]);
  });
});

describe('spansToPlainText', () => {
  it('drops formatting and link targets', () => {
    expect(spansToPlainText(scanInline('**a** *b* [c](d)'))).toBe('a b c');
  });
});
