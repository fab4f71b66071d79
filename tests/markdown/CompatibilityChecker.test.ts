import { describe, it, expect } from 'vitest';
import { CompatibilityChecker } from '../../src/markdown/CompatibilityChecker.js';
import { IncompatibleElementType } from '../../src/markdown/types.js';
import { type LoadedDocument, type XmlNode } from '../../src/docxReader.js';

/** The parsed `w:body` element holding the given paragraph and table nodes */
function body(...children: XmlNode[]): XmlNode {
  return { body: children };
}

function paragraph(styleId: string | undefined, ...runs: XmlNode[]): XmlNode {
  const properties: XmlNode[] = styleId ? [{ pPr: [{ pStyle: [], ':@': { val: styleId } }] }] : [];
  return { p: [...properties, ...runs] };
}

function textRun(text: string, underline = false): XmlNode {
  const properties: XmlNode[] = underline ? [{ rPr: [{ u: [], ':@': { val: 'single' } }] }] : [];
  return { r: [...properties, { t: [{ '#text': text }] }] };
}

/** A run inside `w:hyperlink`, styled the way Word marks links */
function hyperlinkRun(text: string): XmlNode {
  return {
    hyperlink: [{ r: [{ rPr: [{ rStyle: [], ':@': { val: 'Hyperlink' } }] }, { t: [{ '#text': text }] }] }],
    ':@': { id: 'rId5' },
  };
}

function tableNode(...rows: string[][]): XmlNode {
  return {
    tbl: rows.map((cells) => ({
      tr: cells.map((text) => ({ tc: [paragraph(undefined, textRun(text))] })),
    })),
  };
}

function loaded(bodyNode: XmlNode, extra: Partial<LoadedDocument> = {}): LoadedDocument {
  return {
    body: bodyNode,
    styles: { names: new Map([['Heading1', 'Heading 1']]), defaultParagraphStyle: 'Normal' },
    numbering: new Map(),
    headerCount: 0,
    footerCount: 0,
    ...extra,
  };
}

const checker = new CompatibilityChecker();

describe('CompatibilityChecker', () => {
  it('accepts a document using only mapped styles', () => {
    const result = checker.check(loaded(body(paragraph('Heading1', textRun('Head')), paragraph(undefined, textRun('body')))));
    expect(result).toEqual({ compatible: true, issues: [] });
  });

  it('reports headers and footers', () => {
    const result = checker.check(loaded(body(), { headerCount: 1, footerCount: 2 }));
    expect(result.compatible).toBe(false);
    expect(result.issues.map((issue) => issue.type)).toEqual([
      IncompatibleElementType.HEADER,
      IncompatibleElementType.FOOTER,
    ]);
  });

  it('reports underlined text once, at its first location', () => {
    const result = checker.check(
      loaded(body(paragraph(undefined, textRun('a')), paragraph(undefined, textRun('x', true)), paragraph(undefined, textRun('y', true))))
    );
    expect(result.issues).toEqual([
      {
        type: IncompatibleElementType.LINK,
        message: 'Document contains underlined text (usually links). Link targets and underlining are dropped.',
        location: 'paragraph 2',
      },
    ]);
  });

  it('reports hyperlinks without direct underlining', () => {
    const result = checker.check(loaded(body(paragraph(undefined, textRun('see '), hyperlinkRun('site')))));
    expect(result).toEqual({
      compatible: false,
      issues: [
        {
          type: IncompatibleElementType.LINK,
          message: 'Document contains hyperlinks. Link targets are dropped; only the link text is kept.',
          location: 'paragraph 1',
        },
      ],
    });
  });

  it('reports Subtitle, which converts as plain text', () => {
    const result = checker.check(loaded(body(paragraph('Subtitle', textRun('s')))));
    expect(result.issues.map((issue) => issue.type)).toEqual([IncompatibleElementType.UNKNOWN_STYLE]);
  });

  it('reports unknown paragraph styles by name', () => {
    const result = checker.check(loaded(body(paragraph('Caption', textRun('c')))));
    expect(result.issues).toEqual([
      {
        type: IncompatibleElementType.UNKNOWN_STYLE,
        message: 'Paragraph style "Caption" has no Markdown equivalent. It is converted as plain text.',
        location: 'paragraph 1',
      },
    ]);
  });

  it('reports ragged tables', () => {
    const result = checker.check(loaded(body(tableNode(['A', 'B'], ['1']))));
    expect(result.issues.map((issue) => [issue.type, issue.location])).toEqual([
      [IncompatibleElementType.RAGGED_TABLE, 'table 1'],
    ]);
  });

  it('resets between documents', () => {
    checker.check(loaded(body(), { headerCount: 1 }));
    expect(checker.check(loaded(body())).issues).toEqual([]);
  });
});

describe('CompatibilityChecker.formatIssues', () => {
  it('reports a clean document', () => {
    expect(CompatibilityChecker.formatIssues([])).toBe(
      'Document converts to Markdown without losses beyond formatting details.'
    );
  });

  it('lists each issue with its location', () => {
    const report = CompatibilityChecker.formatIssues([
      { type: IncompatibleElementType.IMAGE, message: 'Images dropped.', location: 'paragraph 3' },
      { type: IncompatibleElementType.HEADER, message: 'Headers dropped.' },
    ]);
    expect(report).toBe(
      'Converting this document to Markdown will lose the following:\n\n• Images dropped. (first at paragraph 3)\n• Headers dropped.'
    );
  });
});
