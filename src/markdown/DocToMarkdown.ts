/**
 * DocToMarkdown - Converts a Word document's blocks to Markdown
 *
 * This class takes the paragraphs and tables read from a .docx package and
 * renders Markdown lines reproducing their visual structure. Link targets,
 * cell formatting and list nesting beyond one level do not survive.
 */

import { type ConverterConfig, DEFAULT_CONFIG } from '../config.js';
import { type DocBlock, type DocParagraph, type DocRun, type DocTable, paragraphText } from '../docxReader.js';
import { STYLE_NAMES, normalizeStyleName } from './types.js';

type LineKind = 'heading' | 'paragraph' | 'bullet' | 'number' | 'quote' | 'rule' | 'table';

interface MarkdownChunk {
  kind: LineKind;
  lines: string[];
}

/** Characters a line-only paragraph may be drawn with, besides the configured glyph */
const RULE_GLYPHS = ['─', '-', '—'];

const STYLE_KEYS = {
  title: normalizeStyleName(STYLE_NAMES.title),
  listBullet: normalizeStyleName(STYLE_NAMES.listBullet),
  listBullet2: normalizeStyleName(STYLE_NAMES.listBullet2),
  listNumber: normalizeStyleName(STYLE_NAMES.listNumber),
  quote: normalizeStyleName(STYLE_NAMES.quote),
  intenseQuote: normalizeStyleName(STYLE_NAMES.intenseQuote),
};

/**
 * Wrap a run's text in emphasis markers, keeping surrounding whitespace outside them
 */
export function formatRun(run: DocRun): string {
  const marker = run.bold && run.italic ? '***' : run.bold ? '**' : run.italic ? '*' : '';
  if (!marker) return run.text;

  const match = run.text.match(/^(\s*)(.*?)(\s*)$/s);
  if (!match || !match[2]) return run.text;
  return `${match[1]}${marker}${match[2]}${marker}${match[3]}`;
}

export function formatRuns(runs: DocRun[]): string {
  return runs.map(formatRun).join('');
}

export class DocToMarkdown {
  private readonly config: ConverterConfig;
  private readonly ruleGlyphs: Set<string>;
  private numberCounter = 0;

  constructor(config: ConverterConfig = DEFAULT_CONFIG) {
    this.config = config;
    this.ruleGlyphs = new Set([...RULE_GLYPHS, ...config.ruleGlyph]);
  }

  /**
   * Convert document blocks to a Markdown string ending in a newline
   */
  convert(blocks: DocBlock[]): string {
    const lines = this.toLines(blocks);
    return lines.length > 0 ? lines.join('\n') + '\n' : '';
  }

  /**
   * Convert document blocks to Markdown lines. Consecutive list items of the
   * same kind share adjacent lines; every other block is set off by a blank line.
   */
  toLines(blocks: DocBlock[]): string[] {
    this.numberCounter = 0;
    const chunks: MarkdownChunk[] = [];

    for (const block of blocks) {
      const chunk = block.kind === 'table' ? this.convertTable(block) : this.convertParagraph(block);
      if (!chunk) continue;
      if (chunk.kind !== 'number') {
        this.numberCounter = 0;
      }
      chunks.push(chunk);
    }

    const lines: string[] = [];
    chunks.forEach((chunk, index) => {
      const previous = chunks[index - 1];
      const isListContinuation =
        previous !== undefined && previous.kind === chunk.kind && (chunk.kind === 'bullet' || chunk.kind === 'number');
      if (index > 0 && !isListContinuation) {
        lines.push('');
      }
      lines.push(...chunk.lines);
    });
    return lines;
  }

  /**
   * Convert a paragraph to a markdown chunk, or null for an empty paragraph
   */
  private convertParagraph(paragraph: DocParagraph): MarkdownChunk | null {
    const plain = paragraphText(paragraph).trim();

    if (this.isRule(paragraph, plain)) {
      return { kind: 'rule', lines: ['---'] };
    }

    if (!plain) {
      return null;
    }

    const styleKey = normalizeStyleName(paragraph.styleName);

    // Headings
    if (styleKey === STYLE_KEYS.title) {
      return { kind: 'heading', lines: [`# ${plain}`] };
    }
    const headingMatch = styleKey.match(/^heading(\d+)$/);
    if (headingMatch) {
      const level = Number.parseInt(headingMatch[1], 10);
      const hashes = '#'.repeat(Math.min(level + 1, 6));
      return { kind: 'heading', lines: [`${hashes} ${plain}`] };
    }

    const text = formatRuns(paragraph.runs).trim();
    const indented = (paragraph.indentLeft ?? 0) >= this.config.quoteIndentTwips;

    // Lists
    if (styleKey === STYLE_KEYS.listBullet2 || (styleKey === STYLE_KEYS.listBullet && indented)) {
      return { kind: 'bullet', lines: [`  - ${text}`] };
    }
    if (styleKey === STYLE_KEYS.listBullet) {
      return { kind: 'bullet', lines: [`- ${text}`] };
    }
    if (styleKey === STYLE_KEYS.listNumber) {
      return this.numberedItem(text);
    }

    // Quotes: quote styles, or an indented body paragraph
    if (styleKey === STYLE_KEYS.quote || styleKey === STYLE_KEYS.intenseQuote) {
      return { kind: 'quote', lines: [`> ${text}`] };
    }

    // Direct numbering on an otherwise plain paragraph (lists authored in Word)
    if (paragraph.list) {
      if (paragraph.list.ordered) {
        return this.numberedItem(text);
      }
      return { kind: 'bullet', lines: [`${paragraph.list.level > 0 ? '  ' : ''}- ${text}`] };
    }

    if (indented) {
      return { kind: 'quote', lines: [`> ${text}`] };
    }

    return { kind: 'paragraph', lines: [text] };
  }

  private numberedItem(text: string): MarkdownChunk {
    this.numberCounter++;
    return { kind: 'number', lines: [`${this.numberCounter}. ${text}`] };
  }

  /**
   * A long run of line glyphs, or an empty paragraph with a bottom border
   */
  private isRule(paragraph: DocParagraph, plain: string): boolean {
    if (!plain) {
      return paragraph.bottomBorder;
    }
    return plain.length > this.config.ruleMinLength && [...plain].every((char) => this.ruleGlyphs.has(char));
  }

  /**
   * Convert a table to markdown
   */
  private convertTable(table: DocTable): MarkdownChunk | null {
    const rows = table.rows.map((row) => row.cells);
    if (rows.length === 0) return null;

    const header = rows[0];
    const joinRow = (cells: string[]) => `| ${cells.join(' | ')} |`;
    const lines = [joinRow(header), joinRow(header.map(() => '---'))];

    for (const row of rows.slice(1)) {
      const padded = [...row];
      while (padded.length < header.length) {
        padded.push('');
      }
      lines.push(joinRow(padded));
    }

    return { kind: 'table', lines };
  }
}
