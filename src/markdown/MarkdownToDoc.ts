/**
 * MarkdownToDoc - Converts Markdown to a Word document
 *
 * This class parses markdown line by line into blocks and renders each block
 * as exactly one paragraph or table through the document writer, preserving
 * source order.
 */

import { type ConverterConfig, DEFAULT_CONFIG } from '../config.js';
import {
  addParagraph,
  addRun,
  addTable,
  cellParagraph,
  createDocument,
  type DocumentHandle,
  type ParagraphHandle,
} from '../docxWriter.js';
import { scanInline } from './InlineScanner.js';
import { type Block, type HeadingLevel, type InlineSpan, STYLE_NAMES } from './types.js';

const HEADING_PREFIXES: readonly [string, HeadingLevel][] = [
  ['# ', 0],
  ['## ', 1],
  ['### ', 2],
  ['#### ', 3],
];

const HEADING_STYLES: Record<HeadingLevel, string> = {
  0: STYLE_NAMES.title,
  1: STYLE_NAMES.heading1,
  2: STYLE_NAMES.heading2,
  3: STYLE_NAMES.heading3,
};

const RULE_PATTERN = /^(-{3,}|\*{3,}|_{3,})$/;
const TABLE_SEPARATOR_PATTERN = /^\|[\s\-:|]+\|$/;
const BULLET_PATTERN = /^(\s*)[-*] (.*)$/;
const NUMBERED_PATTERN = /^\s*(\d+)\. (.*)$/;
const QUOTE_PATTERN = /^\s*>(?: (.*))?$/;

/**
 * Split a table line into trimmed cells. The trailing pipe is optional.
 */
export function splitTableRow(line: string): string[] {
  const trimmed = line.trim();
  const parts = trimmed.split('|');
  const cells = trimmed.endsWith('|') && parts.length > 1 ? parts.slice(1, -1) : parts.slice(1);
  return cells.map((cell) => cell.trim());
}

export class MarkdownToDoc {
  private readonly config: ConverterConfig;

  constructor(config: ConverterConfig = DEFAULT_CONFIG) {
    this.config = config;
  }

  /**
   * Convert markdown into a populated document
   * @param markdown The markdown string to convert
   */
  convert(markdown: string): DocumentHandle {
    const doc = createDocument(this.config);
    this.render(this.parseMarkdown(markdown), doc);
    return doc;
  }

  /**
   * Parse markdown into structured blocks
   */
  parseMarkdown(markdown: string): Block[] {
    const blocks: Block[] = [];
    const lines = markdown.split(/\r?\n/);
    let i = 0;

    while (i < lines.length) {
      const line = lines[i];
      const trimmed = line.trim();

      // Blank lines only separate blocks
      if (trimmed === '') {
        i++;
        continue;
      }

      // Heading
      const heading = HEADING_PREFIXES.find(([prefix]) => line.startsWith(prefix));
      if (heading) {
        blocks.push({
          type: 'heading',
          level: heading[1],
          spans: scanInline(line.slice(heading[0].length).trim()),
        });
        i++;
        continue;
      }

      // Horizontal rule
      if (RULE_PATTERN.test(trimmed)) {
        blocks.push({ type: 'rule' });
        i++;
        continue;
      }

      // Table: this line and every following line that starts with a pipe
      if (trimmed.startsWith('|')) {
        const rows: string[][] = [];
        while (i < lines.length && lines[i].trim().startsWith('|')) {
          const row = lines[i].trim();
          if (!TABLE_SEPARATOR_PATTERN.test(row)) {
            rows.push(splitTableRow(row));
          }
          i++;
        }
        if (rows.length > 0) {
          blocks.push({ type: 'table', rows });
        }
        continue;
      }

      // Bullet list item
      const bulletMatch = line.match(BULLET_PATTERN);
      if (bulletMatch) {
        blocks.push({
          type: 'bulletItem',
          nested: bulletMatch[1].length >= this.config.nestedBulletIndent,
          spans: scanInline(bulletMatch[2].trim()),
        });
        i++;
        continue;
      }

      // Numbered list item
      const numberedMatch = line.match(NUMBERED_PATTERN);
      if (numberedMatch) {
        blocks.push({
          type: 'numberedItem',
          ordinal: Number.parseInt(numberedMatch[1], 10),
          spans: scanInline(numberedMatch[2].trim()),
        });
        i++;
        continue;
      }

      // Blockquote
      const quoteMatch = line.match(QUOTE_PATTERN);
      if (quoteMatch) {
        blocks.push({ type: 'quote', spans: scanInline((quoteMatch[1] ?? '').trim()) });
        i++;
        continue;
      }

      // Regular paragraph
      blocks.push({ type: 'paragraph', spans: scanInline(trimmed) });
      i++;
    }

    return blocks;
  }

  /**
   * Render blocks into the document, one paragraph or table per block
   */
  render(blocks: Block[], doc: DocumentHandle): void {
    let previous: Block['type'] | undefined;

    for (const block of blocks) {
      this.renderBlock(block, doc, previous);
      previous = block.type;
    }
  }

  private renderBlock(block: Block, doc: DocumentHandle, previous: Block['type'] | undefined): void {
    switch (block.type) {
      case 'heading':
        this.addSpans(addParagraph(doc, HEADING_STYLES[block.level]), block.spans);
        return;

      case 'paragraph':
        this.addSpans(addParagraph(doc, STYLE_NAMES.normal), block.spans);
        return;

      case 'bulletItem':
        this.addSpans(
          addParagraph(doc, block.nested ? STYLE_NAMES.listBullet2 : STYLE_NAMES.listBullet),
          block.spans
        );
        return;

      case 'numberedItem':
        // A new run of numbered items starts counting from 1 again
        this.addSpans(
          addParagraph(doc, STYLE_NAMES.listNumber, { restartNumbering: previous !== 'numberedItem' }),
          block.spans
        );
        return;

      case 'quote':
        this.addSpans(addParagraph(doc, STYLE_NAMES.quote), block.spans);
        return;

      case 'rule':
        this.renderRule(doc);
        return;

      case 'table':
        this.renderTable(block.rows, doc);
        return;

      default: {
        const unreachable: never = block;
        throw new Error(`Unhandled block: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private renderRule(doc: DocumentHandle): void {
    if (this.config.ruleStyle === 'glyph') {
      const paragraph = addParagraph(doc, STYLE_NAMES.normal);
      addRun(paragraph, this.config.ruleGlyph.repeat(this.config.ruleGlyphLength));
      return;
    }
    addParagraph(doc, STYLE_NAMES.normal, { bottomBorder: true });
  }

  private renderTable(rows: string[][], doc: DocumentHandle): void {
    const columns = Math.max(1, ...rows.map((row) => row.length));
    const table = addTable(doc, rows.length, columns);

    rows.forEach((row, rowIndex) => {
      row.forEach((cellText, colIndex) => {
        // Header cells are bold throughout
        this.addSpans(cellParagraph(table, rowIndex, colIndex), scanInline(cellText), rowIndex === 0);
      });
    });
  }

  /**
   * Write each span as one run
   */
  private addSpans(paragraph: ParagraphHandle, spans: InlineSpan[], forceBold = false): void {
    for (const span of spans) {
      switch (span.type) {
        case 'text':
          addRun(paragraph, span.text, { bold: forceBold });
          break;
        case 'bold':
          addRun(paragraph, span.text, { bold: true });
          break;
        case 'italic':
          addRun(paragraph, span.text, { bold: forceBold, italic: true });
          break;
        case 'boldItalic':
          addRun(paragraph, span.text, { bold: true, italic: true });
          break;
        case 'link':
          // Only the display text survives, underlined
          addRun(paragraph, span.text, { bold: forceBold, underline: true });
          break;
        default: {
          const unreachable: never = span;
          throw new Error(`Unhandled span: ${JSON.stringify(unreachable)}`);
        }
      }
    }
  }
}
