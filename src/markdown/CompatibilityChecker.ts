/**
 * CompatibilityChecker - Checks what a Word document loses when converted to Markdown
 *
 * This class inspects the blocks read from a .docx package and reports the
 * elements the Markdown projection drops or flattens. Conversion still runs
 * when issues are found; the report only tells the user what to expect.
 */

import { type DocBlock, type DocParagraph, type DocTable, type LoadedDocument, listBlocks } from '../docxReader.js';
import {
  type CompatibilityIssue,
  type CompatibilityResult,
  IncompatibleElementType,
  STYLE_NAMES,
  normalizeStyleName,
} from './types.js';

/** Paragraph styles the Markdown conversion reads: body text, headings, lists and quotes */
const KNOWN_STYLES = new Set(
  [...Object.values(STYLE_NAMES), 'Heading 4', 'Heading 5', 'Heading 6', 'List Paragraph'].map(normalizeStyleName)
);

export class CompatibilityChecker {
  private issues: CompatibilityIssue[] = [];
  private blockIndex = 0;

  /**
   * Check a loaded document
   * @returns CompatibilityResult indicating if compatible and any issues found
   */
  check(document: LoadedDocument): CompatibilityResult {
    this.issues = [];
    this.blockIndex = 0;

    // Document-level parts
    if (document.headerCount > 0) {
      this.addIssue(IncompatibleElementType.HEADER, 'Document contains headers. They are not converted.');
    }
    if (document.footerCount > 0) {
      this.addIssue(IncompatibleElementType.FOOTER, 'Document contains footers. They are not converted.');
    }

    this.checkBlocks(listBlocks(document));

    return {
      compatible: this.issues.length === 0,
      issues: this.issues,
    };
  }

  private checkBlocks(blocks: DocBlock[]): void {
    for (const block of blocks) {
      this.blockIndex++;
      if (block.kind === 'paragraph') {
        this.checkParagraph(block);
      } else {
        this.checkTable(block);
      }
    }
  }

  private checkParagraph(paragraph: DocParagraph): void {
    const location = `paragraph ${this.blockIndex}`;

    if (paragraph.imageCount > 0) {
      this.addIssue(IncompatibleElementType.IMAGE, 'Document contains images. They are dropped.', location);
    }

    if (paragraph.footnoteCount > 0) {
      this.addIssue(
        IncompatibleElementType.FOOTNOTE,
        'Document contains footnote or endnote references. They are dropped.',
        location
      );
    }

    if (paragraph.hyperlinkCount > 0) {
      this.addIssue(
        IncompatibleElementType.LINK,
        'Document contains hyperlinks. Link targets are dropped; only the link text is kept.',
        location
      );
    }

    // Underlined runs usually carry links; only their text survives
    if (paragraph.runs.some((run) => run.underline)) {
      this.addIssue(
        IncompatibleElementType.LINK,
        'Document contains underlined text (usually links). Link targets and underlining are dropped.',
        location
      );
    }

    if (paragraph.list && paragraph.list.level > 1) {
      this.addIssue(
        IncompatibleElementType.DEEP_LIST,
        'Document contains lists nested more than one level deep. Deeper levels are flattened.',
        location
      );
    }

    if (!KNOWN_STYLES.has(normalizeStyleName(paragraph.styleName))) {
      this.addIssue(
        IncompatibleElementType.UNKNOWN_STYLE,
        `Paragraph style "${paragraph.styleName}" has no Markdown equivalent. It is converted as plain text.`,
        location
      );
    }
  }

  private checkTable(table: DocTable): void {
    const location = `table ${this.blockIndex}`;

    if (table.nestedTableCount > 0) {
      this.addIssue(
        IncompatibleElementType.NESTED_TABLE,
        'Document contains tables inside table cells. Their content is dropped.',
        location
      );
    }

    const widths = new Set(table.rows.map((row) => row.cells.length));
    if (widths.size > 1) {
      this.addIssue(
        IncompatibleElementType.RAGGED_TABLE,
        'Table rows have different cell counts (merged cells). Short rows are padded with empty cells.',
        location
      );
    }
  }

  /**
   * Add an issue to the list
   */
  private addIssue(type: IncompatibleElementType, message: string, location?: string): void {
    // Avoid duplicate issues of the same type
    if (!this.issues.some((i) => i.type === type)) {
      this.issues.push({ type, message, location });
    }
  }

  /**
   * Format issues as a human-readable report
   */
  static formatIssues(issues: CompatibilityIssue[]): string {
    if (issues.length === 0) {
      return 'Document converts to Markdown without losses beyond formatting details.';
    }

    const lines = ['Converting this document to Markdown will lose the following:', ''];

    for (const issue of issues) {
      lines.push(`• ${issue.message}${issue.location ? ` (first at ${issue.location})` : ''}`);
    }

    return lines.join('\n');
  }
}
