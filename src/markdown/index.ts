/**
 * Markdown ↔ Word conversion layer
 *
 * This module provides the transcoders between Markdown text and the
 * paragraph/run/table model of a Word document.
 */

export { CompatibilityChecker } from './CompatibilityChecker.js';
export { DocToMarkdown, formatRun, formatRuns } from './DocToMarkdown.js';
export { MarkdownToDoc, splitTableRow } from './MarkdownToDoc.js';
export { scanInline, spansToPlainText } from './InlineScanner.js';
export * from './types.js';
