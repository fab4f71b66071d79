/**
 * Types for the Markdown ↔ Word conversion layer
 */

// --- Inline spans ---

export type InlineSpan =
  | { type: 'text'; text: string }
  | { type: 'bold'; text: string }
  | { type: 'italic'; text: string }
  | { type: 'boldItalic'; text: string }
  | { type: 'link'; text: string; url: string };

// --- Blocks ---

/** 0 is the document title; 1..3 map to Heading 1..3 */
export type HeadingLevel = 0 | 1 | 2 | 3;

export type Block =
  | { type: 'heading'; level: HeadingLevel; spans: InlineSpan[] }
  | { type: 'paragraph'; spans: InlineSpan[] }
  | { type: 'bulletItem'; nested: boolean; spans: InlineSpan[] }
  | { type: 'numberedItem'; ordinal: number; spans: InlineSpan[] }
  | { type: 'quote'; spans: InlineSpan[] }
  | { type: 'rule' }
  | { type: 'table'; rows: string[][] };

// --- Paragraph style names ---

/** Style names written by the renderer and recognized by the reverse path */
export const STYLE_NAMES = {
  title: 'Title',
  heading1: 'Heading 1',
  heading2: 'Heading 2',
  heading3: 'Heading 3',
  normal: 'Normal',
  listBullet: 'List Bullet',
  listBullet2: 'List Bullet 2',
  listNumber: 'List Number',
  quote: 'Quote',
  intenseQuote: 'Intense Quote',
} as const;

export type StyleName = (typeof STYLE_NAMES)[keyof typeof STYLE_NAMES];

/**
 * Normalize a style name for comparison: `Heading 1`, `heading 1` and the
 * style id `Heading1` all compare equal.
 */
export function normalizeStyleName(name: string): string {
  return name.replace(/\s+/g, '').toLowerCase();
}

// --- Compatibility ---

export enum IncompatibleElementType {
  LINK = 'link',
  IMAGE = 'image',
  NESTED_TABLE = 'nested_table',
  HEADER = 'header',
  FOOTER = 'footer',
  FOOTNOTE = 'footnote',
  UNKNOWN_STYLE = 'unknown_style',
  RAGGED_TABLE = 'ragged_table',
  DEEP_LIST = 'deep_list',
}

export interface CompatibilityIssue {
  type: IncompatibleElementType;
  message: string;
  /** Where the issue was found, e.g. "paragraph 3" */
  location?: string;
}

export interface CompatibilityResult {
  compatible: boolean;
  issues: CompatibilityIssue[];
}
