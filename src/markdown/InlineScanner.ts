/**
 * InlineScanner - Splits a line of Markdown text into formatted spans
 *
 * Supports links, bold, italic and bold-italic. Spans never overlap or nest:
 * the first pattern that matches at the cursor wins and its inner text is
 * plain. Delimiters without a closing pair are literal text.
 */

import { type InlineSpan } from './types.js';

// Sticky patterns, tried in order at the cursor
const LINK_PATTERN = /\[([^\]]+)\]\(([^)]+)\)/y;
const BOLD_ITALIC_PATTERN = /\*\*\*([^*]+)\*\*\*/y;
const BOLD_PATTERN = /\*\*([^*]+)\*\*/y;
const ITALIC_PATTERN = /\*([^*]+)\*/y;

function matchAt(pattern: RegExp, text: string, index: number): RegExpExecArray | null {
  pattern.lastIndex = index;
  return pattern.exec(text);
}

/**
 * Scan `text` left to right into inline spans
 */
export function scanInline(text: string): InlineSpan[] {
  const spans: InlineSpan[] = [];
  let plain = '';
  let i = 0;

  const flushPlain = () => {
    if (plain) {
      spans.push({ type: 'text', text: plain });
      plain = '';
    }
  };

  while (i < text.length) {
    const ch = text[i];

    if (ch === '[') {
      const link = matchAt(LINK_PATTERN, text, i);
      if (link) {
        flushPlain();
        spans.push({ type: 'link', text: link[1], url: link[2] });
        i += link[0].length;
        continue;
      }
    } else if (ch === '*') {
      const boldItalic = matchAt(BOLD_ITALIC_PATTERN, text, i);
      if (boldItalic) {
        flushPlain();
        spans.push({ type: 'boldItalic', text: boldItalic[1] });
        i += boldItalic[0].length;
        continue;
      }

      const bold = matchAt(BOLD_PATTERN, text, i);
      if (bold) {
        flushPlain();
        spans.push({ type: 'bold', text: bold[1] });
        i += bold[0].length;
        continue;
      }

      const italic = matchAt(ITALIC_PATTERN, text, i);
      if (italic) {
        flushPlain();
        spans.push({ type: 'italic', text: italic[1] });
        i += italic[0].length;
        continue;
      }
    }

    plain += ch;
    i++;
  }

  flushPlain();
  return spans;
}

/**
 * Plain text of a span sequence, with all formatting dropped
 */
export function spansToPlainText(spans: InlineSpan[]): string {
  return spans.map((span) => span.text).join('');
}
