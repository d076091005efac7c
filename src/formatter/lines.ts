/**
 * tg-relay — Line Pass
 */

import { formatInline } from './inline.js';

export interface SourceLine {
  content: string;
  /**
   * The line break that ended the line (`\r\n`, `\n`, `\r`, or a
   * form feed, vertical tab, separator control or Unicode line/paragraph
   * separator), or empty for a final unterminated line.
   */
  terminator: string;
}

export type LineKind = 'heading' | 'subheading' | 'text';

export interface FormattedLine {
  kind: LineKind;
  text: string;
}

const HEADING_MARKER = '# ';
const SUBHEADING_MARKER = '## ';
const LINE_BREAK_PATTERN = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/g;
const NEWLINE_PATTERN = /^(?:\r\n|\n|\r)$/;

/** Whether a terminator is an actual newline rather than another break character. */
export function isNewline(terminator: string): boolean {
  return NEWLINE_PATTERN.test(terminator);
}

/**
 * Split text into lines, keeping each line's terminator for reassembly.
 * Empty input yields no lines.
 */
export function splitLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let cursor = 0;

  for (const match of text.matchAll(LINE_BREAK_PATTERN)) {
    const index = match.index ?? cursor;
    lines.push({ content: text.slice(cursor, index), terminator: match[0] });
    cursor = index + match[0].length;
  }

  if (cursor < text.length) {
    lines.push({ content: text.slice(cursor), terminator: '' });
  }

  return lines;
}

/**
 * Format a single line (without its terminator).
 *
 * `# ` → `__*text*__`, `## ` → `*text*`. A marker followed by nothing but
 * whitespace is plain text: an empty emphasis span is not valid MarkdownV2.
 */
export function formatLine(content: string): FormattedLine {
  if (content.startsWith(HEADING_MARKER)) {
    const inner = content.slice(HEADING_MARKER.length).trimStart();
    if (inner) {
      return { kind: 'heading', text: `__*${formatInline(inner, { insideBold: true })}*__` };
    }
  } else if (content.startsWith(SUBHEADING_MARKER)) {
    const inner = content.slice(SUBHEADING_MARKER.length).trimStart();
    if (inner) {
      return { kind: 'subheading', text: `*${formatInline(inner, { insideBold: true })}*` };
    }
  }

  return { kind: 'text', text: formatInline(content) };
}
