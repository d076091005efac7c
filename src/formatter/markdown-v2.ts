/**
 * tg-relay — Markdown → Telegram MarkdownV2
 *
 * Supported input:
 *   # Heading      → __*Heading*__ (bold + underline, blank line before)
 *   ## Subheading  → *Subheading*
 *   **bold**       → *bold*
 *   https://…      → [https://…](https://…)
 *
 * Everything else is escaped. Pure and synchronous; never throws.
 */

import { formatLine, isNewline, splitLines } from './lines.js';

export function formatMarkdownV2(text: string): string {
  let output = '';
  let previousBlank = false;
  let previousTerminator = '';

  for (const { content, terminator } of splitLines(text)) {
    const line = formatLine(content);

    if (line.kind === 'heading' && !previousBlank) {
      output += isNewline(previousTerminator) ? previousTerminator : '\n';
    }

    output += line.text + terminator;
    previousBlank = content.trim() === '';
    previousTerminator = terminator;
  }

  return output;
}
