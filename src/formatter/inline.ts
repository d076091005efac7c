/**
 * tg-relay — Inline Pass
 *
 * Scans one line left to right for `**bold**` spans and bare URLs, and
 * escapes everything between them. Leftmost token wins; tokens never overlap.
 */

import { escapeLinkTarget, escapeMarkdownV2 } from './escape.js';
import { URL_CANDIDATE_SOURCE, hasHost, trimUrl } from './url.js';

// Group 1 is the bold inner text; a match without it is a URL candidate.
const TOKEN_PATTERN = new RegExp(`\\*\\*(.+?)\\*\\*|${URL_CANDIDATE_SOURCE}`, 'gi');

export interface InlineOptions {
  /**
   * The line is already wrapped in bold (a heading). Bold spans are
   * unwrapped to plain escaped text since MarkdownV2 has no nested bold.
   */
  insideBold?: boolean;
}

export function formatInline(text: string, options: InlineOptions = {}): string {
  const parts: string[] = [];
  let cursor = 0;

  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? cursor;
    parts.push(escapeMarkdownV2(text.slice(cursor, start)));

    const boldInner = match[1];
    if (boldInner !== undefined) {
      const inner = escapeMarkdownV2(boldInner);
      parts.push(options.insideBold ? inner : `*${inner}*`);
    } else {
      parts.push(renderUrl(match[0]));
    }

    cursor = start + match[0].length;
  }

  parts.push(escapeMarkdownV2(text.slice(cursor)));
  return parts.join('');
}

/**
 * Render a URL candidate as `[display](target)`. Whatever trimming removed
 * goes back out as escaped literal text.
 */
export function renderUrl(candidate: string): string {
  const url = trimUrl(candidate);
  if (!hasHost(url)) {
    return escapeMarkdownV2(candidate);
  }

  const link = `[${escapeMarkdownV2(url)}](${escapeLinkTarget(url)})`;
  return link + escapeMarkdownV2(candidate.slice(url.length));
}
