/**
 * tg-relay — MarkdownV2 Escaping
 *
 * Telegram's MarkdownV2 parse mode rejects the whole message when a
 * reserved character appears unescaped outside of the markup it belongs to.
 * Link targets follow their own, narrower rule.
 */

/** Characters MarkdownV2 treats as syntax in ordinary text. */
export const MARKDOWN_V2_RESERVED = '_*[]()~`>#+-=|{}.!\\';

/** Characters that must be escaped inside the `(...)` part of an inline link. */
export const LINK_TARGET_RESERVED = '()\\';

const RESERVED_PATTERN = /[_*[\]()~`>#+\-=|{}.!\\]/g;
const LINK_TARGET_PATTERN = /[()\\]/g;

/**
 * Escape every reserved character with a backslash.
 *
 * Not idempotent: escaping already-escaped text escapes the backslashes too.
 */
export function escapeMarkdownV2(text: string): string {
  return text.replace(RESERVED_PATTERN, '\\$&');
}

/**
 * Escape a URL for use as an inline-link target.
 * Emphasis characters stay as they are; only parens and backslash count here.
 */
export function escapeLinkTarget(url: string): string {
  return url.replace(LINK_TARGET_PATTERN, '\\$&');
}
