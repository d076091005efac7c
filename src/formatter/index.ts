export { formatMarkdownV2 } from './markdown-v2.js';
export { escapeMarkdownV2, escapeLinkTarget, MARKDOWN_V2_RESERVED, LINK_TARGET_RESERVED } from './escape.js';
export { formatInline, renderUrl, type InlineOptions } from './inline.js';
export { formatLine, isNewline, splitLines, type FormattedLine, type LineKind, type SourceLine } from './lines.js';
export { trimUrl, hasHost } from './url.js';
