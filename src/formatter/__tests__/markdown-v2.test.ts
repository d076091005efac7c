import { describe, it, expect } from 'vitest';
import { formatMarkdownV2 } from '../markdown-v2.js';
import { MARKDOWN_V2_RESERVED } from '../escape.js';

/**
 * Walk the output and report any reserved character that is not preceded
 * by an escaping backslash. Only meaningful for input with no markup.
 */
function unescapedReserved(output: string): string[] {
  const found: string[] = [];
  for (let i = 0; i < output.length; i++) {
    const char = output[i];
    if (char === '\\') {
      i++;
      continue;
    }
    if (MARKDOWN_V2_RESERVED.includes(char)) found.push(char);
  }
  return found;
}

/**
 * Structural check of emitted MarkdownV2: `*` and `__` are emphasis
 * delimiters and must pair up; `[display](target)` is a link whose display
 * follows the normal rules and whose target only needs `)` and `\\`
 * escaped. Any other reserved character must be escaped.
 */
function findMarkupErrors(output: string): string[] {
  const errors: string[] = [];
  let stars = 0;
  let underlines = 0;
  let i = 0;

  const isEscapable = (index: number) => index + 1 < output.length;

  while (i < output.length) {
    const char = output[i];

    if (char === '\\') {
      if (!isEscapable(i)) errors.push(`dangling backslash at ${i}`);
      i += 2;
      continue;
    }
    if (char === '*') {
      stars++;
      i++;
      continue;
    }
    if (char === '_' && output[i + 1] === '_') {
      underlines++;
      i += 2;
      continue;
    }
    if (char === '[') {
      let j = i + 1;
      while (j < output.length && output[j] !== ']') {
        if (output[j] === '\\') {
          j += 2;
          continue;
        }
        if (MARKDOWN_V2_RESERVED.includes(output[j])) {
          errors.push(`unescaped ${output[j]} in link text at ${j}`);
        }
        j++;
      }
      if (output[j + 1] !== '(') {
        errors.push(`link at ${i} has no target`);
        i = j + 1;
        continue;
      }
      j += 2;
      while (j < output.length && output[j] !== ')') {
        if (output[j] === '\\') {
          j += 2;
          continue;
        }
        if (output[j] === '(') errors.push(`unescaped ( in link target at ${j}`);
        j++;
      }
      if (j >= output.length) errors.push(`unterminated link target at ${i}`);
      i = j + 1;
      continue;
    }
    if (MARKDOWN_V2_RESERVED.includes(char)) {
      errors.push(`unescaped ${char} at ${i}`);
    }
    i++;
  }

  if (stars % 2 !== 0) errors.push('unbalanced *');
  if (underlines % 2 !== 0) errors.push('unbalanced __');
  return errors;
}

describe('formatMarkdownV2', () => {
  it('returns empty string for empty input', () => {
    expect(formatMarkdownV2('')).toBe('');
  });

  it('renders "# Title" with a leading blank line', () => {
    expect(formatMarkdownV2('# Title')).toBe('\n__*Title*__');
  });

  it('renders "## Sub" as bold with no blank line', () => {
    expect(formatMarkdownV2('## Sub')).toBe('*Sub*');
  });

  it('renders **bold** with no literal asterisks left', () => {
    expect(formatMarkdownV2('**bold**')).toBe('*bold*');
  });

  it('handles the mixed text, URL and bold example', () => {
    expect(formatMarkdownV2('Text https://example.com **bold**')).toBe(
      'Text [https://example\\.com](https://example.com) *bold*'
    );
  });

  it('treats a lone "#" as text', () => {
    expect(formatMarkdownV2('#')).toBe('\\#');
  });

  it('escapes an unterminated bold marker', () => {
    expect(formatMarkdownV2('**oops')).toBe('\\*\\*oops');
  });

  it('separates a heading from the line above it', () => {
    expect(formatMarkdownV2('Intro\n# Title\nBody.')).toBe('Intro\n\n__*Title*__\nBody\\.');
  });

  it('does not add a second blank line when one is already there', () => {
    expect(formatMarkdownV2('Intro\n\n# Title')).toBe('Intro\n\n__*Title*__');
  });

  it('reuses the previous line terminator for the separator', () => {
    expect(formatMarkdownV2('a\r\n# T')).toBe('a\r\n\r\n__*T*__');
  });

  it('preserves each line terminator', () => {
    expect(formatMarkdownV2('line one.\r\nline two!\rend\n')).toBe(
      'line one\\.\r\nline two\\!\rend\n'
    );
  });

  it('keeps bold spans within a single line', () => {
    expect(formatMarkdownV2('**a\nb**')).toBe('\\*\\*a\nb\\*\\*');
  });

  it('formats a multi-line message', () => {
    const input = [
      '# Weekly update',
      'Shipped **v2.0** today!',
      '## Links',
      'Notes: https://example.com/notes.',
    ].join('\n');

    expect(formatMarkdownV2(input)).toBe(
      [
        '',
        '__*Weekly update*__',
        'Shipped *v2\\.0* today\\!',
        '*Links*',
        'Notes: [https://example\\.com/notes](https://example.com/notes)\\.',
      ].join('\n')
    );
  });

  it('is deterministic across calls', () => {
    const input = '# T\n**b** https://x.io (y).';
    expect(formatMarkdownV2(input)).toBe(formatMarkdownV2(input));
  });

  it('double-escapes when fed its own output', () => {
    const once = formatMarkdownV2('a.b');
    expect(once).toBe('a\\.b');
    expect(formatMarkdownV2(once)).toBe('a\\\\\\.b');
    expect(formatMarkdownV2(once)).not.toBe(once);
  });

  it('leaves no reserved character unescaped in plain text', () => {
    const inputs = [
      'Hello (world) [x] {y} ~z~ `c` > q + - = | . ! _ \\ #',
      'C:\\path\\to\\file.txt',
      'a*b*c_d_e',
      '#hashtag and trailing #',
      '*',
    ];
    for (const input of inputs) {
      expect(unescapedReserved(formatMarkdownV2(input))).toEqual([]);
    }
  });

  it('emits well-formed MarkdownV2 for mixed markup', () => {
    const inputs = [
      '# Title with **bold** and https://example.com/a_(b).',
      '## Sub (x) - y!',
      'Text **bold [x]** more https://a.b/c?d=e&f=(g)). end',
      '**unterminated and https://x.y/z, ok',
      '#notheading\n# \n## \n**\n****\n*****',
      'see (https://en.wikipedia.org/wiki/X_(y)).',
      'https:// alone. http://',
      'line\r\n# Head\r\n**a**_b_~c~`d`',
      'https://x.y/**a**?q=[1]{2}\\',
      '**https://inside.bold/x_y** after',
      'intro\f## Sub\u2028# Top',
      '# **nested** heading with HTTPS://UPPER.CASE/(x)!',
      'a\\b **c\\** d',
    ];
    for (const input of inputs) {
      expect(findMarkupErrors(formatMarkdownV2(input)), input).toEqual([]);
    }
  });

  it('treats the other line separators as line breaks', () => {
    expect(formatMarkdownV2('intro\f## Sub')).toBe('intro\f*Sub*');
    expect(formatMarkdownV2('a\u2028b.')).toBe('a\u2028b\\.');
  });

  it('separates a heading with a newline after a non-newline separator', () => {
    expect(formatMarkdownV2('intro\u2029# Top')).toBe('intro\u2029\n__*Top*__');
  });

  it('keeps whitespace-only input as is', () => {
    expect(formatMarkdownV2('   \n\t')).toBe('   \n\t');
  });

  it('handles a long unterminated run without failing', () => {
    const input = '**' + 'x'.repeat(10_000);
    expect(formatMarkdownV2(input)).toBe('\\*\\*' + 'x'.repeat(10_000));
  });
});
