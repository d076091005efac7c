/**
 * tg-relay — Bare URL Detection
 */

/** Scheme-prefixed candidate: everything up to the next whitespace. */
export const URL_CANDIDATE_SOURCE = 'https?:\\/\\/\\S+';

const HAS_HOST_PATTERN = /^https?:\/\/./i;

/** Sentence punctuation that never ends a URL. */
const TRAILING_PUNCTUATION = new Set(['.', ',', ':', ';', '!', '?', "'", '"']);

/** Closing bracket → its opener. Kept only while balanced inside the URL. */
const CLOSING_BRACKETS: Partial<Record<string, string>> = {
  ')': '(',
  ']': '[',
  '}': '{',
};

/**
 * Trim trailing characters that belong to the surrounding sentence.
 *
 * Repeats until the last character is neither sentence punctuation nor an
 * unbalanced closing bracket, so `(see https://a.b/x_(y)).` keeps `x_(y)`
 * and drops `).`.
 */
export function trimUrl(candidate: string): string {
  let end = candidate.length;

  while (end > 0) {
    const last = candidate[end - 1];

    if (TRAILING_PUNCTUATION.has(last)) {
      end--;
      continue;
    }

    const opener = CLOSING_BRACKETS[last];
    if (opener !== undefined) {
      const head = candidate.slice(0, end);
      if (countChar(head, last) > countChar(head, opener)) {
        end--;
        continue;
      }
    }

    break;
  }

  return candidate.slice(0, end);
}

/**
 * Whether a trimmed candidate still has something after the scheme.
 */
export function hasHost(url: string): boolean {
  return HAS_HOST_PATTERN.test(url);
}

function countChar(text: string, char: string): number {
  let count = 0;
  for (const c of text) {
    if (c === char) count++;
  }
  return count;
}
