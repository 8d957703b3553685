/**
 * Text Normalization
 *
 * Cleans raw page text extracted from a statement PDF so that issuer markers
 * and field patterns match reliably. Line structure is kept: several
 * patterns (RBL summary rows, for one) depend on values sitting on separate
 * lines, and joining lines could make a date or amount pattern span two
 * unrelated values.
 */

const NBSP = /\u00A0/g;
const INVISIBLE = /[\u200B-\u200F\u202A-\u202E\u2060\u2066-\u2069\uFEFF]/g;
const UNICODE_DASHES = /[\u2010-\u2015\u2212]/g;

/** A word broken across lines: "State-" followed by "ment ..." */
const BROKEN_WORD = /[A-Za-z]-$/;
const LOWERCASE_START = /^[a-z]/;

/**
 * Normalize a single page of text into trimmed, non-empty lines.
 */
export function normalizePageLines(raw: string): string[] {
  if (!raw) return [];

  return raw
    .replace(NBSP, ' ')
    .replace(INVISIBLE, '')
    .replace(UNICODE_DASHES, '-')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[^\S\n]+/g, ' ').trim())
    .filter((line) => line.length > 0);
}

/**
 * Rejoin words hyphenated across a line break. Only letter-hyphen followed
 * by a lowercase letter qualifies, so digits, dates and amounts are never
 * merged with the next line.
 */
function joinBrokenWords(lines: string[]): string[] {
  const joined: string[] = [];

  for (const line of lines) {
    const previous = joined[joined.length - 1];
    if (previous !== undefined && BROKEN_WORD.test(previous) && LOWERCASE_START.test(line)) {
      joined[joined.length - 1] = previous.slice(0, -1) + line;
    } else {
      joined.push(line);
    }
  }

  return joined;
}

/**
 * Normalize extracted page texts into a single string with one logical line
 * per source line. Returns '' when no page has any text.
 */
export function normalizeText(pages: readonly string[]): string {
  const lines: string[] = [];

  for (const page of pages) {
    lines.push(...normalizePageLines(page));
  }

  return joinBrokenWords(lines).join('\n');
}

export type TextNormalizer = (pages: readonly string[]) => string;
