/**
 * Text Normalizer Tests
 */

import { normalizePageLines, normalizeText } from '@ccparse/shared';

describe('normalizeText', () => {
  it('returns an empty string for no pages', () => {
    expect(normalizeText([])).toBe('');
  });

  it('returns an empty string for whitespace-only pages', () => {
    expect(normalizeText(['   \n\t\n', '\r\n  '])).toBe('');
  });

  it('collapses horizontal whitespace and trims lines', () => {
    expect(normalizeText(['  Total   Amount\tDue   ₹ 1,200.00  '])).toBe('Total Amount Due ₹ 1,200.00');
  });

  it('keeps line structure and drops blank lines', () => {
    expect(normalizeText(['Credit Limit\n\n\n1,25,000.00 0.00 0.00\r\nMinimum Due'])).toBe(
      'Credit Limit\n1,25,000.00 0.00 0.00\nMinimum Due'
    );
  });

  it('joins pages with a line break', () => {
    expect(normalizeText(['Page one', 'Page two'])).toBe('Page one\nPage two');
  });

  it('replaces non-breaking spaces and strips invisible marks', () => {
    expect(normalizeText(['Card\u00A0No:\u200B 1234\uFEFF'])).toBe('Card No: 1234');
  });

  it('unifies unicode dashes', () => {
    expect(normalizeText(['16/02/2024 \u2013 15/03/2024 \u2212250.00'])).toBe('16/02/2024 - 15/03/2024 -250.00');
  });

  it('rejoins a word hyphenated across lines', () => {
    expect(normalizeText(['Your State-\nment Date'])).toBe('Your Statement Date');
  });

  it('does not join lines ending in a digit or followed by an uppercase word', () => {
    expect(normalizeText(['12-\n03-2024', 'Axis-\nBank'])).toBe('12-\n03-2024\nAxis-\nBank');
  });

  it('is idempotent', () => {
    const once = normalizeText(['  ICICI Bank  \r\n\r\nSTATEMENT   DATE March 5, 2024 ']);
    expect(normalizeText([once])).toBe(once);
  });
});

describe('normalizePageLines', () => {
  it('splits a page into trimmed non-empty lines', () => {
    expect(normalizePageLines(' a \n\n b  c \r\n')).toEqual(['a', 'b c']);
  });

  it('returns no lines for an empty page', () => {
    expect(normalizePageLines('')).toEqual([]);
  });
});
