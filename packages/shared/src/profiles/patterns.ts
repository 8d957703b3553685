/**
 * Shared pattern fragments for issuer profiles.
 *
 * Fragments are source strings, combined with `new RegExp(..., 'i')` in the
 * profiles. None of them carry flags.
 */

/** Separator between a label and its value: colons, spaces, line breaks */
export const SEP = '[:\\s]*';

/** Optional rupee marker; ICICI PDFs render the rupee sign as a backtick */
export const RUPEE = '(?:₹|`|Rs\\.?|INR)?\\s*';

/** An amount ends where no digit, or separator followed by a digit, comes next */
const AMOUNT_END = '(?!\\d|[.,]\\d)';

/** Amount with optional grouping and up to two decimals */
export const AMOUNT = `(\\d+(?:,\\d+)*(?:\\.\\d{1,2})?${AMOUNT_END})`;

/** Amount followed by an optional debit/credit marker on the same line */
export const AMOUNT_DR_CR = `(\\d+(?:,\\d+)*(?:\\.\\d{1,2})?${AMOUNT_END}(?:[^\\S\\n]*(?:Dr|Cr)\\b)?)`;

/** Dollar amount with optional leading minus, e.g. "-$25.00" */
export const DOLLAR_AMOUNT = `(-?\\$\\s*\\d+(?:,\\d+)*(?:\\.\\d{1,2})?${AMOUNT_END})`;

/** dd/mm/yyyy or dd-mm-yyyy */
export const NUMERIC_DATE = '(\\d{2}[/-]\\d{2}[/-]\\d{4})';

/** "5 March, 2024" or "05 Mar 2024" */
export const DAY_MONTH_YEAR = '(\\d{1,2}\\s+[A-Za-z]{3,9},?\\s+\\d{4})';

/** "March 5, 2024" */
export const MONTH_DAY_YEAR = '([A-Za-z]{3,9}\\s+\\d{1,2},?\\s+\\d{4})';

/** Any of the date shapes above, plus two-digit years */
export const ANY_DATE =
  '(\\d{1,2}[/-]\\d{1,2}[/-]\\d{2,4}|\\d{1,2}\\s+[A-Za-z]{3,9},?\\s+\\d{4}|[A-Za-z]{3,9}\\s+\\d{1,2},?\\s+\\d{4})';

/**
 * Build a case-insensitive pattern from a label and a value fragment.
 */
export function labelled(label: string, value: string, prefix: string = ''): RegExp {
  return new RegExp(`${label}${SEP}${prefix}${value}`, 'i');
}
