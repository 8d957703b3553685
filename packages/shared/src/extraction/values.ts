/**
 * Value Post-Processing
 *
 * Converts raw pattern captures into the canonical forms stored on a
 * StatementRecord:
 * - amounts: plain decimal string, two decimals, no grouping ("100000.00")
 * - dates: "DD Mon YYYY" ("05 Mar 2024")
 * - card numbers: the masked value as printed
 *
 * Every function returns null when the raw value cannot be normalized; the
 * caller records that as an invalid field rather than throwing.
 */

import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import type { NumberLocale } from '../types';

dayjs.extend(customParseFormat);

// ============================================================================
// Amounts
// ============================================================================

/** Currency symbols and markers seen around amounts on Indian and US statements */
const CURRENCY_MARKERS = /₹|`|\$|\bRs\.?|\bINR\b|\bUSD\b/gi;

/** Trailing debit/credit indicators printed after some balances */
const DEBIT_CREDIT_SUFFIX = /\s*(Dr|Cr)\.?$/i;

const AMOUNT_SHAPE = /^(-)?(\d[\d,]*)(?:\.(\d{1,2}))?$/;

const GROUPING: Record<Exclude<NumberLocale, 'any'>, RegExp> = {
  'en-IN': /^(?:\d{1,2}(?:,\d{2})*,\d{3}|\d{1,3})$/,
  'en-US': /^\d{1,3}(?:,\d{3})*$/,
};

function hasValidGrouping(integerPart: string, locale: NumberLocale): boolean {
  if (!integerPart.includes(',')) return true;
  if (locale === 'any') {
    return GROUPING['en-IN'].test(integerPart) || GROUPING['en-US'].test(integerPart);
  }
  return GROUPING[locale].test(integerPart);
}

/**
 * Normalize an amount to a canonical decimal string.
 *
 * normalizeAmount('₹1,00,000.00', 'en-IN') === '100000.00'
 * normalizeAmount('$1,234.5', 'en-US') === '1234.50'
 * normalizeAmount('100000.00', 'en-IN') === '100000.00'
 * normalizeAmount('250.00 Cr', 'en-IN') === '-250.00'
 */
export function normalizeAmount(raw: string, locale: NumberLocale = 'any'): string | null {
  const withoutCurrency = raw.replace(CURRENCY_MARKERS, '').trim();
  const suffix = DEBIT_CREDIT_SUFFIX.exec(withoutCurrency);
  const cleaned = withoutCurrency.replace(DEBIT_CREDIT_SUFFIX, '').replace(/\s+/g, '');

  const match = AMOUNT_SHAPE.exec(cleaned);
  if (!match) return null;

  const [, sign, integerPart, fraction = ''] = match;
  if (!hasValidGrouping(integerPart, locale)) return null;

  const digits = integerPart.replace(/,/g, '').replace(/^0+(?=\d)/, '');
  const cents = fraction.padEnd(2, '0');
  const isZero = /^0+$/.test(digits) && /^0+$/.test(cents);
  // A credit balance ("250.00 Cr") is money owed to the cardholder
  const isNegative = Boolean(sign) || suffix?.[1].toLowerCase() === 'cr';

  return `${isNegative && !isZero ? '-' : ''}${digits}.${cents}`;
}

// ============================================================================
// Dates
// ============================================================================

export const CANONICAL_DATE_FORMAT = 'DD MMM YYYY';

/** Formats tried when a rule does not declare its own */
export const DEFAULT_DATE_FORMATS: readonly string[] = [
  'DD/MM/YYYY',
  'DD-MM-YYYY',
  'D MMMM YYYY',
  'DD MMMM YYYY',
  'D MMM YYYY',
  'MMMM D YYYY',
  'MMMM DD YYYY',
  'MMM D YYYY',
  'MMM DD YYYY',
];

function titleCaseWords(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Normalize a printed date to "DD Mon YYYY" using strict parsing against
 * the given formats. Commas are dropped and month names title-cased before
 * parsing, so "MARCH 5, 2024" is tried as "March 5 2024".
 */
export function normalizeDate(
  raw: string,
  formats: readonly string[] = DEFAULT_DATE_FORMATS
): string | null {
  const cleaned = titleCaseWords(raw.replace(/,/g, ' ').replace(/\s+/g, ' ').trim());
  if (!cleaned) return null;

  for (const format of [...formats, CANONICAL_DATE_FORMAT]) {
    const parsed = dayjs(cleaned, format, true);
    if (parsed.isValid()) {
      return parsed.format(CANONICAL_DATE_FORMAT);
    }
  }

  return null;
}

// ============================================================================
// Card Numbers
// ============================================================================

/**
 * Keep the masked card number exactly as printed. At least the last four
 * digits must be visible for the value to be useful.
 */
export function normalizeCardNumber(raw: string): string | null {
  const trimmed = raw.trim();
  const digitCount = (trimmed.match(/\d/g) ?? []).length;
  return digitCount >= 4 ? trimmed : null;
}
