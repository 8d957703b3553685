/**
 * Generic Fallback Rules
 *
 * Applied when no issuer marker matches. Labels are the common English
 * ones; amounts accept either Indian or international grouping and dates
 * every shape `ANY_DATE` captures (day first for numeric dates).
 */

import type { FallbackRuleSet } from './types';
import { AMOUNT_DR_CR, ANY_DATE, RUPEE, labelled } from './patterns';

const CURRENCY = `(?:\\$\\s*)?${RUPEE}`;

// d/m/yy through dd-mm-yyyy; dayjs strict mode needs each padding spelled out
const NUMERIC_DATE_FORMATS = ['/', '-'].flatMap((sep) =>
  ['D', 'DD'].flatMap((day) =>
    ['M', 'MM'].flatMap((month) => ['YYYY', 'YY'].map((year) => [day, month, year].join(sep)))
  )
);

const DATE_FORMATS = [
  ...NUMERIC_DATE_FORMATS,
  'D MMMM YYYY',
  'DD MMMM YYYY',
  'D MMM YYYY',
  'MMMM D YYYY',
  'MMMM DD YYYY',
  'MMM D YYYY',
  'MMM DD YYYY',
];

export const GENERIC_RULES: FallbackRuleSet = {
  description: 'Generic credit card statement labels',

  rules: [
    {
      id: 'generic.card_number',
      field: 'card_number',
      valueType: 'card_number',
      patterns: [
        /\b(\d{4}[ -]?[X*]{4}[ -]?[X*]{4}[ -]?\d{4})\b/i,
        /\b(\d{4,6}[X*]{6,8}\d{4})\b/i,
        /Card\s+(?:No|Number)\.?[:\s]*((?:[X*]{4}[ -]?){1,3}\d{4})/i,
        /\b((?:[\dX*]{4}[ -]?){3}\d{4})\b/i,
      ],
    },
    {
      id: 'generic.statement_date',
      field: 'statement_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [labelled('Statement\\s+Date', ANY_DATE), labelled('Closing\\s+Date', ANY_DATE)],
    },
    {
      id: 'generic.payment_due_date',
      field: 'payment_due_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [labelled('(?:Payment\\s+)?Due\\s+Date', ANY_DATE)],
    },
    {
      id: 'generic.total_amount_due',
      field: 'total_amount_due',
      valueType: 'amount',
      numberLocale: 'any',
      patterns: [
        labelled('Total\\s+(?:Amount|Payment)\\s+Due', AMOUNT_DR_CR, CURRENCY),
        labelled('New\\s+Balance', AMOUNT_DR_CR, CURRENCY),
      ],
    },
    {
      id: 'generic.minimum_amount_due',
      field: 'minimum_amount_due',
      valueType: 'amount',
      numberLocale: 'any',
      patterns: [labelled('Minimum\\s+(?:Amount|Payment)\\s+Due', AMOUNT_DR_CR, CURRENCY)],
    },
    {
      id: 'generic.credit_limit',
      field: 'credit_limit',
      valueType: 'amount',
      numberLocale: 'any',
      patterns: [labelled('(?<!Available\\s)Credit\\s+Limit', AMOUNT_DR_CR, CURRENCY)],
    },
    {
      id: 'generic.available_credit',
      field: 'available_credit',
      valueType: 'amount',
      numberLocale: 'any',
      patterns: [labelled('Available\\s+Credit(?:\\s+Limit)?', AMOUNT_DR_CR, CURRENCY)],
    },
    {
      id: 'generic.previous_balance',
      field: 'previous_balance',
      valueType: 'amount',
      numberLocale: 'any',
      patterns: [labelled('(?:Previous|Opening)\\s+Balance', AMOUNT_DR_CR, CURRENCY)],
    },
  ],
};
