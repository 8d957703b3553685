/**
 * American Express Statement Profile
 *
 * US-format statements: dates mm/dd/yy(yy), dollar amounts with thousands
 * grouping, "Pay Over Time" limits instead of a plain credit limit on
 * charge cards. The account is identified as "Account Ending 1-23456".
 */

import type { IssuerProfile } from './types';
import { DOLLAR_AMOUNT, labelled } from './patterns';

const DATE_FORMATS = ['MM/DD/YYYY', 'MM/DD/YY'];
const US_DATE = '(\\d{2}/\\d{2}/\\d{2,4})';

export const AMEX_PROFILE: IssuerProfile = {
  issuer: 'American Express',
  description: 'American Express card statement (US layout)',
  priority: 50,
  markers: [/American\s+Express/i, /americanexpress\.com/i, /\bAMEX\b/i],

  rules: [
    {
      id: 'amex.card_number',
      field: 'card_number',
      valueType: 'card_number',
      patterns: [
        /Account\s+Ending(?:\s+in)?[:\s]*(\d-\d{5})/i,
        /Card\s+Ending(?:\s+in)?[:\s]*(\d-\d{5})/i,
        /\b(X{4}-X{6}-X?\d{4,5})\b/i,
      ],
    },
    {
      id: 'amex.statement_date',
      field: 'statement_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [labelled('Closing\\s+Date', US_DATE), labelled('Statement\\s+Date', US_DATE)],
    },
    {
      id: 'amex.payment_due_date',
      field: 'payment_due_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [labelled('Payment\\s+Due\\s+Date', US_DATE)],
    },
    {
      id: 'amex.total_amount_due',
      field: 'total_amount_due',
      valueType: 'amount',
      numberLocale: 'en-US',
      patterns: [
        labelled('New\\s+Balance', DOLLAR_AMOUNT),
        labelled('Total\\s+(?:Amount\\s+)?Due', DOLLAR_AMOUNT),
      ],
    },
    {
      id: 'amex.minimum_amount_due',
      field: 'minimum_amount_due',
      valueType: 'amount',
      numberLocale: 'en-US',
      patterns: [labelled('Minimum\\s+Payment\\s+Due', DOLLAR_AMOUNT)],
    },
    {
      id: 'amex.credit_limit',
      field: 'credit_limit',
      valueType: 'amount',
      numberLocale: 'en-US',
      patterns: [
        labelled('(?<!Available\\s)Pay\\s+Over\\s+Time\\s+Limit', DOLLAR_AMOUNT),
        labelled('(?<!Available\\s)Credit\\s+Limit', DOLLAR_AMOUNT),
      ],
    },
    {
      id: 'amex.available_credit',
      field: 'available_credit',
      valueType: 'amount',
      numberLocale: 'en-US',
      patterns: [
        labelled('Available\\s+Pay\\s+Over\\s+Time\\s+Limit', DOLLAR_AMOUNT),
        labelled('Available\\s+Credit(?:\\s+Limit)?', DOLLAR_AMOUNT),
      ],
    },
    {
      id: 'amex.previous_balance',
      field: 'previous_balance',
      valueType: 'amount',
      numberLocale: 'en-US',
      patterns: [labelled('Previous\\s+Balance', DOLLAR_AMOUNT)],
    },
  ],
};
