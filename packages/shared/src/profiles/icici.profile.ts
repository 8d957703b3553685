/**
 * ICICI Bank Credit Card Statement Profile
 *
 * Layout notes:
 * - Header block prints "STATEMENT DATE" and "PAYMENT DUE DATE" as "March 5, 2024"
 *   or "5 March, 2024" depending on the statement generation
 * - The rupee sign is often extracted as a backtick
 * - Card number is masked as 4 digits, 8 X, 4 digits
 * - Amounts use Indian digit grouping
 */

import type { IssuerProfile } from './types';
import { AMOUNT, DAY_MONTH_YEAR, MONTH_DAY_YEAR, RUPEE, labelled } from './patterns';

const DATE_FORMATS = ['D MMMM YYYY', 'DD MMMM YYYY', 'D MMM YYYY', 'MMMM D YYYY', 'MMMM DD YYYY', 'MMM D YYYY', 'MMM DD YYYY'];

export const ICICI_PROFILE: IssuerProfile = {
  issuer: 'ICICI Bank',
  description: 'ICICI Bank credit card statement',
  priority: 10,
  markers: [/ICICI\s+Bank/i, /icicibank\.com/i, /L65190GJ1994PLC021012/i],

  rules: [
    {
      id: 'icici.card_number',
      field: 'card_number',
      valueType: 'card_number',
      patterns: [/(\d{4}\s?[X*]{4}\s?[X*]{4}\s?\d{4})/i],
    },
    {
      id: 'icici.statement_date',
      field: 'statement_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [
        labelled('STATEMENT\\s+DATE', DAY_MONTH_YEAR),
        labelled('STATEMENT\\s+DATE', MONTH_DAY_YEAR),
        new RegExp(`Statement\\s+period\\s*:.*?to\\s+${MONTH_DAY_YEAR}`, 'i'),
      ],
    },
    {
      id: 'icici.payment_due_date',
      field: 'payment_due_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [
        labelled('PAYMENT\\s+DUE\\s+DATE', DAY_MONTH_YEAR),
        labelled('PAYMENT\\s+DUE\\s+DATE', MONTH_DAY_YEAR),
      ],
    },
    {
      id: 'icici.total_amount_due',
      field: 'total_amount_due',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [
        labelled('Total\\s+Amount\\s+Due', AMOUNT, RUPEE),
        labelled('Total\\s+Payment\\s+Due', AMOUNT, RUPEE),
      ],
    },
    {
      id: 'icici.minimum_amount_due',
      field: 'minimum_amount_due',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [
        labelled('Minimum\\s+Amount\\s+Due', AMOUNT, RUPEE),
        labelled('Minimum\\s+Payment\\s+Due', AMOUNT, RUPEE),
      ],
    },
    {
      id: 'icici.credit_limit',
      field: 'credit_limit',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [
        labelled('(?<!Available\\s)Credit\\s+Limit\\s*\\(Including\\s+cash\\)', AMOUNT, RUPEE),
        labelled('(?<!Available\\s)Credit\\s+Limit', AMOUNT, RUPEE),
      ],
    },
    {
      id: 'icici.available_credit',
      field: 'available_credit',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [
        labelled('Available\\s+Credit\\s*\\(Including\\s+cash\\)', AMOUNT, RUPEE),
        labelled('Available\\s+Credit(?:\\s+Limit)?', AMOUNT, RUPEE),
      ],
    },
    {
      id: 'icici.previous_balance',
      field: 'previous_balance',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [labelled('Previous\\s+Balance', AMOUNT, RUPEE)],
    },
  ],
};
