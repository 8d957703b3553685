/**
 * IDFC FIRST Bank Credit Card Statement Profile
 *
 * The rupee sign is extracted as a lowercase "r" glued to the amount
 * ("r12,345.00"). Only the last four card digits are printed.
 */

import type { IssuerProfile } from './types';
import { AMOUNT, NUMERIC_DATE, labelled } from './patterns';

const DATE_FORMATS = ['DD/MM/YYYY'];
const RUPEE_GLYPH = '(?:₹|r)?\\s*';

export const IDFC_FIRST_PROFILE: IssuerProfile = {
  issuer: 'IDFC FIRST Bank',
  description: 'IDFC FIRST Bank credit card statement',
  priority: 30,
  markers: [/IDFC\s+FIRST\s+Bank/i, /idfcfirstbank\.com/i, /IDFB0010225/i],

  rules: [
    {
      id: 'idfc_first.card_number',
      field: 'card_number',
      valueType: 'card_number',
      patterns: [
        /Card\s+Number[:\s]*((?:X{4}\s*){1,3}\d{4})/i,
        /(\d{4}\s*X{4}\s*X{4}\s*\d{4})/i,
      ],
    },
    {
      id: 'idfc_first.statement_date',
      field: 'statement_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [
        labelled('Statement\\s+Date', NUMERIC_DATE),
        /(\d{2}\/\d{2}\/\d{4})\s*-\s*(\d{2}\/\d{2}\/\d{4})/,
      ],
    },
    {
      id: 'idfc_first.payment_due_date',
      field: 'payment_due_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [labelled('Payment\\s+Due\\s+Date', NUMERIC_DATE)],
    },
    {
      id: 'idfc_first.total_amount_due',
      field: 'total_amount_due',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [labelled('Total\\s+Amount\\s+Due', AMOUNT, RUPEE_GLYPH)],
    },
    {
      id: 'idfc_first.minimum_amount_due',
      field: 'minimum_amount_due',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [labelled('Minimum\\s+Amount\\s+Due', AMOUNT, RUPEE_GLYPH)],
    },
    {
      id: 'idfc_first.credit_limit',
      field: 'credit_limit',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [labelled('(?<!Available\\s)Credit\\s+Limit', AMOUNT, RUPEE_GLYPH)],
    },
    {
      id: 'idfc_first.available_credit',
      field: 'available_credit',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [labelled('Available\\s+Credit\\s+Limit', AMOUNT, RUPEE_GLYPH)],
    },
    {
      id: 'idfc_first.previous_balance',
      field: 'previous_balance',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [labelled('(?:Previous|Opening)\\s+Balance', AMOUNT, RUPEE_GLYPH)],
    },
  ],
};
