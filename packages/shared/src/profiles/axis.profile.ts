/**
 * Axis Bank Credit Card Statement Profile
 *
 * Dates are printed dd/mm/yyyy; balances carry a trailing "Dr" (or "Cr" for
 * a credit balance). The card number shows the first 6-14 digits and the
 * last 4 with asterisks in between.
 */

import type { IssuerProfile } from './types';
import { AMOUNT_DR_CR, NUMERIC_DATE, SEP, labelled } from './patterns';

const DATE_FORMATS = ['DD/MM/YYYY', 'DD-MM-YYYY'];

export const AXIS_PROFILE: IssuerProfile = {
  issuer: 'Axis Bank',
  description: 'Axis Bank credit card statement',
  priority: 20,
  markers: [/Axis\s+Bank/i, /axisbank\.com/i, /AAACU2414K3ZD/i],

  rules: [
    {
      id: 'axis.card_number',
      field: 'card_number',
      valueType: 'card_number',
      patterns: [
        /Card\s+No\.?[:\s]*(\d{6,14}\*{4,6}\d{4})/i,
        /Credit\s+Card\s+Number[:\s]*(\d{4,14}[*X]{4,8}\d{4})/i,
      ],
    },
    {
      id: 'axis.statement_date',
      field: 'statement_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [
        labelled('Statement\\s+Generation\\s+Date', NUMERIC_DATE),
        new RegExp(`Statement\\s+Period${SEP}\\d{2}[/-]\\d{2}[/-]\\d{4}\\s*(?:-|to)\\s*${NUMERIC_DATE}`, 'i'),
        /(\d{2}\/\d{2}\/\d{4})\s*-\s*(\d{2}\/\d{2}\/\d{4})/,
      ],
    },
    {
      id: 'axis.payment_due_date',
      field: 'payment_due_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [labelled('Payment\\s+Due\\s+Date', NUMERIC_DATE)],
    },
    {
      id: 'axis.total_amount_due',
      field: 'total_amount_due',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [
        labelled('Total\\s+Payment\\s+Due', AMOUNT_DR_CR),
        labelled('Total\\s+Amount\\s+Due', AMOUNT_DR_CR),
      ],
    },
    {
      id: 'axis.minimum_amount_due',
      field: 'minimum_amount_due',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [
        labelled('Minimum\\s+Payment\\s+Due', AMOUNT_DR_CR),
        labelled('Minimum\\s+Amount\\s+Due', AMOUNT_DR_CR),
      ],
    },
    {
      id: 'axis.credit_limit',
      field: 'credit_limit',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [labelled('(?<!Available\\s)Credit\\s+Limit', AMOUNT_DR_CR)],
    },
    {
      id: 'axis.available_credit',
      field: 'available_credit',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [labelled('Available\\s+Credit\\s+Limit', AMOUNT_DR_CR)],
    },
    {
      id: 'axis.previous_balance',
      field: 'previous_balance',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [labelled('Previous\\s+Balance', AMOUNT_DR_CR, '-?\\s*')],
    },
  ],
};
