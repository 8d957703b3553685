/**
 * RBL Bank Credit Card Statement Profile
 *
 * The account summary is a table whose labels and values are extracted on
 * separate lines, so some rules fall back to the shape of the value rows:
 * - total due: the second of two amounts followed by a "0.00" line
 * - credit limit: an amount followed by two "0.00" cells
 * The due date may follow the word "Immediate" with no separator.
 */

import type { IssuerProfile } from './types';
import { AMOUNT, NUMERIC_DATE, RUPEE, labelled } from './patterns';

const DATE_FORMATS = ['DD/MM/YYYY'];

export const RBL_PROFILE: IssuerProfile = {
  issuer: 'RBL Bank',
  description: 'RBL Bank credit card statement',
  priority: 40,
  markers: [/RBL\s+Bank/i, /rblbank\.com/i, /L65191PN1943PLC007308/i],

  rules: [
    {
      id: 'rbl.card_number',
      field: 'card_number',
      valueType: 'card_number',
      patterns: [/(\d{4}\s*X{4}\s*X{4}\s*\d{4})/i],
    },
    {
      id: 'rbl.statement_date',
      field: 'statement_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [
        labelled('Statement\\s+Date', NUMERIC_DATE),
        /(\d{2}\/\d{2}\/\d{4})\s*to\s*(\d{2}\/\d{2}\/\d{4})/i,
      ],
    },
    {
      id: 'rbl.payment_due_date',
      field: 'payment_due_date',
      valueType: 'date',
      dateFormats: DATE_FORMATS,
      patterns: [
        labelled('Payment\\s+Due\\s+Date', NUMERIC_DATE),
        /Immediate\s*(\d{2}\/\d{2}\/\d{4})/i,
      ],
    },
    {
      id: 'rbl.total_amount_due',
      field: 'total_amount_due',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [
        labelled('Total\\s+Amount\\s+Due', AMOUNT, RUPEE),
        /\d+(?:,\d+)*\.\d{2}\s*\n\s*(\d+(?:,\d+)*\.\d{2})\s*\n\s*0\.00/,
      ],
    },
    {
      id: 'rbl.minimum_amount_due',
      field: 'minimum_amount_due',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [
        labelled('Minimum\\s+Amount\\s+Due', AMOUNT, RUPEE),
        /Minimum[^0-9\n]*(\d+(?:,\d+)*(?:\.\d{1,2})?)/i,
      ],
    },
    {
      id: 'rbl.credit_limit',
      field: 'credit_limit',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [
        labelled('(?<!Available\\s)Credit\\s+Limit', AMOUNT, RUPEE),
        /(\d+(?:,\d+)*\.\d{2})\s+0\.00\s+0\.00/,
      ],
    },
    {
      id: 'rbl.available_credit',
      field: 'available_credit',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [labelled('Available\\s+Credit\\s+Limit', AMOUNT, RUPEE)],
    },
    {
      id: 'rbl.previous_balance',
      field: 'previous_balance',
      valueType: 'amount',
      numberLocale: 'en-IN',
      patterns: [labelled('(?:Previous|Opening)\\s+Balance', AMOUNT, RUPEE)],
    },
  ],
};
