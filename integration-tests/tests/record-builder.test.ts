/**
 * Record Builder Tests
 */

import {
  STATEMENT_FIELDS,
  buildStatementRecord,
  determineStatus,
  failedRecord,
  formatIssue,
  type FieldOutcome,
  type FieldOutcomes,
  type StatementField,
} from '@ccparse/shared';

const MISSING: FieldOutcome = { status: 'missing', reason: 'not_found' };

function found(value: string): FieldOutcome {
  return { status: 'found', value, raw: value, ruleId: 'test.rule' };
}

function outcomes(values: Partial<Record<StatementField, string>>): FieldOutcomes {
  return {
    card_number: values.card_number ? found(values.card_number) : MISSING,
    statement_date: values.statement_date ? found(values.statement_date) : MISSING,
    payment_due_date: values.payment_due_date ? found(values.payment_due_date) : MISSING,
    total_amount_due: values.total_amount_due ? found(values.total_amount_due) : MISSING,
    minimum_amount_due: values.minimum_amount_due ? found(values.minimum_amount_due) : MISSING,
    credit_limit: values.credit_limit ? found(values.credit_limit) : MISSING,
    available_credit: values.available_credit ? found(values.available_credit) : MISSING,
    previous_balance: values.previous_balance ? found(values.previous_balance) : MISSING,
  };
}

const MANDATORY = {
  card_number: '4375 XXXX XXXX 1234',
  statement_date: '05 Mar 2024',
  payment_due_date: '23 Mar 2024',
  total_amount_due: '12345.00',
};

describe('determineStatus', () => {
  it('is success when the issuer is known and all mandatory fields are present', () => {
    expect(determineStatus('ICICI Bank', true, outcomes(MANDATORY))).toBe('success');
  });

  it('is partial when a mandatory field is missing', () => {
    const { payment_due_date: _omitted, ...rest } = MANDATORY;
    expect(determineStatus('ICICI Bank', true, outcomes(rest))).toBe('partial');
  });

  it('is partial for an unknown issuer even with every field present', () => {
    expect(determineStatus('Unknown', true, outcomes(MANDATORY))).toBe('partial');
  });

  it('is failed when no field was extracted', () => {
    expect(determineStatus('ICICI Bank', true, outcomes({}))).toBe('failed');
  });

  it('is failed when there was no text', () => {
    expect(determineStatus('Unknown', false, undefined)).toBe('failed');
  });
});

describe('buildStatementRecord', () => {
  it('copies found values and leaves missing ones null', () => {
    const record = buildStatementRecord({
      fileName: 'statement.pdf',
      issuer: 'ICICI Bank',
      hasText: true,
      outcomes: outcomes({ ...MANDATORY, credit_limit: '150000.00' }),
      issues: [
        { kind: 'field_not_found', field: 'minimum_amount_due' },
        { kind: 'field_not_found', field: 'available_credit' },
        { kind: 'field_not_found', field: 'previous_balance' },
      ],
    });

    expect(record).toEqual({
      file_name: 'statement.pdf',
      issuer: 'ICICI Bank',
      card_number: '4375 XXXX XXXX 1234',
      statement_date: '05 Mar 2024',
      payment_due_date: '23 Mar 2024',
      total_amount_due: '12345.00',
      minimum_amount_due: null,
      credit_limit: '150000.00',
      available_credit: null,
      previous_balance: null,
      parsing_status: 'success',
      errors: [
        'minimum_amount_due: not found',
        'available_credit: not found',
        'previous_balance: not found',
      ],
    });
  });

  it('freezes the record and its errors', () => {
    const record = buildStatementRecord({
      fileName: 'statement.pdf',
      issuer: 'Unknown',
      hasText: false,
      issues: [{ kind: 'normalization_empty' }],
    });

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.errors)).toBe(true);
  });

  it('has every field null when there are no outcomes', () => {
    const record = buildStatementRecord({
      fileName: 'empty.pdf',
      issuer: 'Unknown',
      hasText: false,
      issues: [{ kind: 'normalization_empty' }],
    });

    for (const field of STATEMENT_FIELDS) {
      expect(record[field]).toBeNull();
    }
    expect(record.parsing_status).toBe('failed');
    expect(record.errors).toEqual(['text: no extractable text found']);
  });
});

describe('failedRecord', () => {
  it('builds a failed Unknown record carrying the issue', () => {
    const record = failedRecord('broken.pdf', { kind: 'unexpected_failure', message: 'boom' });

    expect(record.issuer).toBe('Unknown');
    expect(record.parsing_status).toBe('failed');
    expect(record.errors).toEqual(['extraction failed: boom']);
  });
});

describe('formatIssue', () => {
  it('formats each kind of issue as one note', () => {
    expect(formatIssue({ kind: 'source_unreadable', message: 'Invalid PDF structure' })).toBe(
      'source: could not read document (Invalid PDF structure)'
    );
    expect(formatIssue({ kind: 'normalization_empty' })).toBe('text: no extractable text found');
    expect(formatIssue({ kind: 'issuer_unrecognized' })).toBe('issuer: not recognized, generic rules applied');
    expect(formatIssue({ kind: 'field_not_found', field: 'credit_limit' })).toBe('credit_limit: not found');
    expect(formatIssue({ kind: 'field_invalid', field: 'total_amount_due', raw: '1,0000.00' })).toBe(
      'total_amount_due: invalid value "1,0000.00"'
    );
    expect(formatIssue({ kind: 'unexpected_failure', message: 'boom' })).toBe('extraction failed: boom');
  });
});
