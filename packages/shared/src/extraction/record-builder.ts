/**
 * Statement Record Builder
 *
 * Turns a detection result and field outcomes into an immutable
 * StatementRecord. Building never throws: whatever went wrong is carried in
 * the record's status and error notes.
 */

import {
  MANDATORY_FIELDS,
  type ExtractionIssue,
  type FieldOutcome,
  type FieldOutcomes,
  type Issuer,
  type ParsingStatus,
  type StatementRecord,
} from '../types';
import { formatIssue } from './issues';

export interface RecordInput {
  fileName: string;
  issuer: Issuer;
  /** False when normalization produced no text */
  hasText: boolean;
  outcomes?: FieldOutcomes;
  issues: readonly ExtractionIssue[];
}

function valueOf(outcome: FieldOutcome | undefined): string | null {
  return outcome?.status === 'found' ? outcome.value : null;
}

/**
 * Parsing status rules:
 * - failed: no text, or no field extracted
 * - partial: issuer unknown, or a mandatory field is missing
 * - success: issuer known and every mandatory field present
 */
export function determineStatus(
  issuer: Issuer,
  hasText: boolean,
  outcomes: FieldOutcomes | undefined
): ParsingStatus {
  if (!hasText || !outcomes) return 'failed';

  const found = Object.values(outcomes).filter((outcome) => outcome.status === 'found').length;
  if (found === 0) return 'failed';
  if (issuer === 'Unknown') return 'partial';

  const missingMandatory = MANDATORY_FIELDS.some((field) => outcomes[field].status !== 'found');
  return missingMandatory ? 'partial' : 'success';
}

export function buildStatementRecord(input: RecordInput): StatementRecord {
  const { fileName, issuer, hasText, outcomes, issues } = input;

  const record: StatementRecord = {
    file_name: fileName,
    issuer,
    card_number: valueOf(outcomes?.card_number),
    statement_date: valueOf(outcomes?.statement_date),
    payment_due_date: valueOf(outcomes?.payment_due_date),
    total_amount_due: valueOf(outcomes?.total_amount_due),
    minimum_amount_due: valueOf(outcomes?.minimum_amount_due),
    credit_limit: valueOf(outcomes?.credit_limit),
    available_credit: valueOf(outcomes?.available_credit),
    previous_balance: valueOf(outcomes?.previous_balance),
    parsing_status: determineStatus(issuer, hasText, outcomes),
    errors: issues.map(formatIssue),
  };

  return freezeRecord(record);
}

/**
 * Minimal failed record for a document that could not be processed at all.
 */
export function failedRecord(fileName: string, issue: ExtractionIssue): StatementRecord {
  return buildStatementRecord({
    fileName,
    issuer: 'Unknown',
    hasText: false,
    issues: [issue],
  });
}

function freezeRecord(record: StatementRecord): StatementRecord {
  Object.freeze(record.errors);
  return Object.freeze(record);
}
