/**
 * Shared TypeScript Types
 *
 * Types for the credit-card statement extraction pipeline, matching the JSON schema in docs/contracts/
 */

// ============================================================================
// Issuers
// ============================================================================

export type KnownIssuer =
  | 'ICICI Bank'
  | 'Axis Bank'
  | 'IDFC FIRST Bank'
  | 'RBL Bank'
  | 'American Express';

export type Issuer = KnownIssuer | 'Unknown';

// ============================================================================
// Statement Fields
// ============================================================================

export type StatementField =
  | 'card_number'
  | 'statement_date'
  | 'payment_due_date'
  | 'total_amount_due'
  | 'minimum_amount_due'
  | 'credit_limit'
  | 'available_credit'
  | 'previous_balance';

/** Canonical field order used for outcomes, error notes and rendering. */
export const STATEMENT_FIELDS: readonly StatementField[] = [
  'card_number',
  'statement_date',
  'payment_due_date',
  'total_amount_due',
  'minimum_amount_due',
  'credit_limit',
  'available_credit',
  'previous_balance',
];

/** Fields that must all be present for a `success` status. */
export const MANDATORY_FIELDS: readonly StatementField[] = [
  'card_number',
  'statement_date',
  'payment_due_date',
  'total_amount_due',
];

export type ValueType = 'card_number' | 'amount' | 'date';

/**
 * Digit grouping expected in an amount:
 * - 'en-IN': lakh/crore grouping (1,00,000.00)
 * - 'en-US': thousands grouping (100,000.00)
 * - 'any': either style
 */
export type NumberLocale = 'en-IN' | 'en-US' | 'any';

// ============================================================================
// Field Outcomes
// ============================================================================

export interface FieldFound {
  status: 'found';
  value: string;
  /** Raw text captured by the pattern, before post-processing */
  raw: string;
  ruleId: string;
}

export interface FieldMissing {
  status: 'missing';
  reason: 'not_found' | 'invalid';
  /** Last raw value that matched but could not be normalized */
  raw?: string;
}

export type FieldOutcome = FieldFound | FieldMissing;

export type FieldOutcomes = Record<StatementField, FieldOutcome>;

// ============================================================================
// Extraction Issues
// ============================================================================

export type ExtractionIssue =
  | { kind: 'source_unreadable'; message: string }
  | { kind: 'normalization_empty' }
  | { kind: 'issuer_unrecognized' }
  | { kind: 'field_not_found'; field: StatementField }
  | { kind: 'field_invalid'; field: StatementField; raw: string }
  | { kind: 'unexpected_failure'; message: string };

// ============================================================================
// Records
// ============================================================================

export type ParsingStatus = 'success' | 'partial' | 'failed';

export interface StatementRecord {
  file_name: string;
  issuer: Issuer;
  card_number: string | null;
  statement_date: string | null;
  payment_due_date: string | null;
  total_amount_due: string | null;
  minimum_amount_due: string | null;
  credit_limit: string | null;
  available_credit: string | null;
  previous_balance: string | null;
  parsing_status: ParsingStatus;
  errors: string[];
}

// ============================================================================
// Input Boundary
// ============================================================================

/**
 * Text of one statement, as produced by the PDF text extraction collaborator.
 */
export interface DocumentText {
  fileName: string;
  pages: readonly string[];
  /** Set when the collaborator could not read the document at all */
  extractionError?: string;
}
