/**
 * Test Helpers
 *
 * Loading of statement text fixtures and their expected records.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { DocumentText, StatementRecord } from '@ccparse/shared';

const FIXTURES_DIR = path.join(__dirname, '../../fixtures');

export const STATEMENT_FIXTURES = [
  'icici_2024_03',
  'axis_2024_03',
  'idfc_first_2024_03',
  'rbl_2024_03',
  'amex_2024_03',
  'unbranded_2024_03',
] as const;

export type StatementFixture = (typeof STATEMENT_FIXTURES)[number];

export function loadStatementText(name: StatementFixture): string {
  return fs.readFileSync(path.join(FIXTURES_DIR, 'statements', `${name}.txt`), 'utf-8');
}

/**
 * Fixture as a document, named like the PDF it would have been read from.
 */
export function loadStatementDocument(name: StatementFixture): DocumentText {
  return { fileName: `${name}.pdf`, pages: [loadStatementText(name)] };
}

export function loadExpectedRecord(name: StatementFixture): StatementRecord {
  const raw = fs.readFileSync(
    path.join(FIXTURES_DIR, 'expected', `${name}.statement_record.json`),
    'utf-8'
  );
  return JSON.parse(raw);
}
