/**
 * Console Rendering
 *
 * Text views of extracted statement records. Functions return strings; the
 * caller decides where they are written.
 */

import type { ParsingStatus, StatementField, StatementRecord } from '@ccparse/shared';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

const FIELD_LABELS: ReadonlyArray<[StatementField, string]> = [
  ['card_number', 'Card Number'],
  ['statement_date', 'Statement Date'],
  ['payment_due_date', 'Payment Due Date'],
  ['total_amount_due', 'Total Amount Due'],
  ['minimum_amount_due', 'Minimum Amount Due'],
  ['credit_limit', 'Credit Limit'],
  ['available_credit', 'Available Credit'],
  ['previous_balance', 'Previous Balance'],
];

const TABLE_COLUMNS: ReadonlyArray<keyof StatementRecord> = [
  'file_name',
  'issuer',
  'card_number',
  'statement_date',
  'payment_due_date',
  'total_amount_due',
  'minimum_amount_due',
  'parsing_status',
];

const STATUS_SYMBOLS: Record<ParsingStatus, string> = {
  success: '✓',
  partial: '⚠',
  failed: '✗',
};

export function statusSymbol(status: ParsingStatus): string {
  return STATUS_SYMBOLS[status];
}

export function renderProcessing(fileName: string): string {
  return `Processing: ${fileName}...`;
}

export function renderOutcome(record: StatementRecord): string {
  return `  ${statusSymbol(record.parsing_status)} ${record.issuer} - ${record.parsing_status}`;
}

export function renderSummary(records: readonly StatementRecord[]): string {
  const lines = ['', RULE, 'PARSING SUMMARY', RULE];

  for (const record of records) {
    lines.push('', `File: ${record.file_name}`, `Issuer: ${record.issuer}`);
    lines.push(`Status: ${record.parsing_status.toUpperCase()}`, THIN_RULE);

    if (record.parsing_status !== 'failed') {
      for (const [field, label] of FIELD_LABELS) {
        const value = record[field];
        if (value !== null) {
          lines.push(`  ${label.padEnd(20)}: ${value}`);
        }
      }
    }

    if (record.errors.length > 0) {
      lines.push('', '  Warnings/Errors:');
      lines.push(...record.errors.map((error) => `    - ${error}`));
    }
  }

  return lines.join('\n');
}

function cellText(value: StatementRecord[keyof StatementRecord]): string {
  if (value === null) return '';
  return Array.isArray(value) ? value.join('; ') : String(value);
}

/**
 * Grid table of the key columns, one row per record.
 */
export function renderTable(records: readonly StatementRecord[]): string {
  if (records.length === 0) {
    return 'No results to display';
  }

  const rows = records.map((record) => TABLE_COLUMNS.map((column) => cellText(record[column])));
  const widths = TABLE_COLUMNS.map((column, i) =>
    Math.max(column.length, ...rows.map((row) => row[i].length))
  );

  const border = (fill: string) => `+${widths.map((w) => fill.repeat(w + 2)).join('+')}+`;
  const line = (cells: readonly string[]) =>
    `|${cells.map((cell, i) => ` ${cell.padEnd(widths[i])} `).join('|')}|`;

  const table = [border('-'), line(TABLE_COLUMNS), border('=')];
  for (const row of rows) {
    table.push(line(row), border('-'));
  }

  return ['', RULE, 'PARSED DATA TABLE', RULE, '', ...table].join('\n');
}

export interface RunStats {
  total: number;
  success: number;
  partial: number;
  failed: number;
}

export function computeStats(records: readonly StatementRecord[]): RunStats {
  const count = (status: ParsingStatus) =>
    records.filter((record) => record.parsing_status === status).length;

  return {
    total: records.length,
    success: count('success'),
    partial: count('partial'),
    failed: count('failed'),
  };
}

export function renderStats(stats: RunStats): string {
  return [
    '',
    RULE,
    `Total: ${stats.total} | Success: ${stats.success} | Partial: ${stats.partial} | Failed: ${stats.failed}`,
    RULE,
    '',
  ].join('\n');
}
