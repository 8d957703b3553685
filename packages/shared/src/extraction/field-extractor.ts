/**
 * Field Extraction
 *
 * Applies an ordered rule set to normalized statement text. Every field of
 * the record gets an explicit outcome; a miss on one field never stops the
 * remaining rules from running.
 */

import {
  STATEMENT_FIELDS,
  type ExtractionIssue,
  type FieldOutcome,
  type FieldOutcomes,
  type StatementField,
} from '../types';
import type { ExtractionRule } from '../profiles/types';
import { normalizeAmount, normalizeCardNumber, normalizeDate } from './values';
import { logger } from '../logger';

export interface FieldExtractionResult {
  outcomes: FieldOutcomes;
  issues: ExtractionIssue[];
  foundCount: number;
}

/**
 * Value of a match: the last capture group that took part in it, or the
 * whole match for patterns without groups.
 */
export function matchedValue(match: RegExpExecArray): string {
  for (let i = match.length - 1; i >= 1; i--) {
    const group = match[i];
    if (group !== undefined) return group;
  }
  return match[0];
}

/**
 * Run a rule's post-processing on a raw capture.
 */
export function postProcess(rule: ExtractionRule, raw: string): string | null {
  switch (rule.valueType) {
    case 'amount':
      return normalizeAmount(raw, rule.numberLocale ?? 'any');
    case 'date':
      return normalizeDate(raw, rule.dateFormats);
    case 'card_number':
      return normalizeCardNumber(raw);
  }
}

/**
 * Apply one rule. Patterns are tried in order; a match whose value cannot
 * be normalized moves on to the next pattern.
 */
export function applyRule(rule: ExtractionRule, text: string): FieldOutcome {
  let invalidRaw: string | undefined;

  for (const pattern of rule.patterns) {
    const match = pattern.exec(text);
    if (!match) continue;

    const raw = matchedValue(match).trim();
    const value = postProcess(rule, raw);
    if (value !== null) {
      return { status: 'found', value, raw, ruleId: rule.id };
    }

    invalidRaw = raw;
    logger.debug('Pattern matched but value was rejected', {
      rule_id: rule.id,
      field: rule.field,
      raw,
    });
  }

  return invalidRaw === undefined
    ? { status: 'missing', reason: 'not_found' }
    : { status: 'missing', reason: 'invalid', raw: invalidRaw };
}

function issueFor(field: StatementField, outcome: FieldOutcome): ExtractionIssue | null {
  if (outcome.status === 'found') return null;
  if (outcome.reason === 'invalid' && outcome.raw !== undefined) {
    return { kind: 'field_invalid', field, raw: outcome.raw };
  }
  return { kind: 'field_not_found', field };
}

/**
 * Outcome for one field. When several rules target the field, the first
 * that yields a value wins; a field with no rule is not found.
 */
export function extractField(
  field: StatementField,
  text: string,
  rules: readonly ExtractionRule[]
): FieldOutcome {
  let outcome: FieldOutcome = { status: 'missing', reason: 'not_found' };

  for (const rule of rules) {
    if (rule.field !== field) continue;
    const result = applyRule(rule, text);
    if (result.status === 'found') return result;
    if (result.reason === 'invalid') {
      outcome = result;
    }
  }

  return outcome;
}

/**
 * Extract every statement field from normalized text with the given rules.
 */
export function extractFields(text: string, rules: readonly ExtractionRule[]): FieldExtractionResult {
  const outcomes: FieldOutcomes = {
    card_number: extractField('card_number', text, rules),
    statement_date: extractField('statement_date', text, rules),
    payment_due_date: extractField('payment_due_date', text, rules),
    total_amount_due: extractField('total_amount_due', text, rules),
    minimum_amount_due: extractField('minimum_amount_due', text, rules),
    credit_limit: extractField('credit_limit', text, rules),
    available_credit: extractField('available_credit', text, rules),
    previous_balance: extractField('previous_balance', text, rules),
  };

  const issues: ExtractionIssue[] = [];
  let foundCount = 0;

  for (const field of STATEMENT_FIELDS) {
    const issue = issueFor(field, outcomes[field]);
    if (issue) {
      issues.push(issue);
    } else {
      foundCount++;
    }
  }

  return { outcomes, issues, foundCount };
}
