/**
 * Issuer Profile Types
 *
 * An issuer profile is static configuration: how to recognise a bank's
 * statement and which ordered rules pull each field out of its text.
 * Adding a bank means adding a profile, not a code branch.
 */

import type { KnownIssuer, NumberLocale, StatementField, ValueType } from '../types';

/**
 * One named extraction rule. Patterns are tried in order; the value is the
 * last capture group that participated in the match (or the whole match
 * when the pattern has no groups).
 */
export interface ExtractionRule {
  /** Stable identifier, reported in debug logs and field outcomes */
  id: string;

  field: StatementField;

  /** Non-global, non-sticky patterns, tried in order */
  patterns: readonly RegExp[];

  /** Post-processing applied to the captured value */
  valueType: ValueType;

  /** Digit grouping of amounts printed by this issuer */
  numberLocale?: NumberLocale;

  /** dayjs formats the issuer prints dates in */
  dateFormats?: readonly string[];
}

export interface IssuerProfile {
  issuer: KnownIssuer;

  /** Human-readable description of the statement layout this profile targets */
  description: string;

  /** Detection order; lower values are tried first */
  priority: number;

  /** Patterns that identify the issuer's statements */
  markers: readonly RegExp[];

  /** Number of markers that must match; defaults to 1 */
  minMarkerMatches?: number;

  rules: readonly ExtractionRule[];
}

/**
 * Rules applied when no issuer could be detected.
 */
export interface FallbackRuleSet {
  description: string;
  rules: readonly ExtractionRule[];
}
