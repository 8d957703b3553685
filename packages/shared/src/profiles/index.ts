/**
 * Issuer Profiles
 *
 * Static detection markers and extraction rules per card issuer, plus the
 * generic rules used when no issuer is recognised.
 */

import type { IssuerProfile } from './types';
import { ICICI_PROFILE } from './icici.profile';
import { AXIS_PROFILE } from './axis.profile';
import { IDFC_FIRST_PROFILE } from './idfc-first.profile';
import { RBL_PROFILE } from './rbl.profile';
import { AMEX_PROFILE } from './amex.profile';

// Export types
export type { ExtractionRule, IssuerProfile, FallbackRuleSet } from './types';

// Export individual profiles
export { ICICI_PROFILE, AXIS_PROFILE, IDFC_FIRST_PROFILE, RBL_PROFILE, AMEX_PROFILE };
export { GENERIC_RULES } from './generic.profile';

/**
 * Built-in profiles in detection order
 */
export const BUILT_IN_PROFILES: readonly IssuerProfile[] = [
  ICICI_PROFILE,
  AXIS_PROFILE,
  IDFC_FIRST_PROFILE,
  RBL_PROFILE,
  AMEX_PROFILE,
];
