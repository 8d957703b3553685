/**
 * Issuer Registry
 *
 * Holds the issuer profiles a detector and extractor work with. A registry
 * is constructed and passed in explicitly, so detection depends only on the
 * profiles given to it and can be tested in isolation.
 */

import type { KnownIssuer } from '../types';
import type { IssuerProfile } from '../profiles/types';
import { BUILT_IN_PROFILES } from '../profiles';
import { logger } from '../logger';

/**
 * Check the invariants every profile must satisfy before it can be used:
 * - at least one detection marker
 * - at least one card_number rule
 * - every pattern is stateless (no 'g' or 'y' flag), so repeated detection
 *   and extraction over the same text give the same answer
 * - minMarkerMatches within 1..markers.length
 *
 * @throws Error describing the first violated invariant
 */
export function validateProfile(profile: IssuerProfile): void {
  if (profile.markers.length === 0) {
    throw new Error(`Issuer profile ${profile.issuer} has no detection markers`);
  }

  if (!profile.rules.some((rule) => rule.field === 'card_number')) {
    throw new Error(`Issuer profile ${profile.issuer} has no card_number rule`);
  }

  const minMatches = profile.minMarkerMatches ?? 1;
  if (!Number.isInteger(minMatches) || minMatches < 1 || minMatches > profile.markers.length) {
    throw new Error(
      `Issuer profile ${profile.issuer} requires ${minMatches} marker matches but has ${profile.markers.length} markers`
    );
  }

  const patterns = [...profile.markers, ...profile.rules.flatMap((rule) => rule.patterns)];
  const stateful = patterns.find((pattern) => pattern.global || pattern.sticky);
  if (stateful) {
    throw new Error(`Issuer profile ${profile.issuer} has a stateful pattern: ${stateful}`);
  }

  const emptyRule = profile.rules.find((rule) => rule.patterns.length === 0);
  if (emptyRule) {
    throw new Error(`Issuer profile ${profile.issuer} rule ${emptyRule.id} has no patterns`);
  }
}

export class IssuerRegistry {
  private readonly profiles = new Map<KnownIssuer, { profile: IssuerProfile; order: number }>();
  private registrations = 0;

  constructor(profiles: readonly IssuerProfile[] = []) {
    for (const profile of profiles) {
      this.register(profile);
    }
  }

  /**
   * Register a profile. Overwrites any existing profile for that issuer,
   * keeping its original registration order.
   *
   * @throws Error if the profile violates an invariant
   */
  register(profile: IssuerProfile): void {
    validateProfile(profile);

    const existing = this.profiles.get(profile.issuer);
    const order = existing ? existing.order : this.registrations++;
    this.profiles.set(profile.issuer, { profile, order });

    logger.debug('Registered issuer profile', {
      issuer: profile.issuer,
      priority: profile.priority,
      markers: profile.markers.length,
      rules: profile.rules.length,
    });
  }

  get(issuer: KnownIssuer): IssuerProfile | undefined {
    return this.profiles.get(issuer)?.profile;
  }

  /**
   * @throws Error if no profile is registered for the issuer
   */
  getOrThrow(issuer: KnownIssuer): IssuerProfile {
    const profile = this.get(issuer);
    if (!profile) {
      throw new Error(`No profile registered for issuer: ${issuer}`);
    }
    return profile;
  }

  has(issuer: KnownIssuer): boolean {
    return this.profiles.has(issuer);
  }

  /**
   * Profiles in detection order: ascending priority, then registration order.
   */
  list(): IssuerProfile[] {
    return Array.from(this.profiles.values())
      .sort((a, b) => a.profile.priority - b.profile.priority || a.order - b.order)
      .map((entry) => entry.profile);
  }

  issuers(): KnownIssuer[] {
    return this.list().map((profile) => profile.issuer);
  }

  stats(): { totalProfiles: number; totalRules: number; issuers: KnownIssuer[] } {
    const profiles = this.list();
    return {
      totalProfiles: profiles.length,
      totalRules: profiles.reduce((sum, profile) => sum + profile.rules.length, 0),
      issuers: profiles.map((profile) => profile.issuer),
    };
  }
}

/**
 * Registry with every built-in issuer profile.
 */
export function createDefaultRegistry(): IssuerRegistry {
  return new IssuerRegistry(BUILT_IN_PROFILES);
}
