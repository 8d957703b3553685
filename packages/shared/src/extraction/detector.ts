/**
 * Issuer Detection
 *
 * Finds the issuer of a statement from its normalized text. Profiles are
 * tried in the registry's fixed priority order and the first one whose
 * markers match wins, so a bank named in another issuer's disclaimer text
 * cannot override an earlier, intended match.
 */

import type { Issuer } from '../types';
import type { IssuerProfile } from '../profiles/types';
import type { IssuerRegistry } from './registry';

export interface DetectionResult {
  issuer: Issuer;
  profile?: IssuerProfile;
  /** Source of the markers that matched for the detected profile */
  matchedMarkers: string[];
}

function matchingMarkers(profile: IssuerProfile, text: string): string[] {
  return profile.markers.filter((marker) => marker.test(text)).map((marker) => marker.source);
}

export class IssuerDetector {
  constructor(private readonly registry: IssuerRegistry) {}

  /**
   * Detect the issuer, with the profile and markers that matched.
   */
  detectWithEvidence(text: string): DetectionResult {
    if (text) {
      for (const profile of this.registry.list()) {
        const matched = matchingMarkers(profile, text);
        if (matched.length >= (profile.minMarkerMatches ?? 1)) {
          return { issuer: profile.issuer, profile, matchedMarkers: matched };
        }
      }
    }

    return { issuer: 'Unknown', matchedMarkers: [] };
  }

  detect(text: string): Issuer {
    return this.detectWithEvidence(text).issuer;
  }
}
