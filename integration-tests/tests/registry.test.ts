/**
 * Issuer Registry Tests
 */

import {
  AXIS_PROFILE,
  ICICI_PROFILE,
  IssuerRegistry,
  createDefaultRegistry,
  validateProfile,
  type IssuerProfile,
} from '@ccparse/shared';

function profile(overrides: Partial<IssuerProfile> = {}): IssuerProfile {
  return {
    issuer: 'RBL Bank',
    description: 'test profile',
    priority: 100,
    markers: [/Test\s+Issuer/i],
    rules: [
      {
        id: 'test.card_number',
        field: 'card_number',
        valueType: 'card_number',
        patterns: [/Card\s+(\d{4}\s*X{4}\s*X{4}\s*\d{4})/i],
      },
    ],
    ...overrides,
  };
}

describe('validateProfile', () => {
  it('accepts every built-in profile', () => {
    for (const builtIn of createDefaultRegistry().list()) {
      expect(() => validateProfile(builtIn)).not.toThrow();
    }
  });

  it('rejects a profile without markers', () => {
    expect(() => validateProfile(profile({ markers: [] }))).toThrow(
      'Issuer profile RBL Bank has no detection markers'
    );
  });

  it('rejects a profile without a card_number rule', () => {
    const rules = [
      {
        id: 'test.total',
        field: 'total_amount_due' as const,
        valueType: 'amount' as const,
        patterns: [/Total\s+(\d+)/],
      },
    ];
    expect(() => validateProfile(profile({ rules }))).toThrow(
      'Issuer profile RBL Bank has no card_number rule'
    );
  });

  it('rejects global and sticky patterns', () => {
    expect(() => validateProfile(profile({ markers: [/Test/g] }))).toThrow(
      'Issuer profile RBL Bank has a stateful pattern: /Test/g'
    );
    expect(() => validateProfile(profile({ markers: [/Test/y] }))).toThrow('stateful pattern');
  });

  it('rejects an unreachable minMarkerMatches', () => {
    expect(() => validateProfile(profile({ minMarkerMatches: 2 }))).toThrow(
      'Issuer profile RBL Bank requires 2 marker matches but has 1 markers'
    );
    expect(() => validateProfile(profile({ minMarkerMatches: 0 }))).toThrow('requires 0 marker matches');
  });

  it('rejects a rule without patterns', () => {
    const rules = [
      { id: 'test.empty', field: 'card_number' as const, valueType: 'card_number' as const, patterns: [] },
    ];
    expect(() => validateProfile(profile({ rules }))).toThrow(
      'Issuer profile RBL Bank rule test.empty has no patterns'
    );
  });
});

describe('IssuerRegistry', () => {
  it('lists the built-in profiles in detection order', () => {
    expect(createDefaultRegistry().issuers()).toEqual([
      'ICICI Bank',
      'Axis Bank',
      'IDFC FIRST Bank',
      'RBL Bank',
      'American Express',
    ]);
  });

  it('orders by priority, then registration order', () => {
    const registry = new IssuerRegistry([
      profile({ issuer: 'RBL Bank', priority: 5 }),
      profile({ issuer: 'Axis Bank', priority: 1 }),
      profile({ issuer: 'ICICI Bank', priority: 5 }),
    ]);

    expect(registry.issuers()).toEqual(['Axis Bank', 'RBL Bank', 'ICICI Bank']);
  });

  it('replaces a profile in place when the issuer is registered again', () => {
    const registry = new IssuerRegistry([
      profile({ issuer: 'ICICI Bank', priority: 1 }),
      profile({ issuer: 'Axis Bank', priority: 1 }),
    ]);
    const replacement = profile({ issuer: 'ICICI Bank', priority: 1, description: 'replacement' });

    registry.register(replacement);

    expect(registry.issuers()).toEqual(['ICICI Bank', 'Axis Bank']);
    expect(registry.get('ICICI Bank')).toBe(replacement);
  });

  it('throws when registering an invalid profile', () => {
    const registry = new IssuerRegistry();
    expect(() => registry.register(profile({ markers: [] }))).toThrow('no detection markers');
    expect(registry.has('RBL Bank')).toBe(false);
  });

  it('looks up profiles by issuer', () => {
    const registry = new IssuerRegistry([ICICI_PROFILE]);

    expect(registry.has('ICICI Bank')).toBe(true);
    expect(registry.get('Axis Bank')).toBeUndefined();
    expect(registry.getOrThrow('ICICI Bank')).toBe(ICICI_PROFILE);
    expect(() => registry.getOrThrow('Axis Bank')).toThrow('No profile registered for issuer: Axis Bank');
  });

  it('reports statistics', () => {
    const registry = new IssuerRegistry([ICICI_PROFILE, AXIS_PROFILE]);

    expect(registry.stats()).toEqual({
      totalProfiles: 2,
      totalRules: ICICI_PROFILE.rules.length + AXIS_PROFILE.rules.length,
      issuers: ['ICICI Bank', 'Axis Bank'],
    });
  });
});
