/**
 * Issuer Detector Tests
 */

import {
  IssuerDetector,
  IssuerRegistry,
  createDefaultRegistry,
  normalizeText,
  type IssuerProfile,
} from '@ccparse/shared';
import { STATEMENT_FIXTURES, loadStatementText } from './helpers';

describe('IssuerDetector', () => {
  const detector = new IssuerDetector(createDefaultRegistry());

  it.each([
    ['icici_2024_03', 'ICICI Bank'],
    ['axis_2024_03', 'Axis Bank'],
    ['idfc_first_2024_03', 'IDFC FIRST Bank'],
    ['rbl_2024_03', 'RBL Bank'],
    ['amex_2024_03', 'American Express'],
    ['unbranded_2024_03', 'Unknown'],
  ] as const)('detects %s as %s', (fixture, issuer) => {
    expect(detector.detect(normalizeText([loadStatementText(fixture)]))).toBe(issuer);
  });

  it('returns Unknown for empty text', () => {
    expect(detector.detect('')).toBe('Unknown');
  });

  it('matches markers case-insensitively', () => {
    expect(detector.detect('payments to axisbank.com')).toBe('Axis Bank');
  });

  it('resolves text naming several issuers by priority order', () => {
    const text = 'RBL Bank statement\nPayments via ICICI Bank net banking are accepted';
    expect(detector.detect(text)).toBe('ICICI Bank');
  });

  it('is idempotent', () => {
    for (const fixture of STATEMENT_FIXTURES) {
      const text = normalizeText([loadStatementText(fixture)]);
      expect(detector.detect(text)).toBe(detector.detect(text));
    }
  });

  it('reports the markers that matched', () => {
    const result = detector.detectWithEvidence('ICICI Bank\nwww.icicibank.com');

    expect(result.issuer).toBe('ICICI Bank');
    expect(result.profile?.issuer).toBe('ICICI Bank');
    expect(result.matchedMarkers).toEqual(['ICICI\\s+Bank', 'icicibank\\.com']);
  });

  it('returns no evidence for unrecognized text', () => {
    expect(detector.detectWithEvidence('Monthly Card Statement')).toEqual({
      issuer: 'Unknown',
      matchedMarkers: [],
    });
  });

  it('only considers the profiles in its registry', () => {
    const amexOnly = new IssuerDetector(
      new IssuerRegistry(createDefaultRegistry().list().filter((p) => p.issuer === 'American Express'))
    );

    expect(amexOnly.detect('ICICI Bank')).toBe('Unknown');
    expect(amexOnly.detect('American Express')).toBe('American Express');
  });

  it('requires minMarkerMatches markers to match', () => {
    const strict: IssuerProfile = {
      issuer: 'Axis Bank',
      description: 'two markers required',
      priority: 1,
      markers: [/Axis\s+Bank/i, /axisbank\.com/i],
      minMarkerMatches: 2,
      rules: [
        { id: 'strict.card', field: 'card_number', valueType: 'card_number', patterns: [/(\d{4})/] },
      ],
    };
    const strictDetector = new IssuerDetector(new IssuerRegistry([strict]));

    expect(strictDetector.detect('Axis Bank')).toBe('Unknown');
    expect(strictDetector.detect('Axis Bank\nwww.axisbank.com')).toBe('Axis Bank');
  });
});
