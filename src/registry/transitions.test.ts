import { describe, expect, it } from 'vitest';
import { DOMAIN_STATUS_VALUES, DOMAIN_STATUSES, HOUR_MS, type DomainStatus } from '../shared/constants.js';
import { evaluateEligibility, transition } from './transitions.js';
import type { DomainEvent, DomainRecord } from './types.js';

const NOW = new Date('2026-06-15T12:00:00.000Z');

function domain(overrides: Partial<DomainRecord> = {}): DomainRecord {
  return {
    id: '01J0000000000000000000TEST',
    name: 'example.org',
    status: DOMAIN_STATUSES.DISCOVERED,
    discoverySessionId: null,
    discoveredAt: new Date('2026-01-01T00:00:00.000Z'),
    lastProcessedAt: null,
    processingCount: 0,
    bestConfidenceScore: null,
    highQualityCount: 0,
    lowQualityCount: 0,
    blacklistReason: null,
    blacklistedBy: null,
    blacklistedAt: null,
    noFundsYear: null,
    noFundsReason: null,
    notes: null,
    failureCount: 0,
    failureReason: null,
    retryAfter: null,
    ...overrides,
  };
}

const quality = (
  highQuality: boolean,
  highQualityCount: number,
  lowQualityCount: number,
): DomainEvent => ({ type: 'QUALITY_RECORDED', highQuality, highQualityCount, lowQualityCount });

describe('transition', () => {
  it('never leaves BLACKLISTED', () => {
    const events: DomainEvent[] = [
      quality(true, 1, 0),
      quality(false, 0, 5),
      { type: 'FAILURE_RECORDED' },
      { type: 'NO_FUNDS_MARKED' },
      { type: 'BLACKLISTED' },
    ];
    for (const event of events) {
      expect(transition('BLACKLISTED', event)).toBe('BLACKLISTED');
    }
  });

  it.each(DOMAIN_STATUS_VALUES.filter((s) => s !== 'BLACKLISTED'))(
    '%s accepts blacklist, failure and no-funds events',
    (status: DomainStatus) => {
      expect(transition(status, { type: 'BLACKLISTED' })).toBe('BLACKLISTED');
      expect(transition(status, { type: 'FAILURE_RECORDED' })).toBe('PROCESSING_FAILED');
      expect(transition(status, { type: 'NO_FUNDS_MARKED' })).toBe('NO_FUNDS_THIS_YEAR');
    },
  );

  it('promotes on any high-quality outcome', () => {
    expect(transition('DISCOVERED', quality(true, 1, 0))).toBe('PROCESSED_HIGH_QUALITY');
    expect(transition('PROCESSED_LOW_QUALITY', quality(true, 1, 3))).toBe('PROCESSED_HIGH_QUALITY');
    expect(transition('PROCESSING_FAILED', quality(true, 1, 0))).toBe('PROCESSED_HIGH_QUALITY');
  });

  it('keeps the status for the first two low-quality outcomes', () => {
    expect(transition('DISCOVERED', quality(false, 0, 1))).toBe('DISCOVERED');
    expect(transition('DISCOVERED', quality(false, 0, 2))).toBe('DISCOVERED');
  });

  it('demotes on the third low-quality outcome without high-quality history', () => {
    expect(transition('DISCOVERED', quality(false, 0, 3))).toBe('PROCESSED_LOW_QUALITY');
  });

  it('does not demote a domain with high-quality history', () => {
    expect(transition('PROCESSED_HIGH_QUALITY', quality(false, 1, 3))).toBe('PROCESSED_HIGH_QUALITY');
    expect(transition('PROCESSED_HIGH_QUALITY', quality(false, 1, 10))).toBe('PROCESSED_HIGH_QUALITY');
  });
});

describe('evaluateEligibility', () => {
  const policy = { highQualityRecheckMs: 0 };

  it('accepts unknown domains', () => {
    expect(evaluateEligibility(null, NOW, policy)).toEqual({ eligible: true, status: null });
  });

  it.each(['DISCOVERED', 'PROCESSING'] as const)('accepts %s', (status) => {
    expect(evaluateEligibility(domain({ status }), NOW, policy)).toEqual({ eligible: true, status });
  });

  it('rejects blacklisted and low-quality domains', () => {
    expect(evaluateEligibility(domain({ status: 'BLACKLISTED' }), NOW, policy)).toEqual({
      eligible: false,
      status: 'BLACKLISTED',
      reason: 'blacklisted',
    });
    expect(evaluateEligibility(domain({ status: 'PROCESSED_LOW_QUALITY' }), NOW, policy)).toEqual({
      eligible: false,
      status: 'PROCESSED_LOW_QUALITY',
      reason: 'low-quality',
    });
  });

  describe('NO_FUNDS_THIS_YEAR', () => {
    it('blocks during the marked year until the next 1 January (UTC)', () => {
      expect(
        evaluateEligibility(domain({ status: 'NO_FUNDS_THIS_YEAR', noFundsYear: 2026 }), NOW, policy),
      ).toEqual({
        eligible: false,
        status: 'NO_FUNDS_THIS_YEAR',
        reason: 'no-funds-this-year',
        until: new Date('2027-01-01T00:00:00.000Z'),
      });
    });

    it('allows once the year has rolled over', () => {
      const newYear = new Date('2027-01-01T00:00:00.000Z');
      expect(
        evaluateEligibility(domain({ status: 'NO_FUNDS_THIS_YEAR', noFundsYear: 2026 }), newYear, policy),
      ).toEqual({ eligible: true, status: 'NO_FUNDS_THIS_YEAR' });
    });

    it('only blocks during the marked year itself', () => {
      const earlier = domain({ status: 'NO_FUNDS_THIS_YEAR', noFundsYear: 2025 });
      const later = domain({ status: 'NO_FUNDS_THIS_YEAR', noFundsYear: 2027 });

      expect(evaluateEligibility(earlier, NOW, policy)).toEqual({
        eligible: true,
        status: 'NO_FUNDS_THIS_YEAR',
      });
      expect(evaluateEligibility(later, NOW, policy)).toEqual({
        eligible: true,
        status: 'NO_FUNDS_THIS_YEAR',
      });
    });

    it('allows when no year was recorded', () => {
      expect(evaluateEligibility(domain({ status: 'NO_FUNDS_THIS_YEAR' }), NOW, policy).eligible).toBe(true);
    });
  });

  describe('PROCESSING_FAILED', () => {
    const retryAfter = new Date(NOW.getTime() + HOUR_MS);

    it('blocks until retryAfter', () => {
      expect(
        evaluateEligibility(domain({ status: 'PROCESSING_FAILED', retryAfter }), NOW, policy),
      ).toEqual({ eligible: false, status: 'PROCESSING_FAILED', reason: 'retry-pending', until: retryAfter });
    });

    it('allows from retryAfter on', () => {
      expect(
        evaluateEligibility(domain({ status: 'PROCESSING_FAILED', retryAfter }), retryAfter, policy).eligible,
      ).toBe(true);
    });
  });

  describe('PROCESSED_HIGH_QUALITY', () => {
    const high = domain({ status: 'PROCESSED_HIGH_QUALITY', lastProcessedAt: NOW });

    it('is always eligible with the default interval of 0', () => {
      expect(evaluateEligibility(high, NOW, policy)).toEqual({
        eligible: true,
        status: 'PROCESSED_HIGH_QUALITY',
      });
    });

    it('waits for the configured re-check interval', () => {
      const recheck = { highQualityRecheckMs: 24 * HOUR_MS };
      const later = new Date(NOW.getTime() + 24 * HOUR_MS);

      expect(evaluateEligibility(high, NOW, recheck)).toEqual({
        eligible: false,
        status: 'PROCESSED_HIGH_QUALITY',
        reason: 'recheck-pending',
        until: later,
      });
      expect(evaluateEligibility(high, later, recheck).eligible).toBe(true);
    });
  });
});
