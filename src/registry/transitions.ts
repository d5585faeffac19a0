/**
 * Domain lifecycle rules as pure functions.
 *
 *   DISCOVERED / PROCESSING ──quality(high)──▶ PROCESSED_HIGH_QUALITY
 *            │                  quality(low, 3rd, no high ever)──▶ PROCESSED_LOW_QUALITY
 *            ├──failure──▶ PROCESSING_FAILED   (retry after backoff)
 *            ├──no funds─▶ NO_FUNDS_THIS_YEAR  (retry next year)
 *            └──blacklist▶ BLACKLISTED         (terminal)
 *
 * Any state except BLACKLISTED accepts any event.
 */

import { DOMAIN_STATUSES, LOW_QUALITY_DEMOTION_COUNT, type DomainStatus } from '../shared/constants.js';
import type { DomainEvent, DomainRecord, EligibilityDecision, EligibilityPolicy } from './types.js';

export function transition(status: DomainStatus, event: DomainEvent): DomainStatus {
  if (status === DOMAIN_STATUSES.BLACKLISTED) {
    return status;
  }

  switch (event.type) {
    case 'BLACKLISTED':
      return DOMAIN_STATUSES.BLACKLISTED;

    case 'NO_FUNDS_MARKED':
      return DOMAIN_STATUSES.NO_FUNDS_THIS_YEAR;

    case 'FAILURE_RECORDED':
      return DOMAIN_STATUSES.PROCESSING_FAILED;

    case 'QUALITY_RECORDED':
      if (event.highQuality) {
        return DOMAIN_STATUSES.PROCESSED_HIGH_QUALITY;
      }
      // A single high-quality hit in the past protects from demotion
      if (
        event.highQualityCount === 0 &&
        event.lowQualityCount >= LOW_QUALITY_DEMOTION_COUNT
      ) {
        return DOMAIN_STATUSES.PROCESSED_LOW_QUALITY;
      }
      return status;

    default:
      return assertNever(event);
  }
}

/**
 * Decides whether search results from a domain should be scored again.
 * `domain` is null for a name the registry has never seen.
 */
export function evaluateEligibility(
  domain: DomainRecord | null,
  now: Date,
  policy: EligibilityPolicy,
): EligibilityDecision {
  if (domain === null) {
    return { eligible: true, status: null };
  }

  const status = domain.status;

  switch (status) {
    case DOMAIN_STATUSES.BLACKLISTED:
      return { eligible: false, status, reason: 'blacklisted' };

    case DOMAIN_STATUSES.PROCESSED_LOW_QUALITY:
      return { eligible: false, status, reason: 'low-quality' };

    case DOMAIN_STATUSES.NO_FUNDS_THIS_YEAR:
      if (domain.noFundsYear !== null && now.getUTCFullYear() === domain.noFundsYear) {
        return {
          eligible: false,
          status,
          reason: 'no-funds-this-year',
          until: new Date(Date.UTC(domain.noFundsYear + 1, 0, 1)),
        };
      }
      return { eligible: true, status };

    case DOMAIN_STATUSES.PROCESSING_FAILED:
      if (domain.retryAfter !== null && now.getTime() < domain.retryAfter.getTime()) {
        return { eligible: false, status, reason: 'retry-pending', until: domain.retryAfter };
      }
      return { eligible: true, status };

    case DOMAIN_STATUSES.PROCESSED_HIGH_QUALITY: {
      if (policy.highQualityRecheckMs <= 0 || domain.lastProcessedAt === null) {
        return { eligible: true, status };
      }
      const nextCheck = domain.lastProcessedAt.getTime() + policy.highQualityRecheckMs;
      if (now.getTime() < nextCheck) {
        return { eligible: false, status, reason: 'recheck-pending', until: new Date(nextCheck) };
      }
      return { eligible: true, status };
    }

    case DOMAIN_STATUSES.DISCOVERED:
    case DOMAIN_STATUSES.PROCESSING:
      return { eligible: true, status };

    default:
      return assertNever(status);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled domain lifecycle value: ${JSON.stringify(value)}`);
}
