/**
 * Type definitions for the domain registry.
 */

import type { DomainStatus } from '../shared/constants.js';

export type { DomainStatus } from '../shared/constants.js';

// ---------------------------------------------------------------------------
// Domain record
// ---------------------------------------------------------------------------

export interface DomainRecord {
  /** ULID assigned on first registration. */
  id: string;
  /** Normalized host name ("example.org"). Unique and immutable. */
  name: string;
  status: DomainStatus;
  /** Session that first encountered the domain, if any. */
  discoverySessionId: string | null;
  discoveredAt: Date;
  lastProcessedAt: Date | null;
  /** Number of quality outcomes recorded for this domain. */
  processingCount: number;

  /** Highest confidence ever recorded (0.00-1.00); only moves upward. */
  bestConfidenceScore: number | null;
  highQualityCount: number;
  lowQualityCount: number;

  blacklistReason: string | null;
  blacklistedBy: string | null;
  blacklistedAt: Date | null;

  /** Calendar year (UTC) for which the funder has no money left. */
  noFundsYear: number | null;
  noFundsReason: string | null;
  notes: string | null;

  failureCount: number;
  failureReason: string | null;
  /** Earliest moment a PROCESSING_FAILED domain may be retried. */
  retryAfter: Date | null;
}

// ---------------------------------------------------------------------------
// Lifecycle events
// ---------------------------------------------------------------------------

/** Everything that can move a domain between statuses. */
export type DomainEvent =
  | {
      type: 'QUALITY_RECORDED';
      highQuality: boolean;
      /** Counters after this outcome was added. */
      highQualityCount: number;
      lowQualityCount: number;
    }
  | { type: 'FAILURE_RECORDED' }
  | { type: 'BLACKLISTED' }
  | { type: 'NO_FUNDS_MARKED' };

// ---------------------------------------------------------------------------
// Eligibility
// ---------------------------------------------------------------------------

export type IneligibleReason =
  | 'blacklisted'
  | 'low-quality'
  | 'no-funds-this-year'
  | 'retry-pending'
  | 'recheck-pending';

export type EligibilityDecision =
  | {
      eligible: true;
      /** null when the domain has never been seen. */
      status: DomainStatus | null;
    }
  | {
      eligible: false;
      status: DomainStatus;
      reason: IneligibleReason;
      /** When the block lifts, for time-based blocks. */
      until?: Date;
    };

export interface EligibilityPolicy {
  /** Minimum time between re-checks of a PROCESSED_HIGH_QUALITY domain. */
  highQualityRecheckMs: number;
}
