// ---------------------------------------------------------------------------
// Domain lifecycle
// ---------------------------------------------------------------------------

export const DOMAIN_STATUS_VALUES = [
  'DISCOVERED',
  'PROCESSING',
  'PROCESSED_HIGH_QUALITY',
  'PROCESSED_LOW_QUALITY',
  'NO_FUNDS_THIS_YEAR',
  'PROCESSING_FAILED',
  'BLACKLISTED',
] as const;

export type DomainStatus = (typeof DOMAIN_STATUS_VALUES)[number];

export const DOMAIN_STATUSES = {
  DISCOVERED: 'DISCOVERED',
  PROCESSING: 'PROCESSING',
  PROCESSED_HIGH_QUALITY: 'PROCESSED_HIGH_QUALITY',
  PROCESSED_LOW_QUALITY: 'PROCESSED_LOW_QUALITY',
  NO_FUNDS_THIS_YEAR: 'NO_FUNDS_THIS_YEAR',
  PROCESSING_FAILED: 'PROCESSING_FAILED',
  BLACKLISTED: 'BLACKLISTED',
} as const satisfies Record<DomainStatus, DomainStatus>;

// ---------------------------------------------------------------------------
// Candidate lifecycle (owned downstream; this core only creates)
// ---------------------------------------------------------------------------

export const CANDIDATE_STATUS_VALUES = ['pending_review', 'approved', 'rejected'] as const;

export type CandidateStatus = (typeof CANDIDATE_STATUS_VALUES)[number];

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

/** Minimum confidence for a search result to become a review candidate. */
export const CONFIDENCE_THRESHOLD = 0.6;

/** Low-confidence outcomes (with no high-quality history) before demotion. */
export const LOW_QUALITY_DEMOTION_COUNT = 3;

// ---------------------------------------------------------------------------
// Time
// ---------------------------------------------------------------------------

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;

/** Retry delay after the 1st, 2nd, 3rd and every later processing failure. */
export const DEFAULT_FAILURE_BACKOFF_MS: readonly number[] = [
  HOUR_MS,
  4 * HOUR_MS,
  DAY_MS,
  WEEK_MS,
];
