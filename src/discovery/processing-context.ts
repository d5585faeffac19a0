/**
 * Per-batch processing state and the pure pipeline stages that read it.
 *
 * A context is never mutated: every stage returns a new one. That keeps a
 * single `process()` call self-contained and lets each stage be tested on
 * its own as `(input, context) -> (decision, context)`.
 */

import type { DomainStatus } from '../shared/constants.js';
import { toHundredths } from '../shared/utils.js';
import type { InvalidUrlError, OperationResult } from '../shared/errors.js';
import type { EligibilityDecision } from '../registry/types.js';
import type { ProcessingStatistics } from './types.js';

export interface ProcessingCounters {
  total: number;
  spamFiltered: number;
  duplicateSkipped: number;
  blacklistSkipped: number;
  invalidUrlSkipped: number;
  lowConfidenceCreated: number;
  highConfidenceCreated: number;
  processingFailed: number;
  ineligibleByStatus: Readonly<Partial<Record<DomainStatus, number>>>;
}

export interface ProcessingContext {
  readonly sessionId: string;
  /** Domains already accepted by the dedup stage in this batch. */
  readonly seenDomains: ReadonlySet<string>;
  readonly counters: Readonly<ProcessingCounters>;
}

export type SkipStage = 'extract' | 'spam' | 'dedup' | 'eligibility';

/** Outcome of one filtering stage. */
export type StageResult =
  | { proceed: true; domain: string; context: ProcessingContext }
  | { proceed: false; stage: SkipStage; reason: string; context: ProcessingContext };

export type ConfidenceBand = 'high' | 'low';

export type Outcome = ConfidenceBand | 'failed';

export function createContext(sessionId: string): ProcessingContext {
  return {
    sessionId,
    seenDomains: new Set(),
    counters: {
      total: 0,
      spamFiltered: 0,
      duplicateSkipped: 0,
      blacklistSkipped: 0,
      invalidUrlSkipped: 0,
      lowConfidenceCreated: 0,
      highConfidenceCreated: 0,
      processingFailed: 0,
      ineligibleByStatus: {},
    },
  };
}

function bump(
  context: ProcessingContext,
  counter: Exclude<keyof ProcessingCounters, 'ineligibleByStatus'>,
): ProcessingContext {
  const counters: ProcessingCounters = { ...context.counters };
  counters[counter] += 1;
  return { ...context, counters };
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

/** Counts a result entering the pipeline. */
export function countResult(context: ProcessingContext): ProcessingContext {
  return bump(context, 'total');
}

export function extractStage(
  extraction: OperationResult<string, InvalidUrlError>,
  context: ProcessingContext,
): StageResult {
  if (!extraction.success) {
    return {
      proceed: false,
      stage: 'extract',
      reason: extraction.error.message,
      context: bump(context, 'invalidUrlSkipped'),
    };
  }
  return { proceed: true, domain: extraction.value, context };
}

/**
 * Runs before dedup so that spam never takes a slot in `seenDomains`.
 * `spamReason` is null for a clean result.
 */
export function spamStage(
  domain: string,
  spamReason: string | null,
  context: ProcessingContext,
): StageResult {
  if (spamReason !== null) {
    return {
      proceed: false,
      stage: 'spam',
      reason: spamReason,
      context: bump(context, 'spamFiltered'),
    };
  }
  return { proceed: true, domain, context };
}

export function dedupStage(domain: string, context: ProcessingContext): StageResult {
  if (context.seenDomains.has(domain)) {
    return {
      proceed: false,
      stage: 'dedup',
      reason: 'Domain already seen in this batch',
      context: bump(context, 'duplicateSkipped'),
    };
  }

  const seenDomains = new Set(context.seenDomains);
  seenDomains.add(domain);
  return { proceed: true, domain, context: { ...context, seenDomains } };
}

export function eligibilityStage(
  domain: string,
  decision: EligibilityDecision,
  context: ProcessingContext,
): StageResult {
  if (decision.eligible) {
    return { proceed: true, domain, context };
  }

  const skipped = bump(context, 'blacklistSkipped');
  const ineligibleByStatus: Partial<Record<DomainStatus, number>> = {
    ...skipped.counters.ineligibleByStatus,
  };
  ineligibleByStatus[decision.status] = (ineligibleByStatus[decision.status] ?? 0) + 1;

  return {
    proceed: false,
    stage: 'eligibility',
    reason: decision.reason,
    context: { ...skipped, counters: { ...skipped.counters, ineligibleByStatus } },
  };
}

/** Scores at or above the threshold are high confidence. */
export function gateStage(score: number, threshold: number): ConfidenceBand {
  return toHundredths(score) >= toHundredths(threshold) ? 'high' : 'low';
}

export function recordOutcome(context: ProcessingContext, outcome: Outcome): ProcessingContext {
  switch (outcome) {
    case 'high':
      return bump(context, 'highConfidenceCreated');
    case 'low':
      return bump(context, 'lowConfidenceCreated');
    case 'failed':
      return bump(context, 'processingFailed');
  }
}

export function toStatistics(context: ProcessingContext, durationMs: number): ProcessingStatistics {
  return {
    sessionId: context.sessionId,
    ...context.counters,
    ineligibleByStatus: { ...context.counters.ineligibleByStatus },
    durationMs,
  };
}
