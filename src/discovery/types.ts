/**
 * Type definitions for the discovery module.
 * These types define the shape of data flowing through the search-result
 * pipeline: raw results in, review candidates and batch statistics out.
 */

import type { DomainStatus } from '../shared/constants.js';

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

/** One raw hit returned by a search engine. Read-only for this core. */
export interface SearchResult {
  url: string;
  /** May be absent or blank. */
  title?: string | null;
  /** May be absent or blank. */
  snippet?: string | null;
  /** Engine that produced the hit ("searxng", "brave", ...). */
  engine?: string | null;
  /** Query that produced the hit. */
  query?: string | null;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export interface ProcessingStatistics {
  sessionId: string;
  total: number;
  spamFiltered: number;
  duplicateSkipped: number;
  /** Every eligibility skip, whatever status caused it. */
  blacklistSkipped: number;
  invalidUrlSkipped: number;
  /** Results scored below the threshold; no candidate is created for them. */
  lowConfidenceCreated: number;
  highConfidenceCreated: number;
  /** Results whose registry write or candidate creation failed. */
  processingFailed: number;
  /** Breakdown of `blacklistSkipped` by blocking status. */
  ineligibleByStatus: Partial<Record<DomainStatus, number>>;
  durationMs: number;
}

/** Candidates actually written to the review queue. */
export function totalCandidatesCreated(stats: ProcessingStatistics): number {
  return stats.highConfidenceCreated;
}

/** Results that made it past every filter and were scored. */
export function totalProcessed(stats: ProcessingStatistics): number {
  return stats.highConfidenceCreated + stats.lowConfidenceCreated + stats.processingFailed;
}

// ---------------------------------------------------------------------------
// Candidate creation
// ---------------------------------------------------------------------------

export interface CandidateRequest {
  sessionId: string;
  domainId: string;
  domain: string;
  sourceUrl: string;
  title: string | null;
  snippet: string | null;
  score: number;
}

export interface CreatedCandidate {
  id: string;
}

/** Downstream review queue. */
export interface CandidateSink {
  create(request: CandidateRequest): Promise<CreatedCandidate>;
}
