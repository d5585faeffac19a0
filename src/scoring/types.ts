/**
 * Type definitions for the scoring module.
 */

/** Minimal search-result shape required for scoring. */
export interface ScorableResult {
  url: string;
  title?: string | null;
  snippet?: string | null;
}

export type SignalFamily = 'credibility' | 'funding' | 'geography' | 'organization' | 'compound';

export interface ScoreSignal {
  family: SignalFamily;
  /** Contribution to the score, two decimals (may be negative). */
  delta: number;
  reason: string;
}

export interface ScoreReport {
  /** Final score in [0.00, 1.00], two decimals. */
  score: number;
  /** Every signal that changed the score, in evaluation order. */
  signals: ScoreSignal[];
  /** Number of independent families that fired (compound bonus excluded). */
  familiesFired: number;
}

// ---------------------------------------------------------------------------
// Data files
// ---------------------------------------------------------------------------

export interface CredibilityTier {
  name: string;
  score: number;
  suffixes: string[];
}

export interface CredibilityTable {
  /** Institutional second-level suffixes such as "gov.bg" or "europa.eu". */
  secondLevel: Record<string, number>;
  tiers: CredibilityTier[];
  /** Known low-trust suffixes and their (negative) contribution. */
  lowTrust: Record<string, number>;
  validatedNonprofit: string[];
  targetRegion: string[];
}

export interface KeywordSets {
  funding: string[];
  geography: string[];
  organization: string[];
}

export interface ContentSpamLexicon {
  /** Domain fragments of gambling sites. */
  gambling: string[];
  /** Domain fragments of essay-writing services. */
  essayMill: string[];
  /** Funding and study vocabulary that such sites borrow. */
  education: string[];
  /** Function words present in natural prose. */
  commonWords: string[];
  /** Suffixes dropped before the domain is split into words. */
  ignoredDomainSuffixes: string[];
}

// ---------------------------------------------------------------------------
// Content spam
// ---------------------------------------------------------------------------

export const SPAM_INDICATORS = [
  'keyword-stuffing',
  'domain-metadata-mismatch',
  'unnatural-keyword-list',
  'cross-category',
] as const;

export type SpamIndicator = (typeof SPAM_INDICATORS)[number];

export type SpamAnalysis =
  | { spam: false }
  | {
      spam: true;
      /** First indicator that fired, in SPAM_INDICATORS order. */
      indicator: SpamIndicator;
      indicators: SpamIndicator[];
      reason: string;
    };
