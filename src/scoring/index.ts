/**
 * Scoring module public API: suffix credibility, metadata confidence and
 * content spam checks.
 */

export type {
  ScorableResult,
  SignalFamily,
  ScoreSignal,
  ScoreReport,
  CredibilityTier,
  CredibilityTable,
  KeywordSets,
  ContentSpamLexicon,
  SpamIndicator,
  SpamAnalysis,
} from './types.js';
export { SPAM_INDICATORS } from './types.js';

export { DomainCredibilityService } from './domain-credibility.js';
export type { DomainCredibilityOptions } from './domain-credibility.js';
export { ConfidenceScorer } from './confidence-scorer.js';
export type { ConfidenceScorerOptions } from './confidence-scorer.js';
export {
  ContentSpamDetector,
  DEFAULT_SPAM_INDICATORS,
  detectKeywordStuffing,
  detectUnnaturalKeywordList,
  detectDomainMetadataMismatch,
  detectCrossCategorySpam,
} from './content-spam.js';
export type { ContentSpamDetectorOptions } from './content-spam.js';
export {
  loadCredibilityTable,
  loadKeywordSets,
  parseCredibilityTable,
  parseKeywordSets,
  defaultCredibilityTable,
  defaultKeywordSets,
  loadContentSpamLexicon,
  parseContentSpamLexicon,
  defaultContentSpamLexicon,
} from './scoring-data.js';
