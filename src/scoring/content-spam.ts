/**
 * Content-based spam checks on a search result's title and snippet.
 *
 * Each indicator is a pure predicate over text. `ContentSpamDetector`
 * runs the enabled ones in SPAM_INDICATORS order and reports every hit.
 */

import { isBlank } from '../shared/utils.js';
import { defaultContentSpamLexicon } from './scoring-data.js';
import {
  SPAM_INDICATORS,
  type ContentSpamLexicon,
  type ScorableResult,
  type SpamAnalysis,
  type SpamIndicator,
} from './types.js';

/** Unique words below this share of all words means stuffing. */
const STUFFING_UNIQUE_RATIO = 0.5;
/** Natural text carries at least this many distinct function words. */
const MIN_COMMON_WORDS = 2;
/** Cosine similarity under which domain and metadata are unrelated. */
const MISMATCH_SIMILARITY = 0.15;
/** Shorter words carry no topic. */
const MIN_TOPIC_WORD_LENGTH = 3;

/**
 * The two precise indicators. Mismatch and keyword-list checks also hit
 * terse legitimate titles, so they are opt-in.
 */
export const DEFAULT_SPAM_INDICATORS: readonly SpamIndicator[] = ['keyword-stuffing', 'cross-category'];

const REASONS: Record<SpamIndicator, string> = {
  'keyword-stuffing': 'repeated words make up most of the title and snippet',
  'domain-metadata-mismatch': 'domain words are unrelated to the title and snippet',
  'unnatural-keyword-list': 'title and snippet read as a bare keyword list',
  'cross-category': 'gambling or essay-writing domain with funding content',
};

function words(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length > 0);
}

function wordVector(tokens: readonly string[]): Map<string, number> {
  const vector = new Map<string, number>();
  for (const token of tokens) {
    if (token.length >= MIN_TOPIC_WORD_LENGTH) {
      vector.set(token, (vector.get(token) ?? 0) + 1);
    }
  }
  return vector;
}

function cosineSimilarity(a: Map<string, number>, b: Map<string, number>): number {
  let dot = 0;
  for (const [word, weight] of a) {
    dot += weight * (b.get(word) ?? 0);
  }
  const norm = (vector: Map<string, number>): number =>
    Math.sqrt(Array.from(vector.values()).reduce((sum, weight) => sum + weight * weight, 0));
  const denominator = norm(a) * norm(b);
  return denominator === 0 ? 0 : dot / denominator;
}

// ---------------------------------------------------------------------------
// Indicators
// ---------------------------------------------------------------------------

/**
 * Fewer than half of the whitespace-separated words are distinct.
 * Example: "grants funding grants grants" -> 2 of 4 unique -> not stuffed;
 * one more "grants" tips it over.
 */
export function detectKeywordStuffing(text: string): boolean {
  const tokens = text.toLowerCase().trim().split(/\s+/).filter((word) => word.length > 0);
  if (tokens.length === 0) {
    return false;
  }
  return new Set(tokens).size / tokens.length < STUFFING_UNIQUE_RATIO;
}

export function detectUnnaturalKeywordList(text: string, commonWords: ReadonlySet<string>): boolean {
  if (isBlank(text)) {
    return false;
  }
  const found = new Set(words(text).filter((word) => commonWords.has(word)));
  return found.size < MIN_COMMON_WORDS;
}

/**
 * Compares the words of the domain (its final suffix dropped when listed
 * in `ignoredSuffixes`) with the metadata words. A domain with no word of
 * three letters or more is not judged.
 */
export function detectDomainMetadataMismatch(
  domain: string,
  metadata: string,
  ignoredSuffixes: ReadonlySet<string>,
): boolean {
  const labels = domain.toLowerCase().split('.');
  const last = labels[labels.length - 1];
  if (labels.length > 1 && last !== undefined && ignoredSuffixes.has(last)) {
    labels.pop();
  }

  const domainVector = wordVector(labels.join(' ').split(/[^a-z0-9]+/));
  const metadataVector = wordVector(words(metadata));
  if (domainVector.size === 0 || metadataVector.size === 0) {
    return false;
  }
  return cosineSimilarity(domainVector, metadataVector) < MISMATCH_SIMILARITY;
}

/** A gambling or essay-mill domain carrying education or funding metadata. */
export function detectCrossCategorySpam(
  domain: string,
  metadata: string,
  lexicon: Pick<ContentSpamLexicon, 'gambling' | 'essayMill' | 'education'>,
): boolean {
  if (isBlank(domain) || isBlank(metadata)) {
    return false;
  }
  const host = domain.toLowerCase();
  const scammer = [...lexicon.gambling, ...lexicon.essayMill].some((fragment) => host.includes(fragment));
  if (!scammer) {
    return false;
  }
  const text = metadata.toLowerCase();
  return lexicon.education.some((keyword) => text.includes(keyword));
}

// ---------------------------------------------------------------------------
// Detector
// ---------------------------------------------------------------------------

export interface ContentSpamDetectorOptions {
  lexicon?: ContentSpamLexicon;
  /** Indicators to run. Defaults to DEFAULT_SPAM_INDICATORS. */
  indicators?: readonly SpamIndicator[];
}

export class ContentSpamDetector {
  private readonly lexicon: ContentSpamLexicon;
  private readonly enabled: ReadonlySet<SpamIndicator>;
  private readonly commonWords: ReadonlySet<string>;
  private readonly ignoredSuffixes: ReadonlySet<string>;

  constructor(options: ContentSpamDetectorOptions = {}) {
    this.lexicon = options.lexicon ?? defaultContentSpamLexicon();
    this.enabled = new Set(options.indicators ?? DEFAULT_SPAM_INDICATORS);
    this.commonWords = new Set(this.lexicon.commonWords);
    this.ignoredSuffixes = new Set(this.lexicon.ignoredDomainSuffixes);
  }

  /** Results without a title or snippet are never content spam. */
  analyze(domain: string, result: ScorableResult): SpamAnalysis {
    const metadata = [result.title, result.snippet]
      .filter((part): part is string => !isBlank(part))
      .join(' ');
    if (metadata.length === 0) {
      return { spam: false };
    }

    const indicators = SPAM_INDICATORS.filter(
      (indicator) => this.enabled.has(indicator) && this.check(indicator, domain, metadata),
    );
    const [first] = indicators;
    if (first === undefined) {
      return { spam: false };
    }
    return { spam: true, indicator: first, indicators, reason: `${first}: ${REASONS[first]}` };
  }

  private check(indicator: SpamIndicator, domain: string, metadata: string): boolean {
    switch (indicator) {
      case 'keyword-stuffing':
        return detectKeywordStuffing(metadata);
      case 'domain-metadata-mismatch':
        return detectDomainMetadataMismatch(domain, metadata, this.ignoredSuffixes);
      case 'unnatural-keyword-list':
        return detectUnnaturalKeywordList(metadata, this.commonWords);
      case 'cross-category':
        return detectCrossCategorySpam(domain, metadata, this.lexicon);
    }
  }
}
