/**
 * Confidence scoring for search results.
 *
 * Estimates how likely a search result points at a genuine funding
 * opportunity from metadata alone (title, snippet, URL). Starts from a
 * neutral baseline and adds independent signal families; when at least
 * three families agree a compound bonus is added once.
 *
 * All arithmetic runs on integer hundredths so that 0.1 + 0.2 style drift
 * never reaches stored or compared scores.
 */

import { getLogger } from '../shared/logger.js';
import { fromHundredths, isBlank, toHundredths } from '../shared/utils.js';
import { extractDomainName } from '../registry/domain-name.js';
import { DomainCredibilityService } from './domain-credibility.js';
import { defaultKeywordSets } from './scoring-data.js';
import type { KeywordSets, ScorableResult, ScoreReport, ScoreSignal } from './types.js';

const log = getLogger('scoring', { component: 'confidence-scorer' });

// ---------------------------------------------------------------------------
// Weights (hundredths)
// ---------------------------------------------------------------------------

const BASELINE = 50;
const TITLE_FUNDING = 15;
const BODY_FUNDING = 10;
const FUNDING_CAP = 25;
const GEOGRAPHY = 15;
const ORGANIZATION = 15;
const COMPOUND_BONUS = 15;
/** Families that must fire before the compound bonus applies. */
const COMPOUND_MIN_FAMILIES = 3;

export interface ConfidenceScorerOptions {
  credibility?: DomainCredibilityService;
  keywords?: KeywordSets;
}

export class ConfidenceScorer {
  private readonly credibility: DomainCredibilityService;
  private readonly funding: RegExp;
  private readonly geography: RegExp;
  private readonly organization: RegExp;

  constructor(options: ConfidenceScorerOptions = {}) {
    this.credibility = options.credibility ?? new DomainCredibilityService();
    const keywords = options.keywords ?? defaultKeywordSets();
    this.funding = compileKeywords(keywords.funding);
    this.geography = compileKeywords(keywords.geography);
    this.organization = compileKeywords(keywords.organization);
  }

  /**
   * Score a result on a 0-1 scale with two decimals.
   */
  score(result: ScorableResult): number {
    return this.evaluate(result).score;
  }

  /**
   * Full evaluation returning every signal that moved the score.
   */
  evaluate(result: ScorableResult): ScoreReport {
    const title = normalizeText(result.title);
    const snippet = normalizeText(result.snippet);
    const url = normalizeText(result.url);
    const combined = `${title} ${snippet} ${url}`;

    const signals: ScoreSignal[] = [];
    let total = BASELINE;
    let familiesFired = 0;

    // Family 1: domain-suffix credibility
    const host = extractDomainName(result.url);
    if (host.success) {
      const credibility = toHundredths(this.credibility.getSuffixScore(host.value));
      if (credibility !== 0) {
        total += credibility;
        signals.push({
          family: 'credibility',
          delta: fromHundredths(credibility),
          reason: `Suffix of "${host.value}" scores ${fromHundredths(credibility).toFixed(2)}`,
        });
      }
      if (credibility > 0) {
        familiesFired++;
      }
    }

    // Family 2: funding vocabulary, title weighted above snippet/URL
    let funding = 0;
    if (this.funding.test(title)) {
      funding += TITLE_FUNDING;
    }
    if (this.funding.test(snippet) || this.funding.test(url)) {
      funding += BODY_FUNDING;
    }
    funding = Math.min(funding, FUNDING_CAP);
    if (funding > 0) {
      total += funding;
      familiesFired++;
      signals.push({
        family: 'funding',
        delta: fromHundredths(funding),
        reason: 'Mentions grants, scholarships or other funding',
      });
    }

    // Family 3: target geography
    if (this.geography.test(combined)) {
      total += GEOGRAPHY;
      familiesFired++;
      signals.push({
        family: 'geography',
        delta: fromHundredths(GEOGRAPHY),
        reason: 'Mentions the target region',
      });
    }

    // Family 4: issuing organization type
    if (this.organization.test(combined)) {
      total += ORGANIZATION;
      familiesFired++;
      signals.push({
        family: 'organization',
        delta: fromHundredths(ORGANIZATION),
        reason: 'Mentions a ministry, commission, foundation or university',
      });
    }

    if (familiesFired >= COMPOUND_MIN_FAMILIES) {
      total += COMPOUND_BONUS;
      signals.push({
        family: 'compound',
        delta: fromHundredths(COMPOUND_BONUS),
        reason: `${familiesFired} independent signals agree`,
      });
    }

    const score = fromHundredths(Math.max(0, Math.min(100, total)));

    log.debug({ url: result.url, score, familiesFired }, 'Search result scored');

    return { score, signals, familiesFired };
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function normalizeText(text: string | null | undefined): string {
  if (text === undefined || text === null || isBlank(text)) {
    return '';
  }
  return text.toLowerCase();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds one case-insensitive pattern matching any keyword at the start of
 * a word, so "grant" matches "grants" and "Grant-funded" but not "emigrant".
 */
function compileKeywords(keywords: readonly string[]): RegExp {
  const alternatives = [...keywords]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  return new RegExp(`(?<![\\p{L}\\p{N}])(?:${alternatives})`, 'iu');
}
