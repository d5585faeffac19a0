/**
 * Domain-suffix credibility.
 *
 * Maps the suffix of a normalized host name onto a tiered score:
 * institutional suffixes (.gov, .edu, .ngo, gov.bg, europa.eu) add the most,
 * unrestricted suffixes add nothing, and known low-trust suffixes subtract.
 * The same low-trust list doubles as the default spam filter of the
 * search-result pipeline.
 */

import { getLogger } from '../shared/logger.js';
import { defaultCredibilityTable } from './scoring-data.js';
import type { CredibilityTable } from './types.js';

const log = getLogger('scoring', { component: 'domain-credibility' });

export interface DomainCredibilityOptions {
  table?: CredibilityTable;
  /**
   * Suffixes treated as spam by `isSpamTld`. Defaults to the keys of the
   * table's low-trust map.
   */
  spamTlds?: Iterable<string>;
}

export class DomainCredibilityService {
  private readonly secondLevel: ReadonlyMap<string, number>;
  private readonly suffixScores: ReadonlyMap<string, number>;
  private readonly spamTlds: ReadonlySet<string>;
  private readonly validatedNonprofit: ReadonlySet<string>;
  private readonly targetRegion: ReadonlySet<string>;

  constructor(options: DomainCredibilityOptions = {}) {
    const table = options.table ?? defaultCredibilityTable();

    this.secondLevel = new Map(Object.entries(table.secondLevel));

    // First tier wins when a suffix is listed twice
    const scores = new Map<string, number>();
    for (const tier of table.tiers) {
      for (const suffix of tier.suffixes) {
        if (!scores.has(suffix)) {
          scores.set(suffix, tier.score);
        }
      }
    }
    for (const [suffix, value] of Object.entries(table.lowTrust)) {
      if (!scores.has(suffix)) {
        scores.set(suffix, value);
      }
    }
    this.suffixScores = scores;

    const spam = options.spamTlds ?? Object.keys(table.lowTrust);
    this.spamTlds = new Set(
      Array.from(spam, (tld) => tld.toLowerCase().replace(/^\./, '')),
    );
    this.validatedNonprofit = new Set(table.validatedNonprofit);
    this.targetRegion = new Set(table.targetRegion);

    log.debug(
      { suffixes: this.suffixScores.size, spamTlds: this.spamTlds.size },
      'Domain credibility table loaded',
    );
  }

  /**
   * Credibility contribution of a host name, two decimals.
   * Second-level institutional suffixes are checked before the final label;
   * unknown suffixes score 0.
   */
  getSuffixScore(host: string): number {
    const labels = splitLabels(host);
    if (labels.length < 2) {
      return 0;
    }

    const secondLevel = this.secondLevel.get(lastLabels(labels, 2));
    if (secondLevel !== undefined) {
      return secondLevel;
    }

    return this.suffixScores.get(lastLabels(labels, 1)) ?? 0;
  }

  /** True when the host ends in one of the configured spam suffixes. */
  isSpamTld(host: string): boolean {
    const labels = splitLabels(host);
    if (labels.length < 2) {
      return false;
    }
    return this.spamTlds.has(lastLabels(labels, 1));
  }

  /** .ngo, .ong, .foundation, .charity */
  isValidatedNonprofit(host: string): boolean {
    return this.validatedNonprofit.has(lastLabels(splitLabels(host), 1));
  }

  /** .gov, gov.xx and europa.eu */
  isGovernmentDomain(host: string): boolean {
    const labels = splitLabels(host);
    if (labels.length < 2) {
      return false;
    }
    const secondLevel = lastLabels(labels, 2);
    return (
      lastLabels(labels, 1) === 'gov' ||
      secondLevel.startsWith('gov.') ||
      secondLevel === 'europa.eu'
    );
  }

  /** Country-code suffixes of the target region (.bg, .ro, .eu, ...). */
  isTargetRegionCcTld(host: string): boolean {
    return this.targetRegion.has(lastLabels(splitLabels(host), 1));
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function splitLabels(host: string): string[] {
  return host
    .toLowerCase()
    .replace(/\.+$/, '')
    .split('.')
    .filter((label) => label.length > 0);
}

function lastLabels(labels: readonly string[], count: number): string {
  return labels.slice(-count).join('.');
}
