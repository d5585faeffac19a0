/**
 * Domain registry: the persistent memory of every funder domain the
 * discovery pipeline has met, its lifecycle status, and whether it should
 * be looked at again.
 *
 * Every mutation is a single read-modify-write of one record. Status
 * changes go through the pure `transition` function, eligibility through
 * `evaluateEligibility`.
 */

import { ulid } from 'ulid';
import {
  DEFAULT_FAILURE_BACKOFF_MS,
  DOMAIN_STATUSES,
  type DomainStatus,
} from '../shared/constants.js';
import { DomainNotFoundError, ValidationError, type InvalidUrlError, type OperationResult } from '../shared/errors.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import { getLogger } from '../shared/logger.js';
import { fromHundredths, isBlank, toHundredths } from '../shared/utils.js';
import { computeRetryAfter } from './backoff.js';
import { extractDomainName, normalizeDomainName } from './domain-name.js';
import type { DomainRepository } from './domain-repository.js';
import { evaluateEligibility, transition } from './transitions.js';
import type { DomainRecord, EligibilityDecision } from './types.js';

const log = getLogger('registry', { component: 'domain-registry' });

export interface DomainRegistryOptions {
  repository: DomainRepository;
  /** Clock used for every timestamp and eligibility check. */
  now?: () => Date;
  /** Retry delays after the 1st, 2nd, ... failure; the last one repeats. */
  failureBackoffMs?: readonly number[];
  /** Minimum gap between re-checks of a high-quality domain. 0 = always. */
  highQualityRecheckMs?: number;
  events?: TypedEventEmitter;
}

export class DomainRegistry {
  private readonly repository: DomainRepository;
  private readonly now: () => Date;
  private readonly failureBackoffMs: readonly number[];
  private readonly highQualityRecheckMs: number;
  private readonly events: TypedEventEmitter;

  constructor(options: DomainRegistryOptions) {
    this.repository = options.repository;
    this.now = options.now ?? (() => new Date());
    this.failureBackoffMs = options.failureBackoffMs ?? DEFAULT_FAILURE_BACKOFF_MS;
    this.highQualityRecheckMs = options.highQualityRecheckMs ?? 0;
    this.events = options.events ?? eventBus;
  }

  // -------------------------------------------------------------------------
  // Names and eligibility
  // -------------------------------------------------------------------------

  extractDomainName(url: string): OperationResult<string, InvalidUrlError> {
    return extractDomainName(url);
  }

  async checkEligibility(name: string): Promise<EligibilityDecision> {
    const domain = await this.repository.findByName(normalizeDomainName(name));
    const decision = evaluateEligibility(domain, this.now(), {
      highQualityRecheckMs: this.highQualityRecheckMs,
    });

    if (!decision.eligible) {
      log.debug(
        { domain: name, status: decision.status, reason: decision.reason, until: decision.until },
        'Domain not eligible for processing',
      );
    }
    return decision;
  }

  async shouldProcess(name: string): Promise<boolean> {
    const decision = await this.checkEligibility(name);
    return decision.eligible;
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  /**
   * Returns the existing record for `name`, or creates a DISCOVERED one
   * attributed to `sessionId`.
   */
  async registerDomain(name: string, sessionId: string | null): Promise<DomainRecord> {
    const normalized = requireName(name);
    const existing = await this.repository.findByName(normalized);
    if (existing !== null) {
      return existing;
    }

    // Another batch may have registered the name since the lookup above
    const { record, created } = await this.repository.insertIfAbsent(
      newDomainRecord(normalized, sessionId, this.now()),
    );
    if (!created) {
      return record;
    }

    log.info({ domain: record.name, domainId: record.id, sessionId }, 'Domain registered');
    this.events.emit('domain:registered', {
      domainId: record.id,
      name: record.name,
      sessionId,
    });
    return record;
  }

  /**
   * Records one scoring outcome. Unknown ids are ignored.
   */
  async updateQuality(domainId: string, score: number, isHighQuality: boolean): Promise<void> {
    if (!Number.isFinite(score) || score < 0 || score > 1) {
      throw new ValidationError('Confidence score must be between 0 and 1', 'score', score);
    }

    const domain = await this.repository.findById(domainId);
    if (domain === null) {
      log.warn({ domainId }, 'Quality update for unknown domain ignored');
      return;
    }

    const rounded = fromHundredths(toHundredths(score));
    const highQualityCount = domain.highQualityCount + (isHighQuality ? 1 : 0);
    const lowQualityCount = domain.lowQualityCount + (isHighQuality ? 0 : 1);
    const status = transition(domain.status, {
      type: 'QUALITY_RECORDED',
      highQuality: isHighQuality,
      highQualityCount,
      lowQualityCount,
    });

    const updated: DomainRecord = {
      ...domain,
      status,
      highQualityCount,
      lowQualityCount,
      bestConfidenceScore:
        domain.bestConfidenceScore === null || rounded > domain.bestConfidenceScore
          ? rounded
          : domain.bestConfidenceScore,
      processingCount: domain.processingCount + 1,
      lastProcessedAt: this.now(),
    };
    await this.repository.save(updated);

    log.debug(
      { domain: domain.name, score: rounded, isHighQuality, status },
      'Domain quality recorded',
    );

    if (status === DOMAIN_STATUSES.PROCESSED_LOW_QUALITY && domain.status !== status) {
      log.info({ domain: domain.name, lowQualityCount }, 'Domain demoted to low quality');
      this.events.emit('domain:demoted', {
        domainId: domain.id,
        name: domain.name,
        lowQualityCount,
      });
    }
  }

  /**
   * Records a technical failure and schedules the next retry. Unknown ids
   * are ignored.
   */
  async recordProcessingFailure(domainId: string, reason: string): Promise<void> {
    const domain = await this.repository.findById(domainId);
    if (domain === null) {
      log.warn({ domainId, reason }, 'Failure report for unknown domain ignored');
      return;
    }

    const now = this.now();
    const failureCount = domain.failureCount + 1;
    const retryAfter = computeRetryAfter(failureCount, now, this.failureBackoffMs);
    const status = transition(domain.status, { type: 'FAILURE_RECORDED' });

    await this.repository.save({
      ...domain,
      status,
      failureCount,
      failureReason: reason,
      retryAfter,
    });

    log.warn(
      { domain: domain.name, failureCount, retryAfter: retryAfter.toISOString(), reason },
      'Domain processing failed',
    );

    if (status === DOMAIN_STATUSES.PROCESSING_FAILED) {
      this.events.emit('domain:failed', {
        domainId: domain.id,
        name: domain.name,
        failureCount,
        retryAfter: retryAfter.toISOString(),
      });
    }
  }

  /**
   * Excludes a domain permanently, registering it first when unknown.
   * Counters and history are kept.
   */
  async blacklistDomain(name: string, reason: string, actorId: string): Promise<DomainRecord> {
    const normalized = requireName(name);
    const now = this.now();
    const domain =
      (await this.repository.findByName(normalized)) ?? newDomainRecord(normalized, null, now);

    const updated = await this.repository.save({
      ...domain,
      status: transition(domain.status, { type: 'BLACKLISTED' }),
      blacklistReason: reason,
      blacklistedBy: actorId,
      blacklistedAt: now,
    });

    log.info({ domain: updated.name, reason, actorId }, 'Domain blacklisted');
    this.events.emit('domain:blacklisted', {
      domainId: updated.id,
      name: updated.name,
      reason,
      actorId,
    });
    return updated;
  }

  /**
   * Marks a funder as out of money for `year`. The domain must exist.
   */
  async markNoFundsThisYear(
    name: string,
    year: number,
    reason: string,
  ): Promise<OperationResult<DomainRecord, DomainNotFoundError | ValidationError>> {
    if (!Number.isInteger(year)) {
      return {
        success: false,
        error: new ValidationError('Year must be an integer', 'year', year),
      };
    }

    const normalized = normalizeDomainName(name);
    const domain = await this.repository.findByName(normalized);
    if (domain === null) {
      return { success: false, error: new DomainNotFoundError(normalized) };
    }

    const status = transition(domain.status, { type: 'NO_FUNDS_MARKED' });
    const updated = await this.repository.save({
      ...domain,
      status,
      noFundsYear: year,
      noFundsReason: reason,
    });

    log.info({ domain: updated.name, year, reason, status }, 'Domain marked as out of funds');
    if (status === DOMAIN_STATUSES.NO_FUNDS_THIS_YEAR) {
      this.events.emit('domain:no-funds', { domainId: updated.id, name: updated.name, year });
    }
    return { success: true, value: updated };
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  findByName(name: string): Promise<DomainRecord | null> {
    return this.repository.findByName(normalizeDomainName(name));
  }

  findById(id: string): Promise<DomainRecord | null> {
    return this.repository.findById(id);
  }

  listBlacklisted(): Promise<DomainRecord[]> {
    return this.repository.findByStatus(DOMAIN_STATUSES.BLACKLISTED);
  }

  /** Failed domains whose backoff has elapsed. */
  listReadyForRetry(): Promise<DomainRecord[]> {
    return this.repository.findReadyForRetry(this.now());
  }

  listBySession(sessionId: string): Promise<DomainRecord[]> {
    return this.repository.findBySession(sessionId);
  }

  /**
   * High-quality domains with at least `minCandidates` high-confidence
   * outcomes, most productive first.
   */
  async listHighQuality(minCandidates = 1): Promise<DomainRecord[]> {
    const domains = await this.repository.findByStatus(DOMAIN_STATUSES.PROCESSED_HIGH_QUALITY);
    return domains
      .filter((domain) => domain.highQualityCount >= minCandidates)
      .sort(
        (a, b) =>
          b.highQualityCount - a.highQualityCount ||
          (b.bestConfidenceScore ?? 0) - (a.bestConfidenceScore ?? 0) ||
          a.name.localeCompare(b.name),
      );
  }

  countByStatus(): Promise<Record<DomainStatus, number>> {
    return this.repository.countByStatus();
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function requireName(name: string): string {
  const normalized = normalizeDomainName(name);
  if (isBlank(normalized)) {
    throw new ValidationError('Domain name must not be blank', 'name', name);
  }
  return normalized;
}

function newDomainRecord(name: string, sessionId: string | null, now: Date): DomainRecord {
  return {
    id: ulid(),
    name,
    status: DOMAIN_STATUSES.DISCOVERED,
    discoverySessionId: sessionId,
    discoveredAt: now,
    lastProcessedAt: null,
    processingCount: 0,
    bestConfidenceScore: null,
    highQualityCount: 0,
    lowQualityCount: 0,
    blacklistReason: null,
    blacklistedBy: null,
    blacklistedAt: null,
    noFundsYear: null,
    noFundsReason: null,
    notes: null,
    failureCount: 0,
    failureReason: null,
    retryAfter: null,
  };
}
