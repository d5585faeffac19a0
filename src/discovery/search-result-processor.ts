/**
 * Search-result processing pipeline.
 *
 * Takes one batch of raw search hits for a discovery session and runs each
 * through: domain extraction -> spam filter (suffix, then content) ->
 * batch dedup -> registry eligibility -> confidence scoring -> threshold gate. High
 * confidence hits become review candidates; every scored hit is reported
 * back to the domain registry as quality history.
 *
 * Errors never escape `process()`: they are folded into the returned
 * statistics and logged with the stage, URL and reason. A result whose
 * candidate was created still counts as high confidence when the quality
 * update after it fails.
 */

import { CONFIDENCE_THRESHOLD } from '../shared/constants.js';
import { describeError } from '../shared/errors.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import { getSessionLogger, type Logger } from '../shared/logger.js';
import type { DomainRegistry } from '../registry/domain-registry.js';
import type { DomainRecord } from '../registry/types.js';
import { ConfidenceScorer } from '../scoring/confidence-scorer.js';
import { ContentSpamDetector } from '../scoring/content-spam.js';
import { DomainCredibilityService } from '../scoring/domain-credibility.js';
import {
  countResult,
  createContext,
  dedupStage,
  eligibilityStage,
  extractStage,
  gateStage,
  recordOutcome,
  spamStage,
  toStatistics,
  type ProcessingContext,
  type StageResult,
} from './processing-context.js';
import type { CandidateSink, ProcessingStatistics, SearchResult } from './types.js';

export interface SearchResultProcessorOptions {
  registry: DomainRegistry;
  candidates: CandidateSink;
  scorer?: ConfidenceScorer;
  /** Supplies the spam-suffix check. */
  credibility?: DomainCredibilityService;
  /** Title and snippet checks run after the suffix check. */
  contentSpam?: ContentSpamDetector;
  /** Minimum score for candidate creation. */
  threshold?: number;
  events?: TypedEventEmitter;
}

type FailureStage = 'eligibility' | 'register' | 'candidate' | 'quality';

export class SearchResultProcessor {
  private readonly registry: DomainRegistry;
  private readonly candidates: CandidateSink;
  private readonly scorer: ConfidenceScorer;
  private readonly credibility: DomainCredibilityService;
  private readonly contentSpam: ContentSpamDetector;
  private readonly threshold: number;
  private readonly events: TypedEventEmitter;

  constructor(options: SearchResultProcessorOptions) {
    this.registry = options.registry;
    this.candidates = options.candidates;
    this.credibility = options.credibility ?? new DomainCredibilityService();
    this.scorer = options.scorer ?? new ConfidenceScorer({ credibility: this.credibility });
    this.contentSpam = options.contentSpam ?? new ContentSpamDetector();
    this.threshold = options.threshold ?? CONFIDENCE_THRESHOLD;
    this.events = options.events ?? eventBus;
  }

  /**
   * Processes one batch. Results are handled one at a time, in order.
   */
  async process(results: readonly SearchResult[], sessionId: string): Promise<ProcessingStatistics> {
    const log = getSessionLogger('discovery', sessionId);
    const startedAt = Date.now();
    let context = createContext(sessionId);

    log.info({ results: results.length }, 'Processing search result batch');

    for (const result of results) {
      context = await this.processOne(result, countResult(context), log);
    }

    const stats = toStatistics(context, Date.now() - startedAt);

    log.info(
      {
        total: stats.total,
        highConfidence: stats.highConfidenceCreated,
        lowConfidence: stats.lowConfidenceCreated,
        spamFiltered: stats.spamFiltered,
        duplicateSkipped: stats.duplicateSkipped,
        ineligibleSkipped: stats.blacklistSkipped,
        invalidUrlSkipped: stats.invalidUrlSkipped,
        processingFailed: stats.processingFailed,
        durationMs: stats.durationMs,
      },
      'Search result batch processed',
    );
    this.events.emit('batch:processed', {
      sessionId,
      total: stats.total,
      highConfidenceCreated: stats.highConfidenceCreated,
      ineligibleByStatus: stats.ineligibleByStatus,
    });

    return stats;
  }

  // -------------------------------------------------------------------------
  // Per-result pipeline
  // -------------------------------------------------------------------------

  private async processOne(
    result: SearchResult,
    context: ProcessingContext,
    log: Logger,
  ): Promise<ProcessingContext> {
    // 1-3: cheap, local checks
    let stage: StageResult = extractStage(this.registry.extractDomainName(result.url), context);
    if (stage.proceed) {
      stage = spamStage(stage.domain, this.spamReason(stage.domain, result), stage.context);
    }
    if (stage.proceed) {
      stage = dedupStage(stage.domain, stage.context);
    }
    if (!stage.proceed) {
      return skip(stage, result, log);
    }

    // 4: registry eligibility
    const domain = stage.domain;
    context = stage.context;
    try {
      const decision = await this.registry.checkEligibility(domain);
      stage = eligibilityStage(domain, decision, context);
    } catch (error) {
      return this.fail(context, 'eligibility', result, domain, null, error, log);
    }
    if (!stage.proceed) {
      return skip(stage, result, log);
    }
    context = stage.context;

    // 5-6: score and gate
    const score = this.scorer.score(result);
    const band = gateStage(score, this.threshold);

    let record: DomainRecord;
    try {
      record = await this.registry.registerDomain(domain, context.sessionId);
    } catch (error) {
      return this.fail(context, 'register', result, domain, null, error, log);
    }

    if (band === 'high') {
      try {
        const candidate = await this.candidates.create({
          sessionId: context.sessionId,
          domainId: record.id,
          domain,
          sourceUrl: result.url,
          title: result.title ?? null,
          snippet: result.snippet ?? null,
          score,
        });
        log.info({ domain, url: result.url, score, candidateId: candidate.id }, 'Candidate created');
        this.events.emit('candidate:created', {
          candidateId: candidate.id,
          sessionId: context.sessionId,
          domain,
          sourceUrl: result.url,
          score,
        });
      } catch (error) {
        return this.fail(context, 'candidate', result, domain, record, error, log);
      }
    } else {
      log.debug({ domain, url: result.url, score }, 'Below confidence threshold');
    }

    try {
      await this.registry.updateQuality(record.id, score, band === 'high');
    } catch (error) {
      if (band === 'low') {
        return this.fail(context, 'quality', result, domain, record, error, log);
      }
      // The candidate is already delivered; only the quality history is lost
      log.error(
        { stage: 'quality', url: result.url, domain, reason: describeError(error), err: error },
        'Quality update failed after candidate creation',
      );
    }

    return recordOutcome(context, band);
  }

  private spamReason(domain: string, result: SearchResult): string | null {
    if (this.credibility.isSpamTld(domain)) {
      return 'low-trust-suffix: domain suffix is on the spam list';
    }
    const analysis = this.contentSpam.analyze(domain, result);
    return analysis.spam ? analysis.reason : null;
  }

  private async fail(
    context: ProcessingContext,
    stage: FailureStage,
    result: SearchResult,
    domain: string,
    record: DomainRecord | null,
    error: unknown,
    log: Logger,
  ): Promise<ProcessingContext> {
    const reason = describeError(error);
    log.error({ stage, url: result.url, domain, reason, err: error }, 'Search result processing failed');

    if (record !== null) {
      try {
        await this.registry.recordProcessingFailure(record.id, `${stage}: ${reason}`);
      } catch (reportError) {
        log.error(
          { domain, err: reportError },
          'Could not record processing failure on domain',
        );
      }
    }
    return recordOutcome(context, 'failed');
  }
}

function skip(
  stage: Extract<StageResult, { proceed: false }>,
  result: SearchResult,
  log: Logger,
): ProcessingContext {
  const fields = { stage: stage.stage, url: result.url, reason: stage.reason };
  if (stage.stage === 'extract') {
    log.warn(fields, 'Search result skipped');
  } else {
    log.debug(fields, 'Search result skipped');
  }
  return stage.context;
}
