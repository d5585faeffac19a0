import type { AppDatabase } from './db/index.js';
import type { CoreSettings } from './env.js';
import { CandidateStore, SearchResultProcessor } from './discovery/index.js';
import { DomainRegistry, SqliteDomainRepository } from './registry/index.js';
import { ConfidenceScorer, ContentSpamDetector, DomainCredibilityService } from './scoring/index.js';
import { eventBus, type TypedEventEmitter } from './shared/events.js';

export interface DiscoveryCore {
  registry: DomainRegistry;
  processor: SearchResultProcessor;
  candidates: CandidateStore;
}

/**
 * Wires the registry, scorer and pipeline onto one SQLite database.
 */
export function createDiscoveryCore(
  db: AppDatabase,
  settings: CoreSettings,
  events: TypedEventEmitter = eventBus,
): DiscoveryCore {
  const registry = new DomainRegistry({
    repository: new SqliteDomainRepository(db),
    failureBackoffMs: settings.failureBackoffMs,
    highQualityRecheckMs: settings.highQualityRecheckMs,
    events,
  });
  const credibility = new DomainCredibilityService(
    settings.spamTlds === undefined ? {} : { spamTlds: settings.spamTlds },
  );
  const candidates = new CandidateStore(db);
  const processor = new SearchResultProcessor({
    registry,
    candidates,
    credibility,
    contentSpam: new ContentSpamDetector({ indicators: settings.contentSpamIndicators }),
    scorer: new ConfidenceScorer({ credibility }),
    threshold: settings.confidenceThreshold,
    events,
  });

  return { registry, processor, candidates };
}
