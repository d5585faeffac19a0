export { DomainRegistry, type DomainRegistryOptions } from './domain-registry.js';
export { extractDomainName, normalizeDomainName } from './domain-name.js';
export { evaluateEligibility, transition } from './transitions.js';
export { backoffDelayMs, computeRetryAfter } from './backoff.js';
export { emptyStatusCounts, type DomainRepository, type InsertResult } from './domain-repository.js';
export { InMemoryDomainRepository } from './in-memory-domain-repository.js';
export { SqliteDomainRepository } from './sqlite-domain-repository.js';
export type {
  DomainEvent,
  DomainRecord,
  DomainStatus,
  EligibilityDecision,
  EligibilityPolicy,
  IneligibleReason,
} from './types.js';
