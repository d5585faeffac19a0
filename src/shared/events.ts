import { EventEmitter } from 'eventemitter3';
import type { DomainStatus } from './constants.js';

/**
 * All typed events emitted by the discovery core.
 * Keys are event names; values are the payload shape passed to listeners.
 */
export interface AppEvents {
  'domain:registered': {
    domainId: string;
    name: string;
    sessionId: string | null;
  };
  'domain:blacklisted': {
    domainId: string;
    name: string;
    reason: string;
    actorId: string;
  };
  'domain:demoted': {
    domainId: string;
    name: string;
    lowQualityCount: number;
  };
  'domain:failed': {
    domainId: string;
    name: string;
    failureCount: number;
    retryAfter: string;
  };
  'domain:no-funds': {
    domainId: string;
    name: string;
    year: number;
  };
  'candidate:created': {
    candidateId: string;
    sessionId: string;
    domain: string;
    sourceUrl: string;
    score: number;
  };
  'batch:processed': {
    sessionId: string;
    total: number;
    highConfidenceCreated: number;
    ineligibleByStatus: Partial<Record<DomainStatus, number>>;
  };
}

/**
 * Strongly-typed event emitter. Components take an emitter in their
 * options and fall back to the shared `eventBus`.
 */
export class TypedEventEmitter extends EventEmitter<AppEvents> {}

export const eventBus = new TypedEventEmitter();
