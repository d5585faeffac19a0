import type { DomainStatus } from '../shared/constants.js';
import type { DomainRecord } from './types.js';

/**
 * Persistence contract for domain records.
 *
 * Lookups return `null` on a miss. `save` inserts or replaces the record
 * keyed by `id`; `name` is unique across records.
 */
export interface DomainRepository {
  findByName(name: string): Promise<DomainRecord | null>;
  findById(id: string): Promise<DomainRecord | null>;
  save(domain: DomainRecord): Promise<DomainRecord>;
  /**
   * Stores `domain` unless a record with the same name exists, in which
   * case that record is returned untouched.
   */
  insertIfAbsent(domain: DomainRecord): Promise<InsertResult>;
  findByStatus(status: DomainStatus): Promise<DomainRecord[]>;
  findBySession(sessionId: string): Promise<DomainRecord[]>;
  /** PROCESSING_FAILED records whose retryAfter is at or before `now`. */
  findReadyForRetry(now: Date): Promise<DomainRecord[]>;
  countByStatus(): Promise<Record<DomainStatus, number>>;
}

export interface InsertResult {
  record: DomainRecord;
  created: boolean;
}

export function emptyStatusCounts(): Record<DomainStatus, number> {
  return {
    DISCOVERED: 0,
    PROCESSING: 0,
    PROCESSED_HIGH_QUALITY: 0,
    PROCESSED_LOW_QUALITY: 0,
    NO_FUNDS_THIS_YEAR: 0,
    PROCESSING_FAILED: 0,
    BLACKLISTED: 0,
  };
}
