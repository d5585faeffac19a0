import { DOMAIN_STATUSES, type DomainStatus } from '../shared/constants.js';
import { emptyStatusCounts, type DomainRepository, type InsertResult } from './domain-repository.js';
import type { DomainRecord } from './types.js';

/**
 * Map-backed repository for tests and dry runs. Records are copied on the
 * way in and out so callers never share state with the store.
 */
export class InMemoryDomainRepository implements DomainRepository {
  private readonly byId = new Map<string, DomainRecord>();
  private readonly idByName = new Map<string, string>();

  async findByName(name: string): Promise<DomainRecord | null> {
    const id = this.idByName.get(name);
    return id === undefined ? null : this.findById(id);
  }

  async findById(id: string): Promise<DomainRecord | null> {
    const record = this.byId.get(id);
    return record === undefined ? null : structuredClone(record);
  }

  async save(domain: DomainRecord): Promise<DomainRecord> {
    const existingId = this.idByName.get(domain.name);
    if (existingId !== undefined && existingId !== domain.id) {
      throw new Error(`Domain name already taken: ${domain.name}`);
    }
    this.byId.set(domain.id, structuredClone(domain));
    this.idByName.set(domain.name, domain.id);
    return structuredClone(domain);
  }

  // Check and insert run without yielding, like a single SQL statement
  async insertIfAbsent(domain: DomainRecord): Promise<InsertResult> {
    const existingId = this.idByName.get(domain.name);
    const existing = existingId === undefined ? undefined : this.byId.get(existingId);
    if (existing !== undefined) {
      return { record: structuredClone(existing), created: false };
    }
    this.byId.set(domain.id, structuredClone(domain));
    this.idByName.set(domain.name, domain.id);
    return { record: structuredClone(domain), created: true };
  }

  async findByStatus(status: DomainStatus): Promise<DomainRecord[]> {
    return this.select((record) => record.status === status);
  }

  async findBySession(sessionId: string): Promise<DomainRecord[]> {
    return this.select((record) => record.discoverySessionId === sessionId);
  }

  async findReadyForRetry(now: Date): Promise<DomainRecord[]> {
    return this.select(
      (record) =>
        record.status === DOMAIN_STATUSES.PROCESSING_FAILED &&
        record.retryAfter !== null &&
        record.retryAfter.getTime() <= now.getTime(),
    );
  }

  async countByStatus(): Promise<Record<DomainStatus, number>> {
    const counts = emptyStatusCounts();
    for (const record of this.byId.values()) {
      counts[record.status]++;
    }
    return counts;
  }

  /** Number of stored records. */
  get size(): number {
    return this.byId.size;
  }

  private select(predicate: (record: DomainRecord) => boolean): DomainRecord[] {
    return Array.from(this.byId.values())
      .filter(predicate)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((record) => structuredClone(record));
  }
}
