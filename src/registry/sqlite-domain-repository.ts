/**
 * SQLite-backed domain repository (drizzle-orm over better-sqlite3).
 *
 * Timestamps are stored as ISO-8601 text, which keeps lexical and
 * chronological order identical for the retry query.
 */

import { and, asc, count, eq, isNotNull, lte } from 'drizzle-orm';
import type { AppDatabase } from '../db/index.js';
import { domains, type DomainRow, type NewDomainRow } from '../db/schema.js';
import { DOMAIN_STATUSES, type DomainStatus } from '../shared/constants.js';
import { getLogger } from '../shared/logger.js';
import { emptyStatusCounts, type DomainRepository, type InsertResult } from './domain-repository.js';
import type { DomainRecord } from './types.js';

const log = getLogger('db', { component: 'domain-repository' });

export class SqliteDomainRepository implements DomainRepository {
  constructor(private readonly db: AppDatabase) {}

  async findByName(name: string): Promise<DomainRecord | null> {
    const row = this.db.select().from(domains).where(eq(domains.name, name)).get();
    return row === undefined ? null : toRecord(row);
  }

  async findById(id: string): Promise<DomainRecord | null> {
    const row = this.db.select().from(domains).where(eq(domains.id, id)).get();
    return row === undefined ? null : toRecord(row);
  }

  async save(domain: DomainRecord): Promise<DomainRecord> {
    const values = toRow(domain);
    const { id: _id, ...changes } = values;

    this.db
      .insert(domains)
      .values(values)
      .onConflictDoUpdate({
        target: domains.id,
        set: { ...changes, updatedAt: new Date().toISOString() },
      })
      .run();

    log.trace({ domainId: domain.id, status: domain.status }, 'Domain saved');
    return domain;
  }

  async insertIfAbsent(domain: DomainRecord): Promise<InsertResult> {
    const result = this.db
      .insert(domains)
      .values(toRow(domain))
      .onConflictDoNothing({ target: domains.name })
      .run();

    const row = this.db.select().from(domains).where(eq(domains.name, domain.name)).get();
    if (row === undefined) {
      throw new Error(`Domain row missing after insert: ${domain.name}`);
    }
    return { record: toRecord(row), created: result.changes > 0 };
  }

  async findByStatus(status: DomainStatus): Promise<DomainRecord[]> {
    return this.db
      .select()
      .from(domains)
      .where(eq(domains.status, status))
      .orderBy(asc(domains.name))
      .all()
      .map(toRecord);
  }

  async findBySession(sessionId: string): Promise<DomainRecord[]> {
    return this.db
      .select()
      .from(domains)
      .where(eq(domains.discoverySessionId, sessionId))
      .orderBy(asc(domains.name))
      .all()
      .map(toRecord);
  }

  async findReadyForRetry(now: Date): Promise<DomainRecord[]> {
    return this.db
      .select()
      .from(domains)
      .where(
        and(
          eq(domains.status, DOMAIN_STATUSES.PROCESSING_FAILED),
          isNotNull(domains.retryAfter),
          lte(domains.retryAfter, now.toISOString()),
        ),
      )
      .orderBy(asc(domains.name))
      .all()
      .map(toRecord);
  }

  async countByStatus(): Promise<Record<DomainStatus, number>> {
    const rows = this.db
      .select({ status: domains.status, total: count() })
      .from(domains)
      .groupBy(domains.status)
      .all();

    const counts = emptyStatusCounts();
    for (const row of rows) {
      counts[row.status] = row.total;
    }
    return counts;
  }
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toRow(domain: DomainRecord): NewDomainRow {
  return {
    id: domain.id,
    name: domain.name,
    status: domain.status,
    discoverySessionId: domain.discoverySessionId,
    discoveredAt: domain.discoveredAt.toISOString(),
    lastProcessedAt: toIso(domain.lastProcessedAt),
    processingCount: domain.processingCount,
    bestConfidenceScore: domain.bestConfidenceScore,
    highQualityCount: domain.highQualityCount,
    lowQualityCount: domain.lowQualityCount,
    blacklistReason: domain.blacklistReason,
    blacklistedBy: domain.blacklistedBy,
    blacklistedAt: toIso(domain.blacklistedAt),
    noFundsYear: domain.noFundsYear,
    noFundsReason: domain.noFundsReason,
    notes: domain.notes,
    failureCount: domain.failureCount,
    failureReason: domain.failureReason,
    retryAfter: toIso(domain.retryAfter),
  };
}

function toRecord(row: DomainRow): DomainRecord {
  return {
    id: row.id,
    name: row.name,
    status: row.status,
    discoverySessionId: row.discoverySessionId,
    discoveredAt: new Date(row.discoveredAt),
    lastProcessedAt: fromIso(row.lastProcessedAt),
    processingCount: row.processingCount,
    bestConfidenceScore: row.bestConfidenceScore,
    highQualityCount: row.highQualityCount,
    lowQualityCount: row.lowQualityCount,
    blacklistReason: row.blacklistReason,
    blacklistedBy: row.blacklistedBy,
    blacklistedAt: fromIso(row.blacklistedAt),
    noFundsYear: row.noFundsYear,
    noFundsReason: row.noFundsReason,
    notes: row.notes,
    failureCount: row.failureCount,
    failureReason: row.failureReason,
    retryAfter: fromIso(row.retryAfter),
  };
}

function toIso(date: Date | null): string | null {
  return date === null ? null : date.toISOString();
}

function fromIso(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}
