/**
 * SQLite review queue for funding candidates.
 */

import { asc, count, eq } from 'drizzle-orm';
import { ulid } from 'ulid';
import type { AppDatabase } from '../db/index.js';
import { fundingCandidates, type FundingCandidateRow } from '../db/schema.js';
import type { CandidateStatus } from '../shared/constants.js';
import { CandidateCreationError, describeError } from '../shared/errors.js';
import { getLogger } from '../shared/logger.js';
import type { CandidateRequest, CandidateSink, CreatedCandidate } from './types.js';

const log = getLogger('db', { component: 'candidate-store' });

export class CandidateStore implements CandidateSink {
  constructor(private readonly db: AppDatabase) {}

  async create(request: CandidateRequest): Promise<CreatedCandidate> {
    const id = ulid();
    try {
      this.db
        .insert(fundingCandidates)
        .values({
          id,
          sessionId: request.sessionId,
          domainId: request.domainId,
          domain: request.domain,
          sourceUrl: request.sourceUrl,
          title: request.title,
          snippet: request.snippet,
          confidenceScore: request.score,
          status: 'pending_review',
          createdAt: new Date().toISOString(),
        })
        .run();
    } catch (error) {
      throw new CandidateCreationError(
        `Failed to store candidate: ${describeError(error)}`,
        request.sourceUrl,
      );
    }

    log.debug({ candidateId: id, domain: request.domain }, 'Candidate stored');
    return { id };
  }

  listBySession(sessionId: string): FundingCandidateRow[] {
    return this.db
      .select()
      .from(fundingCandidates)
      .where(eq(fundingCandidates.sessionId, sessionId))
      .orderBy(asc(fundingCandidates.createdAt), asc(fundingCandidates.id))
      .all();
  }

  countByStatus(): Record<CandidateStatus, number> {
    const rows = this.db
      .select({ status: fundingCandidates.status, total: count() })
      .from(fundingCandidates)
      .groupBy(fundingCandidates.status)
      .all();

    const counts: Record<CandidateStatus, number> = {
      pending_review: 0,
      approved: 0,
      rejected: 0,
    };
    for (const row of rows) {
      counts[row.status] = row.total;
    }
    return counts;
  }
}
