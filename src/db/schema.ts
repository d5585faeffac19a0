import {
  sqliteTable,
  text,
  integer,
  real,
  index,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";
import {
  CANDIDATE_STATUS_VALUES,
  DOMAIN_STATUS_VALUES,
} from "../shared/constants.js";

// ---------------------------------------------------------------------------
// Helper: current-timestamp default
// ---------------------------------------------------------------------------
const currentTimestamp = sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;

// ---------------------------------------------------------------------------
// domains
// ---------------------------------------------------------------------------
export const domains = sqliteTable(
  "domains",
  {
    id: text("id").primaryKey(), // ULID
    name: text("name").notNull(),
    status: text("status", { enum: DOMAIN_STATUS_VALUES })
      .default("DISCOVERED")
      .notNull(),
    discoverySessionId: text("discovery_session_id"),
    discoveredAt: text("discovered_at").notNull(), // ISO-8601
    lastProcessedAt: text("last_processed_at"),
    processingCount: integer("processing_count").default(0).notNull(),
    bestConfidenceScore: real("best_confidence_score"),
    highQualityCount: integer("high_quality_count").default(0).notNull(),
    lowQualityCount: integer("low_quality_count").default(0).notNull(),
    blacklistReason: text("blacklist_reason"),
    blacklistedBy: text("blacklisted_by"),
    blacklistedAt: text("blacklisted_at"),
    noFundsYear: integer("no_funds_year"),
    noFundsReason: text("no_funds_reason"),
    notes: text("notes"),
    failureCount: integer("failure_count").default(0).notNull(),
    failureReason: text("failure_reason"),
    retryAfter: text("retry_after"),
    createdAt: text("created_at").default(currentTimestamp).notNull(),
    updatedAt: text("updated_at").default(currentTimestamp).notNull(),
  },
  (table) => [
    uniqueIndex("idx_domains_name").on(table.name),
    index("idx_domains_status").on(table.status),
    index("idx_domains_session").on(table.discoverySessionId),
    index("idx_domains_retry_after").on(table.retryAfter),
  ],
);

// ---------------------------------------------------------------------------
// funding_candidates
// ---------------------------------------------------------------------------
export const fundingCandidates = sqliteTable(
  "funding_candidates",
  {
    id: text("id").primaryKey(), // ULID
    sessionId: text("session_id").notNull(),
    domainId: text("domain_id")
      .notNull()
      .references(() => domains.id, { onDelete: "cascade" }),
    domain: text("domain").notNull(),
    sourceUrl: text("source_url").notNull(),
    title: text("title"),
    snippet: text("snippet"),
    confidenceScore: real("confidence_score").notNull(),
    status: text("status", { enum: CANDIDATE_STATUS_VALUES })
      .default("pending_review")
      .notNull(),
    createdAt: text("created_at").default(currentTimestamp).notNull(),
  },
  (table) => [
    index("idx_candidates_session").on(table.sessionId),
    index("idx_candidates_domain").on(table.domainId),
    index("idx_candidates_status").on(table.status),
  ],
);

export type DomainRow = typeof domains.$inferSelect;
export type NewDomainRow = typeof domains.$inferInsert;
export type FundingCandidateRow = typeof fundingCandidates.$inferSelect;
export type NewFundingCandidateRow = typeof fundingCandidates.$inferInsert;
