import {
  index,
  integer,
  pgTable,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

export const articlesTable = pgTable(
  "articles",
  {
    url: text("url").primaryKey(),
    finalUrl: text("final_url").notNull(),
    title: text("title").notNull(),
    source: text("source").notNull(),
    published: text("published").notNull(),
    domain: text("domain").notNull(),
    fetchedAt: timestamp("fetched_at", { withTimezone: true }).notNull(),
    extractedChars: integer("extracted_chars").notNull(),
    contentHash: text("content_hash").notNull(),
    text: text("text").notNull(),
  },
  (table) => ({
    fetchedAtIdx: index("idx_articles_fetched_at").on(table.fetchedAt),
    sourceIdx: index("idx_articles_source").on(table.source),
    domainIdx: index("idx_articles_domain").on(table.domain),
    contentHashIdx: index("idx_articles_hash").on(table.contentHash),
  }),
);

export const runsTable = pgTable("runs", {
  runId: text("run_id").primaryKey(),
  startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
  finishedAt: timestamp("finished_at", { withTimezone: true }).notNull(),
  totalCandidates: integer("total_candidates").notNull(),
  storedNew: integer("stored_new").notNull(),
  storedUpdated: integer("stored_updated").notNull(),
  skippedExisting: integer("skipped_existing").notNull(),
  extractOk: integer("extract_ok").notNull(),
});
