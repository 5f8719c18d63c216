import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import { logger } from "../../shared/logger/logger";

/**
 * Builds both the typed ORM and the raw SQL client over one connection pool.
 * The pipeline is sequential, so a single connection is enough.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, {
    max: 1,
    onnotice: (notice) =>
      logger.debug({ notice: notice.message }, "Postgres notice"),
  });
  const db = drizzle(sql);
  return { db, sql };
};

/**
 * Creates tables and indexes when missing. Safe to run on every start.
 */
export const ensureSchema = async (sql: postgres.Sql<{}>): Promise<void> => {
  await sql`
    CREATE TABLE IF NOT EXISTS articles (
      url TEXT PRIMARY KEY,
      final_url TEXT NOT NULL,
      title TEXT NOT NULL,
      source TEXT NOT NULL,
      published TEXT NOT NULL,
      domain TEXT NOT NULL,
      fetched_at TIMESTAMPTZ NOT NULL,
      extracted_chars INTEGER NOT NULL,
      content_hash TEXT NOT NULL,
      text TEXT NOT NULL
    )
  `;
  await sql`CREATE INDEX IF NOT EXISTS idx_articles_fetched_at ON articles (fetched_at)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_articles_source ON articles (source)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_articles_domain ON articles (domain)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_articles_hash ON articles (content_hash)`;
  await sql`
    CREATE TABLE IF NOT EXISTS runs (
      run_id TEXT PRIMARY KEY,
      started_at TIMESTAMPTZ NOT NULL,
      finished_at TIMESTAMPTZ NOT NULL,
      total_candidates INTEGER NOT NULL,
      stored_new INTEGER NOT NULL,
      stored_updated INTEGER NOT NULL,
      skipped_existing INTEGER NOT NULL,
      extract_ok INTEGER NOT NULL
    )
  `;
};
