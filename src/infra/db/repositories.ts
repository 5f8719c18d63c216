import { desc, eq, gte, sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type {
  ArticleEntity,
  UpsertOutcome,
} from "../../core/entities/article";
import type { RunSummaryEntity } from "../../core/entities/run";
import type {
  ArticleRepositoryPort,
  RunRepositoryPort,
} from "../../core/ports/outboundPorts";
import { decideUpsert } from "../../core/policies/upsertPolicy";
import { articlesTable, runsTable } from "./schema";

/**
 * URL-keyed article store. The read-then-write upsert runs in one
 * transaction; nothing else writes concurrently.
 */
export class PostgresArticleRepositoryService implements ArticleRepositoryPort {
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async exists(url: string): Promise<boolean> {
    const rows = await this.db
      .select({ url: articlesTable.url })
      .from(articlesTable)
      .where(eq(articlesTable.url, url))
      .limit(1);

    return rows.length > 0;
  }

  async upsert(article: ArticleEntity): Promise<UpsertOutcome> {
    return this.db.transaction(async (tx) => {
      const [existing] = await tx
        .select({
          contentHash: articlesTable.contentHash,
          extractedChars: articlesTable.extractedChars,
        })
        .from(articlesTable)
        .where(eq(articlesTable.url, article.url))
        .limit(1);

      const outcome = decideUpsert(existing ?? null, article);

      if (outcome === "new") {
        await tx.insert(articlesTable).values(article);
      } else if (outcome === "updated") {
        const { url, ...mutable } = article;
        await tx
          .update(articlesTable)
          .set(mutable)
          .where(eq(articlesTable.url, url));
      }

      return outcome;
    });
  }

  async listRecent(since: Date, limit: number): Promise<ArticleEntity[]> {
    return this.db
      .select()
      .from(articlesTable)
      .where(gte(articlesTable.fetchedAt, since))
      .orderBy(desc(articlesTable.fetchedAt))
      .limit(limit);
  }
}

/**
 * One row per pipeline execution; a retried write of the same run id replaces it.
 */
export class PostgresRunRepositoryService implements RunRepositoryPort {
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async record(summary: RunSummaryEntity): Promise<void> {
    await this.db
      .insert(runsTable)
      .values(summary)
      .onConflictDoUpdate({
        target: runsTable.runId,
        set: {
          startedAt: sql`excluded.started_at`,
          finishedAt: sql`excluded.finished_at`,
          totalCandidates: sql`excluded.total_candidates`,
          storedNew: sql`excluded.stored_new`,
          storedUpdated: sql`excluded.stored_updated`,
          skippedExisting: sql`excluded.skipped_existing`,
          extractOk: sql`excluded.extract_ok`,
        },
      });
  }

  async latest(limit: number): Promise<RunSummaryEntity[]> {
    return this.db
      .select()
      .from(runsTable)
      .orderBy(desc(runsTable.startedAt))
      .limit(limit);
  }
}
