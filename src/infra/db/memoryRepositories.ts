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

/**
 * Process-local article store for dry runs (`STORE_PROVIDER=memory`) and tests.
 */
export class InMemoryArticleRepository implements ArticleRepositoryPort {
  private readonly articles = new Map<string, ArticleEntity>();

  async exists(url: string): Promise<boolean> {
    return this.articles.has(url);
  }

  async upsert(article: ArticleEntity): Promise<UpsertOutcome> {
    const existing = this.articles.get(article.url) ?? null;
    const outcome = decideUpsert(existing, article);
    if (outcome !== "unchanged") {
      this.articles.set(article.url, { ...article });
    }
    return outcome;
  }

  async listRecent(since: Date, limit: number): Promise<ArticleEntity[]> {
    return [...this.articles.values()]
      .filter((article) => article.fetchedAt.getTime() >= since.getTime())
      .sort(
        (left, right) => right.fetchedAt.getTime() - left.fetchedAt.getTime(),
      )
      .slice(0, limit);
  }

  get(url: string): ArticleEntity | undefined {
    return this.articles.get(url);
  }

  count(): number {
    return this.articles.size;
  }
}

export class InMemoryRunRepository implements RunRepositoryPort {
  private readonly runs = new Map<string, RunSummaryEntity>();

  async record(summary: RunSummaryEntity): Promise<void> {
    this.runs.set(summary.runId, { ...summary });
  }

  async latest(limit: number): Promise<RunSummaryEntity[]> {
    return [...this.runs.values()]
      .sort(
        (left, right) => right.startedAt.getTime() - left.startedAt.getTime(),
      )
      .slice(0, limit);
  }
}
