import type { ArticleEntity, UpsertOutcome } from "../entities/article";
import type { ProbeRow, RunSummaryEntity } from "../entities/run";

export interface ArticleRepositoryPort {
  exists(url: string): Promise<boolean>;
  upsert(article: ArticleEntity): Promise<UpsertOutcome>;
  listRecent(since: Date, limit: number): Promise<ArticleEntity[]>;
}

export interface RunRepositoryPort {
  record(summary: RunSummaryEntity): Promise<void>;
  latest(limit: number): Promise<RunSummaryEntity[]>;
}

export interface ArtifactWriterPort {
  writeProbe(rows: ProbeRow[]): Promise<string>;
  writeSite(html: string): Promise<string>;
}

export interface ClockPort {
  now(): Date;
}
