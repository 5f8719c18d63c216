import type {
  ArticleRepositoryPort,
  RunRepositoryPort,
} from "../../core/ports/outboundPorts";
import { TopicFilter } from "../../core/policies/topicFilter";
import { createDb, ensureSchema } from "../../infra/db/client";
import {
  InMemoryArticleRepository,
  InMemoryRunRepository,
} from "../../infra/db/memoryRepositories";
import {
  PostgresArticleRepositoryService,
  PostgresRunRepositoryService,
} from "../../infra/db/repositories";
import { ReadabilityExtractor } from "../../infra/extraction/readabilityExtractor";
import { HttpPageClient } from "../../infra/http/httpPageClient";
import { FileArtifactWriter } from "../../infra/output/fileArtifactWriter";
import { ListingPageDiscoverer } from "../../infra/providers/listing/listingPageDiscoverer";
import { RssFeedDiscoverer } from "../../infra/providers/rss/rssFeedDiscoverer";
import { SourceLinkDiscoverer } from "../../infra/providers/sourceLinkDiscoverer";
import { SystemClock } from "../../infra/system/systemPorts";
import {
  env,
  pipelineSettings,
  siteSettings,
} from "../../shared/config/env";
import { SOURCES } from "../../shared/config/sources";
import { loadTopicKeywords } from "../../shared/config/topic";
import { logger } from "../../shared/logger/logger";
import { IngestionService } from "../services/ingestionService";
import { SiteService } from "../services/siteService";

type Stores = {
  articleRepo: ArticleRepositoryPort;
  runRepo: RunRepositoryPort;
  close: () => Promise<void>;
};

/**
 * Opens the configured store. Postgres tables are created on first use.
 */
const createStores = async (): Promise<Stores> => {
  if (env.STORE_PROVIDER === "memory") {
    logger.warn("Using in-memory store; nothing persists after this process");
    return {
      articleRepo: new InMemoryArticleRepository(),
      runRepo: new InMemoryRunRepository(),
      close: () => Promise.resolve(),
    };
  }

  const { db, sql } = createDb(env.POSTGRES_URL);
  await ensureSchema(sql);

  return {
    articleRepo: new PostgresArticleRepositoryService(db),
    runRepo: new PostgresRunRepositoryService(db),
    close: () => sql.end(),
  };
};

/**
 * Centralizes runtime wiring so every CLI command shares one composition root.
 */
export const createRuntime = async () => {
  const { articleRepo, runRepo, close } = await createStores();

  const clock = new SystemClock();
  const topic = new TopicFilter(loadTopicKeywords());
  const writer = new FileArtifactWriter(env.OUTPUT_DIR, env.SITE_DIR);

  const fetcher = new HttpPageClient({
    userAgent: env.HTTP_USER_AGENT,
    acceptLanguage: env.HTTP_ACCEPT_LANGUAGE,
    timeoutMs: env.HTTP_TIMEOUT_MS,
  });
  const discoverer = new SourceLinkDiscoverer({
    feed: new RssFeedDiscoverer(fetcher),
    listing: new ListingPageDiscoverer(fetcher),
  });

  const siteService = new SiteService(
    articleRepo,
    topic,
    writer,
    clock,
    siteSettings(),
  );
  const ingestionService = new IngestionService(
    SOURCES,
    discoverer,
    fetcher,
    new ReadabilityExtractor(),
    topic,
    articleRepo,
    runRepo,
    writer,
    siteService,
    clock,
    pipelineSettings(),
  );

  return {
    runRepo,
    siteService,
    ingestionService,
    close,
  };
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;
