import type { ArticleEntity } from "../../core/entities/article";
import { describeBoundaryError } from "../../core/entities/appError";
import type {
  PipelineRunResult,
  ProbeRow,
  RunSummaryEntity,
} from "../../core/entities/run";
import type {
  Candidate,
  SourceDescriptor,
} from "../../core/entities/source";
import type {
  LinkDiscoveryPort,
  PageFetcherPort,
  TextExtractorPort,
} from "../../core/ports/inboundPorts";
import type {
  ArticleRepositoryPort,
  ArtifactWriterPort,
  ClockPort,
  RunRepositoryPort,
} from "../../core/ports/outboundPorts";
import { contentHash } from "../../core/policies/contentHash";
import type { TopicFilter } from "../../core/policies/topicFilter";
import type { PipelineSettings } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { toIsoSeconds, truncateToSeconds } from "../../shared/utils/dateUtils";
import { countChars, sliceChars } from "../../shared/utils/textUtils";
import type { SiteService } from "./siteService";

type RunTally = Pick<
  RunSummaryEntity,
  | "totalCandidates"
  | "storedNew"
  | "storedUpdated"
  | "skippedExisting"
  | "extractOk"
>;

type ProbeBase = Pick<
  ProbeRow,
  "source" | "sourceKind" | "sourceUrl" | "title" | "url" | "published"
>;

const describeThrown = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error);

/**
 * Runs one sequential ingestion pass over every configured source:
 * discover, filter, skip known URLs, fetch, extract, store, then record the
 * run and publish the debug snapshot and the site.
 */
export class IngestionService {
  constructor(
    private readonly sources: readonly SourceDescriptor[],
    private readonly discoverer: LinkDiscoveryPort,
    private readonly fetcher: PageFetcherPort,
    private readonly extractor: TextExtractorPort,
    private readonly topic: TopicFilter,
    private readonly articleRepo: ArticleRepositoryPort,
    private readonly runRepo: RunRepositoryPort,
    private readonly writer: ArtifactWriterPort,
    private readonly siteService: SiteService,
    private readonly clock: ClockPort,
    private readonly settings: PipelineSettings,
  ) {}

  async run(): Promise<PipelineRunResult> {
    const startedAt = truncateToSeconds(this.clock.now());
    const runId = toIsoSeconds(startedAt);
    const tally: RunTally = {
      totalCandidates: 0,
      storedNew: 0,
      storedUpdated: 0,
      skippedExisting: 0,
      extractOk: 0,
    };
    const rows: ProbeRow[] = [];

    logger.info({ runId, sources: this.sources.length }, "Pipeline run started");

    for (const source of this.sources) {
      const candidates = await this.discover(source);

      for (const candidate of candidates) {
        tally.totalCandidates += 1;

        if (!this.topic.isOnTopic(candidate.title, candidate.url)) {
          continue;
        }

        if (await this.articleRepo.exists(candidate.url)) {
          tally.skippedExisting += 1;
          continue;
        }

        rows.push(await this.ingestCandidate(source, candidate, tally));
      }
    }

    const summary: RunSummaryEntity = {
      runId,
      startedAt,
      finishedAt: truncateToSeconds(this.clock.now()),
      ...tally,
    };

    await this.runRepo.record(summary);
    const probePath = await this.writer.writeProbe(rows);
    const site = await this.siteService.publish();

    logger.info(
      { ...summary, probePath, sitePath: site.path, siteArticles: site.articleCount },
      "Pipeline run finished",
    );

    return { summary, rows, probePath, site };
  }

  /**
   * Listing pages are scanned for twice the per-source limit since most of
   * their anchors are dropped by the topic filter afterwards.
   */
  private async discover(source: SourceDescriptor): Promise<Candidate[]> {
    const limit =
      source.kind === "listing"
        ? this.settings.perSourceLimit * 2
        : this.settings.perSourceLimit;

    const result = await this.discoverer.discover(source, limit);
    if (result.isErr()) {
      throw new Error(
        `Discovery failed for source '${source.name}': ${describeBoundaryError(result.error)}`,
        { cause: result.error },
      );
    }

    logger.info(
      { source: source.name, kind: source.kind, candidates: result.value.length },
      "Discovered candidates",
    );
    return result.value;
  }

  private async ingestCandidate(
    source: SourceDescriptor,
    candidate: Candidate,
    tally: RunTally,
  ): Promise<ProbeRow> {
    const base: ProbeBase = {
      source: source.name,
      sourceKind: source.kind,
      sourceUrl: source.url,
      title: candidate.title,
      url: candidate.url,
      published: candidate.published,
    };

    try {
      const page = await this.fetcher.fetchPage(candidate.url);
      if (page.isErr()) {
        logger.warn(
          { url: candidate.url, code: page.error.code, reason: page.error.message },
          "Candidate fetch failed",
        );
        return this.failedRow(base, describeBoundaryError(page.error));
      }

      const { status, finalUrl, body } = page.value;
      const text = this.extractor.extract(body);
      const fetchedAt = truncateToSeconds(this.clock.now());
      const domain = new URL(finalUrl).host;
      const extractedChars = countChars(text);
      const extractOk = extractedChars >= this.settings.minExtractedChars;
      const hash = text ? contentHash(text) : "";

      const row: ProbeRow = {
        ...base,
        httpStatus: status,
        finalUrl,
        domain,
        extractedChars,
        extractOk,
        contentHash: hash,
        textPreview: sliceChars(text, this.settings.previewChars),
      };

      if (!extractOk) {
        logger.debug(
          { url: candidate.url, extractedChars },
          "Extracted text below threshold",
        );
        return {
          ...row,
          error: `Low extracted chars (<${this.settings.minExtractedChars}).`,
        };
      }

      tally.extractOk += 1;

      const article: ArticleEntity = {
        url: candidate.url,
        finalUrl,
        title: candidate.title,
        source: source.name,
        published: candidate.published,
        domain,
        fetchedAt,
        extractedChars,
        contentHash: hash,
        text,
      };

      const outcome = await this.articleRepo.upsert(article);
      if (outcome === "new") tally.storedNew += 1;
      if (outcome === "updated") tally.storedUpdated += 1;

      logger.debug({ url: candidate.url, outcome }, "Article stored");
      return row;
    } catch (error) {
      logger.warn(
        { url: candidate.url, reason: describeThrown(error) },
        "Candidate processing failed",
      );
      return this.failedRow(base, describeThrown(error));
    }
  }

  private failedRow(base: ProbeBase, error: string): ProbeRow {
    return {
      ...base,
      httpStatus: null,
      finalUrl: null,
      domain: null,
      extractedChars: 0,
      extractOk: false,
      contentHash: "",
      textPreview: "",
      error,
    };
  }
}
