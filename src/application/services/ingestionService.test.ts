import { describe, expect, it } from "vitest";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { ArticleEntity } from "../../core/entities/article";
import type { ProbeRow } from "../../core/entities/run";
import type {
  Candidate,
  SourceDescriptor,
} from "../../core/entities/source";
import type {
  FetchedPage,
  LinkDiscoveryPort,
  PageFetcherPort,
  TextExtractorPort,
} from "../../core/ports/inboundPorts";
import type {
  ArtifactWriterPort,
  ClockPort,
} from "../../core/ports/outboundPorts";
import { contentHash } from "../../core/policies/contentHash";
import { TopicFilter } from "../../core/policies/topicFilter";
import {
  InMemoryArticleRepository,
  InMemoryRunRepository,
} from "../../infra/db/memoryRepositories";
import { IngestionService } from "./ingestionService";
import { SiteService } from "./siteService";

const now = new Date("2026-10-19T12:00:00.750Z");
const clock: ClockPort = { now: () => now };

const topic = new TopicFilter({
  mmaKeywords: ["ufc", "mma"],
  boxingKeywords: ["boxeo", "canelo"],
  offTopicPatterns: ["/futbol/"],
});

const feedSource: SourceDescriptor = {
  name: "feed_a",
  kind: "feed",
  url: "https://feed.example/rss.xml",
};

const listingSource: SourceDescriptor = {
  name: "listing_b",
  kind: "listing",
  url: "https://listing.example/mma/",
};

const longText = "Topuria ".repeat(150);

const timeoutError: AppBoundaryError = {
  source: "fetch",
  code: "timeout",
  provider: "http",
  message: "HTTP request to https://example.com/mma-down timed out after 25000ms.",
  retryable: true,
};

type PageResult = Result<FetchedPage, AppBoundaryError>;

class FakeDiscoverer implements LinkDiscoveryPort {
  readonly calls: Array<[string, number]> = [];

  constructor(
    private readonly results: Record<string, Result<Candidate[], AppBoundaryError>>,
  ) {}

  async discover(
    source: SourceDescriptor,
    limit: number,
  ): Promise<Result<Candidate[], AppBoundaryError>> {
    this.calls.push([source.name, limit]);
    return this.results[source.name] ?? ok([]);
  }
}

class FakeFetcher implements PageFetcherPort {
  readonly fetched: string[] = [];

  constructor(private readonly pages: Record<string, PageResult | Error>) {}

  async fetchPage(url: string): Promise<PageResult> {
    this.fetched.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      throw new Error(`unexpected fetch for ${url}`);
    }
    if (page instanceof Error) {
      throw page;
    }
    return page;
  }
}

const identityExtractor: TextExtractorPort = { extract: (html) => html };

class RecordingWriter implements ArtifactWriterPort {
  probes: ProbeRow[][] = [];
  sites: string[] = [];

  async writeProbe(rows: ProbeRow[]): Promise<string> {
    this.probes.push(rows);
    return "/tmp/out/probe.json";
  }

  async writeSite(html: string): Promise<string> {
    this.sites.push(html);
    return "/tmp/site/index.html";
  }
}

const page = (url: string, body: string, finalUrl = url): PageResult =>
  ok({ status: 200, finalUrl, body });

const seeded: ArticleEntity = {
  url: "https://example.com/boxeo/canelo-vuelve",
  finalUrl: "https://example.com/boxeo/canelo-vuelve",
  title: "Canelo vuelve al ring",
  source: "feed_a",
  published: "",
  domain: "example.com",
  fetchedAt: new Date("2026-10-18T08:00:00.000Z"),
  extractedChars: 1000,
  contentHash: "seeded-hash",
  text: "x".repeat(1000),
};

const buildService = (
  discoverer: LinkDiscoveryPort,
  fetcher: PageFetcherPort,
) => {
  const articleRepo = new InMemoryArticleRepository();
  const runRepo = new InMemoryRunRepository();
  const writer = new RecordingWriter();
  const siteService = new SiteService(articleRepo, topic, writer, clock, {
    recentDays: 14,
    recentLimit: 100,
  });
  const service = new IngestionService(
    [feedSource, listingSource],
    discoverer,
    fetcher,
    identityExtractor,
    topic,
    articleRepo,
    runRepo,
    writer,
    siteService,
    clock,
    { perSourceLimit: 5, minExtractedChars: 900, previewChars: 50 },
  );
  return { service, articleRepo, runRepo, writer };
};

describe("IngestionService", () => {
  it("filters, deduplicates, stores and records one run", async () => {
    const discoverer = new FakeDiscoverer({
      feed_a: ok([
        {
          title: "UFC 300: Topuria retains title",
          url: "https://example.com/ufc-300-topuria",
          published: "Sat, 13 Apr 2024 22:00:00 GMT",
        },
        {
          title: "Liga: resumen de la jornada",
          url: "https://example.com/liga/jornada-9",
          published: "",
        },
        {
          title: "Canelo vuelve al ring",
          url: "https://example.com/boxeo/canelo-vuelve",
          published: "",
        },
        {
          title: "UFC Fight Night: nota breve",
          url: "https://example.com/ufc-short",
          published: "",
        },
        {
          title: "MMA: combate aplazado",
          url: "https://example.com/mma-down",
          published: "",
        },
      ]),
    });
    const fetcher = new FakeFetcher({
      "https://example.com/ufc-300-topuria": page(
        "https://example.com/ufc-300-topuria",
        longText,
        "https://www.example.com/ufc-300-topuria",
      ),
      "https://example.com/ufc-short": page(
        "https://example.com/ufc-short",
        "short body",
      ),
      "https://example.com/mma-down": err(timeoutError),
    });
    const { service, articleRepo, runRepo, writer } = buildService(
      discoverer,
      fetcher,
    );
    await articleRepo.upsert(seeded);

    const result = await service.run();

    expect(discoverer.calls).toEqual([
      ["feed_a", 5],
      ["listing_b", 10],
    ]);
    expect(fetcher.fetched).toEqual([
      "https://example.com/ufc-300-topuria",
      "https://example.com/ufc-short",
      "https://example.com/mma-down",
    ]);

    expect(result.summary).toEqual({
      runId: "2026-10-19T12:00:00Z",
      startedAt: new Date("2026-10-19T12:00:00.000Z"),
      finishedAt: new Date("2026-10-19T12:00:00.000Z"),
      totalCandidates: 5,
      storedNew: 1,
      storedUpdated: 0,
      skippedExisting: 1,
      extractOk: 1,
    });
    expect(await runRepo.latest(5)).toEqual([result.summary]);

    expect(articleRepo.get("https://example.com/ufc-300-topuria")).toEqual({
      url: "https://example.com/ufc-300-topuria",
      finalUrl: "https://www.example.com/ufc-300-topuria",
      title: "UFC 300: Topuria retains title",
      source: "feed_a",
      published: "Sat, 13 Apr 2024 22:00:00 GMT",
      domain: "www.example.com",
      fetchedAt: new Date("2026-10-19T12:00:00.000Z"),
      extractedChars: 1200,
      contentHash: contentHash(longText),
      text: longText,
    });
    expect(articleRepo.count()).toBe(2);

    expect(result.rows).toEqual([
      {
        source: "feed_a",
        sourceKind: "feed",
        sourceUrl: "https://feed.example/rss.xml",
        title: "UFC 300: Topuria retains title",
        url: "https://example.com/ufc-300-topuria",
        published: "Sat, 13 Apr 2024 22:00:00 GMT",
        httpStatus: 200,
        finalUrl: "https://www.example.com/ufc-300-topuria",
        domain: "www.example.com",
        extractedChars: 1200,
        extractOk: true,
        contentHash: contentHash(longText),
        textPreview: longText.slice(0, 50),
      },
      {
        source: "feed_a",
        sourceKind: "feed",
        sourceUrl: "https://feed.example/rss.xml",
        title: "UFC Fight Night: nota breve",
        url: "https://example.com/ufc-short",
        published: "",
        httpStatus: 200,
        finalUrl: "https://example.com/ufc-short",
        domain: "example.com",
        extractedChars: 10,
        extractOk: false,
        contentHash: contentHash("short body"),
        textPreview: "short body",
        error: "Low extracted chars (<900).",
      },
      {
        source: "feed_a",
        sourceKind: "feed",
        sourceUrl: "https://feed.example/rss.xml",
        title: "MMA: combate aplazado",
        url: "https://example.com/mma-down",
        published: "",
        httpStatus: null,
        finalUrl: null,
        domain: null,
        extractedChars: 0,
        extractOk: false,
        contentHash: "",
        textPreview: "",
        error:
          "timeout: HTTP request to https://example.com/mma-down timed out after 25000ms.",
      },
    ]);

    expect(writer.probes).toEqual([result.rows]);
    expect(result.probePath).toBe("/tmp/out/probe.json");
    expect(result.site).toEqual({
      path: "/tmp/site/index.html",
      articleCount: 2,
    });
    expect(writer.sites).toHaveLength(1);
  });

  it("skips a URL stored by an earlier run without fetching it", async () => {
    const candidate: Candidate = {
      title: "UFC 300: Topuria retains title",
      url: "https://example.com/ufc-300-topuria",
      published: "",
    };
    const discoverer = new FakeDiscoverer({ feed_a: ok([candidate]) });
    const fetcher = new FakeFetcher({
      [candidate.url]: page(candidate.url, longText),
    });
    const { service } = buildService(discoverer, fetcher);

    const first = await service.run();
    const second = await service.run();

    expect(first.summary.storedNew).toBe(1);
    expect(second.summary.storedNew).toBe(0);
    expect(second.summary.skippedExisting).toBe(1);
    expect(second.rows).toEqual([]);
    expect(fetcher.fetched).toEqual([candidate.url]);
  });

  it("records a thrown candidate error and keeps going", async () => {
    const discoverer = new FakeDiscoverer({
      feed_a: ok([
        { title: "MMA: primera", url: "https://example.com/mma-1", published: "" },
        { title: "MMA: segunda", url: "https://example.com/mma-2", published: "" },
      ]),
    });
    const fetcher = new FakeFetcher({
      "https://example.com/mma-1": new Error("kaboom"),
      "https://example.com/mma-2": page("https://example.com/mma-2", longText),
    });
    const { service } = buildService(discoverer, fetcher);

    const result = await service.run();

    expect(result.rows.map((row) => row.error)).toEqual([
      "Error: kaboom",
      undefined,
    ]);
    expect(result.summary.storedNew).toBe(1);
    expect(result.summary.extractOk).toBe(1);
  });

  it("measures extracted text in characters, not UTF-16 units", async () => {
    const emojiText = "🥊".repeat(450);
    const url = "https://example.com/ufc-emoji";
    const discoverer = new FakeDiscoverer({
      feed_a: ok([{ title: "UFC en emojis", url, published: "" }]),
    });
    const { service, articleRepo } = buildService(
      discoverer,
      new FakeFetcher({ [url]: page(url, emojiText) }),
    );

    const result = await service.run();

    expect(emojiText.length).toBe(900);
    expect(result.rows).toHaveLength(1);
    expect(result.rows[0]?.extractedChars).toBe(450);
    expect(result.rows[0]?.textPreview).toBe("🥊".repeat(50));
    expect(result.rows[0]?.error).toBe("Low extracted chars (<900).");
    expect(result.summary.extractOk).toBe(0);
    expect(await articleRepo.exists(url)).toBe(false);
  });

  it("aborts the run when a listing page cannot be discovered", async () => {
    const discoverer = new FakeDiscoverer({
      listing_b: err({
        source: "discovery",
        code: "transport_error",
        provider: "listing_b",
        message: "socket reset",
        retryable: true,
      }),
    });
    const { service, runRepo, writer } = buildService(
      discoverer,
      new FakeFetcher({}),
    );

    await expect(service.run()).rejects.toThrow(
      "Discovery failed for source 'listing_b': transport_error: socket reset",
    );
    expect(await runRepo.latest(5)).toEqual([]);
    expect(writer.probes).toEqual([]);
    expect(writer.sites).toEqual([]);
  });
});
