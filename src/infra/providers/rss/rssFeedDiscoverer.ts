import RssParser from "rss-parser";
import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  Candidate,
  SourceDescriptor,
} from "../../../core/entities/source";
import type {
  LinkDiscoveryPort,
  PageFetcherPort,
} from "../../../core/ports/inboundPorts";
import { logger } from "../../../shared/logger/logger";

/**
 * Reads RSS/Atom entries in document order. An unreachable or unparseable
 * feed yields no candidates rather than failing the run.
 */
export class RssFeedDiscoverer implements LinkDiscoveryPort {
  constructor(
    private readonly fetcher: PageFetcherPort,
    private readonly parser = new RssParser(),
  ) {}

  async discover(
    source: SourceDescriptor,
    limit: number,
  ): Promise<Result<Candidate[], AppBoundaryError>> {
    const page = await this.fetcher.fetchPage(source.url);
    if (page.isErr()) {
      logger.warn(
        { source: source.name, url: source.url, reason: page.error.message },
        "Feed fetch failed; continuing without entries",
      );
      return ok([]);
    }

    let items: RssParser.Item[];
    try {
      const feed = await this.parser.parseString(page.value.body);
      items = feed.items ?? [];
    } catch (error) {
      logger.warn(
        {
          source: source.name,
          url: source.url,
          reason: error instanceof Error ? error.message : String(error),
        },
        "Feed parse failed; continuing without entries",
      );
      return ok([]);
    }

    return ok(
      items.slice(0, limit).map((item) => ({
        title: item.title ?? "",
        url: item.link ?? "",
        published: item.pubDate ?? "",
      })),
    );
  }
}
