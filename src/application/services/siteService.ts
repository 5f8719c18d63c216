import type { SitePublication } from "../../core/entities/run";
import type {
  ArticleRepositoryPort,
  ArtifactWriterPort,
  ClockPort,
} from "../../core/ports/outboundPorts";
import type { TopicFilter } from "../../core/policies/topicFilter";
import type { SiteSettings } from "../../shared/config/env";
import { daysBefore } from "../../shared/utils/dateUtils";
import { buildSiteHtml } from "../site/siteBuilder";

/**
 * Rebuilds the static site from the articles fetched in the recent window.
 */
export class SiteService {
  constructor(
    private readonly articleRepo: ArticleRepositoryPort,
    private readonly topic: TopicFilter,
    private readonly writer: ArtifactWriterPort,
    private readonly clock: ClockPort,
    private readonly settings: SiteSettings,
  ) {}

  async publish(): Promise<SitePublication> {
    const now = this.clock.now();
    const articles = await this.articleRepo.listRecent(
      daysBefore(now, this.settings.recentDays),
      this.settings.recentLimit,
    );

    const path = await this.writer.writeSite(
      buildSiteHtml(articles, this.topic, now),
    );

    return { path, articleCount: articles.length };
  }
}
