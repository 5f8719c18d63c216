import type {
  ArticleEntity,
  SportCategory,
} from "../../core/entities/article";
import type { TopicFilter } from "../../core/policies/topicFilter";
import { toIsoSeconds } from "../../shared/utils/dateUtils";
import { sliceChars } from "../../shared/utils/textUtils";
import {
  COUNT_TOKEN,
  GENERATED_TOKEN,
  ITEMS_TOKEN,
  SITE_TEMPLATE,
} from "./siteTemplate";

const PREVIEW_CHARS = 280;

export type SiteItem = {
  title: string;
  url: string;
  source: string;
  domain: string;
  published: string;
  fetchedAt: string;
  sport: SportCategory;
  preview: string;
};

export const toSiteItem = (
  article: ArticleEntity,
  topic: TopicFilter,
): SiteItem => ({
  title: article.title,
  url: article.url,
  source: article.source,
  domain: article.domain,
  published: article.published,
  fetchedAt: toIsoSeconds(article.fetchedAt),
  sport: topic.classifySport(article.title, article.url, article.text),
  preview: sliceChars(article.text, PREVIEW_CHARS).replace(/\n/g, " ").trim(),
});

/**
 * `<` is escaped so embedded article text cannot close the script element.
 */
export const serializeItems = (items: SiteItem[]): string =>
  JSON.stringify(items).replace(/</g, "\\u003c");

/**
 * Renders the whole browsable site as one document with the rows inlined.
 * Output depends only on the articles and `generatedAt`.
 */
export const buildSiteHtml = (
  articles: ArticleEntity[],
  topic: TopicFilter,
  generatedAt: Date,
): string => {
  const items = articles.map((article) => toSiteItem(article, topic));

  return SITE_TEMPLATE.replace(GENERATED_TOKEN, () => toIsoSeconds(generatedAt))
    .replace(COUNT_TOKEN, () => String(items.length))
    .replace(ITEMS_TOKEN, () => serializeItems(items));
};
