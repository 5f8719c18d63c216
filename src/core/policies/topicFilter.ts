import type { SportCategory } from "../entities/article";

export type TopicKeywords = {
  readonly mmaKeywords: readonly string[];
  readonly boxingKeywords: readonly string[];
  readonly offTopicPatterns: readonly string[];
};

const containsAny = (haystack: string, needles: readonly string[]): boolean =>
  needles.some((needle) => haystack.includes(needle));

/**
 * Case-insensitive substring heuristics for the combat sports topic.
 */
export class TopicFilter {
  private readonly mma: string[];
  private readonly boxing: string[];
  private readonly offTopic: string[];

  constructor(keywords: TopicKeywords) {
    this.mma = keywords.mmaKeywords.map((value) => value.toLowerCase());
    this.boxing = keywords.boxingKeywords.map((value) => value.toLowerCase());
    this.offTopic = keywords.offTopicPatterns.map((value) =>
      value.toLowerCase(),
    );
  }

  isOnTopic(title: string, url: string): boolean {
    const haystack = `${title} ${url}`.toLowerCase();

    if (containsAny(haystack, this.offTopic)) {
      return false;
    }

    return containsAny(haystack, this.mma) || containsAny(haystack, this.boxing);
  }

  /**
   * "Other" only shows up for rows that passed `isOnTopic` on title/url but
   * whose combined text no longer matches either list.
   */
  classifySport(title: string, url: string, text: string): SportCategory {
    const haystack = `${title} ${url} ${text}`.toLowerCase();
    const mma = containsAny(haystack, this.mma);
    const boxing = containsAny(haystack, this.boxing);

    if (mma && boxing) return "Mixed";
    if (mma) return "MMA";
    if (boxing) return "Boxing";
    return "Other";
  }
}
