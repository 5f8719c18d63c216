export type ArticleEntity = {
  url: string;
  finalUrl: string;
  title: string;
  source: string;
  published: string;
  domain: string;
  fetchedAt: Date;
  extractedChars: number;
  contentHash: string;
  text: string;
};

/**
 * The two fields the store compares to decide whether stored content changed.
 */
export type ArticleFingerprint = Pick<
  ArticleEntity,
  "contentHash" | "extractedChars"
>;

export type UpsertOutcome = "new" | "updated" | "unchanged";

export type SportCategory = "MMA" | "Boxing" | "Mixed" | "Other";
