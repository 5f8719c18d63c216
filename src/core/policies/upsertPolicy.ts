import type {
  ArticleFingerprint,
  UpsertOutcome,
} from "../entities/article";

/**
 * Decides what an upsert must do given the stored row (if any).
 * Only the content hash and extracted length count as a change; title or
 * published-date drift alone leaves the row untouched.
 */
export const decideUpsert = (
  existing: ArticleFingerprint | null,
  incoming: ArticleFingerprint,
): UpsertOutcome => {
  if (!existing) {
    return "new";
  }

  if (
    existing.contentHash === incoming.contentHash &&
    existing.extractedChars === incoming.extractedChars
  ) {
    return "unchanged";
  }

  return "updated";
};
