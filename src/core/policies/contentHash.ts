import { createHash } from "node:crypto";
import { sliceChars } from "../../shared/utils/textUtils";

const HASHED_PREFIX_CHARS = 5000;

export const normalizeForHash = (text: string): string =>
  sliceChars(
    text.toLowerCase().split(/\s+/).filter(Boolean).join(" "),
    HASHED_PREFIX_CHARS,
  );

/**
 * SHA-256 over the case-folded, whitespace-collapsed first 5000 characters.
 */
export const contentHash = (text: string): string =>
  createHash("sha256").update(normalizeForHash(text), "utf8").digest("hex");
