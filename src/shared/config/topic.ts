import { readFileSync } from "node:fs";
import { z } from "zod";
import type { TopicKeywords } from "../../core/policies/topicFilter";

const keywordList = z.array(z.string().trim().min(1)).min(1);

const topicSchema = z.object({
  mmaKeywords: keywordList,
  boxingKeywords: keywordList,
  offTopicPatterns: z.array(z.string().trim().min(1)),
});

const DEFAULT_TOPIC_PATH = new URL(
  "../../../config/topic.json",
  import.meta.url,
);

let cached: TopicKeywords | null = null;

export const parseTopicKeywords = (raw: unknown): TopicKeywords => {
  const parsed = topicSchema.parse(raw);
  return Object.freeze({
    mmaKeywords: Object.freeze([...parsed.mmaKeywords]),
    boxingKeywords: Object.freeze([...parsed.boxingKeywords]),
    offTopicPatterns: Object.freeze([...parsed.offTopicPatterns]),
  });
};

/**
 * Reads `config/topic.json` once per process.
 */
export const loadTopicKeywords = (): TopicKeywords => {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(DEFAULT_TOPIC_PATH, "utf-8"));
    cached = parseTopicKeywords(raw);
  }
  return cached;
};
