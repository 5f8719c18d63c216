import { Readability } from "@mozilla/readability";
import { parseHTML } from "linkedom";
import type { TextExtractorPort } from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";

const EXCLUDED_SELECTORS = [
  "table",
  "#comments",
  ".comments",
  ".comment-list",
  "[id^='comments-']",
];

const tidyText = (text: string): string =>
  text
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n")
    .trim();

/**
 * Main-content extraction with Mozilla Readability over a linkedom document.
 * Tables and comment sections are dropped before scoring.
 */
export class ReadabilityExtractor implements TextExtractorPort {
  constructor(private readonly charThreshold = 100) {}

  extract(html: string): string {
    if (!html.trim()) {
      return "";
    }

    try {
      const { document } = parseHTML(html);
      for (const node of document.querySelectorAll(
        EXCLUDED_SELECTORS.join(","),
      )) {
        node.remove();
      }

      const article = new Readability(document, {
        charThreshold: this.charThreshold,
      }).parse();

      return tidyText(article?.textContent ?? "");
    } catch (error) {
      logger.debug(
        { reason: error instanceof Error ? error.message : String(error) },
        "Readability extraction failed",
      );
      return "";
    }
  }
}
