import { parseHTML } from "linkedom";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  Candidate,
  SourceDescriptor,
} from "../../../core/entities/source";
import type {
  LinkDiscoveryPort,
  PageFetcherPort,
} from "../../../core/ports/inboundPorts";

const MIN_LINK_TEXT_CHARS = 18;
const MIN_URL_SLASHES = 4;

const ASSET_EXTENSIONS = [
  ".jpg",
  ".png",
  ".svg",
  ".css",
  ".js",
  ".webp",
  ".mp4",
  ".woff",
  ".woff2",
];

const NAVIGATION_PATTERNS = [
  "/inicio",
  "/ver",
  "/para-ti",
  "/suscrib",
  "/registro",
  "/deportes",
  "/resultados",
  "/calendario",
  "/medallero",
  "/equipo",
];

const TEXT_NODE = 3;

const normalizeWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

const collectTextNodes = (node: Node): string[] =>
  node.nodeType === TEXT_NODE
    ? [node.textContent ?? ""]
    : Array.from(node.childNodes).flatMap(collectTextNodes);

/**
 * Link text with a space between text nodes, so nested blocks such as
 * `<h3>` and `<p>` do not run together.
 */
export const anchorText = (anchor: Node): string =>
  normalizeWhitespace(collectTextNodes(anchor).join(" "));

export const resolveHref = (href: string, base: URL): string => {
  if (href.startsWith("//")) {
    return `${base.protocol}${href}`;
  }
  if (href.startsWith("/")) {
    return `${base.protocol}//${base.host}${href}`;
  }
  return href;
};

const countSlashes = (value: string): number => value.split("/").length - 1;

/**
 * Applies the link-shape rules to one resolved anchor URL.
 * Returns the URL to keep, or null when it looks like chrome, not an article.
 */
export const acceptArticleLink = (resolved: string): string | null => {
  if (!resolved.startsWith("http")) {
    return null;
  }

  let path: string;
  try {
    path = new URL(resolved).pathname.toLowerCase();
  } catch {
    return null;
  }

  if (ASSET_EXTENSIONS.some((extension) => path.endsWith(extension))) {
    return null;
  }

  const lowered = resolved.toLowerCase();
  if (NAVIGATION_PATTERNS.some((pattern) => lowered.includes(pattern))) {
    return null;
  }

  if (countSlashes(lowered) < MIN_URL_SLASHES) {
    return null;
  }

  return resolved;
};

/**
 * Scans a listing page's anchors for deep, non-navigation links.
 */
export class ListingPageDiscoverer implements LinkDiscoveryPort {
  constructor(private readonly fetcher: PageFetcherPort) {}

  async discover(
    source: SourceDescriptor,
    limit: number,
  ): Promise<Result<Candidate[], AppBoundaryError>> {
    const page = await this.fetcher.fetchPage(source.url);
    if (page.isErr()) {
      return err({
        ...page.error,
        source: "discovery",
        provider: source.name,
      });
    }

    let base: URL;
    try {
      base = new URL(page.value.finalUrl);
    } catch (error) {
      return err({
        source: "discovery",
        code: "malformed_response",
        provider: source.name,
        message: `Listing page resolved to an invalid URL: ${page.value.finalUrl}`,
        retryable: false,
        cause: error,
      });
    }

    const { document } = parseHTML(page.value.body);
    const seen = new Set<string>();
    const candidates: Candidate[] = [];

    for (const anchor of document.querySelectorAll("a[href]")) {
      if (candidates.length >= limit) break;

      const href = (anchor.getAttribute("href") ?? "").trim();
      const text = anchorText(anchor);
      if (!href || text.length < MIN_LINK_TEXT_CHARS) continue;

      const url = acceptArticleLink(resolveHref(href, base));
      if (!url || seen.has(url)) continue;

      seen.add(url);
      candidates.push({ title: text, url, published: "" });
    }

    return ok(candidates);
  }
}
