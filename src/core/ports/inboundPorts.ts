import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { Candidate, SourceDescriptor } from "../entities/source";

export type FetchedPage = {
  status: number;
  finalUrl: string;
  body: string;
};

export interface LinkDiscoveryPort {
  discover(
    source: SourceDescriptor,
    limit: number,
  ): Promise<Result<Candidate[], AppBoundaryError>>;
}

export interface PageFetcherPort {
  fetchPage(url: string): Promise<Result<FetchedPage, AppBoundaryError>>;
}

/**
 * Returns main-content text, or an empty string when nothing usable is found.
 */
export interface TextExtractorPort {
  extract(html: string): string;
}
