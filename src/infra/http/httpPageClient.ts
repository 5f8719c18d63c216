import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  FetchedPage,
  PageFetcherPort,
} from "../../core/ports/inboundPorts";

export type HttpPageClientOptions = {
  userAgent: string;
  acceptLanguage: string;
  timeoutMs: number;
};

/**
 * Single-attempt GET that follows redirects and returns the body for any status.
 */
export class HttpPageClient implements PageFetcherPort {
  constructor(private readonly options: HttpPageClientOptions) {}

  async fetchPage(url: string): Promise<Result<FetchedPage, AppBoundaryError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: {
          "User-Agent": this.options.userAgent,
          "Accept-Language": this.options.acceptLanguage,
        },
        redirect: "follow",
        signal: controller.signal,
      });

      const body = await response.text();

      return ok({
        status: response.status,
        finalUrl: response.url || url,
        body,
      });
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          source: "fetch",
          code: "timeout",
          provider: "http",
          message: `HTTP request to ${url} timed out after ${this.options.timeoutMs}ms.`,
          retryable: true,
          cause: error,
        });
      }

      return err({
        source: "fetch",
        code: "transport_error",
        provider: "http",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
