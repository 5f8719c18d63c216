import type { RunSummaryEntity } from "../core/entities/run";
import type { SourceDescriptor } from "../core/entities/source";
import type { AppEnv, StoreProviderName } from "../shared/config/env";
import { toIsoSeconds } from "../shared/utils/dateUtils";

/**
 * The one-line summary printed when a run finishes.
 */
export const formatRunSummary = (summary: RunSummaryEntity): string =>
  [
    `Candidates: ${summary.totalCandidates}`,
    `New: ${summary.storedNew}`,
    `Updated: ${summary.storedUpdated}`,
    `Skipped(existing URL): ${summary.skippedExisting}`,
    `Extract OK: ${summary.extractOk}`,
  ].join(" | ");

export const formatRunHistory = (runs: RunSummaryEntity[]): string => {
  if (runs.length === 0) {
    return "No runs recorded.";
  }

  return runs
    .map((run) => {
      const seconds = Math.round(
        (run.finishedAt.getTime() - run.startedAt.getTime()) / 1000,
      );
      return `${toIsoSeconds(run.startedAt)} (${seconds}s)  ${formatRunSummary(run)}`;
    })
    .join("\n");
};

export const formatSources = (sources: readonly SourceDescriptor[]): string =>
  sources
    .map((source) => `${source.name.padEnd(16)} ${source.kind.padEnd(8)} ${source.url}`)
    .join("\n");

/**
 * Names the store without leaking credentials from the connection string.
 */
export const describeStore = (
  provider: StoreProviderName,
  connectionString: string,
): string => {
  if (provider === "memory") {
    return "memory";
  }

  try {
    const url = new URL(connectionString);
    return `postgres ${url.host}${url.pathname}`;
  } catch {
    return "postgres";
  }
};

export const buildStatusReport = (
  appEnv: AppEnv,
  sources: readonly SourceDescriptor[],
) => ({
  store: describeStore(appEnv.STORE_PROVIDER, appEnv.POSTGRES_URL),
  sources: sources.map((source) => source.name),
  outputDir: appEnv.OUTPUT_DIR,
  siteDir: appEnv.SITE_DIR,
  perSourceLimit: appEnv.PER_SOURCE_LIMIT,
  minExtractedChars: appEnv.MIN_EXTRACTED_CHARS,
  recentDays: appEnv.RECENT_DAYS,
  recentLimit: appEnv.RECENT_LIMIT,
  httpTimeoutMs: appEnv.HTTP_TIMEOUT_MS,
  userAgent: appEnv.HTTP_USER_AGENT,
  startupWorkflow:
    appEnv.STORE_PROVIDER === "memory"
      ? ["npm start -- run"]
      : [
          "Point POSTGRES_URL at a running Postgres database; tables are created on first run.",
          "npm start -- run",
          "npm start -- site",
        ],
  troubleshooting: [
    "Set STORE_PROVIDER=memory for a dry run without Postgres.",
    "probe.json lists every fetched candidate with its extraction result.",
  ],
});
