/**
 * Drops milliseconds; stored timestamps and run ids have second precision.
 */
export const truncateToSeconds = (value: Date): Date =>
  new Date(Math.floor(value.getTime() / 1000) * 1000);

/**
 * ISO-8601 UTC without milliseconds, e.g. `2026-10-19T12:00:00Z`.
 */
export const toIsoSeconds = (value: Date): string =>
  truncateToSeconds(value).toISOString().replace(/\.\d{3}Z$/, "Z");

export const daysBefore = (value: Date, days: number): Date =>
  new Date(value.getTime() - days * 24 * 60 * 60 * 1000);
