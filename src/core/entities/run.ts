import type { SourceKind } from "./source";

export type RunSummaryEntity = {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  totalCandidates: number;
  storedNew: number;
  storedUpdated: number;
  skippedExisting: number;
  extractOk: number;
};

/**
 * Debug record for one candidate that reached the fetch stage.
 * Network fields are null when the fetch itself failed.
 */
export type ProbeRow = {
  source: string;
  sourceKind: SourceKind;
  sourceUrl: string;
  title: string;
  url: string;
  published: string;
  httpStatus: number | null;
  finalUrl: string | null;
  domain: string | null;
  extractedChars: number;
  extractOk: boolean;
  contentHash: string;
  textPreview: string;
  error?: string;
};

export type SitePublication = {
  path: string;
  articleCount: number;
};

export type PipelineRunResult = {
  summary: RunSummaryEntity;
  rows: ProbeRow[];
  probePath: string;
  site: SitePublication;
};
