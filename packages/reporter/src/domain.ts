import type { CommitKind } from "@commitlens/core";

export const NO_RESULTS_MESSAGE = "No results to report." as const;
export const UNKNOWN_DATE = "Unknown date" as const;
export const REPORT_TITLE = "Commit Analysis Report" as const;
export const RULE_WIDTH = 30;

export type ReportFormat = "text" | "json";

export type TimeZoneMode = "local" | "utc";

export type ReportOptions = {
  showCumulative: boolean;
  timeZone?: TimeZoneMode;
};

export type ChangeTotals = {
  filesChanged: number;
  linesAdded: number;
  linesRemoved: number;
  netChange: number;
};

export type AuthorSummary = ChangeTotals & {
  author: string;
  commits: number;
};

export type JsonReportSummary = {
  total_commits: number;
  total_files_changed: number;
  total_lines_added: number;
  total_lines_removed: number;
  total_net_change: number;
};

export type JsonCommitEntry = {
  analyzed_commit: string;
  author: string;
  date: number;
  files_changed: number;
  lines_added: number;
  lines_removed: number;
  net_change: number;
  cumulative_files_changed?: number;
  cumulative_lines_added?: number;
  cumulative_lines_removed?: number;
  cumulative_net_change?: number;
};

export type JsonReport =
  | {
      summary: JsonReportSummary;
      commits: readonly JsonCommitEntry[];
    }
  | { error: typeof NO_RESULTS_MESSAGE };

const commitKindLabelByKind: Readonly<Record<CommitKind, string>> = {
  initial: "Initial Commit",
  merge: "Merge Commit",
  regular: "Commit",
};

export const commitKindLabel = (kind: CommitKind): string => commitKindLabelByKind[kind];

export const shortCommitId = (commitId: string): string => commitId.slice(0, 7);
