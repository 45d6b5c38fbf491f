import type { AnalysisRecord } from "@commitlens/core";
import { accumulateRecords, computeTotals, summarizeByAuthor } from "./aggregation.js";
import {
  NO_RESULTS_MESSAGE,
  REPORT_TITLE,
  RULE_WIDTH,
  commitKindLabel,
  shortCommitId,
  type JsonCommitEntry,
  type JsonReport,
  type ReportOptions,
} from "./domain.js";
import { formatTimestamp } from "./timestamp.js";

const renderCommitBlocks = (records: readonly AnalysisRecord[], options: ReportOptions): string[] =>
  records.flatMap((record) => [
    `Commit: ${shortCommitId(record.analyzedCommit)} (${commitKindLabel(record.commitKind)})`,
    `Author: ${record.author}`,
    `Date: ${formatTimestamp(record.date, options.timeZone)}`,
    `Files Changed: ${record.filesChanged}`,
    `Lines Added: ${record.linesAdded}`,
    `Lines Removed: ${record.linesRemoved}`,
    `Net Change: ${record.netChange}`,
    "-".repeat(RULE_WIDTH),
    "",
  ]);

const renderAuthorBlocks = (records: readonly AnalysisRecord[]): string[] =>
  summarizeByAuthor(records).flatMap((summary) => [
    `Author: ${summary.author}`,
    `Commits: ${summary.commits}`,
    `Files Changed: ${summary.filesChanged}`,
    `Lines Added: ${summary.linesAdded}`,
    `Lines Removed: ${summary.linesRemoved}`,
    `Net Change: ${summary.netChange}`,
    "-".repeat(RULE_WIDTH),
    "",
  ]);

export const renderTextReport = (
  records: readonly AnalysisRecord[],
  options: ReportOptions,
): string => {
  if (records.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  const totals = computeTotals(records);
  const lines: string[] = [REPORT_TITLE, "=".repeat(RULE_WIDTH), ""];
  lines.push(
    ...(options.showCumulative ? renderAuthorBlocks(records) : renderCommitBlocks(records, options)),
  );

  lines.push(`Total Files Changed: ${totals.filesChanged}`);
  lines.push(`Total Lines Added: ${totals.linesAdded}`);
  lines.push(`Total Lines Removed: ${totals.linesRemoved}`);
  lines.push(`Total Net Change: ${totals.netChange}`);

  return lines.join("\n");
};

const toJsonCommitEntry = (record: AnalysisRecord): JsonCommitEntry => ({
  analyzed_commit: record.analyzedCommit,
  author: record.author,
  date: record.date,
  files_changed: record.filesChanged,
  lines_added: record.linesAdded,
  lines_removed: record.linesRemoved,
  net_change: record.netChange,
});

export const createJsonReport = (
  records: readonly AnalysisRecord[],
  options: ReportOptions,
): JsonReport => {
  if (records.length === 0) {
    return { error: NO_RESULTS_MESSAGE };
  }

  const totals = computeTotals(records);
  const commits: readonly JsonCommitEntry[] = options.showCumulative
    ? accumulateRecords(records).map((record) => ({
        ...toJsonCommitEntry(record),
        cumulative_files_changed: record.cumulativeFilesChanged,
        cumulative_lines_added: record.cumulativeLinesAdded,
        cumulative_lines_removed: record.cumulativeLinesRemoved,
        cumulative_net_change: record.cumulativeNetChange,
      }))
    : records.map(toJsonCommitEntry);

  return {
    summary: {
      total_commits: records.length,
      total_files_changed: totals.filesChanged,
      total_lines_added: totals.linesAdded,
      total_lines_removed: totals.linesRemoved,
      total_net_change: totals.netChange,
    },
    commits,
  };
};

export const renderJsonReport = (records: readonly AnalysisRecord[], options: ReportOptions): string =>
  JSON.stringify(createJsonReport(records, options), null, 2);
