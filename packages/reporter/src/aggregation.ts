import type { AnalysisRecord, CumulativeAnalysisRecord } from "@commitlens/core";
import type { AuthorSummary, ChangeTotals } from "./domain.js";

const EMPTY_TOTALS: ChangeTotals = { filesChanged: 0, linesAdded: 0, linesRemoved: 0, netChange: 0 };

const addRecord = (totals: ChangeTotals, record: AnalysisRecord): ChangeTotals => ({
  filesChanged: totals.filesChanged + record.filesChanged,
  linesAdded: totals.linesAdded + record.linesAdded,
  linesRemoved: totals.linesRemoved + record.linesRemoved,
  netChange: totals.netChange + record.netChange,
});

export const computeTotals = (records: readonly AnalysisRecord[]): ChangeTotals =>
  records.reduce(addRecord, EMPTY_TOTALS);

// Returns new records; the inputs keep their original fields untouched.
export const accumulateRecords = (
  records: readonly AnalysisRecord[],
): readonly CumulativeAnalysisRecord[] => {
  let running = EMPTY_TOTALS;

  return records.map((record) => {
    running = addRecord(running, record);
    return {
      ...record,
      cumulativeFilesChanged: running.filesChanged,
      cumulativeLinesAdded: running.linesAdded,
      cumulativeLinesRemoved: running.linesRemoved,
      cumulativeNetChange: running.netChange,
    };
  });
};

/**
 * Totals per author, in order of each author's first record.
 * Every record of an author contributes, not only the first one.
 */
export const summarizeByAuthor = (records: readonly AnalysisRecord[]): readonly AuthorSummary[] => {
  const byAuthor = new Map<string, AuthorSummary>();

  for (const record of records) {
    const current = byAuthor.get(record.author) ?? {
      author: record.author,
      commits: 0,
      ...EMPTY_TOTALS,
    };
    byAuthor.set(record.author, {
      ...current,
      ...addRecord(current, record),
      commits: current.commits + 1,
    });
  }

  return [...byAuthor.values()];
};
