import {
  createAnalysisRecord,
  type AnalysisRecord,
  type Commit,
  type FileChange,
  type RepositoryClient,
} from "@commitlens/core";
import { createEffectiveConfig, type CommitAnalysisConfig } from "../domain/analysis-config.js";
import { classifyCommit } from "../domain/commit-classification.js";
import { countDiffLines, sumLineCounts } from "../domain/diff-stats.js";
import { createExtensionFilter } from "../domain/file-filter.js";
import { mapWithConcurrency } from "./map-with-concurrency.js";

export type AnalyzeCommitInput = {
  commit: Commit;
  previousCommitId?: string | null;
  config?: Partial<CommitAnalysisConfig>;
};

export type FileSkipReason = "excluded_extension" | "missing_change_type";

export type CommitAnalysisProgressEvent =
  | { stage: "baseline_resolved"; commitId: string; baseline: string | null }
  | { stage: "changes_loaded"; commitId: string; files: number }
  | { stage: "file_skipped"; commitId: string; filePath: string; reason: FileSkipReason }
  | {
      stage: "file_diff_loaded";
      commitId: string;
      filePath: string;
      linesAdded: number;
      linesRemoved: number;
    }
  | { stage: "commit_analyzed"; record: AnalysisRecord };

export const resolveBaseline = (commit: Commit, previousCommitId?: string | null): string | null =>
  previousCommitId ?? commit.parents[0] ?? null;

const skipReason = (
  change: FileChange,
  isIncluded: (filePath: string) => boolean,
): FileSkipReason | null => {
  if (!isIncluded(change.path)) {
    return "excluded_extension";
  }

  return change.changeType === null ? "missing_change_type" : null;
};

export const analyzeCommit = async (
  input: AnalyzeCommitInput,
  client: RepositoryClient,
  onProgress?: (event: CommitAnalysisProgressEvent) => void,
): Promise<AnalysisRecord> => {
  const { commit } = input;
  const config = createEffectiveConfig(input.config);
  const isIncluded = createExtensionFilter(config.excludedExtensions);
  const baseline = resolveBaseline(commit, input.previousCommitId);
  onProgress?.({ stage: "baseline_resolved", commitId: commit.id, baseline });

  const changes = await client.fetchCommitChanges(commit.id, baseline);
  onProgress?.({ stage: "changes_loaded", commitId: commit.id, files: changes.length });

  const countedChanges = changes.filter((change) => {
    const reason = skipReason(change, isIncluded);
    if (reason !== null) {
      onProgress?.({ stage: "file_skipped", commitId: commit.id, filePath: change.path, reason });
    }

    return reason === null;
  });

  const perFileCounts = await mapWithConcurrency(
    countedChanges,
    config.fileDiffConcurrency,
    async (change) => {
      const diff = await client.fetchFileDiff(commit.id, baseline, change.path);
      const counts = countDiffLines(diff);
      onProgress?.({
        stage: "file_diff_loaded",
        commitId: commit.id,
        filePath: change.path,
        ...counts,
      });
      return counts;
    },
  );
  const totals = sumLineCounts(perFileCounts);

  const record = createAnalysisRecord({
    analyzedCommit: commit.id,
    commitKind: classifyCommit(commit),
    author: commit.authorName,
    date: commit.authorTimestamp,
    // Every listed change counts as a changed file, including those excluded from line totals.
    filesChanged: changes.length,
    linesAdded: totals.linesAdded,
    linesRemoved: totals.linesRemoved,
  });
  onProgress?.({ stage: "commit_analyzed", record });
  return record;
};
