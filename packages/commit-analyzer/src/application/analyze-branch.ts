import type { AnalysisRecord, RepositoryClient } from "@commitlens/core";
import type { CommitAnalysisConfig } from "../domain/analysis-config.js";
import { filterSignificantCommits } from "../domain/commit-classification.js";
import {
  analyzeCommit,
  resolveBaseline,
  type CommitAnalysisProgressEvent,
} from "./analyze-commit.js";
import { foldSequentially } from "./map-with-concurrency.js";

export type AnalyzeBranchInput = {
  branch: string;
  config?: Partial<CommitAnalysisConfig>;
};

export type BranchAnalysisProgressEvent =
  | { stage: "loading_commits"; branch: string }
  | { stage: "commits_loaded"; total: number }
  | { stage: "no_commits"; branch: string }
  | { stage: "significant_commits_filtered"; significant: number; total: number }
  | { stage: "no_significant_commits"; branch: string }
  | {
      stage: "commit_analysis_started";
      index: number;
      total: number;
      commitId: string;
      baseline: string | null;
    }
  | { stage: "commit"; event: CommitAnalysisProgressEvent }
  | { stage: "analysis_completed"; records: number };

type BranchFoldState = {
  records: readonly AnalysisRecord[];
  previousCommitId: string | null;
};

/**
 * Analyzes the root and merge commits of `branch`, oldest first.
 *
 * Each significant commit is diffed against the significant commit analyzed
 * before it rather than its own first parent, so records measure the change
 * between consecutive integration points. The oldest one falls back to its
 * first parent, or to the empty tree when it is a root commit.
 */
export const analyzeBranch = async (
  input: AnalyzeBranchInput,
  client: RepositoryClient,
  onProgress?: (event: BranchAnalysisProgressEvent) => void,
): Promise<readonly AnalysisRecord[]> => {
  onProgress?.({ stage: "loading_commits", branch: input.branch });
  const commits = await client.fetchCommits(input.branch);
  onProgress?.({ stage: "commits_loaded", total: commits.length });
  if (commits.length === 0) {
    onProgress?.({ stage: "no_commits", branch: input.branch });
    return [];
  }

  const significant = filterSignificantCommits(commits);
  onProgress?.({
    stage: "significant_commits_filtered",
    significant: significant.length,
    total: commits.length,
  });
  if (significant.length === 0) {
    onProgress?.({ stage: "no_significant_commits", branch: input.branch });
    return [];
  }

  // The server lists newest first.
  const oldestFirst = [...significant].reverse();
  const initial: BranchFoldState = { records: [], previousCommitId: null };

  const final = await foldSequentially(oldestFirst, initial, async (state, commit, index) => {
    onProgress?.({
      stage: "commit_analysis_started",
      index: index + 1,
      total: oldestFirst.length,
      commitId: commit.id,
      baseline: resolveBaseline(commit, state.previousCommitId),
    });
    const record = await analyzeCommit(
      {
        commit,
        previousCommitId: state.previousCommitId,
        ...(input.config === undefined ? {} : { config: input.config }),
      },
      client,
      (event) => onProgress?.({ stage: "commit", event }),
    );

    return { records: [...state.records, record], previousCommitId: commit.id };
  });

  onProgress?.({ stage: "analysis_completed", records: final.records.length });
  return final.records;
};
