import type { Commit, CommitKind } from "@commitlens/core";

export const isInitialCommit = (commit: Commit): boolean => commit.parents.length === 0;

export const isMergeCommit = (commit: Commit): boolean => commit.parents.length > 1;

export const classifyCommit = (commit: Commit): CommitKind => {
  if (isInitialCommit(commit)) {
    return "initial";
  }

  return isMergeCommit(commit) ? "merge" : "regular";
};

/**
 * Keeps the integration points of a history (root and merge commits) in their original order.
 */
export const filterSignificantCommits = (commits: readonly Commit[]): readonly Commit[] =>
  commits.filter((commit) => isInitialCommit(commit) || isMergeCommit(commit));
