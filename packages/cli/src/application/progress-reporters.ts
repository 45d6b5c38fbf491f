import type {
  BranchAnalysisProgressEvent,
  CommitAnalysisProgressEvent,
} from "@commitlens/commit-analyzer";
import { shortCommitId } from "@commitlens/reporter";
import type { RepositoryClientProgressEvent } from "@commitlens/repository-client";
import type { Logger } from "./logger.js";

const describeBaseline = (baseline: string | null): string =>
  baseline === null ? "none" : shortCommitId(baseline);

export const createClientProgressReporter = (
  logger: Logger,
): ((event: RepositoryClientProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "request_started":
        logger.debug(`api request: ${event.url}`);
        break;
      case "page_fetched":
        if (!event.isLastPage) {
          logger.debug(
            `client: fetched ${event.resource} page at ${event.start} (${event.size} values), more pages follow`,
          );
        }
        break;
      case "resource_fetched":
        if (event.resource === "commits") {
          logger.info(`client: retrieved ${event.total} commits`);
        } else {
          logger.debug(`client: retrieved ${event.total} changes`);
        }
        break;
    }
  };
};

const reportCommitEvent = (logger: Logger, event: CommitAnalysisProgressEvent): void => {
  switch (event.stage) {
    case "baseline_resolved":
      logger.debug(
        `analysis: ${shortCommitId(event.commitId)} diffs against ${describeBaseline(event.baseline)}`,
      );
      break;
    case "changes_loaded":
      logger.debug(`analysis: ${shortCommitId(event.commitId)} touches ${event.files} files`);
      break;
    case "file_skipped":
      logger.debug(`analysis: skipped ${event.filePath} (${event.reason})`);
      break;
    case "file_diff_loaded":
      logger.debug(
        `analysis: ${event.filePath} +${event.linesAdded} -${event.linesRemoved}`,
      );
      break;
    case "commit_analyzed":
      logger.info(
        `analysis: ${shortCommitId(event.record.analyzedCommit)} lines added ${event.record.linesAdded}, lines removed ${event.record.linesRemoved}, net change ${event.record.netChange}`,
      );
      break;
  }
};

export const createAnalysisProgressReporter = (
  logger: Logger,
): ((event: BranchAnalysisProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "loading_commits":
        logger.info(`analysis: fetching commits for branch ${event.branch}`);
        break;
      case "commits_loaded":
        logger.debug(`analysis: loaded ${event.total} commits`);
        break;
      case "no_commits":
        logger.warn(`analysis: no commits found in branch ${event.branch}`);
        break;
      case "significant_commits_filtered":
        logger.info(
          `analysis: filtered ${event.significant} significant commits from ${event.total} total commits`,
        );
        break;
      case "no_significant_commits":
        logger.warn(`analysis: no initial or merge commits found in branch ${event.branch}`);
        break;
      case "commit_analysis_started":
        logger.info(
          `analysis: commit ${event.index}/${event.total} ${shortCommitId(event.commitId)} (baseline ${describeBaseline(event.baseline)})`,
        );
        break;
      case "commit":
        reportCommitEvent(logger, event.event);
        break;
      case "analysis_completed":
        logger.info(`analysis: completed ${event.records} significant commits`);
        break;
    }
  };
};
