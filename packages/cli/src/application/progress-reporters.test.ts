import { createAnalysisRecord } from "@commitlens/core";
import { describe, expect, it } from "vitest";
import type { Logger } from "./logger.js";
import {
  createAnalysisProgressReporter,
  createClientProgressReporter,
} from "./progress-reporters.js";

const createRecordingLogger = () => {
  const entries: string[] = [];
  const logger: Logger = {
    error: (message) => entries.push(`error ${message}`),
    warn: (message) => entries.push(`warn ${message}`),
    info: (message) => entries.push(`info ${message}`),
    debug: (message) => entries.push(`debug ${message}`),
  };

  return { logger, entries };
};

describe("createAnalysisProgressReporter", () => {
  it("logs branch progress with short commit ids", () => {
    const { logger, entries } = createRecordingLogger();
    const report = createAnalysisProgressReporter(logger);

    report({ stage: "significant_commits_filtered", significant: 2, total: 40 });
    report({
      stage: "commit_analysis_started",
      index: 2,
      total: 2,
      commitId: "9f8e7d6c5b4a",
      baseline: "0a1b2c3d4e5f",
    });
    report({
      stage: "commit",
      event: {
        stage: "commit_analyzed",
        record: createAnalysisRecord({
          analyzedCommit: "9f8e7d6c5b4a",
          commitKind: "merge",
          author: "Alice",
          date: 0,
          filesChanged: 1,
          linesAdded: 2,
          linesRemoved: 7,
        }),
      },
    });
    report({ stage: "no_significant_commits", branch: "main" });

    expect(entries).toEqual([
      "info analysis: filtered 2 significant commits from 40 total commits",
      "info analysis: commit 2/2 9f8e7d6 (baseline 0a1b2c3)",
      "info analysis: 9f8e7d6 lines added 2, lines removed 7, net change -5",
      "warn analysis: no initial or merge commits found in branch main",
    ]);
  });
});

describe("createClientProgressReporter", () => {
  it("logs commit totals at info and intermediate pages at debug", () => {
    const { logger, entries } = createRecordingLogger();
    const report = createClientProgressReporter(logger);

    report({ stage: "page_fetched", resource: "commits", start: 0, size: 100, isLastPage: false });
    report({ stage: "page_fetched", resource: "commits", start: 100, size: 3, isLastPage: true });
    report({ stage: "resource_fetched", resource: "commits", total: 103 });

    expect(entries).toEqual([
      "debug client: fetched commits page at 0 (100 values), more pages follow",
      "info client: retrieved 103 commits",
    ]);
  });
});
