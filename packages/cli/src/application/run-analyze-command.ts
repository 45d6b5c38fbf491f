import { writeFile } from "node:fs/promises";
import type { AnalysisRecord } from "@commitlens/core";
import { analyzeBranch } from "@commitlens/commit-analyzer";
import { formatReport } from "@commitlens/reporter";
import {
  createBitbucketRepositoryClient,
  type FetchLike,
} from "@commitlens/repository-client";
import type { AnalyzeConfig } from "./config.js";
import { createSilentLogger, type Logger } from "./logger.js";
import {
  createAnalysisProgressReporter,
  createClientProgressReporter,
} from "./progress-reporters.js";

export type AnalyzeCommandDependencies = {
  fetch?: FetchLike;
};

export type AnalyzeCommandResult = {
  records: readonly AnalysisRecord[];
  rendered: string;
};

export const runAnalyzeCommand = async (
  config: AnalyzeConfig,
  logger: Logger = createSilentLogger(),
  dependencies: AnalyzeCommandDependencies = {},
): Promise<AnalyzeCommandResult> => {
  const { connection } = config;
  logger.info(`analyzing ${connection.projectKey}/${connection.repositorySlug} at ${connection.baseUrl}`);
  if (config.excludedExtensions.length > 0) {
    logger.info(`excluding file extensions: ${config.excludedExtensions.join(", ")}`);
  }

  const client = createBitbucketRepositoryClient({
    ...connection,
    onProgress: createClientProgressReporter(logger),
    ...(dependencies.fetch === undefined ? {} : { fetch: dependencies.fetch }),
  });

  const records = await analyzeBranch(
    {
      branch: config.branch,
      config: {
        excludedExtensions: config.excludedExtensions,
        fileDiffConcurrency: config.fileDiffConcurrency,
      },
    },
    client,
    createAnalysisProgressReporter(logger),
  );

  const rendered = formatReport(records, config.format, {
    showCumulative: config.showCumulative,
    timeZone: config.timeZone,
  });

  if (config.outputPath !== null) {
    await writeFile(config.outputPath, rendered, "utf8");
    logger.info(`report written: ${config.outputPath}`);
  }

  return { records, rendered };
};
