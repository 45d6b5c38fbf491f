export type CommitAnalysisConfig = {
  excludedExtensions: readonly string[];
  fileDiffConcurrency: number;
};

export const DEFAULT_COMMIT_ANALYSIS_CONFIG: CommitAnalysisConfig = {
  excludedExtensions: [],
  fileDiffConcurrency: 1,
};

export const createEffectiveConfig = (
  overrides: Partial<CommitAnalysisConfig> | undefined,
): CommitAnalysisConfig => ({
  ...DEFAULT_COMMIT_ANALYSIS_CONFIG,
  ...overrides,
});
