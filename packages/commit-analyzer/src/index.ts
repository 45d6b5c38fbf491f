export {
  analyzeBranch,
  type AnalyzeBranchInput,
  type BranchAnalysisProgressEvent,
} from "./application/analyze-branch.js";
export {
  analyzeCommit,
  resolveBaseline,
  type AnalyzeCommitInput,
  type CommitAnalysisProgressEvent,
  type FileSkipReason,
} from "./application/analyze-commit.js";
export {
  DEFAULT_COMMIT_ANALYSIS_CONFIG,
  type CommitAnalysisConfig,
} from "./domain/analysis-config.js";
export {
  classifyCommit,
  filterSignificantCommits,
  isInitialCommit,
  isMergeCommit,
} from "./domain/commit-classification.js";
export { countDiffLines, type LineCounts } from "./domain/diff-stats.js";
export {
  createExtensionFilter,
  fileExtension,
  normalizeExcludedExtensions,
  normalizeExtension,
  shouldIncludeFile,
} from "./domain/file-filter.js";
