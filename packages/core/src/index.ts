export const UNKNOWN_AUTHOR = "Unknown" as const;

export type Commit = {
  id: string;
  parents: readonly string[];
  authorName: string;
  authorTimestamp: number;
};

export type CommitKind = "initial" | "merge" | "regular";

export type FileChangeType = "ADD" | "MODIFY" | "DELETE" | "MOVE" | "COPY" | (string & {});

export type FileChange = {
  path: string;
  srcPath: string | null;
  changeType: FileChangeType | null;
  srcExecutable: boolean;
  executable: boolean;
};

export type DiffSegmentType = "ADDED" | "REMOVED" | "CONTEXT";

export type DiffSegment = {
  type: DiffSegmentType;
  lines: readonly string[];
};

export type DiffHunk = {
  segments: readonly DiffSegment[];
};

export type FileDiffEntry = {
  hunks: readonly DiffHunk[];
};

export type FileDiff = {
  diffs: readonly FileDiffEntry[];
};

export type AnalysisRecord = {
  readonly analyzedCommit: string;
  readonly commitKind: CommitKind;
  readonly author: string;
  readonly date: number;
  readonly filesChanged: number;
  readonly linesAdded: number;
  readonly linesRemoved: number;
  readonly netChange: number;
};

export type CumulativeAnalysisRecord = AnalysisRecord & {
  readonly cumulativeFilesChanged: number;
  readonly cumulativeLinesAdded: number;
  readonly cumulativeLinesRemoved: number;
  readonly cumulativeNetChange: number;
};

export type CreateAnalysisRecordInput = Omit<AnalysisRecord, "netChange">;

export const createAnalysisRecord = (input: CreateAnalysisRecordInput): AnalysisRecord =>
  Object.freeze({
    ...input,
    netChange: input.linesAdded - input.linesRemoved,
  });

/**
 * Read-only access to one repository on a source-control server.
 *
 * A `previousCommitId` of `null` asks the server to diff against the
 * commit's own baseline (its first parent, or the empty tree for a root commit).
 */
export interface RepositoryClient {
  fetchCommits(branch: string): Promise<readonly Commit[]>;
  fetchCommitChanges(
    currentCommitId: string,
    previousCommitId: string | null,
  ): Promise<readonly FileChange[]>;
  fetchFileDiff(
    currentCommitId: string,
    previousCommitId: string | null,
    filePath: string,
  ): Promise<FileDiff>;
}
