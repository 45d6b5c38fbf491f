import {
  UNKNOWN_AUTHOR,
  type Commit,
  type DiffHunk,
  type DiffSegment,
  type DiffSegmentType,
  type FileChange,
  type FileDiff,
  type FileDiffEntry,
} from "@commitlens/core";

export class MalformedPayloadError extends Error {
  constructor(code: string) {
    super(code);
    this.name = "MalformedPayloadError";
  }
}

export type PagePayload<T> = {
  values: readonly T[];
  isLastPage: boolean;
  nextPageStart: number | null;
};

type JsonObject = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalArray = (value: unknown, code: string): readonly unknown[] => {
  if (value === undefined || value === null) {
    return [];
  }

  if (!Array.isArray(value)) {
    throw new MalformedPayloadError(code);
  }

  return value;
};

const readString = (value: unknown): string | null => (typeof value === "string" ? value : null);

const readBoolean = (value: unknown): boolean => value === true;

export const parsePage = <T>(body: unknown, parseValue: (value: unknown) => T): PagePayload<T> => {
  if (!isRecord(body)) {
    throw new MalformedPayloadError("invalid_page_payload");
  }

  const values = body["values"];
  if (!Array.isArray(values)) {
    throw new MalformedPayloadError("invalid_page_values");
  }

  const rawLastPage = body["isLastPage"];
  // Bitbucket always sends isLastPage; a body without it is treated as the final page.
  const isLastPage = typeof rawLastPage === "boolean" ? rawLastPage : true;
  const rawNextStart = body["nextPageStart"];
  const nextPageStart =
    typeof rawNextStart === "number" && Number.isInteger(rawNextStart) ? rawNextStart : null;

  if (!isLastPage && nextPageStart === null) {
    throw new MalformedPayloadError("missing_next_page_start");
  }

  return {
    values: values.map((value: unknown) => parseValue(value)),
    isLastPage,
    nextPageStart,
  };
};

export const parseCommit = (value: unknown): Commit => {
  if (!isRecord(value)) {
    throw new MalformedPayloadError("invalid_commit_payload");
  }

  const id = readString(value["id"]);
  if (id === null || id.length === 0) {
    throw new MalformedPayloadError("invalid_commit_id");
  }

  const parents = optionalArray(value["parents"], "invalid_commit_parents").map((parent) => {
    const parentId = isRecord(parent) ? readString(parent["id"]) : null;
    if (parentId === null) {
      throw new MalformedPayloadError("invalid_commit_parent_id");
    }

    return parentId;
  });

  const author = value["author"];
  const authorName = isRecord(author) ? readString(author["name"]) : null;
  const authorTimestamp = value["authorTimestamp"];

  return {
    id,
    parents,
    authorName: authorName ?? UNKNOWN_AUTHOR,
    authorTimestamp:
      typeof authorTimestamp === "number" && Number.isFinite(authorTimestamp) ? authorTimestamp : 0,
  };
};

const readPath = (value: unknown): string | null =>
  isRecord(value) ? readString(value["toString"]) : null;

export const parseFileChange = (value: unknown): FileChange => {
  if (!isRecord(value)) {
    throw new MalformedPayloadError("invalid_change_payload");
  }

  const path = readPath(value["path"]);
  if (path === null) {
    throw new MalformedPayloadError("invalid_change_path");
  }

  return {
    path,
    srcPath: readPath(value["srcPath"]),
    changeType: readString(value["type"]),
    srcExecutable: readBoolean(value["srcExecutable"]),
    executable: readBoolean(value["executable"]),
  };
};

const SEGMENT_TYPES: readonly DiffSegmentType[] = ["ADDED", "REMOVED", "CONTEXT"];

const isSegmentType = (value: unknown): value is DiffSegmentType =>
  SEGMENT_TYPES.some((type) => type === value);

const parseLine = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }

  const text = isRecord(value) ? readString(value["line"]) : null;
  if (text === null) {
    throw new MalformedPayloadError("invalid_diff_line");
  }

  return text;
};

const parseSegment = (value: unknown): DiffSegment => {
  if (!isRecord(value)) {
    throw new MalformedPayloadError("invalid_diff_segment");
  }

  const type = value["type"];
  if (!isSegmentType(type)) {
    throw new MalformedPayloadError("invalid_diff_segment_type");
  }

  return {
    type,
    lines: optionalArray(value["lines"], "invalid_diff_lines").map(parseLine),
  };
};

const parseHunk = (value: unknown): DiffHunk => {
  if (!isRecord(value)) {
    throw new MalformedPayloadError("invalid_diff_hunk");
  }

  return {
    segments: optionalArray(value["segments"], "invalid_diff_segments").map(parseSegment),
  };
};

const parseDiffEntry = (value: unknown): FileDiffEntry => {
  if (!isRecord(value)) {
    throw new MalformedPayloadError("invalid_diff_entry");
  }

  return {
    hunks: optionalArray(value["hunks"], "invalid_diff_hunks").map(parseHunk),
  };
};

export const parseFileDiff = (body: unknown): FileDiff => {
  if (!isRecord(body)) {
    throw new MalformedPayloadError("invalid_diff_payload");
  }

  return {
    diffs: optionalArray(body["diffs"], "invalid_diff_list").map(parseDiffEntry),
  };
};
