import type { FileDiff } from "@commitlens/core";

export type LineCounts = {
  linesAdded: number;
  linesRemoved: number;
};

export const EMPTY_LINE_COUNTS: LineCounts = { linesAdded: 0, linesRemoved: 0 };

export const countDiffLines = (diff: FileDiff): LineCounts => {
  let linesAdded = 0;
  let linesRemoved = 0;

  for (const entry of diff.diffs) {
    for (const hunk of entry.hunks) {
      for (const segment of hunk.segments) {
        if (segment.type === "ADDED") {
          linesAdded += segment.lines.length;
        } else if (segment.type === "REMOVED") {
          linesRemoved += segment.lines.length;
        }
      }
    }
  }

  return { linesAdded, linesRemoved };
};

export const sumLineCounts = (counts: readonly LineCounts[]): LineCounts =>
  counts.reduce(
    (total, current) => ({
      linesAdded: total.linesAdded + current.linesAdded,
      linesRemoved: total.linesRemoved + current.linesRemoved,
    }),
    EMPTY_LINE_COUNTS,
  );
