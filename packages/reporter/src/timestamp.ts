import { UNKNOWN_DATE, type TimeZoneMode } from "./domain.js";

const pad2 = (value: number): string => String(value).padStart(2, "0");

/**
 * Renders epoch milliseconds as `YYYY-MM-DD HH:MM:SS`.
 * Zero, missing and non-finite values mean the server did not report a date.
 */
export const formatTimestamp = (
  timestampMs: number | null | undefined,
  timeZone: TimeZoneMode = "local",
): string => {
  if (timestampMs === null || timestampMs === undefined || timestampMs === 0) {
    return UNKNOWN_DATE;
  }

  const date = new Date(timestampMs);
  if (Number.isNaN(date.getTime())) {
    return UNKNOWN_DATE;
  }

  const utc = timeZone === "utc";
  const year = utc ? date.getUTCFullYear() : date.getFullYear();
  const month = (utc ? date.getUTCMonth() : date.getMonth()) + 1;
  const day = utc ? date.getUTCDate() : date.getDate();
  const hours = utc ? date.getUTCHours() : date.getHours();
  const minutes = utc ? date.getUTCMinutes() : date.getMinutes();
  const seconds = utc ? date.getUTCSeconds() : date.getSeconds();

  return `${year}-${pad2(month)}-${pad2(day)} ${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
};
